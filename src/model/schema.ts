/**
 * Persisted model metadata schema.
 *
 * A trained model directory holds one metadata.json describing how the
 * model was produced and what each component persisted. Loading a model
 * reads only this file; components restore themselves from their entry
 * in `components`.
 */

import { z } from "zod";

/**
 * Metadata format version. Loaders accept any version with the same major.
 */
export const MODEL_FORMAT_VERSION = "1.0.0";

export const MODEL_METADATA_FILENAME = "metadata.json";

export const ModelMetadataSchema = z
  .object({
    formatVersion: z
      .string()
      .regex(/^\d+\.\d+\.\d+$/, "Expected a semantic version such as 1.0.0"),
    language: z.string().min(1),
    pipeline: z.array(z.string().min(1)).describe("Component names in pipeline order"),
    trainedAt: z.string().datetime(),
    runId: z.string().min(1),
    config: z.record(z.unknown()).describe("Configuration used for training"),
    components: z
      .record(z.record(z.unknown()))
      .describe("Component name -> what its persist stage returned"),
  })
  .strict();

export type ModelMetadataData = z.infer<typeof ModelMetadataSchema>;
