/**
 * Pipeline configuration schema.
 *
 * The pipeline configuration is the static half of argument resolution:
 * every stage parameter that no earlier component places in the context is
 * looked up here by name. Keys therefore use the same snake_case spelling
 * as the parameters declared on component descriptors.
 *
 * The schema is passthrough: component-specific keys that are not listed
 * below survive validation untouched and remain available to `fillArgs`.
 */

import { z } from "zod";

/**
 * Either the name of a registered pipeline template or an explicit,
 * ordered list of component names.
 */
export const PipelineSpecSchema = z.union([
  z.string().min(1).describe("Name of a registered pipeline template"),
  z
    .array(z.string().min(1))
    .min(1)
    .describe("Ordered component names"),
]);

export type PipelineSpec = z.infer<typeof PipelineSpecSchema>;

/** intent name -> keywords that trigger it */
export const IntentKeywordsSchema = z.record(
  z.string().min(1),
  z.array(z.string().min(1)).min(1)
);

/** entity type -> regular expression source */
export const EntityPatternsSchema = z.record(z.string().min(1), z.string().min(1));

export const PipelineConfigSchema = z
  .object({
    language: z
      .string()
      .regex(/^[a-z]{2}(-[A-Z]{2})?$/, "Expected a language tag such as \"en\" or \"en-US\"")
      .default("en")
      .describe("Language of the training data and of parsed messages"),

    pipeline: PipelineSpecSchema,

    case_sensitive: z
      .boolean()
      .default(false)
      .describe("Whether token normalization preserves case"),

    intent_keywords: IntentKeywordsSchema.default({}).describe(
      "Keywords used by the keyword intent classifier"
    ),

    entity_patterns: EntityPatternsSchema.default({}).describe(
      "Regular expressions used by the regex entity extractor"
    ),
  })
  .passthrough();

export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;
export type PipelineConfigInput = z.input<typeof PipelineConfigSchema>;

/**
 * Flat, read-only view of a pipeline configuration, keyed by parameter name.
 */
export type PipelineSettings = Readonly<Record<string, unknown>>;
