/**
 * Training data schema.
 *
 * Training data is a list of example messages, each optionally labelled
 * with an intent and with entity spans, plus explicit entity synonyms.
 */

import { z } from "zod";

export const EntitySchema = z
  .object({
    /** Character offset of the first character of the span */
    start: z.number().int().nonnegative(),
    /** Character offset after the last character of the span */
    end: z.number().int().nonnegative(),
    /** Canonical value; may differ from the text of the span */
    value: z.string(),
    entity: z.string().min(1),
    /** Component that produced the entity, if extracted */
    extractor: z.string().optional(),
  })
  .refine((e) => e.end >= e.start, { message: "end must not precede start", path: ["end"] });

export type Entity = z.infer<typeof EntitySchema>;

export const TrainingExampleSchema = z.object({
  text: z.string().min(1),
  intent: z.string().min(1).optional(),
  entities: z.array(EntitySchema).default([]),
});

export type TrainingExample = z.infer<typeof TrainingExampleSchema>;

export const TrainingDataSchema = z.object({
  examples: z.array(TrainingExampleSchema),
  /** surface form -> canonical value */
  entity_synonyms: z.record(z.string().min(1), z.string().min(1)).default({}),
});

export type TrainingData = z.infer<typeof TrainingDataSchema>;
export type TrainingDataInput = z.input<typeof TrainingDataSchema>;

export class TrainingDataError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid training data: ${issues.join("; ")}`);
    this.name = "TrainingDataError";
  }
}

/**
 * Validate training data. Entity spans must lie inside their example.
 *
 * @throws TrainingDataError listing every problem
 */
export function parseTrainingData(input: unknown): TrainingData {
  const result = TrainingDataSchema.safeParse(input);
  if (!result.success) {
    throw new TrainingDataError(
      result.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
    );
  }

  const issues: string[] = [];
  for (const [i, example] of result.data.examples.entries()) {
    for (const [j, entity] of example.entities.entries()) {
      if (entity.end > example.text.length) {
        issues.push(`examples.${i}.entities.${j}: span ends beyond the example text`);
      }
    }
  }
  if (issues.length > 0) {
    throw new TrainingDataError(issues);
  }
  return result.data;
}
