/**
 * Runtime checks for the positional arguments built-in components receive.
 */

import { z } from "zod";
import type { LifecycleStage } from "../schema.js";

export class StageArgumentError extends Error {
  constructor(
    public readonly componentName: string,
    public readonly stage: LifecycleStage,
    public readonly issues: string[]
  ) {
    super(`Component "${componentName}" received invalid ${stage} arguments: ${issues.join("; ")}`);
    this.name = "StageArgumentError";
  }
}

/**
 * Parse a stage's arguments against a tuple schema.
 *
 * @throws StageArgumentError naming the argument positions that failed
 */
export function parseStageArgs<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  args: readonly unknown[],
  componentName: string,
  stage: LifecycleStage
): T {
  const result = schema.safeParse(args);
  if (!result.success) {
    throw new StageArgumentError(
      componentName,
      stage,
      result.error.issues.map((i) => `argument ${i.path.join(".")}: ${i.message}`)
    );
  }
  return result.data;
}
