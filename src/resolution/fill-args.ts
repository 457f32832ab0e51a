/**
 * Argument filling for component stage methods.
 *
 * A stage method declares its parameters by name. Each name is looked up
 * in the runtime context first and in the pipeline configuration second;
 * the first hit wins, whatever its value (`null` and `undefined` included).
 * Names found in neither are reported together, never one at a time.
 */

import type { PipelineSettings } from "../config/pipeline/schema.js";
import type { LifecycleStage } from "../components/schema.js";

/** Where a fill happened, for error messages only. */
export interface FillLocation {
  componentName?: string;
  stage?: LifecycleStage;
}

export class MissingArgumentError extends Error {
  public readonly componentName: string | undefined;
  public readonly stage: LifecycleStage | undefined;

  constructor(
    /** Unsatisfiable names, in declaration order, without duplicates */
    public readonly missingArguments: readonly string[],
    where: FillLocation = {}
  ) {
    const location =
      where.componentName !== undefined
        ? ` for component "${where.componentName}"${where.stage ? ` (stage ${where.stage})` : ""}`
        : where.stage
          ? ` for stage ${where.stage}`
          : "";
    super(
      `No value available${location} for argument(s): ${missingArguments.join(", ")}. ` +
        `Add them to the pipeline configuration or place a component that provides them earlier in the pipeline.`
    );
    this.name = "MissingArgumentError";
    this.componentName = where.componentName;
    this.stage = where.stage;
  }
}

function uniqueInOrder(names: Iterable<string>): string[] {
  return [...new Set(names)];
}

/**
 * Names that neither the available context keys nor the configuration
 * can satisfy. Key-only counterpart of fillArgs() for planning passes.
 */
export function unsatisfiedArguments(
  requiredNames: readonly string[],
  availableKeys: ReadonlySet<string>,
  config: PipelineSettings
): string[] {
  return uniqueInOrder(
    requiredNames.filter((name) => !availableKeys.has(name) && !Object.hasOwn(config, name))
  );
}

/**
 * Resolve each required name to a value, context before configuration.
 *
 * @returns Values in the order of `requiredNames`
 * @throws MissingArgumentError naming every unsatisfiable argument
 *
 * @example
 *   fillArgs(["a", "b"], { a: 1 }, { b: 2 }); // [1, 2]
 */
export function fillArgs(
  requiredNames: readonly string[],
  context: Readonly<Record<string, unknown>>,
  config: PipelineSettings,
  where?: FillLocation
): unknown[] {
  const values: unknown[] = [];
  const missing: string[] = [];

  for (const name of requiredNames) {
    if (Object.hasOwn(context, name)) {
      values.push(context[name]);
    } else if (Object.hasOwn(config, name)) {
      values.push(config[name]);
    } else {
      missing.push(name);
    }
  }

  if (missing.length > 0) {
    throw new MissingArgumentError(uniqueInOrder(missing), where);
  }
  return values;
}
