/**
 * Stage execution.
 *
 * Runs one lifecycle stage over the pipeline's components, in order.
 * Each component's declared arguments are filled from the live context
 * (then the configuration), its stage method is called with them, and
 * the returned record is checked against the component's `provides`
 * before it is merged into the context.
 */

import type { PipelineSettings } from "../config/pipeline/schema.js";
import type { Logger } from "../logging/logger.js";
import {
  STAGE_METHODS,
  declaresStage,
  providedKeys,
  requiredArguments,
  stageMethod,
  type Component,
  type ComponentDescriptor,
  type LifecycleStage,
  type StageOutput,
} from "../components/schema.js";
import type { PipelineContext } from "../resolution/context.js";
import { fillArgs } from "../resolution/fill-args.js";

export type ContractViolation = "missing_keys" | "missing_method" | "invalid_output";

export class ContractViolationError extends Error {
  constructor(
    public readonly componentName: string,
    public readonly stage: LifecycleStage,
    public readonly missingKeys: readonly string[],
    public readonly violation: ContractViolation = "missing_keys"
  ) {
    super(ContractViolationError.describe(componentName, stage, missingKeys, violation));
    this.name = "ContractViolationError";
  }

  private static describe(
    componentName: string,
    stage: LifecycleStage,
    missingKeys: readonly string[],
    violation: ContractViolation
  ): string {
    switch (violation) {
      case "missing_keys":
        return `Component "${componentName}" did not provide ${missingKeys.join(", ")} in stage ${stage}`;
      case "missing_method":
        return `Component "${componentName}" declares stage ${stage} but has no ${STAGE_METHODS[stage]}() method`;
      case "invalid_output":
        return `Component "${componentName}" returned something other than a record from stage ${stage}`;
    }
  }
}

/** A built component in its pipeline position. */
export interface PipelineStep {
  readonly name: string;
  readonly descriptor: Readonly<ComponentDescriptor>;
  readonly component: Component;
}

export interface StageOutputRecord {
  componentName: string;
  output: StageOutput;
}

export interface StageResult {
  context: PipelineContext;
  /** What each component returned, in pipeline order */
  outputs: StageOutputRecord[];
}

function isRecord(value: unknown): value is StageOutput {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Run `stage` over `steps`, extending `context` in place.
 *
 * @throws MissingArgumentError if an argument is in neither the context
 *         nor the configuration
 * @throws ContractViolationError if a component breaks its descriptor
 */
export function runStage(
  steps: readonly PipelineStep[],
  stage: LifecycleStage,
  context: PipelineContext,
  config: PipelineSettings,
  logger?: Logger
): StageResult {
  const outputs: StageOutputRecord[] = [];

  for (const { name, descriptor, component } of steps) {
    const method = stageMethod(component, stage);
    if (method === undefined) {
      if (declaresStage(descriptor, stage)) {
        throw new ContractViolationError(name, stage, providedKeys(descriptor, stage), "missing_method");
      }
      continue;
    }

    const args = fillArgs(requiredArguments(descriptor, stage), context.toRecord(), config, {
      componentName: name,
      stage,
    });
    const returned: unknown = method(...args) ?? {};
    if (!isRecord(returned)) {
      throw new ContractViolationError(name, stage, providedKeys(descriptor, stage), "invalid_output");
    }

    const promised = providedKeys(descriptor, stage);
    const missing = promised.filter((key) => !Object.hasOwn(returned, key));
    if (missing.length > 0) {
      throw new ContractViolationError(name, stage, missing);
    }

    const undeclared = Object.keys(returned).filter((key) => !promised.includes(key));
    if (undeclared.length > 0) {
      logger?.warn("Component returned undeclared context keys", {
        component: name,
        stage,
        keys: undeclared,
      });
    }

    context.extend(returned);
    outputs.push({ componentName: name, output: returned });
  }

  return { context, outputs };
}
