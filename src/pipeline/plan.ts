/**
 * Ordered pipeline planning.
 *
 * A key-only dry run of the pipeline, in order: each stage starts from its
 * base keys plus the final keys of the stages it inherits, and every
 * component must find its arguments among the keys produced so far or in
 * the configuration. Runs before any component is instantiated.
 *
 * Unlike supersetContextKeys(), order matters here: a component cannot
 * use a key that only a later component provides.
 */

import type { PipelineSettings } from "../config/pipeline/schema.js";
import {
  LIFECYCLE_STAGES,
  providedKeys,
  requiredArguments,
  type ComponentDescriptor,
  type LifecycleStage,
} from "../components/schema.js";
import { STAGE_BASE_KEYS, STAGE_INHERITS } from "../resolution/context.js";
import { MissingArgumentError, unsatisfiedArguments } from "../resolution/fill-args.js";

export interface PlanIssue {
  componentName: string;
  stage: LifecycleStage;
  missingArguments: string[];
}

export interface PipelinePlan {
  /** Stages whose issues are reported */
  stages: readonly LifecycleStage[];
  /** Issues in stage order, then pipeline order */
  issues: PlanIssue[];
  /** Keys present after the last component of each stage */
  finalKeys: Readonly<Record<LifecycleStage, ReadonlySet<string>>>;
}

/**
 * Walk every stage in lifecycle order; report issues for `stages` only.
 * Inherited stages are always walked, since their keys carry over.
 */
export function planPipeline(
  descriptors: ReadonlyArray<Readonly<ComponentDescriptor>>,
  config: PipelineSettings,
  stages: readonly LifecycleStage[] = LIFECYCLE_STAGES
): PipelinePlan {
  const finalKeys: Record<LifecycleStage, Set<string>> = {
    pipeline_init: new Set(),
    train: new Set(),
    process: new Set(),
    persist: new Set(),
  };
  const issues: PlanIssue[] = [];

  for (const stage of LIFECYCLE_STAGES) {
    const keys = new Set<string>(STAGE_BASE_KEYS[stage]);
    for (const inherited of STAGE_INHERITS[stage]) {
      for (const key of finalKeys[inherited]) keys.add(key);
    }

    for (const descriptor of descriptors) {
      const missing = unsatisfiedArguments(requiredArguments(descriptor, stage), keys, config);
      if (missing.length > 0 && stages.includes(stage)) {
        issues.push({ componentName: descriptor.name, stage, missingArguments: missing });
      }
      for (const key of providedKeys(descriptor, stage)) keys.add(key);
    }
    finalKeys[stage] = keys;
  }

  return { stages, issues, finalKeys };
}

/**
 * @throws MissingArgumentError for the first issue, naming its component
 *         and stage
 */
export function assertPipelineResolvable(plan: PipelinePlan): void {
  const [first] = plan.issues;
  if (first === undefined) return;
  throw new MissingArgumentError(first.missingArguments, {
    componentName: first.componentName,
    stage: first.stage,
  });
}
