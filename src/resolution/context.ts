/**
 * Pipeline context: the per-invocation key/value store that stage methods
 * read their arguments from and write their results to.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * STAGES AND THEIR BASE KEYS
 * ═══════════════════════════════════════════════════════════════════════════
 *
 *   pipeline_init   (none)
 *   train           training_data           inherits pipeline_init
 *   process         text, intent, entities  inherits pipeline_init
 *   persist         model_dir               inherits pipeline_init, train
 *
 * Keys are only ever added. A value may be replaced by a later component
 * (extractors extend the `entities` list), but no key disappears.
 */

import {
  providedKeys,
  type ComponentDescriptor,
  type LifecycleStage,
} from "../components/schema.js";

// ============================================================
// Stage tables
// ============================================================

/** Keys that must be present before the first component runs. */
export const STAGE_BASE_KEYS: Readonly<Record<LifecycleStage, readonly string[]>> = {
  pipeline_init: [],
  train: ["training_data"],
  process: ["text", "intent", "entities"],
  persist: ["model_dir"],
};

/** Stages whose final context is carried into this one. */
export const STAGE_INHERITS: Readonly<Record<LifecycleStage, readonly LifecycleStage[]>> = {
  pipeline_init: [],
  train: ["pipeline_init"],
  process: ["pipeline_init"],
  persist: ["pipeline_init", "train"],
};

/**
 * Default values seeded for a stage. Returns fresh objects on every call so
 * no two contexts share a mutable default.
 */
export function stageDefaults(stage: LifecycleStage): Record<string, unknown> {
  switch (stage) {
    case "process":
      return { intent: null, entities: [] };
    case "pipeline_init":
    case "train":
    case "persist":
      return {};
  }
}

export class ContextSeedError extends Error {
  constructor(
    public readonly stage: LifecycleStage,
    public readonly missingKeys: readonly string[]
  ) {
    super(`Cannot start stage ${stage}: missing base key(s) ${missingKeys.join(", ")}`);
    this.name = "ContextSeedError";
  }
}

// ============================================================
// Live context
// ============================================================

export class PipelineContext {
  private readonly values = new Map<string, unknown>();

  private constructor(public readonly stage: LifecycleStage) {}

  /**
   * Start a stage's context.
   *
   * Order of application: inherited values, stage defaults, then `values`.
   *
   * @throws ContextSeedError if a base key is still absent
   */
  static seed(
    stage: LifecycleStage,
    values: Readonly<Record<string, unknown>> = {},
    inherited?: PipelineContext
  ): PipelineContext {
    const context = new PipelineContext(stage);
    if (inherited) {
      context.extend(inherited.toRecord());
    }
    context.extend(stageDefaults(stage));
    context.extend(values);

    const missing = STAGE_BASE_KEYS[stage].filter((key) => !context.has(key));
    if (missing.length > 0) {
      throw new ContextSeedError(stage, missing);
    }
    return context;
  }

  has(key: string): boolean {
    return this.values.has(key);
  }

  get(key: string): unknown {
    return this.values.get(key);
  }

  keys(): string[] {
    return [...this.values.keys()];
  }

  get size(): number {
    return this.values.size;
  }

  /**
   * Add or replace keys. Existing keys not named in `updates` are kept.
   */
  extend(updates: Readonly<Record<string, unknown>>): this {
    for (const [key, value] of Object.entries(updates)) {
      this.values.set(key, value);
    }
    return this;
  }

  /**
   * Frozen snapshot, suitable as the `context` argument of fillArgs().
   */
  toRecord(): Readonly<Record<string, unknown>> {
    return Object.freeze(Object.fromEntries(this.values));
  }
}

// ============================================================
// Superset context (validation only)
// ============================================================

/**
 * Every key that could be in a stage's context for a given set of
 * components, ignoring order: the stage's base keys plus everything any
 * component provides in the stage or in a stage it inherits.
 *
 * Used by static validation. Ordered checks use planPipeline().
 */
export function supersetContextKeys(
  descriptors: Iterable<Readonly<ComponentDescriptor>>,
  stage: LifecycleStage
): Set<string> {
  const list = [...descriptors];
  const keys = new Set<string>(STAGE_BASE_KEYS[stage]);
  for (const contributing of [...STAGE_INHERITS[stage], stage]) {
    for (const key of STAGE_BASE_KEYS[contributing]) keys.add(key);
    for (const descriptor of list) {
      for (const key of providedKeys(descriptor, contributing)) keys.add(key);
    }
  }
  return keys;
}

/**
 * Superset context for every stage.
 */
export function supersetContext(
  descriptors: Iterable<Readonly<ComponentDescriptor>>
): Record<LifecycleStage, Set<string>> {
  const list = [...descriptors];
  return {
    pipeline_init: supersetContextKeys(list, "pipeline_init"),
    train: supersetContextKeys(list, "train"),
    process: supersetContextKeys(list, "process"),
    persist: supersetContextKeys(list, "persist"),
  };
}
