/**
 * Component descriptor schema and component contracts.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * DESCRIPTORS ARE THE CONTRACT
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * A descriptor states, as data, everything the runtime needs to wire a
 * component into a pipeline:
 *
 *   - requires[stage]  ordered parameter names of the stage method; values are
 *                      filled from the context first, then the configuration
 *   - provides[stage]  context keys the component adds after running the stage
 *   - requiredPackages third-party packages that must be resolvable
 *   - configKeys       configuration keys that identify a cached instance
 *
 * Stage methods receive the filled values positionally, in `requires` order,
 * and return a record of context updates. The registry, the validators and
 * the builder read only the descriptor; no method signature is inspected.
 */

import { z } from "zod";
import type { PipelineSettings } from "../config/pipeline/schema.js";
import type { Logger } from "../logging/logger.js";
import type { ModelMetadata } from "../model/metadata.js";

// ============================================================
// Lifecycle stages
// ============================================================

export const LIFECYCLE_STAGES = ["pipeline_init", "train", "process", "persist"] as const;

export const LifecycleStage = z.enum(LIFECYCLE_STAGES);
export type LifecycleStage = z.infer<typeof LifecycleStage>;

export const COMPONENT_KINDS = [
  "tokenizer",
  "featurizer",
  "extractor",
  "classifier",
  "utility",
] as const;

export const ComponentKind = z.enum(COMPONENT_KINDS);
export type ComponentKind = z.infer<typeof ComponentKind>;

// ============================================================
// Descriptor
// ============================================================

const IDENTIFIER = /^[a-z][a-z0-9_]*$/;

const Identifier = z
  .string()
  .regex(IDENTIFIER, "Must be snake_case: lowercase letters, digits and underscores");

const UniqueIdentifiers = z
  .array(Identifier)
  .superRefine((names, ctx) => {
    const seen = new Set<string>();
    for (const [index, name] of names.entries()) {
      if (seen.has(name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [index],
          message: `Duplicate name "${name}"`,
        });
      }
      seen.add(name);
    }
  });

export const StageKeysSchema = z
  .object({
    pipeline_init: UniqueIdentifiers.optional(),
    train: UniqueIdentifiers.optional(),
    process: UniqueIdentifiers.optional(),
    persist: UniqueIdentifiers.optional(),
  })
  .strict();

export type StageKeys = z.infer<typeof StageKeysSchema>;

export const ComponentDescriptorSchema = z
  .object({
    name: Identifier.describe("Unique name used in pipeline definitions"),
    kind: ComponentKind.default("utility"),
    provides: StageKeysSchema.default({}).describe(
      "Context keys added after each stage"
    ),
    requires: StageKeysSchema.default({}).describe(
      "Ordered parameter names of each stage method"
    ),
    requiredPackages: z
      .array(z.string().min(1))
      .default([])
      .describe("Packages that must be resolvable before instantiation"),
    configKeys: z
      .array(z.string().min(1))
      .default([])
      .describe("Configuration keys forming the instance cache key"),
    description: z.string().optional(),
  })
  .strict();

export type ComponentDescriptor = z.infer<typeof ComponentDescriptorSchema>;
export type ComponentDescriptorInput = z.input<typeof ComponentDescriptorSchema>;

/**
 * Parameter names declared for a stage (empty if the stage is not used).
 */
export function requiredArguments(
  descriptor: ComponentDescriptor,
  stage: LifecycleStage
): readonly string[] {
  return descriptor.requires[stage] ?? [];
}

/**
 * Context keys promised for a stage (empty if none).
 */
export function providedKeys(
  descriptor: ComponentDescriptor,
  stage: LifecycleStage
): readonly string[] {
  return descriptor.provides[stage] ?? [];
}

/**
 * Whether the descriptor declares anything for a stage.
 */
export function declaresStage(descriptor: ComponentDescriptor, stage: LifecycleStage): boolean {
  return descriptor.requires[stage] !== undefined || descriptor.provides[stage] !== undefined;
}

// ============================================================
// Instances
// ============================================================

/** Context updates returned by a stage method. */
export type StageOutput = Readonly<Record<string, unknown>>;

export type StageMethod = (...args: unknown[]) => StageOutput | undefined;

/**
 * A component instance. Each lifecycle stage maps to an optional method
 * that receives the stage's declared arguments positionally.
 */
export interface Component {
  pipelineInit?(...args: unknown[]): StageOutput | undefined;
  train?(...args: unknown[]): StageOutput | undefined;
  process?(...args: unknown[]): StageOutput | undefined;
  persist?(...args: unknown[]): StageOutput | undefined;
}

export const STAGE_METHODS = {
  pipeline_init: "pipelineInit",
  train: "train",
  process: "process",
  persist: "persist",
} as const satisfies Record<LifecycleStage, keyof Component>;

/**
 * The instance's method for a stage, bound to the instance.
 */
export function stageMethod(
  component: Component,
  stage: LifecycleStage
): StageMethod | undefined {
  const method: StageMethod | undefined = component[STAGE_METHODS[stage]];
  return method === undefined ? undefined : method.bind(component);
}

// ============================================================
// Definitions
// ============================================================

export interface ComponentFactoryContext {
  /** Flat configuration view for this pipeline build */
  config: PipelineSettings;
  logger: Logger;
}

export interface ComponentLoadContext extends ComponentFactoryContext {
  /** Metadata of the persisted model being loaded */
  metadata: ModelMetadata;
  /** What this component's `persist` stage returned during training */
  state: StageOutput;
}

/**
 * A registered component: its descriptor plus the means to produce
 * instances.
 */
export interface ComponentDefinition {
  readonly descriptor: Readonly<ComponentDescriptor>;
  create(ctx: ComponentFactoryContext): Component | Promise<Component>;
  /** Restore a trained instance. Falls back to `create` when absent. */
  load?(ctx: ComponentLoadContext): Component | Promise<Component>;
  /**
   * Cache key override. Return null for components that must never be
   * shared between pipeline steps.
   */
  cacheKey?(config: PipelineSettings): string | null;
}

export interface ComponentDefinitionInput {
  descriptor: ComponentDescriptorInput;
  create: ComponentDefinition["create"];
  load?: ComponentDefinition["load"];
  cacheKey?: ComponentDefinition["cacheKey"];
}

export class InvalidDescriptorError extends Error {
  constructor(
    public readonly componentName: string,
    public readonly issues: string[]
  ) {
    super(`Invalid descriptor for component "${componentName}": ${issues.join("; ")}`);
    this.name = "InvalidDescriptorError";
  }
}

function freezeDescriptor(descriptor: ComponentDescriptor): Readonly<ComponentDescriptor> {
  for (const stageKeys of [descriptor.provides, descriptor.requires]) {
    for (const keys of Object.values(stageKeys)) {
      if (keys) Object.freeze(keys);
    }
    Object.freeze(stageKeys);
  }
  Object.freeze(descriptor.requiredPackages);
  Object.freeze(descriptor.configKeys);
  return Object.freeze(descriptor);
}

/**
 * Validate a descriptor and bundle it with its factories.
 *
 * @throws InvalidDescriptorError if the descriptor does not match the schema
 *
 * @example
 *   export const tokenizer = defineComponent({
 *     descriptor: {
 *       name: "tokenizer_whitespace",
 *       kind: "tokenizer",
 *       requires: { process: ["text"] },
 *       provides: { process: ["tokens"] },
 *     },
 *     create: () => new WhitespaceTokenizer(),
 *   });
 */
export function defineComponent(input: ComponentDefinitionInput): ComponentDefinition {
  const result = ComponentDescriptorSchema.safeParse(input.descriptor);
  if (!result.success) {
    throw new InvalidDescriptorError(
      input.descriptor.name || "(unnamed)",
      result.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    );
  }

  const definition: ComponentDefinition = {
    descriptor: freezeDescriptor(result.data),
    create: input.create,
    ...(input.load ? { load: input.load } : {}),
    ...(input.cacheKey ? { cacheKey: input.cacheKey } : {}),
  };
  return Object.freeze(definition);
}
