/**
 * Interpreter: parses messages with a trained pipeline.
 */

import {
  configAsDict,
  loadPipelineConfig,
  type PipelineConfig,
  type PipelineSettings,
} from "../config/pipeline/index.js";
import { createAppLogger, type Logger } from "../logging/index.js";
import { validateRequirements } from "../dependencies/checker.js";
import { PipelineContext } from "../resolution/context.js";
import { readModelMetadata } from "../model/serialization.js";
import type { ModelMetadata } from "../model/metadata.js";
import { assertPipelineResolvable, planPipeline } from "./plan.js";
import { runStage, type PipelineStep } from "./runner.js";
import { buildSteps, resolvePipelineOptions, type PipelineOptions } from "./options.js";

export interface ParseResult {
  text: string;
  /** Whatever the classifier placed under `intent`; null if none did */
  intent: unknown;
  /** Whatever the extractors placed under `entities` */
  entities: unknown;
}

export class Interpreter {
  private constructor(
    public readonly config: Readonly<PipelineConfig>,
    private readonly settings: PipelineSettings,
    private readonly steps: readonly PipelineStep[],
    private readonly initContext: PipelineContext,
    private readonly logger: Logger,
    public readonly metadata: ModelMetadata | null
  ) {}

  /**
   * Wrap components that were just trained in this process.
   */
  static fromTrained(
    config: Readonly<PipelineConfig>,
    steps: readonly PipelineStep[],
    initContext: PipelineContext,
    logger: Logger
  ): Interpreter {
    return new Interpreter(config, configAsDict(config), steps, initContext, logger, null);
  }

  /**
   * Load a persisted model: read metadata.json, check requirements and
   * argument resolution, restore every component, run pipeline_init.
   *
   * @throws ModelMetadataError if the metadata is missing or invalid
   * @throws PipelineConfigError if the stored configuration is invalid
   * @throws UnknownComponentError if a stored component is not registered
   * @throws MissingDependencyError if any component's packages are missing
   */
  static async load(modelDir: string, options: PipelineOptions = {}): Promise<Interpreter> {
    const logger = options.logger ?? createAppLogger("interpreter");
    const { registry, builder, checkOptions } = resolvePipelineOptions(options, logger);

    const metadata = readModelMetadata(modelDir);
    const config = loadPipelineConfig({ ...metadata.config, pipeline: [...metadata.pipeline] });
    const settings = configAsDict(config);
    const names = metadata.pipeline;

    validateRequirements(names, registry, checkOptions);
    const descriptors = names.map((name) => registry.require(name).descriptor);
    assertPipelineResolvable(planPipeline(descriptors, settings, ["pipeline_init", "process"]));

    const steps = await buildSteps(names, registry, (name) =>
      builder.loadComponent(name, settings, metadata.componentState(name), metadata)
    );
    const initContext = runStage(
      steps,
      "pipeline_init",
      PipelineContext.seed("pipeline_init"),
      settings,
      logger
    ).context;

    logger.info("Model loaded", { modelDir, pipeline: [...names], trainedAt: metadata.trainedAt });
    return new Interpreter(config, settings, steps, initContext, logger, metadata);
  }

  /**
   * Run the process stage over one message.
   */
  parse(text: string): ParseResult {
    const context = runStage(
      this.steps,
      "process",
      PipelineContext.seed("process", { text }, this.initContext),
      this.settings,
      this.logger
    ).context;
    return { text, intent: context.get("intent"), entities: context.get("entities") };
  }
}
