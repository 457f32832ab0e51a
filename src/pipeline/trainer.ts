/**
 * Trainer: builds a pipeline from configuration, trains it and persists
 * the result.
 *
 *   const trainer = await Trainer.create(config);
 *   const interpreter = trainer.train(trainingData);
 *   trainer.persist("models/current");
 *
 * Everything that can be checked without running a component is checked
 * in create(): the pipeline names, the required packages of every
 * component, and that each stage argument will have a value.
 */

import {
  configAsDict,
  type PipelineConfig,
  type PipelineSettings,
} from "../config/pipeline/index.js";
import { createAppLogger, type Logger } from "../logging/index.js";
import { validateRequirements } from "../dependencies/checker.js";
import { PipelineContext } from "../resolution/context.js";
import { ModelMetadata } from "../model/metadata.js";
import { writeModelMetadata } from "../model/serialization.js";
import { resolvePipelineNames } from "./names.js";
import { assertPipelineResolvable, planPipeline } from "./plan.js";
import { runStage, type PipelineStep } from "./runner.js";
import { parseTrainingData } from "./training-data.js";
import { buildSteps, resolvePipelineOptions, type PipelineOptions } from "./options.js";
import { Interpreter } from "./interpreter.js";

export class PipelineStateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PipelineStateError";
  }
}

export class Trainer {
  private trainContext: PipelineContext | null = null;

  private constructor(
    public readonly config: Readonly<PipelineConfig>,
    public readonly pipeline: readonly string[],
    private readonly settings: PipelineSettings,
    private readonly steps: readonly PipelineStep[],
    private readonly logger: Logger
  ) {}

  /**
   * @throws UnknownTemplateError if `pipeline` names no registered template
   * @throws UnknownComponentError if a component name is not registered
   * @throws MissingDependencyError if any component's packages are missing
   * @throws MissingArgumentError if the pipeline order starves a component
   */
  static async create(
    config: Readonly<PipelineConfig>,
    options: PipelineOptions = {}
  ): Promise<Trainer> {
    const logger = options.logger ?? createAppLogger("trainer");
    const { registry, builder, checkOptions } = resolvePipelineOptions(options, logger);

    const names = resolvePipelineNames(config, registry);
    validateRequirements(names, registry, checkOptions);

    const settings = configAsDict(config);
    const descriptors = names.map((name) => registry.require(name).descriptor);
    assertPipelineResolvable(planPipeline(descriptors, settings));

    const steps = await buildSteps(names, registry, (name) =>
      builder.createComponent(name, settings)
    );
    logger.info("Pipeline built", { pipeline: names });
    return new Trainer(config, names, settings, steps, logger);
  }

  /**
   * Run pipeline_init and train.
   *
   * @returns An interpreter backed by the freshly trained components
   * @throws TrainingDataError if the data fails validation
   */
  train(trainingData: unknown): Interpreter {
    const data = parseTrainingData(trainingData);
    this.logger.info("Training started", { examples: data.examples.length });

    const initContext = runStage(
      this.steps,
      "pipeline_init",
      PipelineContext.seed("pipeline_init"),
      this.settings,
      this.logger
    ).context;
    this.trainContext = runStage(
      this.steps,
      "train",
      PipelineContext.seed("train", { training_data: data }, initContext),
      this.settings,
      this.logger
    ).context;

    this.logger.info("Training finished");
    return Interpreter.fromTrained(this.config, this.steps, initContext, this.logger);
  }

  get trained(): boolean {
    return this.trainContext !== null;
  }

  /**
   * Run persist and write metadata.json into `modelDir`.
   *
   * @throws PipelineStateError if train() has not run
   */
  persist(modelDir: string): ModelMetadata {
    if (this.trainContext === null) {
      throw new PipelineStateError("Cannot persist an untrained pipeline; call train() first");
    }

    const { outputs } = runStage(
      this.steps,
      "persist",
      PipelineContext.seed("persist", { model_dir: modelDir }, this.trainContext),
      this.settings,
      this.logger
    );

    const metadata = ModelMetadata.create({
      language: this.config.language,
      pipeline: this.pipeline,
      config: this.settings,
      components: Object.fromEntries(outputs.map((o) => [o.componentName, o.output])),
    });
    const filePath = writeModelMetadata(modelDir, metadata);
    this.logger.info("Model persisted", { path: filePath });
    return metadata;
  }
}
