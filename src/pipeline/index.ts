/**
 * Pipeline planning, execution, training and interpretation.
 */

export {
  EntitySchema,
  TrainingExampleSchema,
  TrainingDataSchema,
  TrainingDataError,
  parseTrainingData,
  type Entity,
  type TrainingExample,
  type TrainingData,
  type TrainingDataInput,
} from "./training-data.js";

export { planPipeline, assertPipelineResolvable, type PipelinePlan, type PlanIssue } from "./plan.js";

export {
  runStage,
  ContractViolationError,
  type ContractViolation,
  type PipelineStep,
  type StageResult,
  type StageOutputRecord,
} from "./runner.js";

export { resolvePipelineNames } from "./names.js";
export { type PipelineOptions } from "./options.js";
export { Trainer, PipelineStateError } from "./trainer.js";
export { Interpreter, type ParseResult } from "./interpreter.js";
