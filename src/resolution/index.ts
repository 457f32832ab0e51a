/**
 * Argument resolution: fillArgs and the pipeline context.
 */

export {
  fillArgs,
  unsatisfiedArguments,
  MissingArgumentError,
  type FillLocation,
} from "./fill-args.js";

export {
  PipelineContext,
  ContextSeedError,
  STAGE_BASE_KEYS,
  STAGE_INHERITS,
  stageDefaults,
  supersetContextKeys,
  supersetContext,
} from "./context.js";
