/**
 * Pipeline configuration module.
 *
 * Usage:
 *   import { loadPipelineConfig, DEFAULT_PIPELINE_CONFIG } from "./config/pipeline/index.js";
 *
 *   const config = loadPipelineConfig({
 *     ...DEFAULT_PIPELINE_CONFIG,
 *     pipeline: ["nlp_lexicon", "tokenizer_whitespace", "intent_classifier_keyword"],
 *   });
 */

export {
  PipelineConfigSchema,
  PipelineSpecSchema,
  IntentKeywordsSchema,
  EntityPatternsSchema,
  type PipelineConfig,
  type PipelineConfigInput,
  type PipelineSpec,
  type PipelineSettings,
} from "./schema.js";

export {
  loadPipelineConfig,
  validatePipelineConfig,
  readPipelineConfigFile,
  configAsDict,
  PipelineConfigError,
  type PipelineConfigIssue,
} from "./loader.js";

export { DEFAULT_PIPELINE_CONFIG } from "./defaults.js";
