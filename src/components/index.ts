/**
 * Components: descriptors, the registry, static validation and the
 * built-in catalog.
 */

export {
  LIFECYCLE_STAGES,
  LifecycleStage,
  COMPONENT_KINDS,
  ComponentKind,
  StageKeysSchema,
  ComponentDescriptorSchema,
  STAGE_METHODS,
  requiredArguments,
  providedKeys,
  declaresStage,
  stageMethod,
  defineComponent,
  InvalidDescriptorError,
  type StageKeys,
  type ComponentDescriptor,
  type ComponentDescriptorInput,
  type StageOutput,
  type StageMethod,
  type Component,
  type ComponentFactoryContext,
  type ComponentLoadContext,
  type ComponentDefinition,
  type ComponentDefinitionInput,
} from "./schema.js";

export {
  ComponentRegistry,
  ALL_COMPONENTS_TEMPLATE,
  initRegistry,
  getRegistry,
  isRegistryInitialized,
  type PipelineTemplates,
} from "./registry.js";

export {
  UnknownComponentError,
  UnknownTemplateError,
  DuplicateComponentError,
  DuplicateTemplateError,
  RegistrySealedError,
  RegistryInitError,
} from "./errors.js";

export { closestNames, editDistance } from "./suggest.js";

export {
  validateRegistry,
  validateDefinitions,
  checkDuplicateNames,
  checkTemplateComponents,
  checkAllComponentsTemplate,
  checkStageArguments,
  checkExtractorEntities,
  formatRegistryIssue,
  formatRegistryReport,
  type RegistryRule,
  type RegistryValidationIssue,
  type RegistryValidationResult,
  type ValidationSeverity,
} from "./validators.js";

export * from "./builtin/index.js";
