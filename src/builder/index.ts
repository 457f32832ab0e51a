/**
 * Component builder and cache keys.
 */

export {
  ComponentBuilder,
  type ComponentBuilderOptions,
  type BuildPhase,
  type BuildMode,
  type BuildTransition,
} from "./component-builder.js";

export {
  canonicalJson,
  configProjection,
  deriveCacheKey,
  digest,
  type LoadedIdentity,
} from "./cache-key.js";
