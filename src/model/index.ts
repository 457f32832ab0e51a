/**
 * Persisted model metadata.
 */

export {
  ModelMetadataSchema,
  MODEL_FORMAT_VERSION,
  MODEL_METADATA_FILENAME,
  type ModelMetadataData,
} from "./schema.js";

export { ModelMetadata, type ModelMetadataOptions } from "./metadata.js";

export {
  serializeModelMetadata,
  deserializeModelMetadata,
  writeModelMetadata,
  readModelMetadata,
  metadataPath,
  isFormatVersionCompatible,
  ModelMetadataError,
} from "./serialization.js";
