/**
 * Model metadata serialization.
 *
 * A model directory contains metadata.json. Its formatVersion must share
 * the major version of MODEL_FORMAT_VERSION; anything else is rejected
 * rather than migrated.
 */

import { writeFileSync, readFileSync, mkdirSync, existsSync } from "node:fs";
import { join } from "node:path";
import {
  MODEL_FORMAT_VERSION,
  MODEL_METADATA_FILENAME,
  ModelMetadataSchema,
} from "./schema.js";
import { ModelMetadata } from "./metadata.js";

export class ModelMetadataError extends Error {
  constructor(
    message: string,
    public readonly filePath?: string
  ) {
    super(message);
    this.name = "ModelMetadataError";
  }
}

export function isFormatVersionCompatible(version: string): boolean {
  const [major] = version.split(".").map(Number);
  const [currentMajor] = MODEL_FORMAT_VERSION.split(".").map(Number);
  return major === currentMajor;
}

export function serializeModelMetadata(metadata: ModelMetadata, pretty = true): string {
  return JSON.stringify(metadata, null, pretty ? 2 : undefined);
}

/**
 * @throws ModelMetadataError if the JSON is malformed, fails the schema,
 *         or has an incompatible format version
 */
export function deserializeModelMetadata(json: string, filePath?: string): ModelMetadata {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (err) {
    throw new ModelMetadataError(
      `Failed to parse model metadata JSON: ${err instanceof Error ? err.message : String(err)}`,
      filePath
    );
  }

  const result = ModelMetadataSchema.safeParse(parsed);
  if (!result.success) {
    const errors = result.error.issues
      .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
      .join("; ");
    throw new ModelMetadataError(`Invalid model metadata: ${errors}`, filePath);
  }

  if (!isFormatVersionCompatible(result.data.formatVersion)) {
    throw new ModelMetadataError(
      `Incompatible model format version: ${result.data.formatVersion} ` +
        `(current: ${MODEL_FORMAT_VERSION}). Retrain the model.`,
      filePath
    );
  }

  return ModelMetadata.fromData(result.data);
}

export function metadataPath(modelDir: string): string {
  return join(modelDir, MODEL_METADATA_FILENAME);
}

/**
 * Write metadata.json into `modelDir`, creating the directory if needed.
 *
 * @returns Full path of the written file
 */
export function writeModelMetadata(modelDir: string, metadata: ModelMetadata): string {
  if (!existsSync(modelDir)) {
    mkdirSync(modelDir, { recursive: true });
  }
  const filePath = metadataPath(modelDir);
  writeFileSync(filePath, serializeModelMetadata(metadata), "utf-8");
  return filePath;
}

/**
 * @throws ModelMetadataError if the file cannot be read or is invalid
 */
export function readModelMetadata(modelDir: string): ModelMetadata {
  const filePath = metadataPath(modelDir);
  let json: string;
  try {
    json = readFileSync(filePath, "utf-8");
  } catch (err) {
    throw new ModelMetadataError(
      `Failed to read model metadata: ${err instanceof Error ? err.message : String(err)}`,
      filePath
    );
  }
  return deserializeModelMetadata(json, filePath);
}
