/**
 * Read-only view of persisted model metadata.
 */

import { ensureRunId } from "../logging/run-id.js";
import { MODEL_FORMAT_VERSION, type ModelMetadataData } from "./schema.js";

type StageState = Readonly<Record<string, unknown>>;

function deepFreeze<T extends object>(obj: T): Readonly<T> {
  for (const name of Reflect.ownKeys(obj)) {
    const value: unknown = Reflect.get(obj, name);
    if (value && typeof value === "object" && !Object.isFrozen(value)) {
      deepFreeze(value);
    }
  }
  return Object.freeze(obj);
}

export interface ModelMetadataOptions {
  language: string;
  pipeline: readonly string[];
  config: Readonly<Record<string, unknown>>;
  components?: Readonly<Record<string, StageState>>;
  runId?: string;
  trainedAt?: Date;
}

export class ModelMetadata {
  private constructor(private readonly data: Readonly<ModelMetadataData>) {}

  /**
   * Wrap already-validated data. The data is frozen in place.
   */
  static fromData(data: ModelMetadataData): ModelMetadata {
    return new ModelMetadata(deepFreeze(data));
  }

  /**
   * Metadata for a model trained now.
   */
  static create(options: ModelMetadataOptions): ModelMetadata {
    return ModelMetadata.fromData({
      formatVersion: MODEL_FORMAT_VERSION,
      language: options.language,
      pipeline: [...options.pipeline],
      trainedAt: (options.trainedAt ?? new Date()).toISOString(),
      runId: options.runId ?? ensureRunId(),
      config: structuredClone({ ...options.config }),
      components: structuredClone({ ...(options.components ?? {}) }),
    });
  }

  /**
   * Metadata of an untrained model, for components loaded without one.
   */
  static empty(language = "en"): ModelMetadata {
    return ModelMetadata.create({ language, pipeline: [], config: {} });
  }

  get formatVersion(): string {
    return this.data.formatVersion;
  }

  get language(): string {
    return this.data.language;
  }

  get pipeline(): readonly string[] {
    return this.data.pipeline;
  }

  get trainedAt(): string {
    return this.data.trainedAt;
  }

  get runId(): string {
    return this.data.runId;
  }

  get config(): Readonly<Record<string, unknown>> {
    return this.data.config;
  }

  /**
   * A top-level metadata field, or a training configuration value, or
   * `fallback`.
   */
  get(key: string, fallback: unknown = undefined): unknown {
    if (Object.hasOwn(this.data, key)) return Reflect.get(this.data, key);
    if (Object.hasOwn(this.data.config, key)) return this.data.config[key];
    return fallback;
  }

  /**
   * What a component's persist stage returned; empty if it persisted nothing.
   */
  componentState(componentName: string): StageState {
    return Object.hasOwn(this.data.components, componentName)
      ? this.data.components[componentName] ?? {}
      : {};
  }

  toJSON(): ModelMetadataData {
    return this.data;
  }
}
