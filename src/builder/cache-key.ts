/**
 * Cache keys for built components.
 *
 * Two requests share an instance when they name the same component and
 * agree on every configuration key the component declares in
 * `configKeys`. Other configuration keys never split the cache.
 *
 *   tokenizer_whitespace@3f2a9c01b7de
 *   ner_regex@91c0e4a2d6f3#5b1d0e77c2a9   (loaded: suffix digests run id and state)
 */

import { createHash } from "node:crypto";
import type { PipelineSettings } from "../config/pipeline/schema.js";
import type {
  ComponentDefinition,
  ComponentDescriptor,
  StageOutput,
} from "../components/schema.js";

const DIGEST_LENGTH = 12;

function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(sortKeys);
  }
  if (value !== null && typeof value === "object") {
    return Object.fromEntries(
      Object.keys(value)
        .sort()
        .map((key) => [key, sortKeys(Reflect.get(value, key))])
    );
  }
  return value;
}

/**
 * JSON with object keys sorted at every depth, so equal values always
 * serialize identically.
 */
export function canonicalJson(value: unknown): string {
  return JSON.stringify(sortKeys(value)) ?? "null";
}

export function digest(value: unknown): string {
  return createHash("sha256").update(canonicalJson(value)).digest("hex").slice(0, DIGEST_LENGTH);
}

/**
 * The declared configuration keys, sorted, each mapped to its value or
 * null when the configuration lacks it.
 */
export function configProjection(
  descriptor: Readonly<ComponentDescriptor>,
  config: PipelineSettings
): Record<string, unknown> {
  return Object.fromEntries(
    [...descriptor.configKeys]
      .sort()
      .map((key) => [key, Object.hasOwn(config, key) ? config[key] : null])
  );
}

/** What identifies a restored instance beyond its configuration. */
export interface LoadedIdentity {
  /** Run that persisted the model */
  runId: string;
  state: StageOutput;
}

/**
 * @param loaded - Omit for a fresh create
 * @returns The key, or null when the component must not be cached
 */
export function deriveCacheKey(
  definition: ComponentDefinition,
  config: PipelineSettings,
  loaded?: LoadedIdentity
): string | null {
  const base = definition.cacheKey
    ? definition.cacheKey(config)
    : `${definition.descriptor.name}@${digest(configProjection(definition.descriptor, config))}`;
  if (base === null) return null;
  return loaded === undefined
    ? base
    : `${base}#${digest({ runId: loaded.runId, state: loaded.state })}`;
}
