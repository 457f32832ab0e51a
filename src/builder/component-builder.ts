/**
 * Component builder.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * ONE REQUEST, ONE STATE MACHINE
 * ═══════════════════════════════════════════════════════════════════════════
 *
 *   unresolved ──► name_validated ──► dependencies_validated ──► instantiated
 *        │                │                      │
 *        └────────────────┴──────────────────────┴──────────► failed
 *
 * Every request starts unresolved. The name must be registered, then every
 * package the component declares must resolve, and only then is the
 * factory run. A failure at any step is terminal for that request and the
 * error propagates unchanged.
 *
 * Instances are cached by deriveCacheKey(). The cache holds promises, so
 * concurrent first requests for one key share a single instantiation.
 * A rejected instantiation is evicted and the next request retries.
 */

import type { PipelineSettings } from "../config/pipeline/schema.js";
import { createAppLogger, type Logger } from "../logging/index.js";
import type {
  Component,
  ComponentDefinition,
  StageOutput,
} from "../components/schema.js";
import { getRegistry, type ComponentRegistry } from "../components/registry.js";
import { assertPackagesAvailable } from "../dependencies/checker.js";
import type { PackageResolver } from "../dependencies/resolver.js";
import type { ModelMetadata } from "../model/metadata.js";
import { deriveCacheKey } from "./cache-key.js";

export type BuildPhase =
  | "unresolved"
  | "name_validated"
  | "dependencies_validated"
  | "instantiated"
  | "failed";

export type BuildMode = "create" | "load";

export interface BuildTransition {
  componentName: string;
  mode: BuildMode;
  from: BuildPhase;
  to: BuildPhase;
  /** Set when `to` is "failed" */
  error?: Error;
}

export interface ComponentBuilderOptions {
  /** Defaults to the process-wide registry */
  registry?: ComponentRegistry;
  resolver?: PackageResolver;
  /** Requirements manifest used to enrich MissingDependencyError */
  manifestPath?: string;
  /** Reuse instances across requests (default: true) */
  useCache?: boolean;
  logger?: Logger;
  onTransition?: (transition: BuildTransition) => void;
}

interface LoadRequest {
  state: StageOutput;
  metadata: ModelMetadata;
}

class BuildRequest {
  private phase: BuildPhase = "unresolved";

  constructor(
    private readonly componentName: string,
    private readonly mode: BuildMode,
    private readonly report: (transition: BuildTransition) => void
  ) {}

  advance(to: BuildPhase, error?: Error): void {
    const from = this.phase;
    this.phase = to;
    this.report({
      componentName: this.componentName,
      mode: this.mode,
      from,
      to,
      ...(error ? { error } : {}),
    });
  }

  fail(err: unknown): void {
    if (this.phase === "failed") return;
    this.advance("failed", err instanceof Error ? err : new Error(String(err)));
  }
}

export class ComponentBuilder {
  private readonly registry: ComponentRegistry;
  private readonly logger: Logger;
  private readonly cache = new Map<string, Promise<Component>>();

  constructor(private readonly options: ComponentBuilderOptions = {}) {
    this.registry = options.registry ?? getRegistry();
    this.logger = options.logger ?? createAppLogger("component-builder");
  }

  /**
   * Build a fresh (or cached) instance.
   *
   * @returns null when no name is given
   * @throws UnknownComponentError if the name is not registered
   * @throws MissingDependencyError if required packages are unavailable
   */
  createComponent(name: string, config: PipelineSettings): Promise<Component>;
  createComponent(
    name: string | null | undefined,
    config: PipelineSettings
  ): Promise<Component | null>;
  async createComponent(
    name: string | null | undefined,
    config: PipelineSettings
  ): Promise<Component | null> {
    if (name === null || name === undefined) return null;
    return this.build(name, config, "create");
  }

  /**
   * Restore a trained instance from its persisted state. Components
   * without a `load` factory are created fresh. Cached instances are
   * shared only between loads of the same run and state.
   *
   * @returns null when no name is given
   * @throws UnknownComponentError if the name is not registered
   * @throws MissingDependencyError if required packages are unavailable
   */
  loadComponent(
    name: string,
    config: PipelineSettings,
    state: StageOutput,
    metadata: ModelMetadata
  ): Promise<Component>;
  loadComponent(
    name: string | null | undefined,
    config: PipelineSettings,
    state: StageOutput,
    metadata: ModelMetadata
  ): Promise<Component | null>;
  async loadComponent(
    name: string | null | undefined,
    config: PipelineSettings,
    state: StageOutput,
    metadata: ModelMetadata
  ): Promise<Component | null> {
    if (name === null || name === undefined) return null;
    return this.build(name, config, "load", { state, metadata });
  }

  get cacheSize(): number {
    return this.cache.size;
  }

  clearCache(): void {
    this.cache.clear();
  }

  // ============================================================
  // Internals
  // ============================================================

  private async build(
    name: string,
    config: PipelineSettings,
    mode: BuildMode,
    load?: LoadRequest
  ): Promise<Component> {
    const request = new BuildRequest(name, mode, (t) => this.reportTransition(t));

    try {
      const definition = this.registry.require(name);
      request.advance("name_validated");

      assertPackagesAvailable([definition.descriptor], {
        ...(this.options.resolver ? { resolver: this.options.resolver } : {}),
        ...(this.options.manifestPath ? { manifestPath: this.options.manifestPath } : {}),
        logger: this.logger,
      });
      request.advance("dependencies_validated");

      const key =
        this.options.useCache === false
          ? null
          : deriveCacheKey(
              definition,
              config,
              load ? { runId: load.metadata.runId, state: load.state } : undefined
            );
      const component = await this.instantiate(key, () =>
        this.runFactory(definition, config, load)
      );
      request.advance("instantiated");
      return component;
    } catch (err) {
      request.fail(err);
      throw err;
    }
  }

  private runFactory(
    definition: ComponentDefinition,
    config: PipelineSettings,
    load?: LoadRequest
  ): Component | Promise<Component> {
    const logger = this.logger.child(definition.descriptor.name);
    if (load && definition.load) {
      return definition.load({ config, logger, metadata: load.metadata, state: load.state });
    }
    return definition.create({ config, logger });
  }

  private async instantiate(
    key: string | null,
    factory: () => Component | Promise<Component>
  ): Promise<Component> {
    if (key === null) {
      return factory();
    }

    const cached = this.cache.get(key);
    if (cached) {
      this.logger.debug("Component cache hit", { key });
      return cached;
    }

    const pending = Promise.resolve().then(factory);
    this.cache.set(key, pending);
    try {
      return await pending;
    } catch (err) {
      if (this.cache.get(key) === pending) {
        this.cache.delete(key);
      }
      throw err;
    }
  }

  private reportTransition(transition: BuildTransition): void {
    this.logger.debug("Component build transition", {
      component: transition.componentName,
      mode: transition.mode,
      from: transition.from,
      to: transition.to,
      ...(transition.error ? { error: transition.error.message } : {}),
    });
    this.options.onTransition?.(transition);
  }
}
