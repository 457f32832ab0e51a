/**
 * Options shared by the trainer and the interpreter.
 */

import type { Logger } from "../logging/logger.js";
import { getRegistry, type ComponentRegistry } from "../components/registry.js";
import type { Component } from "../components/schema.js";
import type { PackageResolver } from "../dependencies/resolver.js";
import { ComponentBuilder } from "../builder/component-builder.js";
import type { PipelineStep } from "./runner.js";

export interface PipelineOptions {
  /** Defaults to the process-wide registry */
  registry?: ComponentRegistry;
  /** Builder to share between pipelines; each pipeline gets its own otherwise */
  builder?: ComponentBuilder;
  resolver?: PackageResolver;
  /** Requirements manifest used to enrich MissingDependencyError */
  manifestPath?: string;
  logger?: Logger;
}

export interface ResolvedPipelineOptions {
  registry: ComponentRegistry;
  builder: ComponentBuilder;
  checkOptions: {
    resolver?: PackageResolver;
    manifestPath?: string;
    logger: Logger;
  };
}

export function resolvePipelineOptions(
  options: PipelineOptions,
  logger: Logger
): ResolvedPipelineOptions {
  const registry = options.registry ?? getRegistry();
  const checkOptions = {
    ...(options.resolver ? { resolver: options.resolver } : {}),
    ...(options.manifestPath ? { manifestPath: options.manifestPath } : {}),
    logger,
  };
  const builder =
    options.builder ??
    new ComponentBuilder({ registry, ...checkOptions, logger: logger.child("component-builder") });
  return { registry, builder, checkOptions };
}

/**
 * Build each component in pipeline order. Instantiation is sequential so
 * that a failure names the first broken component.
 */
export async function buildSteps(
  names: readonly string[],
  registry: ComponentRegistry,
  build: (name: string) => Promise<Component>
): Promise<PipelineStep[]> {
  const steps: PipelineStep[] = [];
  for (const name of names) {
    const component = await build(name);
    steps.push({ name, descriptor: registry.require(name).descriptor, component });
  }
  return steps;
}
