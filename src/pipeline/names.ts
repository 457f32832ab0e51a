/**
 * Pipeline name resolution.
 */

import type { PipelineConfig } from "../config/pipeline/schema.js";
import type { ComponentRegistry } from "../components/registry.js";
import { UnknownTemplateError } from "../components/errors.js";

/**
 * Component names for a configuration. `pipeline` is either an explicit
 * list or the name of a registered template. Names are not checked here.
 *
 * @throws UnknownTemplateError if `pipeline` names no registered template
 */
export function resolvePipelineNames(
  config: Pick<PipelineConfig, "pipeline">,
  registry: ComponentRegistry
): string[] {
  if (typeof config.pipeline !== "string") {
    return [...config.pipeline];
  }
  const template = registry.getTemplate(config.pipeline);
  if (template === undefined) {
    throw new UnknownTemplateError(config.pipeline, [...registry.templates().keys()]);
  }
  return [...template];
}
