/**
 * Registry validators.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * STATIC CHECKS OVER THE WHOLE CATALOG
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * These checks run from tooling (validate-registry, tests), never per
 * request. Like the pipeline config loader they do not throw: each rule
 * returns structured issues naming the offending component or template
 * and a suggested fix.
 *
 * USAGE:
 *   const result = validateRegistry(registry, configAsDict(config));
 *   if (!result.isValid) {
 *     console.error(formatRegistryReport(result));
 *   }
 */

import type { PipelineSettings } from "../config/pipeline/schema.js";
import { supersetContext } from "../resolution/context.js";
import { unsatisfiedArguments } from "../resolution/fill-args.js";
import {
  LIFECYCLE_STAGES,
  requiredArguments,
  type ComponentDefinition,
  type ComponentDescriptor,
  type LifecycleStage,
} from "./schema.js";
import { ALL_COMPONENTS_TEMPLATE, ComponentRegistry, type PipelineTemplates } from "./registry.js";

export type ValidationSeverity = "error" | "warning";

export type RegistryRule =
  | "DUPLICATE_NAME"
  | "UNKNOWN_TEMPLATE_COMPONENT"
  | "INCOMPLETE_ALL_COMPONENTS"
  | "UNSATISFIABLE_STAGE_ARGUMENT"
  | "EXTRACTOR_IGNORES_ENTITIES";

export interface RegistryValidationIssue {
  rule: RegistryRule;
  severity: ValidationSeverity;
  message: string;
  suggestion: string;
  componentName?: string;
  templateName?: string;
  stage?: LifecycleStage;
}

export interface RegistryValidationResult {
  isValid: boolean;
  issues: RegistryValidationIssue[];
  errorCount: number;
  warningCount: number;
}

type Descriptors = ReadonlyArray<Readonly<ComponentDescriptor>>;

// ═══════════════════════════════════════════════════════════════════════════
// INDIVIDUAL RULES
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Names used by more than one descriptor. Applies to definition lists
 * before registration; a registry cannot hold duplicates.
 */
export function checkDuplicateNames(descriptors: Descriptors): RegistryValidationIssue[] {
  const counts = new Map<string, number>();
  for (const descriptor of descriptors) {
    counts.set(descriptor.name, (counts.get(descriptor.name) ?? 0) + 1);
  }

  const issues: RegistryValidationIssue[] = [];
  for (const [name, count] of counts) {
    if (count < 2) continue;
    issues.push({
      rule: "DUPLICATE_NAME",
      severity: "error",
      message: `Component name "${name}" is defined ${count} times`,
      suggestion: "Rename all but one of the definitions",
      componentName: name,
    });
  }
  return issues;
}

export function checkTemplateComponents(registry: ComponentRegistry): RegistryValidationIssue[] {
  const issues: RegistryValidationIssue[] = [];
  for (const templateName of registry.templates().keys()) {
    for (const name of registry.unknownTemplateComponents(templateName)) {
      const suggestions = registry.suggest(name);
      issues.push({
        rule: "UNKNOWN_TEMPLATE_COMPONENT",
        severity: "error",
        message: `Template "${templateName}" references unknown component "${name}"`,
        suggestion:
          suggestions.length > 0
            ? `Did you mean: ${suggestions.join(", ")}?`
            : "Register the component or remove it from the template",
        componentName: name,
        templateName,
      });
    }
  }
  return issues;
}

/**
 * The all_components template lists every registered component exactly once.
 */
export function checkAllComponentsTemplate(
  registry: ComponentRegistry
): RegistryValidationIssue[] {
  const template = registry.getTemplate(ALL_COMPONENTS_TEMPLATE);
  if (template === undefined) {
    return [
      {
        rule: "INCOMPLETE_ALL_COMPONENTS",
        severity: "warning",
        message: `No "${ALL_COMPONENTS_TEMPLATE}" template is registered`,
        suggestion: `Register "${ALL_COMPONENTS_TEMPLATE}" listing every component so the whole catalog can be exercised`,
        templateName: ALL_COMPONENTS_TEMPLATE,
      },
    ];
  }

  const issues: RegistryValidationIssue[] = [];
  for (const name of registry.names()) {
    if (!template.includes(name)) {
      issues.push({
        rule: "INCOMPLETE_ALL_COMPONENTS",
        severity: "error",
        message: `Component "${name}" is missing from "${ALL_COMPONENTS_TEMPLATE}"`,
        suggestion: `Add "${name}" to the "${ALL_COMPONENTS_TEMPLATE}" template`,
        componentName: name,
        templateName: ALL_COMPONENTS_TEMPLATE,
      });
    }
  }

  const seen = new Set<string>();
  for (const name of template) {
    if (seen.has(name)) {
      issues.push({
        rule: "INCOMPLETE_ALL_COMPONENTS",
        severity: "error",
        message: `Component "${name}" is listed more than once in "${ALL_COMPONENTS_TEMPLATE}"`,
        suggestion: "List each component once",
        componentName: name,
        templateName: ALL_COMPONENTS_TEMPLATE,
      });
    }
    seen.add(name);
  }
  return issues;
}

/**
 * Every declared stage argument must be obtainable from some component's
 * output (order ignored) or from the configuration.
 */
export function checkStageArguments(
  descriptors: Descriptors,
  config: PipelineSettings
): RegistryValidationIssue[] {
  const superset = supersetContext(descriptors);
  const issues: RegistryValidationIssue[] = [];

  for (const descriptor of descriptors) {
    for (const stage of LIFECYCLE_STAGES) {
      const missing = unsatisfiedArguments(
        requiredArguments(descriptor, stage),
        superset[stage],
        config
      );
      if (missing.length === 0) continue;
      issues.push({
        rule: "UNSATISFIABLE_STAGE_ARGUMENT",
        severity: "error",
        message:
          `Component "${descriptor.name}" requires ${missing.join(", ")} in stage ${stage}, ` +
          `but no component provides it and the configuration does not define it`,
        suggestion: `Add a component that provides ${missing.join(", ")}, or set it in the configuration`,
        componentName: descriptor.name,
        stage,
      });
    }
  }
  return issues;
}

/**
 * Extractors consume the entity list so earlier extractors' results survive.
 */
export function checkExtractorEntities(descriptors: Descriptors): RegistryValidationIssue[] {
  return descriptors
    .filter(
      (d) => d.kind === "extractor" && !requiredArguments(d, "process").includes("entities")
    )
    .map((d): RegistryValidationIssue => ({
      rule: "EXTRACTOR_IGNORES_ENTITIES",
      severity: "error",
      message: `Extractor "${d.name}" does not take "entities" in its process stage`,
      suggestion: `Add "entities" to requires.process and return the extended list`,
      componentName: d.name,
      stage: "process",
    }));
}

// ═══════════════════════════════════════════════════════════════════════════
// AGGREGATE
// ═══════════════════════════════════════════════════════════════════════════

function summarize(issues: RegistryValidationIssue[]): RegistryValidationResult {
  const errorCount = issues.filter((i) => i.severity === "error").length;
  return {
    isValid: errorCount === 0,
    issues,
    errorCount,
    warningCount: issues.length - errorCount,
  };
}

/**
 * Run every rule against a sealed registry.
 *
 * @param config - Settings that stage arguments may fall back to
 */
export function validateRegistry(
  registry: ComponentRegistry,
  config: PipelineSettings = {}
): RegistryValidationResult {
  const descriptors = registry.all();
  return summarize([
    ...checkTemplateComponents(registry),
    ...checkAllComponentsTemplate(registry),
    ...checkStageArguments(descriptors, config),
    ...checkExtractorEntities(descriptors),
  ]);
}

/**
 * Validate definitions before they are registered. Duplicates are
 * reported and only the first definition of each name is checked further.
 */
export function validateDefinitions(
  definitions: readonly ComponentDefinition[],
  templates: PipelineTemplates = {},
  config: PipelineSettings = {}
): RegistryValidationResult {
  const duplicates = checkDuplicateNames(definitions.map((d) => d.descriptor));
  const firstOfEach = new Map<string, ComponentDefinition>();
  for (const definition of definitions) {
    if (!firstOfEach.has(definition.descriptor.name)) {
      firstOfEach.set(definition.descriptor.name, definition);
    }
  }
  const registry = ComponentRegistry.create(firstOfEach.values(), templates);
  const rest = validateRegistry(registry, config);
  return summarize([...duplicates, ...rest.issues]);
}

// ═══════════════════════════════════════════════════════════════════════════
// FORMATTING
// ═══════════════════════════════════════════════════════════════════════════

export function formatRegistryIssue(issue: RegistryValidationIssue): string {
  const lines = [
    `${issue.severity.toUpperCase()} [${issue.rule}]: ${issue.message}`,
    `  SUGGESTION: ${issue.suggestion}`,
  ];
  return lines.join("\n");
}

export function formatRegistryReport(result: RegistryValidationResult): string {
  if (result.issues.length === 0) {
    return "✓ Registry passes all checks";
  }

  const lines: string[] = [
    `═══════════════════════════════════════════════════════════════`,
    result.isValid ? `REGISTRY VALIDATION PASSED WITH WARNINGS` : `REGISTRY VALIDATION FAILED`,
    `═══════════════════════════════════════════════════════════════`,
    `Errors: ${result.errorCount} | Warnings: ${result.warningCount}`,
    ``,
  ];
  for (const issue of result.issues) {
    lines.push(formatRegistryIssue(issue), ``);
  }
  return lines.join("\n");
}
