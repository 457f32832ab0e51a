#!/usr/bin/env node
/**
 * CLI command to validate the component registry.
 *
 * Validates:
 * - Pipeline configuration (built-in defaults or a JSON file)
 * - Registry rules (templates, all_components, stage arguments, extractors)
 * - Requirements manifest syntax
 * - Availability of every package a component declares
 * - Argument resolution of the configured pipeline, in order
 *
 * Usage:
 *   npx tsx src/cli/validate-registry.ts [options]
 *   npm run validate-registry
 *
 * Options:
 *   --config <path>        Pipeline configuration JSON (default: built-in defaults)
 *   --requirements <path>  Requirements manifest (default: REQUIREMENTS_FILE)
 *   --verbose              Show details of passing steps
 *   --json                 Output the report as JSON (for CI parsing)
 *   -h, --help             Show help
 *
 * Exit codes:
 *   0 - All validations passed
 *   1 - One or more validations failed
 */

import { resolve } from "node:path";
import { parseArgs } from "node:util";

import {
  config as appConfig,
  configAsDict,
  validateConfig,
  ConfigError,
  loadPipelineConfig,
  readPipelineConfigFile,
  DEFAULT_PIPELINE_CONFIG,
  PipelineConfigError,
  type PipelineConfig,
} from "../config/index.js";
import {
  createBuiltinRegistry,
  formatRegistryIssue,
  validateRegistry,
  type ComponentRegistry,
} from "../components/index.js";
import {
  findUnavailablePackages,
  getDefaultPackageResolver,
  readRequirementsManifest,
  ManifestReadError,
  type PackageResolver,
} from "../dependencies/index.js";
import { planPipeline, resolvePipelineNames } from "../pipeline/index.js";

// ============================================================
// Types
// ============================================================

export interface StepResult {
  success: boolean;
  component: string;
  message: string;
  details?: string[];
}

export interface ValidationReport {
  timestamp: string;
  steps: StepResult[];
  summary: {
    stepsPassed: number;
    stepsFailed: number;
    stepsTotal: number;
  };
}

export interface RegistryCheckOptions {
  registry?: ComponentRegistry;
  /** Pipeline configuration JSON; built-in defaults when absent */
  configPath?: string;
  requirementsPath?: string;
  resolver?: PackageResolver;
}

// ============================================================
// Steps
// ============================================================

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function runConfigStep(configPath?: string): {
  step: StepResult;
  config: Readonly<PipelineConfig> | null;
} {
  try {
    const config = configPath
      ? readPipelineConfigFile(configPath)
      : loadPipelineConfig(DEFAULT_PIPELINE_CONFIG);
    return {
      config,
      step: {
        success: true,
        component: "PipelineConfig",
        message: configPath ? `Loaded ${configPath}` : "Built-in defaults are valid",
        details: [`language: ${config.language}`, `pipeline: ${JSON.stringify(config.pipeline)}`],
      },
    };
  } catch (err) {
    if (!(err instanceof PipelineConfigError)) throw err;
    return {
      config: null,
      step: {
        success: false,
        component: "PipelineConfig",
        message: err.message,
        details: err.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`),
      },
    };
  }
}

function runRegistryStep(registry: ComponentRegistry, config: Readonly<PipelineConfig>): StepResult {
  const result = validateRegistry(registry, configAsDict(config));
  return {
    success: result.isValid,
    component: "Registry",
    message: `${registry.size} component(s), ${registry.templates().size} template(s): ` +
      `${result.errorCount} error(s), ${result.warningCount} warning(s)`,
    details:
      result.issues.length > 0
        ? result.issues.map(formatRegistryIssue)
        : registry.names().map((name) => `registered: ${name}`),
  };
}

function runManifestStep(requirementsPath: string): StepResult {
  try {
    const manifest = readRequirementsManifest(requirementsPath);
    return {
      success: true,
      component: "RequirementsManifest",
      message: `${Object.keys(manifest).length} requirement group(s) in ${requirementsPath}`,
      details: Object.entries(manifest).map(
        ([name, installNames]) => `${name} -> ${installNames.join(", ") || "(nothing)"}`
      ),
    };
  } catch (err) {
    if (!(err instanceof ManifestReadError)) throw err;
    return { success: false, component: "RequirementsManifest", message: err.message };
  }
}

function runPackagesStep(registry: ComponentRegistry, resolver: PackageResolver): StepResult {
  const missing: string[] = [];
  let declared = 0;
  for (const descriptor of registry.all()) {
    declared += descriptor.requiredPackages.length;
    for (const name of findUnavailablePackages(descriptor.requiredPackages, resolver)) {
      missing.push(`${descriptor.name}: ${name}`);
    }
  }
  return {
    success: missing.length === 0,
    component: "Packages",
    message:
      missing.length === 0
        ? `All ${declared} declared package(s) resolve`
        : `${missing.length} declared package(s) do not resolve`,
    ...(missing.length > 0 ? { details: missing } : {}),
  };
}

function runPipelineStep(registry: ComponentRegistry, config: Readonly<PipelineConfig>): StepResult {
  let names: string[];
  try {
    names = resolvePipelineNames(config, registry);
  } catch (err) {
    return { success: false, component: "Pipeline", message: errorMessage(err) };
  }

  const unknown = names.filter((name) => !registry.has(name));
  if (unknown.length > 0) {
    return {
      success: false,
      component: "Pipeline",
      message: `Unknown component(s): ${unknown.join(", ")}`,
      details: unknown.map((name) => `${name}: did you mean ${registry.suggest(name).join(", ") || "(no match)"}?`),
    };
  }

  const plan = planPipeline(
    names.map((name) => registry.require(name).descriptor),
    configAsDict(config)
  );
  return {
    success: plan.issues.length === 0,
    component: "Pipeline",
    message:
      plan.issues.length === 0
        ? `${names.join(" -> ")} resolves in every stage`
        : `${plan.issues.length} unresolvable argument set(s)`,
    details: plan.issues.map(
      (i) => `${i.componentName} (${i.stage}): ${i.missingArguments.join(", ")}`
    ),
  };
}

/**
 * Run every check and build the report. Never exits the process.
 */
export function runRegistryChecks(options: RegistryCheckOptions = {}): ValidationReport {
  const registry = options.registry ?? createBuiltinRegistry();
  const steps: StepResult[] = [];

  const { step: configStep, config } = runConfigStep(options.configPath);
  steps.push(configStep);
  if (config) {
    steps.push(runRegistryStep(registry, config));
  }
  steps.push(runManifestStep(options.requirementsPath ?? appConfig.requirementsFile));
  steps.push(runPackagesStep(registry, options.resolver ?? getDefaultPackageResolver()));
  if (config) {
    steps.push(runPipelineStep(registry, config));
  }

  const passed = steps.filter((s) => s.success).length;
  return {
    timestamp: new Date().toISOString(),
    steps,
    summary: { stepsPassed: passed, stepsFailed: steps.length - passed, stepsTotal: steps.length },
  };
}

// ============================================================
// Output Formatting
// ============================================================

const COLORS = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  dim: "\x1b[2m",
  green: "\x1b[32m",
  red: "\x1b[31m",
};

const useColors = process.stdout.isTTY && !process.env.NO_COLOR;

function c(color: keyof typeof COLORS, text: string): string {
  return useColors ? `${COLORS[color]}${text}${COLORS.reset}` : text;
}

function printReport(report: ValidationReport, verbose: boolean): void {
  console.log("");
  console.log(c("bold", "═".repeat(60)));
  console.log(c("bold", " Component Registry Validation"));
  console.log(c("bold", "═".repeat(60)));
  console.log("");

  for (const step of report.steps) {
    const mark = step.success ? c("green", "✓") : c("red", "✗");
    console.log(`${mark} ${c("bold", step.component)}: ${step.message}`);
    if (!step.success || verbose) {
      for (const detail of step.details ?? []) {
        console.log(`    ${c(step.success ? "dim" : "red", "•")} ${detail}`);
      }
    }
    console.log("");
  }

  const { stepsPassed, stepsFailed } = report.summary;
  console.log("─".repeat(60));
  console.log(
    stepsFailed === 0
      ? c("green", `✓ All validations passed (${stepsPassed}/${stepsPassed})`)
      : c("red", `✗ Validation failed: ${stepsFailed} error(s)`)
  );
  console.log("─".repeat(60));
}

// ============================================================
// CLI
// ============================================================

function parseCliArgs() {
  const { values } = parseArgs({
    options: {
      config: { type: "string" },
      requirements: { type: "string" },
      verbose: { type: "boolean", default: false },
      json: { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  });

  if (values.help) {
    console.log(`
Usage: validate-registry [options]

Options:
  --config <path>        Pipeline configuration JSON (default: built-in defaults)
  --requirements <path>  Requirements manifest (default: ${appConfig.requirementsFile})
  --verbose              Show details of passing steps
  --json                 Output the report as JSON (for CI parsing)
  -h, --help             Show this help message
`);
    process.exit(0);
  }

  return values;
}

function main(): void {
  const args = parseCliArgs();
  try {
    validateConfig();
  } catch (err) {
    if (!(err instanceof ConfigError)) throw err;
    console.error(c("red", `Configuration error: ${err.message}`));
    process.exit(1);
  }

  const report = runRegistryChecks({
    ...(args.config ? { configPath: resolve(args.config) } : {}),
    ...(args.requirements ? { requirementsPath: resolve(args.requirements) } : {}),
  });

  if (args.json) {
    console.log(JSON.stringify(report, null, 2));
  } else {
    printReport(report, args.verbose ?? false);
  }
  process.exit(report.summary.stepsFailed > 0 ? 1 : 0);
}

const isDirectExecution =
  process.argv[1] !== undefined &&
  (process.argv[1].endsWith("validate-registry.ts") ||
    process.argv[1].endsWith("validate-registry.js"));

if (isDirectExecution) {
  try {
    main();
  } catch (err) {
    console.error("Unexpected error:", err);
    process.exit(1);
  }
}
