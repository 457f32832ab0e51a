/**
 * Pipeline configuration loader and validator.
 *
 * Responsible for:
 * - Validating raw input against the schema with fail-fast behavior
 * - Checks zod cannot express (entity patterns must compile)
 * - Producing structured error messages
 * - Freezing the result so no stage can mutate it mid-run
 */

import { readFileSync } from "node:fs";
import type { ZodIssue } from "zod";
import {
  PipelineConfigSchema,
  type PipelineConfig,
  type PipelineSettings,
} from "./schema.js";

/**
 * Structured validation error for pipeline configuration.
 */
export class PipelineConfigError extends Error {
  public readonly issues: PipelineConfigIssue[];

  constructor(message: string, issues: PipelineConfigIssue[]) {
    super(message);
    this.name = "PipelineConfigError";
    this.issues = issues;
  }

  format(): string {
    const lines = ["Pipeline configuration validation failed:"];
    for (const issue of this.issues) {
      const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      lines.push(`  - ${path}: ${issue.message}`);
    }
    return lines.join("\n");
  }
}

export interface PipelineConfigIssue {
  /** Path to the invalid field */
  path: (string | number)[];
  message: string;
  /** Zod error code, or one of: invalid_pattern, unreadable, invalid_json */
  code: string;
}

function formatZodIssues(zodIssues: ZodIssue[]): PipelineConfigIssue[] {
  return zodIssues.map((issue) => ({
    path: issue.path.filter(
      (p): p is string | number => typeof p === "string" || typeof p === "number"
    ),
    message: issue.message,
    code: issue.code,
  }));
}

/**
 * Every entity pattern must be a valid regular expression.
 */
function validatePatterns(config: PipelineConfig): PipelineConfigIssue[] {
  const issues: PipelineConfigIssue[] = [];
  for (const [entity, source] of Object.entries(config.entity_patterns)) {
    try {
      new RegExp(source, "g");
    } catch (err) {
      issues.push({
        path: ["entity_patterns", entity],
        message: `Invalid regular expression: ${err instanceof Error ? err.message : String(err)}`,
        code: "invalid_pattern",
      });
    }
  }
  return issues;
}

function deepFreeze<T extends object>(obj: T): Readonly<T> {
  for (const name of Reflect.ownKeys(obj)) {
    const value: unknown = Reflect.get(obj, name);
    if (value && typeof value === "object" && !Object.isFrozen(value)) {
      deepFreeze(value);
    }
  }
  return Object.freeze(obj);
}

/**
 * Validate pipeline configuration without throwing.
 */
export function validatePipelineConfig(input: unknown): {
  success: boolean;
  config?: PipelineConfig;
  errors?: PipelineConfigIssue[];
} {
  const result = PipelineConfigSchema.safeParse(input);
  if (!result.success) {
    return { success: false, errors: formatZodIssues(result.error.issues) };
  }

  const patternIssues = validatePatterns(result.data);
  if (patternIssues.length > 0) {
    return { success: false, errors: patternIssues };
  }

  return { success: true, config: result.data };
}

/**
 * Validate and load pipeline configuration.
 *
 * @param input - Raw configuration object
 * @returns Validated and deep-frozen configuration
 * @throws PipelineConfigError if validation fails
 */
export function loadPipelineConfig(input: unknown): Readonly<PipelineConfig> {
  const result = validatePipelineConfig(input);

  if (!result.success || result.config === undefined) {
    const issues = result.errors ?? [];
    throw new PipelineConfigError(
      `Invalid pipeline configuration: ${issues.length} validation error(s)`,
      issues
    );
  }

  return deepFreeze(result.config);
}

/**
 * Read a JSON configuration file and load it.
 *
 * @throws PipelineConfigError if the file is unreadable, not JSON, or invalid
 */
export function readPipelineConfigFile(filePath: string): Readonly<PipelineConfig> {
  let raw: string;
  try {
    raw = readFileSync(filePath, "utf-8");
  } catch (err) {
    throw new PipelineConfigError(`Cannot read pipeline configuration ${filePath}`, [
      {
        path: [],
        message: err instanceof Error ? err.message : String(err),
        code: "unreadable",
      },
    ]);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new PipelineConfigError(`Pipeline configuration ${filePath} is not valid JSON`, [
      {
        path: [],
        message: err instanceof Error ? err.message : String(err),
        code: "invalid_json",
      },
    ]);
  }

  return loadPipelineConfig(parsed);
}

/**
 * Flat settings view used for argument resolution.
 */
export function configAsDict(config: Readonly<PipelineConfig>): PipelineSettings {
  return Object.freeze({ ...config });
}
