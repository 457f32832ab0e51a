/**
 * Pipeline configuration loader tests.
 *
 * Run: node --import tsx --test src/config/pipeline/loader.test.ts
 */

import { test } from "node:test";
import { strict as assert } from "node:assert";
import { mkdtempSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";

import {
  loadPipelineConfig,
  validatePipelineConfig,
  readPipelineConfigFile,
  configAsDict,
  PipelineConfigError,
  DEFAULT_PIPELINE_CONFIG,
} from "./index.js";

// ---------------------------------------------------------------------------
// Defaults and freezing
// ---------------------------------------------------------------------------

test("loadPipelineConfig fills defaults for omitted fields", () => {
  const config = loadPipelineConfig({ pipeline: "keyword" });

  assert.equal(config.language, "en");
  assert.equal(config.case_sensitive, false);
  assert.deepEqual(config.intent_keywords, {});
  assert.deepEqual(config.entity_patterns, {});
  assert.equal(config.pipeline, "keyword");
});

test("loadPipelineConfig deep-freezes the result", () => {
  const config = loadPipelineConfig(DEFAULT_PIPELINE_CONFIG);

  assert.ok(Object.isFrozen(config));
  assert.ok(Object.isFrozen(config.intent_keywords));
  assert.ok(Object.isFrozen(config.intent_keywords["greet"]));
});

test("component-specific keys pass through validation", () => {
  const config = loadPipelineConfig({ pipeline: ["tokenizer_whitespace"], max_tokens: 5 });
  const settings = configAsDict(config);

  assert.equal(settings["max_tokens"], 5);
  assert.deepEqual(settings["pipeline"], ["tokenizer_whitespace"]);
  assert.ok(Object.isFrozen(settings));
});

// ---------------------------------------------------------------------------
// Validation failures
// ---------------------------------------------------------------------------

test("missing pipeline is reported with its path", () => {
  const result = validatePipelineConfig({ language: "en" });

  assert.equal(result.success, false);
  assert.equal(result.errors?.length, 1);
  assert.deepEqual(result.errors?.[0]?.path, ["pipeline"]);
});

test("an empty pipeline list is rejected", () => {
  const result = validatePipelineConfig({ pipeline: [] });

  assert.equal(result.success, false);
  assert.deepEqual(result.errors?.[0]?.path, ["pipeline"]);
});

test("entity patterns must compile", () => {
  const result = validatePipelineConfig({
    pipeline: "keyword",
    entity_patterns: { number: "(\\d+", email: "\\S+@\\S+" },
  });

  assert.equal(result.success, false);
  assert.equal(result.errors?.length, 1);
  assert.deepEqual(result.errors?.[0]?.path, ["entity_patterns", "number"]);
  assert.equal(result.errors?.[0]?.code, "invalid_pattern");
});

test("loadPipelineConfig throws PipelineConfigError with a formatted report", () => {
  assert.throws(
    () => loadPipelineConfig({ pipeline: "keyword", language: "english" }),
    (err: unknown) => {
      assert.ok(err instanceof PipelineConfigError);
      assert.equal(err.issues.length, 1);
      assert.equal(
        err.format().split("\n")[1],
        '  - language: Expected a language tag such as "en" or "en-US"'
      );
      return true;
    }
  );
});

// ---------------------------------------------------------------------------
// Files
// ---------------------------------------------------------------------------

test("readPipelineConfigFile loads JSON from disk", () => {
  const dir = mkdtempSync(join(tmpdir(), "pipeline-config-"));
  const file = join(dir, "config.json");
  writeFileSync(file, JSON.stringify({ pipeline: "all_components", language: "de" }));

  const config = readPipelineConfigFile(file);

  assert.equal(config.pipeline, "all_components");
  assert.equal(config.language, "de");
});

test("readPipelineConfigFile distinguishes unreadable files from invalid JSON", () => {
  const dir = mkdtempSync(join(tmpdir(), "pipeline-config-"));
  const broken = join(dir, "broken.json");
  writeFileSync(broken, "{ pipeline: ");

  assert.throws(
    () => readPipelineConfigFile(join(dir, "missing.json")),
    (err: unknown) => err instanceof PipelineConfigError && err.issues[0]?.code === "unreadable"
  );
  assert.throws(
    () => readPipelineConfigFile(broken),
    (err: unknown) => err instanceof PipelineConfigError && err.issues[0]?.code === "invalid_json"
  );
});
