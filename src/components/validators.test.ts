/**
 * Registry validator tests.
 *
 * Run: node --import tsx --test src/components/validators.test.ts
 */

import { describe, it } from "node:test";
import { strict as assert } from "node:assert";

import {
  validateRegistry,
  validateDefinitions,
  checkAllComponentsTemplate,
  formatRegistryIssue,
  formatRegistryReport,
  type RegistryValidationIssue,
} from "./validators.js";
import { ComponentRegistry } from "./registry.js";
import { defineComponent, type ComponentDescriptorInput } from "./schema.js";
import { createBuiltinRegistry } from "./builtin/index.js";
import {
  configAsDict,
  loadPipelineConfig,
  DEFAULT_PIPELINE_CONFIG,
} from "../config/pipeline/index.js";

const settings = configAsDict(loadPipelineConfig(DEFAULT_PIPELINE_CONFIG));

const component = (descriptor: ComponentDescriptorInput) =>
  defineComponent({ descriptor, create: () => ({}) });

const rules = (issues: RegistryValidationIssue[]) => issues.map((i) => i.rule);

describe("validateRegistry", () => {
  it("passes the built-in catalog with the default configuration", () => {
    const result = validateRegistry(createBuiltinRegistry(), settings);

    assert.deepEqual(result.issues, []);
    assert.equal(result.isValid, true);
    assert.equal(formatRegistryReport(result), "✓ Registry passes all checks");
  });

  it("reports arguments that only configuration could supply when it is absent", () => {
    const result = validateRegistry(createBuiltinRegistry(), {});

    assert.equal(result.isValid, false);
    assert.deepEqual(
      result.issues.map((i) => [i.rule, i.componentName, i.stage]),
      [
        ["UNSATISFIABLE_STAGE_ARGUMENT", "nlp_lexicon", "pipeline_init"],
        ["UNSATISFIABLE_STAGE_ARGUMENT", "intent_classifier_keyword", "process"],
        ["UNSATISFIABLE_STAGE_ARGUMENT", "ner_regex", "process"],
      ]
    );
    assert.equal(
      result.issues[0]?.message,
      'Component "nlp_lexicon" requires language, case_sensitive in stage pipeline_init, ' +
        "but no component provides it and the configuration does not define it"
    );
  });

  it("accepts arguments provided by a later component", () => {
    const registry = ComponentRegistry.create(
      [
        component({ name: "consumer", requires: { process: ["late_key"] } }),
        component({ name: "producer", provides: { process: ["late_key"] } }),
      ],
      { all_components: ["consumer", "producer"] }
    );

    assert.equal(validateRegistry(registry).isValid, true);
  });

  it("requires extractors to take the entity list", () => {
    const registry = ComponentRegistry.create(
      [
        component({ name: "lazy_extractor", kind: "extractor", provides: { process: ["entities"] } }),
      ],
      { all_components: ["lazy_extractor"] }
    );

    const result = validateRegistry(registry);

    assert.deepEqual(rules(result.issues), ["EXTRACTOR_IGNORES_ENTITIES"]);
    assert.equal(result.issues[0]?.componentName, "lazy_extractor");
  });

  it("reports unknown template components with suggestions", () => {
    const registry = ComponentRegistry.create([component({ name: "tokenizer_basic" })], {
      all_components: ["tokenizer_basic"],
      broken: ["tokenizer_basci"],
    });

    const [issue, ...rest] = validateRegistry(registry).issues;

    assert.equal(rest.length, 0);
    assert.equal(issue?.rule, "UNKNOWN_TEMPLATE_COMPONENT");
    assert.equal(issue?.templateName, "broken");
    assert.equal(issue?.suggestion, "Did you mean: tokenizer_basic?");
  });

  it("treats a missing all_components template as a warning", () => {
    const result = validateRegistry(ComponentRegistry.create([component({ name: "alone" })]));

    assert.equal(result.isValid, true);
    assert.equal(result.warningCount, 1);
    assert.deepEqual(rules(result.issues), ["INCOMPLETE_ALL_COMPONENTS"]);
  });
});

describe("checkAllComponentsTemplate", () => {
  it("reports missing and repeated components", () => {
    const registry = ComponentRegistry.create(
      [component({ name: "one" }), component({ name: "two" })],
      { all_components: ["one", "one"] }
    );

    assert.deepEqual(
      checkAllComponentsTemplate(registry).map((i) => i.message),
      [
        'Component "two" is missing from "all_components"',
        'Component "one" is listed more than once in "all_components"',
      ]
    );
  });
});

describe("validateDefinitions", () => {
  it("reports duplicate names before registration", () => {
    const result = validateDefinitions(
      [component({ name: "dup" }), component({ name: "dup" })],
      { all_components: ["dup"] }
    );

    assert.deepEqual(rules(result.issues), ["DUPLICATE_NAME"]);
    assert.equal(result.issues[0]?.message, 'Component name "dup" is defined 2 times');
    assert.equal(result.errorCount, 1);
  });
});

describe("formatting", () => {
  it("renders an issue with its suggestion", () => {
    const issue: RegistryValidationIssue = {
      rule: "DUPLICATE_NAME",
      severity: "error",
      message: "Component name \"x\" is defined 2 times",
      suggestion: "Rename all but one of the definitions",
    };

    assert.equal(
      formatRegistryIssue(issue),
      'ERROR [DUPLICATE_NAME]: Component name "x" is defined 2 times\n' +
        "  SUGGESTION: Rename all but one of the definitions"
    );
  });

  it("labels a failing report", () => {
    const report = formatRegistryReport(validateRegistry(createBuiltinRegistry(), {}));

    assert.equal(report.split("\n")[1], "REGISTRY VALIDATION FAILED");
    assert.equal(report.split("\n")[3], "Errors: 3 | Warnings: 0");
  });
});
