/**
 * Planning, stage execution and pipeline name tests.
 *
 * Run: node --import tsx --test src/pipeline/plan.test.ts
 */

import { describe, it } from "node:test";
import { strict as assert } from "node:assert";

import { planPipeline, assertPipelineResolvable } from "./plan.js";
import { runStage, ContractViolationError, type PipelineStep } from "./runner.js";
import { resolvePipelineNames } from "./names.js";
import { createBuiltinRegistry } from "../components/builtin/index.js";
import { UnknownTemplateError } from "../components/errors.js";
import {
  defineComponent,
  type Component,
  type ComponentDescriptorInput,
} from "../components/schema.js";
import { PipelineContext } from "../resolution/context.js";
import { MissingArgumentError } from "../resolution/fill-args.js";
import {
  configAsDict,
  loadPipelineConfig,
  DEFAULT_PIPELINE_CONFIG,
} from "../config/pipeline/index.js";
import { createRecordingLogger } from "../testing/recording-logger.js";

const registry = createBuiltinRegistry();
const settings = configAsDict(loadPipelineConfig(DEFAULT_PIPELINE_CONFIG));
const descriptorsOf = (names: string[]) => names.map((n) => registry.require(n).descriptor);

function step(descriptor: ComponentDescriptorInput, component: Component): PipelineStep {
  const definition = defineComponent({ descriptor, create: () => component });
  return { name: definition.descriptor.name, descriptor: definition.descriptor, component };
}

// ---------------------------------------------------------------------------
// planPipeline
// ---------------------------------------------------------------------------

describe("planPipeline", () => {
  it("finds no issues in the built-in templates", () => {
    for (const template of ["keyword", "keyword_entities", "all_components"]) {
      const names = resolvePipelineNames({ pipeline: template }, registry);
      assert.deepEqual(planPipeline(descriptorsOf(names), settings).issues, [], template);
    }
  });

  it("reports a component that needs a key only a later component provides", () => {
    const plan = planPipeline(
      descriptorsOf(["intent_classifier_keyword", "tokenizer_whitespace", "nlp_lexicon"]),
      settings
    );

    assert.deepEqual(plan.issues, [
      { componentName: "intent_classifier_keyword", stage: "process", missingArguments: ["tokens"] },
    ]);
  });

  it("carries inherited stage keys regardless of component order", () => {
    const plan = planPipeline(descriptorsOf(["tokenizer_whitespace", "nlp_lexicon"]), settings);

    assert.deepEqual(plan.issues, []);
    assert.deepEqual(
      [...plan.finalKeys.persist].sort(),
      ["lexicon", "model_dir", "tokenized_examples", "training_data"]
    );
  });

  it("reports only the requested stages", () => {
    const plan = planPipeline(
      descriptorsOf(["intent_classifier_keyword", "tokenizer_whitespace", "nlp_lexicon"]),
      settings,
      ["pipeline_init", "train"]
    );

    assert.deepEqual(plan.issues, []);
  });

  it("assertPipelineResolvable throws the first issue with its location", () => {
    const plan = planPipeline(descriptorsOf(["tokenizer_whitespace"]), {});

    assert.throws(
      () => assertPipelineResolvable(plan),
      (err: unknown) =>
        err instanceof MissingArgumentError &&
        err.componentName === "tokenizer_whitespace" &&
        err.stage === "train" &&
        err.missingArguments.join() === "lexicon"
    );
  });
});

// ---------------------------------------------------------------------------
// resolvePipelineNames
// ---------------------------------------------------------------------------

describe("resolvePipelineNames", () => {
  it("expands a template", () => {
    assert.deepEqual(resolvePipelineNames({ pipeline: "keyword" }, registry), [
      "nlp_lexicon",
      "tokenizer_whitespace",
      "intent_classifier_keyword",
    ]);
  });

  it("passes an explicit list through", () => {
    assert.deepEqual(resolvePipelineNames({ pipeline: ["ner_regex"] }, registry), ["ner_regex"]);
  });

  it("rejects an unknown template", () => {
    assert.throws(
      () => resolvePipelineNames({ pipeline: "nope" }, registry),
      (err: unknown) =>
        err instanceof UnknownTemplateError &&
        err.message ===
          'Unknown pipeline template "nope". Registered templates: keyword, keyword_entities, all_components'
    );
  });
});

// ---------------------------------------------------------------------------
// runStage
// ---------------------------------------------------------------------------

describe("runStage", () => {
  it("fills arguments from context then configuration and extends the context", () => {
    const seen: unknown[][] = [];
    const steps = [
      step(
        { name: "first", requires: { process: ["text", "suffix"] }, provides: { process: ["shout"] } },
        {
          process: (...args: unknown[]) => {
            seen.push(args);
            return { shout: `${String(args[0])}${String(args[1])}` };
          },
        }
      ),
      step(
        { name: "second", requires: { process: ["shout"] }, provides: { process: ["length"] } },
        { process: (shout: unknown) => ({ length: String(shout).length }) }
      ),
    ];

    const { context, outputs } = runStage(
      steps,
      "process",
      PipelineContext.seed("process", { text: "hey" }),
      { suffix: "!" }
    );

    assert.deepEqual(seen, [["hey", "!"]]);
    assert.equal(context.get("shout"), "hey!");
    assert.equal(context.get("length"), 4);
    assert.deepEqual(outputs, [
      { componentName: "first", output: { shout: "hey!" } },
      { componentName: "second", output: { length: 4 } },
    ]);
  });

  it("skips components that neither declare nor implement the stage", () => {
    const steps = [step({ name: "idle" }, {})];

    const { outputs } = runStage(steps, "train", PipelineContext.seed("train", { training_data: [] }), {});

    assert.deepEqual(outputs, []);
  });

  it("raises MissingArgumentError naming component and stage", () => {
    const steps = [step({ name: "needy", requires: { process: ["absent"] } }, { process: () => ({}) })];

    assert.throws(
      () => runStage(steps, "process", PipelineContext.seed("process", { text: "" }), {}),
      (err: unknown) =>
        err instanceof MissingArgumentError &&
        err.componentName === "needy" &&
        err.stage === "process"
    );
  });

  it("rejects output that omits a declared key", () => {
    const steps = [
      step({ name: "forgetful", provides: { process: ["a", "b"] } }, { process: () => ({ a: 1 }) }),
    ];

    assert.throws(
      () => runStage(steps, "process", PipelineContext.seed("process", { text: "" }), {}),
      (err: unknown) => {
        assert.ok(err instanceof ContractViolationError);
        assert.deepEqual(err.missingKeys, ["b"]);
        assert.equal(err.message, 'Component "forgetful" did not provide b in stage process');
        return true;
      }
    );
  });

  it("rejects a declared stage without a method", () => {
    const steps = [step({ name: "hollow", requires: { train: ["training_data"] } }, {})];

    assert.throws(
      () => runStage(steps, "train", PipelineContext.seed("train", { training_data: [] }), {}),
      (err: unknown) =>
        err instanceof ContractViolationError &&
        err.violation === "missing_method" &&
        err.message === 'Component "hollow" declares stage train but has no train() method'
    );
  });

  it("rejects output that is not a record", () => {
    const steps = [step({ name: "listy" }, { process: () => JSON.parse("[1, 2]") })];

    assert.throws(
      () => runStage(steps, "process", PipelineContext.seed("process", { text: "" }), {}),
      (err: unknown) =>
        err instanceof ContractViolationError &&
        err.violation === "invalid_output" &&
        err.componentName === "listy"
    );
  });

  it("adds undeclared keys and warns about them", () => {
    const logger = createRecordingLogger();
    const steps = [step({ name: "chatty" }, { process: () => ({ extra: true }) })];

    const { context } = runStage(
      steps,
      "process",
      PipelineContext.seed("process", { text: "" }),
      {},
      logger
    );

    assert.equal(context.get("extra"), true);
    assert.deepEqual(logger.messages("warn"), ["Component returned undeclared context keys"]);
    assert.deepEqual(logger.entries[0]?.context, {
      component: "chatty",
      stage: "process",
      keys: ["extra"],
    });
  });
});
