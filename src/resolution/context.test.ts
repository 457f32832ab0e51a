/**
 * Pipeline context tests.
 *
 * Run: node --import tsx --test src/resolution/context.test.ts
 */

import { describe, it } from "node:test";
import { strict as assert } from "node:assert";

import {
  PipelineContext,
  ContextSeedError,
  supersetContextKeys,
  supersetContext,
} from "./context.js";
import { defineComponent } from "../components/schema.js";

describe("PipelineContext.seed", () => {
  it("seeds process defaults", () => {
    const context = PipelineContext.seed("process", { text: "hello" });

    assert.deepEqual(context.toRecord(), { intent: null, entities: [], text: "hello" });
  });

  it("lets supplied values override defaults", () => {
    const context = PipelineContext.seed("process", { text: "hi", intent: "greet" });

    assert.equal(context.get("intent"), "greet");
  });

  it("gives each context its own default entity list", () => {
    const first = PipelineContext.seed("process", { text: "a" });
    const second = PipelineContext.seed("process", { text: "b" });

    assert.notEqual(first.get("entities"), second.get("entities"));
  });

  it("carries inherited values into the new stage", () => {
    const init = PipelineContext.seed("pipeline_init").extend({ lexicon: "lex" });
    const train = PipelineContext.seed("train", { training_data: [] }, init);

    assert.equal(train.get("lexicon"), "lex");
    assert.deepEqual(train.keys(), ["lexicon", "training_data"]);
    assert.equal(train.stage, "train");
  });

  it("rejects a stage whose base keys are absent", () => {
    assert.throws(
      () => PipelineContext.seed("persist", {}),
      (err: unknown) =>
        err instanceof ContextSeedError &&
        err.stage === "persist" &&
        err.missingKeys.join(",") === "model_dir"
    );
  });

  it("accepts base keys from the inherited context", () => {
    const train = PipelineContext.seed("train", { training_data: ["x"] });
    const process = PipelineContext.seed("process", { text: "t" }, train);

    assert.deepEqual(process.get("training_data"), ["x"]);
  });
});

describe("PipelineContext.extend", () => {
  it("replaces values and keeps other keys", () => {
    const context = PipelineContext.seed("process", { text: "t" });
    context.extend({ entities: [{ entity: "city" }], tokens: ["t"] });

    assert.deepEqual(context.keys(), ["intent", "entities", "text", "tokens"]);
    assert.deepEqual(context.get("entities"), [{ entity: "city" }]);
    assert.equal(context.size, 4);
  });

  it("returns a frozen snapshot", () => {
    const snapshot = PipelineContext.seed("pipeline_init").extend({ a: 1 }).toRecord();

    assert.ok(Object.isFrozen(snapshot));
    assert.equal(snapshot["a"], 1);
  });
});

describe("supersetContextKeys", () => {
  const lexicon = defineComponent({
    descriptor: { name: "lexicon", provides: { pipeline_init: ["lexicon"] } },
    create: () => ({}),
  });
  const learner = defineComponent({
    descriptor: {
      name: "learner",
      requires: { train: ["training_data"] },
      provides: { train: ["learned"], process: ["tokens"] },
    },
    create: () => ({}),
  });
  const descriptors = [lexicon.descriptor, learner.descriptor];

  it("unions base keys with provides of the stage and inherited stages", () => {
    assert.deepEqual(
      [...supersetContextKeys(descriptors, "train")].sort(),
      ["learned", "lexicon", "training_data"]
    );
    assert.deepEqual(
      [...supersetContextKeys(descriptors, "process")].sort(),
      ["entities", "intent", "lexicon", "text", "tokens"]
    );
  });

  it("carries train keys into persist", () => {
    assert.deepEqual(
      [...supersetContextKeys(descriptors, "persist")].sort(),
      ["learned", "lexicon", "model_dir", "training_data"]
    );
  });

  it("ignores component order", () => {
    const reversed = supersetContext([learner.descriptor, lexicon.descriptor]);

    assert.deepEqual([...reversed.pipeline_init], ["lexicon"]);
    assert.ok(reversed.process.has("tokens"));
  });
});
