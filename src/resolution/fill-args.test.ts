/**
 * fillArgs tests.
 *
 * Run: node --import tsx --test src/resolution/fill-args.test.ts
 */

import { describe, it } from "node:test";
import { strict as assert } from "node:assert";

import { fillArgs, unsatisfiedArguments, MissingArgumentError } from "./fill-args.js";

describe("fillArgs", () => {
  it("takes values from the context, then from the configuration", () => {
    assert.deepEqual(fillArgs(["a", "b"], { a: 1 }, { b: 2 }), [1, 2]);
  });

  it("prefers the context when both have the key", () => {
    assert.deepEqual(fillArgs(["lang"], { lang: "de" }, { lang: "en" }), ["de"]);
  });

  it("returns values in declaration order", () => {
    const context = { tokens: ["hi"], text: "hi" };
    assert.deepEqual(fillArgs(["text", "tokens", "language"], context, { language: "en" }), [
      "hi",
      ["hi"],
      "en",
    ]);
  });

  it("treats present null and undefined values as satisfied", () => {
    assert.deepEqual(fillArgs(["intent", "hint"], { intent: null }, { hint: undefined }), [
      null,
      undefined,
    ]);
  });

  it("ignores inherited properties", () => {
    const context: Record<string, unknown> = Object.create({ inherited: true });
    assert.throws(
      () => fillArgs(["inherited"], context, {}),
      (err: unknown) =>
        err instanceof MissingArgumentError && err.missingArguments.join(",") === "inherited"
    );
  });

  it("returns an empty array when nothing is required", () => {
    assert.deepEqual(fillArgs([], {}, {}), []);
  });

  it("names exactly the unsatisfiable arguments", () => {
    assert.throws(
      () => fillArgs(["good_one", "bad_one", "good_two", "bad_two"], { good_one: 1 }, { good_two: 2 }),
      (err: unknown) => {
        assert.ok(err instanceof MissingArgumentError);
        assert.deepEqual(err.missingArguments, ["bad_one", "bad_two"]);
        assert.ok(err.message.includes("bad_one, bad_two"));
        assert.ok(!err.message.includes("good_one"));
        assert.ok(!err.message.includes("good_two"));
        return true;
      }
    );
  });

  it("lists a repeated missing name once", () => {
    assert.throws(
      () => fillArgs(["x", "x", "y"], {}, {}),
      (err: unknown) =>
        err instanceof MissingArgumentError && err.missingArguments.join(",") === "x,y"
    );
  });

  it("mentions the component and stage when given", () => {
    assert.throws(
      () => fillArgs(["lexicon"], {}, {}, { componentName: "tokenizer_whitespace", stage: "process" }),
      (err: unknown) => {
        assert.ok(err instanceof MissingArgumentError);
        assert.equal(err.componentName, "tokenizer_whitespace");
        assert.equal(err.stage, "process");
        assert.ok(
          err.message.startsWith(
            'No value available for component "tokenizer_whitespace" (stage process) for argument(s): lexicon.'
          )
        );
        return true;
      }
    );
  });
});

describe("unsatisfiedArguments", () => {
  it("checks keys against the available set and the configuration", () => {
    const available = new Set(["text", "tokens"]);
    assert.deepEqual(
      unsatisfiedArguments(["text", "language", "lexicon", "lexicon"], available, {
        language: "en",
      }),
      ["lexicon"]
    );
  });

  it("is empty when everything is available", () => {
    assert.deepEqual(unsatisfiedArguments(["a"], new Set(["a"]), {}), []);
  });
});
