/**
 * Component builder tests.
 *
 * Run: node --import tsx --test src/builder/component-builder.test.ts
 */

import { describe, it } from "node:test";
import { strict as assert } from "node:assert";
import { setTimeout as sleep } from "node:timers/promises";

import { ComponentBuilder, type BuildTransition } from "./component-builder.js";
import { ComponentRegistry } from "../components/registry.js";
import { UnknownComponentError } from "../components/errors.js";
import {
  defineComponent,
  type Component,
  type ComponentDefinitionInput,
} from "../components/schema.js";
import { MissingDependencyError } from "../dependencies/checker.js";
import { StaticPackageResolver } from "../dependencies/resolver.js";
import { ModelMetadata } from "../model/metadata.js";
import { createRecordingLogger } from "../testing/recording-logger.js";

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

class Probe implements Component {
  constructor(public readonly restored?: unknown) {}
}

function counted(input: Omit<ComponentDefinitionInput, "create">, delayMs = 0) {
  const calls = { create: 0 };
  const definition = defineComponent({
    ...input,
    create: async () => {
      calls.create += 1;
      if (delayMs > 0) await sleep(delayMs);
      return new Probe();
    },
  });
  return { definition, calls };
}

function builderFor(
  definitions: ComponentDefinitionInput[],
  transitions: BuildTransition[] = [],
  useCache = true
) {
  const registry = ComponentRegistry.create(definitions.map(defineComponent));
  return new ComponentBuilder({
    registry,
    resolver: new StaticPackageResolver(["available_pkg"]),
    manifestPath: "/nonexistent/optional-packages.txt",
    logger: createRecordingLogger(),
    onTransition: (t) => transitions.push(t),
    useCache,
  });
}

const phases = (transitions: BuildTransition[]) => transitions.map((t) => `${t.from}>${t.to}`);

// ---------------------------------------------------------------------------
// Name handling
// ---------------------------------------------------------------------------

describe("name handling", () => {
  it("returns null for a missing name", async () => {
    const builder = builderFor([]);

    assert.equal(await builder.createComponent(null, {}), null);
    assert.equal(await builder.createComponent(undefined, {}), null);
    assert.equal(await builder.loadComponent(null, {}, {}, ModelMetadata.empty()), null);
  });

  it("rejects an unknown name and reports the failure", async () => {
    const transitions: BuildTransition[] = [];
    const builder = builderFor(
      [{ descriptor: { name: "ner_regex" }, create: () => new Probe() }],
      transitions
    );

    await assert.rejects(builder.createComponent("ner_regx", {}), (err: unknown) => {
      assert.ok(err instanceof UnknownComponentError);
      assert.ok(err.message.includes("Unknown component name"));
      assert.deepEqual(err.suggestions, ["ner_regex"]);
      return true;
    });
    assert.deepEqual(phases(transitions), ["unresolved>failed"]);
    assert.ok(transitions[0]?.error instanceof UnknownComponentError);
  });

  it("rejects an unknown name on load", async () => {
    const transitions: BuildTransition[] = [];
    const builder = builderFor(
      [{ descriptor: { name: "ner_regex" }, create: () => new Probe() }],
      transitions
    );

    await assert.rejects(
      builder.loadComponent("my_made_up_component", {}, {}, ModelMetadata.empty()),
      (err: unknown) => {
        assert.ok(err instanceof UnknownComponentError);
        assert.ok(err.message.includes("Unknown component name"));
        return true;
      }
    );
    assert.deepEqual(phases(transitions), ["unresolved>failed"]);
    assert.equal(transitions[0]?.mode, "load");
  });
});

// ---------------------------------------------------------------------------
// Dependencies
// ---------------------------------------------------------------------------

describe("dependency validation", () => {
  it("fails before instantiation when a package is missing", async () => {
    const transitions: BuildTransition[] = [];
    const { definition, calls } = counted({
      descriptor: { name: "needs_pkg", requiredPackages: ["available_pkg", "absent_pkg"] },
    });
    const builder = builderFor([definition], transitions);

    await assert.rejects(
      builder.createComponent("needs_pkg", {}),
      (err: unknown) =>
        err instanceof MissingDependencyError && err.missingPackages.join() === "absent_pkg"
    );
    assert.equal(calls.create, 0);
    assert.deepEqual(phases(transitions), ["unresolved>name_validated", "name_validated>failed"]);
  });

  it("walks every phase on success", async () => {
    const transitions: BuildTransition[] = [];
    const { definition } = counted({
      descriptor: { name: "fine", requiredPackages: ["available_pkg"] },
    });
    const builder = builderFor([definition], transitions);

    await builder.createComponent("fine", {});

    assert.deepEqual(phases(transitions), [
      "unresolved>name_validated",
      "name_validated>dependencies_validated",
      "dependencies_validated>instantiated",
    ]);
    assert.ok(transitions.every((t) => t.componentName === "fine" && t.mode === "create"));
  });
});

// ---------------------------------------------------------------------------
// Caching
// ---------------------------------------------------------------------------

describe("caching", () => {
  it("shares one instantiation between concurrent requests", async () => {
    const { definition, calls } = counted({ descriptor: { name: "slow" } }, 20);
    const builder = builderFor([definition]);

    const instances = await Promise.all([
      builder.createComponent("slow", {}),
      builder.createComponent("slow", {}),
      builder.createComponent("slow", {}),
    ]);

    assert.equal(calls.create, 1);
    assert.equal(instances[0], instances[1]);
    assert.equal(instances[1], instances[2]);
    assert.equal(builder.cacheSize, 1);
  });

  it("splits the cache only on declared configuration keys", async () => {
    const { definition, calls } = counted({
      descriptor: { name: "configured", configKeys: ["language"] },
    });
    const builder = builderFor([definition]);

    const en = await builder.createComponent("configured", { language: "en", noise: 1 });
    const enAgain = await builder.createComponent("configured", { language: "en", noise: 2 });
    const de = await builder.createComponent("configured", { language: "de" });

    assert.equal(en, enAgain);
    assert.notEqual(en, de);
    assert.equal(calls.create, 2);
  });

  it("evicts a failed instantiation so the next request retries", async () => {
    let attempts = 0;
    const builder = builderFor([
      {
        descriptor: { name: "flaky" },
        create: () => {
          attempts += 1;
          if (attempts === 1) throw new Error("first attempt fails");
          return new Probe();
        },
      },
    ]);

    await assert.rejects(builder.createComponent("flaky", {}), /first attempt fails/);
    assert.equal(builder.cacheSize, 0);

    const component = await builder.createComponent("flaky", {});

    assert.ok(component instanceof Probe);
    assert.equal(attempts, 2);
  });

  it("builds fresh instances when caching is off or opted out", async () => {
    const { definition, calls } = counted({ descriptor: { name: "plain" } });
    const uncachedBuilder = builderFor([definition], [], false);

    await uncachedBuilder.createComponent("plain", {});
    await uncachedBuilder.createComponent("plain", {});
    assert.equal(calls.create, 2);
    assert.equal(uncachedBuilder.cacheSize, 0);

    const builder = builderFor([
      { descriptor: { name: "opted_out" }, create: () => new Probe(), cacheKey: () => null },
    ]);
    const first = await builder.createComponent("opted_out", {});
    const second = await builder.createComponent("opted_out", {});
    assert.notEqual(first, second);
  });

  it("clearCache drops cached instances", async () => {
    const { definition, calls } = counted({ descriptor: { name: "cached" } });
    const builder = builderFor([definition]);

    await builder.createComponent("cached", {});
    builder.clearCache();
    await builder.createComponent("cached", {});

    assert.equal(builder.cacheSize, 1);
    assert.equal(calls.create, 2);
  });
});

// ---------------------------------------------------------------------------
// Loading
// ---------------------------------------------------------------------------

describe("loadComponent", () => {
  const metadata = ModelMetadata.empty();

  it("passes persisted state to the load factory", async () => {
    const transitions: BuildTransition[] = [];
    const builder = builderFor(
      [
        {
          descriptor: { name: "stateful" },
          create: () => new Probe(),
          load: ({ state }) => new Probe(state["learned"]),
        },
      ],
      transitions
    );

    const loaded = await builder.loadComponent("stateful", {}, { learned: 42 }, metadata);

    assert.ok(loaded instanceof Probe);
    assert.equal(loaded.restored, 42);
    assert.ok(transitions.every((t) => t.mode === "load"));
  });

  it("keeps loaded instances apart from created ones and from other states", async () => {
    const builder = builderFor([
      {
        descriptor: { name: "stateful" },
        create: () => new Probe(),
        load: ({ state }) => new Probe(state["learned"]),
      },
    ]);

    const created = await builder.createComponent("stateful", {});
    const one = await builder.loadComponent("stateful", {}, { learned: 1 }, metadata);
    const oneAgain = await builder.loadComponent("stateful", {}, { learned: 1 }, metadata);
    const two = await builder.loadComponent("stateful", {}, { learned: 2 }, metadata);

    assert.notEqual(created, one);
    assert.equal(one, oneAgain);
    assert.notEqual(one, two);
  });

  it("does not share a loaded instance between models of different runs", async () => {
    const seen: string[] = [];
    const builder = builderFor([
      {
        descriptor: { name: "stateful" },
        create: () => new Probe(),
        load: ({ metadata: loadedFrom }) => {
          seen.push(loadedFrom.runId);
          return new Probe(loadedFrom.runId);
        },
      },
    ]);
    const runA = ModelMetadata.create({ language: "en", pipeline: [], config: {}, runId: "run-a" });
    const runB = ModelMetadata.create({ language: "en", pipeline: [], config: {}, runId: "run-b" });

    const fromA = await builder.loadComponent("stateful", {}, { learned: 1 }, runA);
    const fromB = await builder.loadComponent("stateful", {}, { learned: 1 }, runB);

    assert.notEqual(fromA, fromB);
    assert.deepEqual(seen, ["run-a", "run-b"]);
  });

  it("falls back to create without a load factory", async () => {
    const { definition, calls } = counted({ descriptor: { name: "stateless" } });
    const builder = builderFor([definition]);

    const loaded = await builder.loadComponent("stateless", {}, {}, metadata);

    assert.ok(loaded instanceof Probe);
    assert.equal(calls.create, 1);
  });
});
