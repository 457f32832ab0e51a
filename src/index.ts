/**
 * NLU component runtime.
 *
 * Typical use:
 *
 *   const registry = createBuiltinRegistry();
 *   const trainer = await Trainer.create(loadPipelineConfig(raw), { registry });
 *   const interpreter = trainer.train(trainingData);
 *   trainer.persist("models/latest");
 *
 *   const loaded = await Interpreter.load("models/latest", { registry });
 *   loaded.parse("hello there");
 */

export * from "./config/index.js";
export * from "./logging/index.js";
export * from "./components/index.js";
export * from "./dependencies/index.js";
export * from "./resolution/index.js";
export * from "./builder/index.js";
export * from "./model/index.js";
export * from "./pipeline/index.js";
