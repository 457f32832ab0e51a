/**
 * ner_synonyms: maps extracted entity values onto canonical values.
 *
 * Synonyms come from the training data's explicit `entity_synonyms` and
 * from annotated entities whose value differs from the text they span.
 * They are persisted in the model metadata and restored on load.
 */

import { z } from "zod";
import { defineComponent, type Component, type StageOutput } from "../schema.js";
import type { Logger } from "../../logging/logger.js";
import {
  EntitySchema,
  TrainingDataSchema,
  type TrainingData,
} from "../../pipeline/training-data.js";
import { parseStageArgs } from "./args.js";

export const NER_SYNONYMS = "ner_synonyms";

const SynonymMap = z.record(z.string(), z.string());
const PersistedState = z.object({ entity_synonyms: SynonymMap.default({}) });

const TrainArgs = z.tuple([TrainingDataSchema]);
const PersistArgs = z.tuple([z.string()]);
const ProcessArgs = z.tuple([z.array(EntitySchema)]);

/**
 * Lowercased surface form -> canonical value.
 */
export function learnSynonyms(trainingData: TrainingData): Map<string, string> {
  const synonyms = new Map<string, string>();
  for (const [surface, canonical] of Object.entries(trainingData.entity_synonyms)) {
    synonyms.set(surface.toLowerCase(), canonical);
  }
  for (const example of trainingData.examples) {
    for (const entity of example.entities) {
      const surface = example.text.slice(entity.start, entity.end);
      if (surface !== entity.value) {
        synonyms.set(surface.toLowerCase(), entity.value);
      }
    }
  }
  return synonyms;
}

class EntitySynonymMapper implements Component {
  private synonyms: Map<string, string>;

  constructor(
    private readonly logger: Logger,
    synonyms: Readonly<Record<string, string>> = {}
  ) {
    this.synonyms = new Map(Object.entries(synonyms));
  }

  train(...args: unknown[]): StageOutput {
    const [trainingData] = parseStageArgs(TrainArgs, args, NER_SYNONYMS, "train");
    this.synonyms = learnSynonyms(trainingData);
    this.logger.info("Learned entity synonyms", { count: this.synonyms.size });
    return {};
  }

  persist(...args: unknown[]): StageOutput {
    parseStageArgs(PersistArgs, args, NER_SYNONYMS, "persist");
    return { entity_synonyms: Object.fromEntries(this.synonyms) };
  }

  process(...args: unknown[]): StageOutput {
    const [entities] = parseStageArgs(ProcessArgs, args, NER_SYNONYMS, "process");
    return {
      entities: entities.map((entity) => {
        const canonical = this.synonyms.get(entity.value.toLowerCase());
        return canonical === undefined ? entity : { ...entity, value: canonical };
      }),
    };
  }
}

export const nerSynonyms = defineComponent({
  descriptor: {
    name: NER_SYNONYMS,
    kind: "extractor",
    requires: {
      train: ["training_data"],
      persist: ["model_dir"],
      process: ["entities"],
    },
    provides: {
      persist: ["entity_synonyms"],
      process: ["entities"],
    },
  },
  create: ({ logger }) => new EntitySynonymMapper(logger),
  load: ({ logger, state }) =>
    new EntitySynonymMapper(logger, PersistedState.parse(state).entity_synonyms),
  // Trained state lives on the instance
  cacheKey: () => null,
});
