/**
 * ner_regex: extracts entities with configured regular expressions.
 */

import { z } from "zod";
import { defineComponent, type Component, type StageOutput } from "../schema.js";
import { EntityPatternsSchema } from "../../config/pipeline/schema.js";
import { EntitySchema, type Entity } from "../../pipeline/training-data.js";
import { parseStageArgs } from "./args.js";

export const NER_REGEX = "ner_regex";

const ProcessArgs = z.tuple([z.string(), z.array(EntitySchema), EntityPatternsSchema]);

/**
 * Non-empty matches of every pattern, ordered by position, then by
 * pattern order.
 */
export function extractWithPatterns(
  text: string,
  patterns: Readonly<Record<string, string>>
): Entity[] {
  const found: Entity[] = [];
  for (const [entity, source] of Object.entries(patterns)) {
    for (const match of text.matchAll(new RegExp(source, "g"))) {
      if (match[0] === "") continue;
      const start = match.index ?? 0;
      found.push({
        start,
        end: start + match[0].length,
        value: match[0],
        entity,
        extractor: NER_REGEX,
      });
    }
  }
  // Stable sort: equal starts keep pattern order
  return found.sort((a, b) => a.start - b.start);
}

class RegexEntityExtractor implements Component {
  process(...args: unknown[]): StageOutput {
    const [text, entities, patterns] = parseStageArgs(ProcessArgs, args, NER_REGEX, "process");
    return { entities: [...entities, ...extractWithPatterns(text, patterns)] };
  }
}

export const nerRegex = defineComponent({
  descriptor: {
    name: NER_REGEX,
    kind: "extractor",
    requires: { process: ["text", "entities", "entity_patterns"] },
    provides: { process: ["entities"] },
    configKeys: ["entity_patterns"],
  },
  create: () => new RegexEntityExtractor(),
});
