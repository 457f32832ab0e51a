/**
 * intent_classifier_keyword: picks the intent whose keywords occur most
 * often among the message tokens.
 */

import { z } from "zod";
import { defineComponent, type Component, type StageOutput } from "../schema.js";
import { IntentKeywordsSchema } from "../../config/pipeline/schema.js";
import { parseStageArgs } from "./args.js";

export const INTENT_CLASSIFIER_KEYWORD = "intent_classifier_keyword";

export interface IntentPrediction {
  name: string;
  /** Share of all keyword hits that went to this intent */
  confidence: number;
}

const TokensArg = z.array(z.object({ text: z.string() }).passthrough());
const ProcessArgs = z.tuple([TokensArg, IntentKeywordsSchema, z.boolean()]);

/**
 * Ties go to the intent listed first in `intentKeywords`.
 */
export function classifyByKeywords(
  tokens: readonly string[],
  intentKeywords: Readonly<Record<string, readonly string[]>>,
  caseSensitive: boolean
): IntentPrediction | null {
  const fold = (s: string) => (caseSensitive ? s : s.toLowerCase());
  const words = tokens.map(fold);

  let best: { name: string; hits: number } | null = null;
  let totalHits = 0;
  for (const [name, keywords] of Object.entries(intentKeywords)) {
    const wanted = new Set(keywords.map(fold));
    const hits = words.filter((word) => wanted.has(word)).length;
    totalHits += hits;
    if (hits > 0 && (best === null || hits > best.hits)) {
      best = { name, hits };
    }
  }

  if (best === null) return null;
  return { name: best.name, confidence: best.hits / totalHits };
}

class KeywordIntentClassifier implements Component {
  process(...args: unknown[]): StageOutput {
    const [tokens, intentKeywords, caseSensitive] = parseStageArgs(
      ProcessArgs,
      args,
      INTENT_CLASSIFIER_KEYWORD,
      "process"
    );
    return {
      intent: classifyByKeywords(
        tokens.map((t) => t.text),
        intentKeywords,
        caseSensitive
      ),
    };
  }
}

export const intentClassifierKeyword = defineComponent({
  descriptor: {
    name: INTENT_CLASSIFIER_KEYWORD,
    kind: "classifier",
    requires: { process: ["tokens", "intent_keywords", "case_sensitive"] },
    provides: { process: ["intent"] },
    configKeys: ["intent_keywords", "case_sensitive"],
  },
  create: () => new KeywordIntentClassifier(),
});
