/**
 * nlp_lexicon: shared language resources, built once per pipeline.
 */

import { z } from "zod";
import { defineComponent, type Component, type StageOutput } from "../schema.js";
import { parseStageArgs } from "./args.js";

export const NLP_LEXICON = "nlp_lexicon";

/**
 * Normalization rules for one language.
 */
export class Lexicon {
  constructor(
    public readonly language: string,
    public readonly caseSensitive: boolean
  ) {}

  normalize(word: string): string {
    const composed = word.normalize("NFC");
    return this.caseSensitive ? composed : composed.toLocaleLowerCase(this.language);
  }
}

const PipelineInitArgs = z.tuple([z.string().min(1), z.boolean()]);

class NlpLexicon implements Component {
  pipelineInit(...args: unknown[]): StageOutput {
    const [language, caseSensitive] = parseStageArgs(
      PipelineInitArgs,
      args,
      NLP_LEXICON,
      "pipeline_init"
    );
    return { lexicon: new Lexicon(language, caseSensitive) };
  }
}

export const nlpLexicon = defineComponent({
  descriptor: {
    name: NLP_LEXICON,
    kind: "utility",
    requires: { pipeline_init: ["language", "case_sensitive"] },
    provides: { pipeline_init: ["lexicon"] },
    configKeys: ["language", "case_sensitive"],
    description: "Language-specific normalization shared by later components",
  },
  create: () => new NlpLexicon(),
});
