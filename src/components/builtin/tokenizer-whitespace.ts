/**
 * tokenizer_whitespace: splits on whitespace and punctuation.
 */

import { z } from "zod";
import { defineComponent, type Component, type StageOutput } from "../schema.js";
import { TrainingDataSchema } from "../../pipeline/training-data.js";
import { Lexicon } from "./nlp-lexicon.js";
import { parseStageArgs } from "./args.js";

export const TOKENIZER_WHITESPACE = "tokenizer_whitespace";

export interface Token {
  /** Normalized form */
  text: string;
  start: number;
  end: number;
}

const WORD = /[^\s.,!?;:"()[\]{}]+/gu;

export function tokenize(text: string, lexicon: Lexicon): Token[] {
  const tokens: Token[] = [];
  for (const match of text.matchAll(WORD)) {
    const start = match.index ?? 0;
    tokens.push({
      text: lexicon.normalize(match[0]),
      start,
      end: start + match[0].length,
    });
  }
  return tokens;
}

const LexiconArg = z.instanceof(Lexicon);
const TrainArgs = z.tuple([TrainingDataSchema, LexiconArg]);
const ProcessArgs = z.tuple([z.string(), LexiconArg]);

class WhitespaceTokenizer implements Component {
  train(...args: unknown[]): StageOutput {
    const [trainingData, lexicon] = parseStageArgs(TrainArgs, args, TOKENIZER_WHITESPACE, "train");
    return {
      tokenized_examples: trainingData.examples.map((example) => tokenize(example.text, lexicon)),
    };
  }

  process(...args: unknown[]): StageOutput {
    const [text, lexicon] = parseStageArgs(ProcessArgs, args, TOKENIZER_WHITESPACE, "process");
    return { tokens: tokenize(text, lexicon) };
  }
}

export const tokenizerWhitespace = defineComponent({
  descriptor: {
    name: TOKENIZER_WHITESPACE,
    kind: "tokenizer",
    requires: {
      train: ["training_data", "lexicon"],
      process: ["text", "lexicon"],
    },
    provides: {
      train: ["tokenized_examples"],
      process: ["tokens"],
    },
  },
  create: () => new WhitespaceTokenizer(),
});
