/**
 * Built-in component catalog.
 *
 * Rule-based components with no third-party packages. Together they cover
 * every lifecycle stage, so the registry, the templates and the
 * train / persist / load / parse cycle can run end to end.
 */

import type { ComponentDefinition } from "../schema.js";
import { ALL_COMPONENTS_TEMPLATE, ComponentRegistry, type PipelineTemplates } from "../registry.js";
import { nlpLexicon, NLP_LEXICON } from "./nlp-lexicon.js";
import { tokenizerWhitespace, TOKENIZER_WHITESPACE } from "./tokenizer-whitespace.js";
import {
  intentClassifierKeyword,
  INTENT_CLASSIFIER_KEYWORD,
} from "./intent-classifier-keyword.js";
import { nerRegex, NER_REGEX } from "./ner-regex.js";
import { nerSynonyms, NER_SYNONYMS } from "./ner-synonyms.js";

export { Lexicon, NLP_LEXICON, nlpLexicon } from "./nlp-lexicon.js";
export { tokenize, TOKENIZER_WHITESPACE, tokenizerWhitespace, type Token } from "./tokenizer-whitespace.js";
export {
  classifyByKeywords,
  INTENT_CLASSIFIER_KEYWORD,
  intentClassifierKeyword,
  type IntentPrediction,
} from "./intent-classifier-keyword.js";
export { extractWithPatterns, NER_REGEX, nerRegex } from "./ner-regex.js";
export { learnSynonyms, NER_SYNONYMS, nerSynonyms } from "./ner-synonyms.js";
export { StageArgumentError, parseStageArgs } from "./args.js";

export const BUILTIN_COMPONENTS: readonly ComponentDefinition[] = Object.freeze([
  nlpLexicon,
  tokenizerWhitespace,
  intentClassifierKeyword,
  nerRegex,
  nerSynonyms,
]);

const KEYWORD = [NLP_LEXICON, TOKENIZER_WHITESPACE, INTENT_CLASSIFIER_KEYWORD];

export const BUILTIN_TEMPLATES: PipelineTemplates = Object.freeze({
  keyword: KEYWORD,
  keyword_entities: [...KEYWORD, NER_REGEX, NER_SYNONYMS],
  [ALL_COMPONENTS_TEMPLATE]: BUILTIN_COMPONENTS.map((d) => d.descriptor.name),
});

/**
 * A sealed registry holding the built-in catalog and its templates.
 */
export function createBuiltinRegistry(): ComponentRegistry {
  return ComponentRegistry.create(BUILTIN_COMPONENTS, BUILTIN_TEMPLATES);
}
