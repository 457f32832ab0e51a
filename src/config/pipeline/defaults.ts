/**
 * Default pipeline configuration.
 *
 * Uses the `keyword` template with a small greeting vocabulary. Projects
 * override `pipeline`, `intent_keywords` and `entity_patterns` for their
 * own data.
 */

import type { PipelineConfigInput } from "./schema.js";

export const DEFAULT_PIPELINE_CONFIG: PipelineConfigInput = {
  language: "en",
  pipeline: "keyword",
  case_sensitive: false,
  intent_keywords: {
    greet: ["hello", "hi", "hey"],
    goodbye: ["bye", "goodbye"],
    affirm: ["yes", "yep", "sure"],
    deny: ["no", "nope"],
  },
  entity_patterns: {},
};
