/**
 * Synthesizer module types
 */

import type { EngineConfig } from "../../types/config.js";
import type { NameHint } from "../../types/model.js";
import type { ScopeStack } from "../../types/schema-node.js";

export interface SynthesisContext {
  scope: ScopeStack;
  nameHint: NameHint;
  /**
   * Key of the ref target being synthesized; the model built for the node
   * itself takes the id reserved under this key by recursive references
   */
  targetKey?: string;
}

export type SynthesizerConfig = Pick<
  EngineConfig,
  "inferDiscriminators" | "materializeAliases" | "arrayItemSuffix" | "definitionCollections"
>;
