import { applyPhraseTable, type PhraseTable } from "./lexical.ts";
import { applyStructuralRules, type CompiledStructuralRule } from "./structural.ts";

export type RewriteConfig = Readonly<{
  rules: readonly CompiledStructuralRule[];
  /** Phrase tables in pass order. Each pass sees the full output of the one before. */
  phrases: readonly PhraseTable[];
}>;

export type RewriteConfigInput = {
  rules?: readonly CompiledStructuralRule[];
  phrases?: readonly PhraseTable[];
};

export type ProcessResult = {
  result: string;
  changed: boolean;
  structuralMatches: number;
  phraseReplacements: number;
};

export function createRewriteConfig(input: RewriteConfigInput): RewriteConfig {
  const rules = Object.freeze([...(input.rules ?? [])]);
  const phrases = Object.freeze((input.phrases ?? []).map((table) => new Map(table)));

  return Object.freeze({ rules, phrases });
}

/**
 * Structural rules first, then each phrase table in turn. A pass is skipped when
 * the config has nothing for it.
 */
export function processContent(original: string, config: RewriteConfig): ProcessResult {
  const structural =
    config.rules.length > 0
      ? applyStructuralRules(original, config.rules)
      : { text: original, matches: 0 };

  let text = structural.text;
  let phraseReplacements = 0;
  for (const table of config.phrases) {
    const lexical = applyPhraseTable(text, table);
    text = lexical.text;
    phraseReplacements += lexical.replacements;
  }

  return {
    result: text,
    changed: text !== original,
    structuralMatches: structural.matches,
    phraseReplacements,
  };
}
