import { compilePattern, findTemplateMatches } from "./template/match.ts";
import { compileReplacementTemplate, renderCompiledTemplate } from "./template/render.ts";
import { compileTemplate } from "./template/syntax.ts";
import type { CompiledPattern, CompiledReplacementTemplate } from "./template/types.ts";

export type StructuralRuleSource = {
  name: string;
  pattern: string;
  replacement: string;
};

export type CompiledStructuralRule = {
  name: string;
  pattern: CompiledPattern;
  replacement: CompiledReplacementTemplate;
};

export type StructuralRewrite = {
  text: string;
  matches: number;
};

/**
 * Compiles a rule and checks that its replacement only draws on holes the
 * pattern captures, so a rule can never fail once it has been loaded.
 */
export function compileStructuralRule(source: StructuralRuleSource): CompiledStructuralRule {
  try {
    const pattern = compilePattern(compileTemplate(source.pattern));
    const replacement = compileReplacementTemplate(source.replacement);

    const unknown = replacement.holeNames.filter((name) => !pattern.holeNames.includes(name));
    if (unknown.length > 0) {
      throw new Error(
        `Replacement uses hole${unknown.length === 1 ? "" : "s"} not captured by the pattern: ${unknown
          .map((name) => `"${name}"`)
          .join(", ")}.`,
      );
    }

    return { name: source.name, pattern, replacement };
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new Error(`Rule "${source.name}": ${reason}`);
  }
}

/**
 * Replaces every match of one rule in a single left-to-right pass. Matches come
 * from one scan of a global regex, so they are ordered and never overlap.
 */
export function applyStructuralRule(text: string, rule: CompiledStructuralRule): StructuralRewrite {
  const matches = findTemplateMatches(text, rule.pattern);
  if (matches.length === 0) {
    return { text, matches: 0 };
  }

  const pieces: string[] = [];
  let cursor = 0;
  for (const match of matches) {
    pieces.push(
      text.slice(cursor, match.start),
      renderCompiledTemplate(rule.replacement, match.captures),
    );
    cursor = match.end;
  }
  pieces.push(text.slice(cursor));

  return { text: pieces.join(""), matches: matches.length };
}

/**
 * Applies rules in priority order. Each rule scans the whole output of the
 * previous one, so more specific shapes must come first.
 */
export function applyStructuralRules(
  text: string,
  rules: readonly CompiledStructuralRule[],
): StructuralRewrite {
  let current = text;
  let matches = 0;

  for (const rule of rules) {
    const rewrite = applyStructuralRule(current, rule);
    current = rewrite.text;
    matches += rewrite.matches;
  }

  return { text: current, matches };
}

export function rewriteStructural(text: string, rules: readonly CompiledStructuralRule[]): string {
  return applyStructuralRules(text, rules).text;
}
