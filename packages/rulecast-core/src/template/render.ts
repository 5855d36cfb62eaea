import { tokenizeTemplate } from "./syntax.ts";
import type { CompiledReplacementTemplate } from "./types.ts";

export function renderTemplate(source: string, captures: Record<string, string>): string {
  return renderCompiledTemplate(compileReplacementTemplate(source), captures);
}

export function compileReplacementTemplate(source: string): CompiledReplacementTemplate {
  if (source.length === 0) {
    return {
      source,
      tokens: [],
      holeNames: [],
    };
  }

  const tokens = tokenizeTemplate(source);
  const holeNames: string[] = [];
  for (const token of tokens) {
    if (token.kind === "hole" && !token.anonymous && !holeNames.includes(token.name)) {
      holeNames.push(token.name);
    }
  }

  return {
    source,
    tokens,
    holeNames,
  };
}

export function renderCompiledTemplate(
  template: CompiledReplacementTemplate,
  captures: Record<string, string>,
): string {
  let rendered = "";

  for (const token of template.tokens) {
    if (token.kind === "text") {
      rendered += token.value;
      continue;
    }

    if (token.anonymous) {
      continue;
    }

    const value = captures[token.name];
    if (value === undefined) {
      throw new Error(`Replacement uses unknown hole "${token.name}".`);
    }

    rendered += value;
  }

  return rendered;
}
