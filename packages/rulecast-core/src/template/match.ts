import type { CompiledPattern, CompiledTemplate, TemplateMatch, TemplateToken } from "./types.ts";

const UNCONSTRAINED_HOLE_SOURCE = String.raw`[\s\S]+?`;
const FLEXIBLE_WHITESPACE_SOURCE = String.raw`\s*`;

export function compilePattern(template: CompiledTemplate): CompiledPattern {
  const tokens = trimOuterWhitespace(template.tokens);
  if (!tokens.some((token) => token.kind === "text")) {
    throw new Error(`Pattern must contain literal text: ${template.source}`);
  }

  const holeNames: string[] = [];
  let regexSource = "";

  for (const token of tokens) {
    if (token.kind === "text") {
      regexSource += compileLiteralText(token.value);
      continue;
    }

    const body = token.constraintSource ?? UNCONSTRAINED_HOLE_SOURCE;
    if (token.anonymous) {
      regexSource += `(?:${body})`;
      continue;
    }

    if (holeNames.includes(token.name)) {
      // A repeated hole must capture the same text as its first occurrence.
      regexSource += `\\k<${token.name}>`;
      continue;
    }

    holeNames.push(token.name);
    regexSource += `(?<${token.name}>${body})`;
  }

  return {
    source: template.source,
    regex: new RegExp(regexSource, "g"),
    holeNames,
  };
}

export function findTemplateMatches(text: string, pattern: CompiledPattern): TemplateMatch[] {
  // Fresh instance per scan: a shared global regex carries lastIndex between calls.
  const regex = new RegExp(pattern.regex.source, pattern.regex.flags);
  const matches: TemplateMatch[] = [];

  for (let match = regex.exec(text); match !== null; match = regex.exec(text)) {
    const matched = match[0];
    if (matched.length === 0) {
      regex.lastIndex += 1;
      continue;
    }

    const captures: Record<string, string> = {};
    for (const name of pattern.holeNames) {
      captures[name] = match.groups?.[name] ?? "";
    }

    matches.push({
      start: match.index,
      end: match.index + matched.length,
      text: matched,
      captures,
    });
  }

  return matches;
}

function compileLiteralText(value: string): string {
  return value
    .split(/(\s+)/)
    .map((part, index) => (index % 2 === 1 ? FLEXIBLE_WHITESPACE_SOURCE : escapeRegex(part)))
    .join("");
}

function escapeRegex(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

// Whitespace before the first lexeme and after the last one is not part of the
// construct, so it must not be consumed by a match.
function trimOuterWhitespace(tokens: readonly TemplateToken[]): TemplateToken[] {
  const trimmed = [...tokens];
  const first = trimmed[0];
  if (first?.kind === "text") {
    trimmed[0] = { kind: "text", value: first.value.trimStart() };
  }

  const lastIndex = trimmed.length - 1;
  const last = trimmed[lastIndex];
  if (last?.kind === "text") {
    trimmed[lastIndex] = { kind: "text", value: last.value.trimEnd() };
  }

  return trimmed.filter((token) => token.kind !== "text" || token.value.length > 0);
}
