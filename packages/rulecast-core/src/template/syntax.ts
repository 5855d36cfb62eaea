import type { CompiledTemplate, HoleToken, TemplateToken } from "./types.ts";

// :[name], :[_] or :[name~regex]. A constraint may contain escapes and
// character classes, so `]` only closes the hole outside of a class.
const HOLE_SOURCE =
  String.raw`:\[([A-Za-z_][A-Za-z0-9_]*)(?:~((?:\\[\s\S]|\[(?:\\[\s\S]|[^\]\\])*\]|[^\]\\\[])+))?\]`;
const MAX_HOLE_REGEX_CONSTRAINT_LENGTH = 256;

export function tokenizeTemplate(source: string): TemplateToken[] {
  const holeRegex = new RegExp(HOLE_SOURCE, "y");
  const tokens: TemplateToken[] = [];
  let text = "";
  let index = 0;

  const flushText = () => {
    if (text.length > 0) {
      tokens.push({ kind: "text", value: text });
      text = "";
    }
  };

  while (index < source.length) {
    const char = source.charAt(index);

    if (char === "\\" && index + 1 < source.length) {
      text += source.charAt(index + 1);
      index += 2;
      continue;
    }

    if (source.startsWith(":[", index)) {
      holeRegex.lastIndex = index;
      const hole = holeRegex.exec(source);
      if (!hole) {
        throw new Error(buildHoleParseError(source, index));
      }

      flushText();
      tokens.push(buildHoleToken(hole[1] ?? "", hole[2] ?? null));
      index = holeRegex.lastIndex;
      continue;
    }

    text += char;
    index += 1;
  }

  flushText();
  return tokens;
}

export function compileTemplate(source: string): CompiledTemplate {
  if (source.trim().length === 0) {
    throw new Error("Template cannot be empty.");
  }

  return {
    source,
    tokens: tokenizeTemplate(source),
  };
}

function buildHoleToken(name: string, constraintSource: string | null): HoleToken {
  if (constraintSource !== null) {
    if (constraintSource.length > MAX_HOLE_REGEX_CONSTRAINT_LENGTH) {
      throw new Error(
        `Regex constraint for hole "${name}" exceeds ${MAX_HOLE_REGEX_CONSTRAINT_LENGTH} characters.`,
      );
    }

    try {
      new RegExp(constraintSource);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new Error(`Invalid regex constraint for hole "${name}": ${reason}`);
    }
  }

  return {
    kind: "hole",
    name,
    anonymous: name === "_",
    constraintSource,
  };
}

function buildHoleParseError(source: string, index: number): string {
  const excerpt = source.slice(index, index + 24);
  return [
    `Invalid hole syntax at offset ${index}: "${excerpt}".`,
    "Hint: use :[name], :[_] or :[name~regex]; escape a literal ':[' as '\\:['.",
  ].join(" ");
}
