/**
 * Ordered phrase substitution.
 *
 * Entries apply line by line in table order using plain substring replacement.
 * A later entry sees the output of earlier ones, so table order is part of the
 * table's meaning: a short key placed before a longer key that contains it will
 * rewrite the longer key's text first.
 */

export type PhraseTable = ReadonlyMap<string, string>;

export type PhraseEntry = readonly [key: string, value: string];

export type LexicalRewrite = {
  text: string;
  replacements: number;
};

export type ReentrantPhrase = {
  key: string;
  value: string;
  contains: string;
};

/**
 * Builds a table from entries in order. A repeated key keeps the position of its
 * first occurrence and takes the value of its last.
 */
export function createPhraseTable(entries: Iterable<PhraseEntry>): PhraseTable {
  const table = new Map<string, string>();
  for (const [key, value] of entries) {
    if (key.length === 0) {
      throw new Error("Phrase table keys cannot be empty.");
    }
    table.set(key, value);
  }
  return table;
}

export function rewriteLine(line: string, table: PhraseTable): { line: string; replacements: number } {
  let current = line;
  let replacements = 0;

  for (const [key, value] of table) {
    if (key === value || !current.includes(key)) {
      continue;
    }

    // split/join: non-overlapping, left to right, and no `$` patterns in value.
    const parts = current.split(key);
    replacements += parts.length - 1;
    current = parts.join(value);
  }

  return { line: current, replacements };
}

export function applyPhraseTable(text: string, table: PhraseTable): LexicalRewrite {
  if (table.size === 0) {
    return { text, replacements: 0 };
  }

  let replacements = 0;
  const lines = text.split("\n").map((line) => {
    const rewritten = rewriteLine(line, table);
    replacements += rewritten.replacements;
    return rewritten.line;
  });

  return {
    text: replacements === 0 ? text : lines.join("\n"),
    replacements,
  };
}

export function rewriteLexical(text: string, table: PhraseTable): string {
  return applyPhraseTable(text, table).text;
}

/**
 * Entries whose value contains another entry's key. Running the table twice over
 * such a value rewrites it again. Identity entries are ignored.
 */
export function findReentrantPhrases(table: PhraseTable): ReentrantPhrase[] {
  const activeKeys = [...table].filter(([key, value]) => key !== value).map(([key]) => key);
  const found: ReentrantPhrase[] = [];

  for (const [key, value] of table) {
    for (const candidate of activeKeys) {
      if (value.includes(candidate)) {
        found.push({ key, value, contains: candidate });
      }
    }
  }

  return found;
}
