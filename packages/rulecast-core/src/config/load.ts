import type { z } from "zod";
import { readInputFile, type ReadInputFileOptions } from "../common/input.ts";
import { formatMs, nowNs, nsToMs, type Logger } from "../common/trace.ts";
import { createRewriteConfig, type RewriteConfig } from "../engine.ts";
import { createPhraseTable, findReentrantPhrases, type PhraseTable } from "../lexical.ts";
import { compileStructuralRule, type CompiledStructuralRule } from "../structural.ts";
import { readPreset, type PresetKind } from "./presets.ts";
import {
  formatSchemaIssues,
  PhraseTableDocumentSchema,
  RuleSetDocumentSchema,
} from "./schema.ts";

export type LoadSourceOptions = ReadInputFileOptions;

export type LoadedRuleSet = {
  name: string;
  origin: string;
  rules: CompiledStructuralRule[];
};

export type LoadedPhraseTable = {
  name: string;
  origin: string;
  table: PhraseTable;
};

export type LoadRewriteConfigOptions = LoadSourceOptions & {
  rules?: readonly string[];
  phrases?: readonly string[];
  logger?: Logger;
  verbose?: number;
};

export type LoadedRewriteConfig = {
  config: RewriteConfig;
  ruleSets: string[];
  phraseTables: string[];
};

const SOURCE_LABELS: Record<PresetKind, string> = {
  rules: "rule set",
  phrases: "phrase table",
};

/**
 * `source` is a built-in preset name or a JSON file path relative to `cwd`. A
 * preset name takes precedence over a file of the same name; `./message-text`
 * always reads the file.
 */
export async function loadRuleSet(
  source: string,
  options: LoadSourceOptions = {},
): Promise<LoadedRuleSet> {
  const { origin, document } = await readDocument("rules", source, RuleSetDocumentSchema, options);

  return {
    name: document.name,
    origin,
    rules: document.rules.map((rule) =>
      compileStructuralRule({ ...rule, name: `${document.name}/${rule.name}` }),
    ),
  };
}

export async function loadPhraseTable(
  source: string,
  options: LoadSourceOptions = {},
): Promise<LoadedPhraseTable> {
  const { origin, document } = await readDocument(
    "phrases",
    source,
    PhraseTableDocumentSchema,
    options,
  );

  return {
    name: document.name,
    origin,
    table: createPhraseTable(document.entries),
  };
}

/**
 * Loads every source before any file is touched. Rule sets are concatenated in
 * the order given; phrase tables stay separate and run as passes in that order.
 */
export async function loadRewriteConfig(
  options: LoadRewriteConfigOptions,
): Promise<LoadedRewriteConfig> {
  const ruleSources = options.rules ?? [];
  const phraseSources = options.phrases ?? [];
  if (ruleSources.length === 0 && phraseSources.length === 0) {
    throw new Error("Nothing to apply: pass at least one rule set or phrase table.");
  }

  const verbose = options.verbose ?? 0;
  const log = options.logger ?? (() => {});
  const started = verbose > 0 ? nowNs() : 0n;

  const ruleSets: LoadedRuleSet[] = [];
  for (const source of ruleSources) {
    ruleSets.push(await loadRuleSet(source, options));
  }

  const phraseTables: LoadedPhraseTable[] = [];
  for (const source of phraseSources) {
    phraseTables.push(await loadPhraseTable(source, options));
  }

  const config = createRewriteConfig({
    rules: ruleSets.flatMap((loaded) => loaded.rules),
    phrases: phraseTables.map((loaded) => loaded.table),
  });

  if (verbose > 0) {
    const entries = config.phrases.reduce((total, table) => total + table.size, 0);
    log(
      `[rulecast] loadConfig ${formatMs(nsToMs(nowNs() - started))} rules=${config.rules.length} phraseTables=${config.phrases.length} phrases=${entries}`,
    );
    for (const loaded of phraseTables) {
      for (const entry of findReentrantPhrases(loaded.table)) {
        log(
          `[rulecast] reentrant phrase table=${loaded.name} key=${JSON.stringify(entry.key)} value contains ${JSON.stringify(entry.contains)}`,
        );
      }
    }
  }

  return {
    config,
    ruleSets: ruleSets.map((loaded) => loaded.name),
    phraseTables: phraseTables.map((loaded) => loaded.name),
  };
}

async function readDocument<TSchema extends z.ZodTypeAny>(
  kind: PresetKind,
  source: string,
  schema: TSchema,
  options: LoadSourceOptions,
): Promise<{ origin: string; document: z.infer<TSchema> }> {
  const label = SOURCE_LABELS[kind];
  const input = (await readPreset(kind, source)) ?? (await readInputFile(source, options));
  if (!input) {
    throw new Error(`Unknown ${label} "${source}": not a built-in preset or an existing file.`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(input.text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new Error(`Invalid JSON in ${label} ${input.path}: ${reason}`);
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Invalid ${label} ${input.path}: ${formatSchemaIssues(parsed.error)}`);
  }

  return { origin: input.path, document: parsed.data };
}
