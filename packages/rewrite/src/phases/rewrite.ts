import path from "node:path";
import {
  assertWithinBoundary,
  collectCorpusFiles,
  formatMs,
  mapLimit,
  nowNs,
  nsToMs,
  processContent,
  toDisplayPath,
  type RewriteConfig,
} from "@rulecast/core";
import { readCorpusFile, writeCorpusFileIfUnchanged, type CorpusFile } from "../corpus-file.ts";
import type { RewriteFailure, RewriteFileResult, RewriteOptions } from "../types.ts";

export type RewritePhaseResult = {
  cwd: string;
  scope: string;
  dryRun: boolean;
  filesScanned: number;
  filesMatched: number;
  filesChanged: number;
  totalStructuralMatches: number;
  totalPhraseReplacements: number;
  files: RewriteFileResult[];
  failures: RewriteFailure[];
};

export type BeforeWriteFileHook = (input: {
  filePath: string;
  originalText: string;
  rewrittenText: string;
}) => Promise<void> | void;

export type RewriteCorpusOptions = RewriteOptions & {
  /** Runs after a file has been rewritten in memory and before it is written. */
  beforeWriteFile?: BeforeWriteFileHook;
};

type RewritePerfStats = {
  readNs: bigint;
  processNs: bigint;
  writeNs: bigint;
};

type FileOutcome =
  | { kind: "unmatched" }
  | { kind: "matched"; result: RewriteFileResult }
  | { kind: "failed"; failure: RewriteFailure };

export async function rewriteCorpus(
  config: RewriteConfig,
  options: RewriteCorpusOptions,
): Promise<RewritePhaseResult> {
  const verbose = options.verbose ?? 0;
  const log = options.logger ?? (() => {});
  const cwd = path.resolve(options.cwd ?? process.cwd());
  const scope = options.scope ?? ".";
  const dryRun = options.dryRun ?? false;
  const encoding = options.encoding ?? "utf8";
  const concurrency = options.concurrency ?? 8;
  const resolvedScope = path.resolve(cwd, scope);
  await assertWithinBoundary(cwd, resolvedScope, "Scope");

  const collectStarted = verbose > 0 ? nowNs() : 0n;
  const files = await collectCorpusFiles({
    cwd,
    scope,
    extensions: options.extensions,
    excludedDirectories: options.excludedDirectories,
  });
  if (verbose > 0) {
    log(
      `[rulecast] collectFiles ${formatMs(nsToMs(nowNs() - collectStarted))} files=${files.length}`,
    );
  }

  const stats: RewritePerfStats = { readNs: 0n, processNs: 0n, writeNs: 0n };
  const slowFiles: Array<{ file: string; ms: number }> = [];
  const rewriteStarted = verbose > 0 ? nowNs() : 0n;
  const outcomes = await mapLimit(
    files,
    async (filePath) => {
      const perFileStarted = verbose >= 2 ? nowNs() : 0n;
      const outcome = await rewriteFile({
        config,
        cwd,
        filePath,
        encoding,
        dryRun,
        beforeWriteFile: options.beforeWriteFile,
        stats: verbose > 0 ? stats : undefined,
      });
      if (verbose >= 2) {
        slowFiles.push({
          file: toDisplayPath(cwd, filePath),
          ms: nsToMs(nowNs() - perFileStarted),
        });
      }
      return outcome;
    },
    { concurrency },
  );
  if (verbose > 0) {
    log(
      `[rulecast] rewriteFiles ${formatMs(nsToMs(nowNs() - rewriteStarted))} concurrency=${concurrency} dryRun=${dryRun}`,
    );
    log(
      `[rulecast] breakdown read=${formatMs(nsToMs(stats.readNs))} process=${formatMs(nsToMs(stats.processNs))} write=${formatMs(nsToMs(stats.writeNs))}`,
    );
  }

  let filesChanged = 0;
  let totalStructuralMatches = 0;
  let totalPhraseReplacements = 0;
  const fileResults: RewriteFileResult[] = [];
  const failures: RewriteFailure[] = [];
  for (const outcome of outcomes) {
    if (outcome.kind === "failed") {
      failures.push(outcome.failure);
      log(`[rulecast] ${outcome.failure.phase} failed file=${outcome.failure.file}`);
      continue;
    }
    if (outcome.kind === "unmatched") {
      continue;
    }

    const { result } = outcome;
    totalStructuralMatches += result.structuralMatches;
    totalPhraseReplacements += result.phraseReplacements;
    if (result.changed) {
      filesChanged += 1;
    }
    fileResults.push(result);
  }

  if (verbose >= 2 && slowFiles.length > 0) {
    slowFiles.sort((a, b) => b.ms - a.ms);
    for (const entry of slowFiles.slice(0, 10)) {
      log(`[rulecast] slowFile ${formatMs(entry.ms)} file=${entry.file}`);
    }
  }

  if (verbose > 0) {
    const mode = dryRun ? "preview" : "apply";
    log(
      `[rulecast] summary mode=${mode} flow=${files.length}->${fileResults.length}->${filesChanged} failures=${failures.length} totals=structural:${totalStructuralMatches},phrases:${totalPhraseReplacements}`,
    );
  }

  return {
    cwd,
    scope: resolvedScope,
    dryRun,
    filesScanned: files.length,
    filesMatched: fileResults.length,
    filesChanged,
    totalStructuralMatches,
    totalPhraseReplacements,
    files: fileResults,
    failures,
  };
}

type RewriteFileInput = {
  config: RewriteConfig;
  cwd: string;
  filePath: string;
  encoding: BufferEncoding;
  dryRun: boolean;
  beforeWriteFile?: BeforeWriteFileHook;
  stats?: RewritePerfStats;
};

async function rewriteFile(input: RewriteFileInput): Promise<FileOutcome> {
  const file = toDisplayPath(input.cwd, input.filePath);

  const readStarted = input.stats ? nowNs() : 0n;
  let original: CorpusFile;
  try {
    original = await readCorpusFile(input.filePath, input.encoding);
  } catch (error) {
    return { kind: "failed", failure: { file, phase: "read", message: describeError(error) } };
  }
  if (input.stats) {
    input.stats.readNs += nowNs() - readStarted;
  }

  const processStarted = input.stats ? nowNs() : 0n;
  const processed = processContent(original.text, input.config);
  if (input.stats) {
    input.stats.processNs += nowNs() - processStarted;
  }

  if (processed.structuralMatches === 0 && processed.phraseReplacements === 0) {
    return { kind: "unmatched" };
  }

  if (processed.changed && !input.dryRun) {
    const writeStarted = input.stats ? nowNs() : 0n;
    try {
      await input.beforeWriteFile?.({
        filePath: input.filePath,
        originalText: original.text,
        rewrittenText: processed.result,
      });
      await writeCorpusFileIfUnchanged({
        file: original,
        rewrittenText: processed.result,
        encoding: input.encoding,
      });
    } catch (error) {
      return { kind: "failed", failure: { file, phase: "write", message: describeError(error) } };
    }
    if (input.stats) {
      input.stats.writeNs += nowNs() - writeStarted;
    }
  }

  return {
    kind: "matched",
    result: {
      file,
      changed: processed.changed,
      structuralMatches: processed.structuralMatches,
      phraseReplacements: processed.phraseReplacements,
      byteDelta: processed.changed
        ? Buffer.byteLength(processed.result, input.encoding) - original.bytes.length
        : 0,
    },
  };
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
