import type { LoadedRewriteConfig } from "@rulecast/core";
import type { RewriteResult } from "../types.ts";
import type { RewritePhaseResult } from "./rewrite.ts";

type OutputPhaseInput = {
  loaded: Pick<LoadedRewriteConfig, "ruleSets" | "phraseTables">;
  rewrite: RewritePhaseResult;
  elapsedMs: number;
};

export function buildRewriteResult(input: OutputPhaseInput): RewriteResult {
  return {
    dryRun: input.rewrite.dryRun,
    scope: input.rewrite.scope,
    ruleSets: input.loaded.ruleSets,
    phraseTables: input.loaded.phraseTables,
    filesScanned: input.rewrite.filesScanned,
    filesMatched: input.rewrite.filesMatched,
    filesChanged: input.rewrite.filesChanged,
    totalStructuralMatches: input.rewrite.totalStructuralMatches,
    totalPhraseReplacements: input.rewrite.totalPhraseReplacements,
    elapsedMs: input.elapsedMs,
    files: input.rewrite.files,
    failures: input.rewrite.failures,
  };
}
