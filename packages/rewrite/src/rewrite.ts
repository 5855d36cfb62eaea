import { loadRewriteConfig, type LoadedRewriteConfig } from "@rulecast/core";
import { buildRewriteResult } from "./phases/output.ts";
import { rewriteCorpus, type RewriteCorpusOptions } from "./phases/rewrite.ts";
import type { RewriteProjectOptions, RewriteResult } from "./types.ts";

export async function rewriteProject(
  options: RewriteProjectOptions & Pick<RewriteCorpusOptions, "beforeWriteFile">,
): Promise<RewriteResult> {
  const loaded = await loadRewriteConfig({
    rules: options.rules,
    phrases: options.phrases,
    cwd: options.cwd,
    logger: options.logger,
    verbose: options.verbose,
  });

  return runRewritePhases(loaded, options);
}

export async function runRewritePhases(
  loaded: LoadedRewriteConfig,
  options: RewriteCorpusOptions,
): Promise<RewriteResult> {
  const startedAt = Date.now();

  const rewrite = await rewriteCorpus(loaded.config, options);
  return buildRewriteResult({
    loaded,
    rewrite,
    elapsedMs: Date.now() - startedAt,
  });
}
