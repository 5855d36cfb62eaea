export { rewriteProject, runRewritePhases } from "./rewrite.ts";
export { rewriteCorpus } from "./phases/rewrite.ts";
export type { BeforeWriteFileHook, RewriteCorpusOptions } from "./phases/rewrite.ts";
export { decodeLosslessly, readCorpusFile, writeCorpusFileIfUnchanged } from "./corpus-file.ts";
export type { CorpusFile, CorpusFileFs } from "./corpus-file.ts";
export type {
  RewriteFailure,
  RewriteFileResult,
  RewriteOptions,
  RewriteProjectOptions,
  RewriteResult,
} from "./types.ts";
export { DEFAULT_CORPUS_EXTENSIONS, DEFAULT_EXCLUDED_DIRECTORIES } from "./types.ts";

export { enforceExitStatus, rewriteCommand, runRewriteCommand } from "./command.ts";
export { formatRewriteOutput } from "./command/output.ts";
export type { RewriteCommandFlags } from "./command/flags.ts";
