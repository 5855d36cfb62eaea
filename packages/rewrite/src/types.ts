import type { Logger } from "@rulecast/core";

export {
  DEFAULT_CORPUS_EXTENSIONS,
  DEFAULT_EXCLUDED_DIRECTORIES,
} from "@rulecast/core";

export type RewriteOptions = {
  scope?: string;
  cwd?: string;
  dryRun?: boolean;
  extensions?: readonly string[];
  excludedDirectories?: readonly string[];
  encoding?: BufferEncoding;
  concurrency?: number;
  verbose?: number;
  logger?: Logger;
};

export type RewriteProjectOptions = RewriteOptions & {
  /** Rule set preset names or JSON file paths, in priority order. */
  rules?: readonly string[];
  /** Phrase table preset names or JSON file paths, merged in order. */
  phrases?: readonly string[];
};

export type RewriteFileResult = {
  file: string;
  changed: boolean;
  structuralMatches: number;
  phraseReplacements: number;
  byteDelta: number;
};

export type RewriteFailure = {
  file: string;
  phase: "read" | "write";
  message: string;
};

export type RewriteResult = {
  dryRun: boolean;
  scope: string;
  ruleSets: string[];
  phraseTables: string[];
  filesScanned: number;
  filesMatched: number;
  filesChanged: number;
  totalStructuralMatches: number;
  totalPhraseReplacements: number;
  elapsedMs: number;
  files: RewriteFileResult[];
  failures: RewriteFailure[];
};
