export {
  applyStructuralRule,
  applyStructuralRules,
  compileStructuralRule,
  rewriteStructural,
} from "./structural.ts";
export type {
  CompiledStructuralRule,
  StructuralRewrite,
  StructuralRuleSource,
} from "./structural.ts";
export {
  applyPhraseTable,
  createPhraseTable,
  findReentrantPhrases,
  rewriteLexical,
  rewriteLine,
} from "./lexical.ts";
export type { LexicalRewrite, PhraseEntry, PhraseTable, ReentrantPhrase } from "./lexical.ts";
export { createRewriteConfig, processContent } from "./engine.ts";
export type { ProcessResult, RewriteConfig, RewriteConfigInput } from "./engine.ts";
export * from "./template/index.ts";
export {
  loadPhraseTable,
  loadRewriteConfig,
  loadRuleSet,
} from "./config/load.ts";
export type {
  LoadedPhraseTable,
  LoadedRewriteConfig,
  LoadedRuleSet,
  LoadRewriteConfigOptions,
  LoadSourceOptions,
} from "./config/load.ts";
export { listPresets } from "./config/presets.ts";
export type { PresetInfo, PresetKind } from "./config/presets.ts";
export {
  PhraseTableDocumentSchema,
  RuleSetDocumentSchema,
  StructuralRuleSchema,
} from "./config/schema.ts";
export type { PhraseTableDocument, RuleSetDocument } from "./config/schema.ts";
export {
  collectCorpusFiles,
  DEFAULT_CORPUS_EXTENSIONS,
  DEFAULT_EXCLUDED_DIRECTORIES,
} from "./files.ts";
export type { CollectCorpusFilesOptions } from "./files.ts";
export { mapLimit } from "./common/async.ts";
export type { MapLimitOptions } from "./common/async.ts";
export { readInputFile } from "./common/input.ts";
export {
  assertWithinBoundary,
  findNearestGitRepoRoot,
  isErrorWithCode,
  isPathWithinBase,
  toDisplayPath,
} from "./common/paths.ts";
export { formatMs, nowNs, nsToMs } from "./common/trace.ts";
export type { Logger } from "./common/trace.ts";
