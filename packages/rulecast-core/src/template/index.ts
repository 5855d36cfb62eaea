export { compileTemplate, tokenizeTemplate } from "./syntax.ts";
export { compilePattern, findTemplateMatches } from "./match.ts";
export { compileReplacementTemplate, renderCompiledTemplate, renderTemplate } from "./render.ts";
export type {
  CompiledPattern,
  CompiledReplacementTemplate,
  CompiledTemplate,
  HoleToken,
  TemplateMatch,
  TemplateToken,
  TextToken,
} from "./types.ts";
