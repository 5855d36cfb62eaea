import { z } from "zod";

const nameText = z.string().min(1).max(80);

export const StructuralRuleSchema = z.object({
  name: nameText,
  pattern: z.string().min(1),
  replacement: z.string(),
});

export const RuleSetDocumentSchema = z.object({
  name: nameText,
  description: z.string().optional(),
  rules: z.array(StructuralRuleSchema).min(1),
});

// Entries are pairs rather than an object so that order survives JSON parsing
// (integer-like object keys are enumerated first).
export const PhraseEntrySchema = z.tuple([z.string().min(1), z.string()]);

export const PhraseTableDocumentSchema = z.object({
  name: nameText,
  description: z.string().optional(),
  entries: z.array(PhraseEntrySchema).min(1),
});

export type RuleSetDocument = z.infer<typeof RuleSetDocumentSchema>;
export type PhraseTableDocument = z.infer<typeof PhraseTableDocumentSchema>;

export function formatSchemaIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const location = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      return `${location}: ${issue.message}`;
    })
    .join("; ");
}
