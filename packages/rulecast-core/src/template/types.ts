export type TextToken = {
  kind: "text";
  value: string;
};

export type HoleToken = {
  kind: "hole";
  name: string;
  anonymous: boolean;
  constraintSource: string | null;
};

export type TemplateToken = TextToken | HoleToken;

export type CompiledTemplate = {
  source: string;
  tokens: TemplateToken[];
};

export type CompiledReplacementTemplate = {
  source: string;
  tokens: TemplateToken[];
  holeNames: string[];
};

export type CompiledPattern = {
  source: string;
  regex: RegExp;
  /** Named holes in first-occurrence order. Anonymous holes are not listed. */
  holeNames: string[];
};

export type TemplateMatch = {
  start: number;
  end: number;
  text: string;
  captures: Record<string, string>;
};
