export type RewriteCommandFlags = {
  rules?: readonly string[];
  phrases?: readonly string[];
  ext?: readonly string[];
  "dry-run"?: boolean;
  check?: boolean;
  json?: boolean;
  "no-color"?: boolean;
  cwd?: string;
  concurrency?: number;
  verbose?: number;
};

export const rewriteCommandFlagParameters = {
  rules: {
    kind: "parsed" as const,
    optional: true,
    variadic: true,
    brief: "Rule set preset or JSON file, repeatable, in priority order (a preset name wins; use ./name for a file)",
    placeholder: "preset|file",
    parse: (input: string) => input,
  },
  phrases: {
    kind: "parsed" as const,
    optional: true,
    variadic: true,
    brief: "Phrase table preset or JSON file, repeatable, one pass each in order (a preset name wins; use ./name for a file)",
    placeholder: "preset|file",
    parse: (input: string) => input,
  },
  ext: {
    kind: "parsed" as const,
    optional: true,
    variadic: true,
    brief: "File extension to include, repeatable (default: .rs and TS/JS)",
    placeholder: "ext",
    parse: (input: string) => {
      const value = input.trim();
      if (value.length === 0 || value === ".") {
        throw new Error("--ext must name an extension");
      }
      return value;
    },
  },
  concurrency: {
    kind: "parsed" as const,
    optional: true,
    brief: "Max files processed concurrently (default: 8)",
    placeholder: "n",
    parse: (input: string) => {
      const value = Number(input);
      if (!Number.isFinite(value) || value <= 0) {
        throw new Error("--concurrency must be a positive number");
      }
      return Math.floor(value);
    },
  },
  verbose: {
    kind: "parsed" as const,
    optional: true,
    brief: "Print tracing to stderr (1=summary, 2=includes slow files)",
    placeholder: "level",
    parse: (input: string) => {
      const value = Number(input);
      if (!Number.isFinite(value) || value < 0) {
        throw new Error("--verbose must be a non-negative number");
      }
      return Math.floor(value);
    },
  },
  json: {
    kind: "boolean" as const,
    optional: true,
    withNegated: false,
    brief: "Output structured JSON instead of the file list",
  },
  "no-color": {
    kind: "boolean" as const,
    optional: true,
    withNegated: false,
    brief: "Disable colored output",
  },
  "dry-run": {
    kind: "boolean" as const,
    optional: true,
    withNegated: false,
    brief: "Report changes without writing files",
  },
  check: {
    kind: "boolean" as const,
    optional: true,
    withNegated: false,
    brief: "Fail when any file would change; writes nothing",
  },
  cwd: {
    kind: "parsed" as const,
    optional: true,
    brief: "Working directory for resolving rule files and scope",
    placeholder: "path",
    parse: (input: string) => input,
  },
} as const;

export function validateRewriteCommandFlags(flags: RewriteCommandFlags): void {
  const rules = flags.rules ?? [];
  const phrases = flags.phrases ?? [];
  if (rules.length === 0 && phrases.length === 0) {
    throw new Error("Pass at least one --rules or --phrases source.");
  }
}
