import { stderr as processStderr } from "node:process";
import { buildCommand } from "@stricli/core";
import type { Logger } from "@rulecast/core";
import {
  rewriteCommandFlagParameters,
  validateRewriteCommandFlags,
  type RewriteCommandFlags,
} from "./command/flags.ts";
import { formatRewriteOutput } from "./command/output.ts";
import { rewriteProject } from "./rewrite.ts";
import type { RewriteResult } from "./types.ts";

type RunRewriteCommandOptions = {
  /**
   * Text encoding used for reading/writing corpus files. Defaults to "utf8".
   */
  encoding?: BufferEncoding;
  /**
   * Optional logger override. Defaults to stderr when --verbose is enabled.
   */
  logger?: Logger;
};

export async function runRewriteCommand(
  scope: string | undefined,
  flags: RewriteCommandFlags,
  options: RunRewriteCommandOptions = {},
): Promise<RewriteResult> {
  validateRewriteCommandFlags(flags);

  const logger =
    options.logger ??
    (flags.verbose ? (line: string) => processStderr.write(`${line}\n`) : undefined);

  return rewriteProject({
    rules: flags.rules,
    phrases: flags.phrases,
    scope: scope ?? ".",
    cwd: flags.cwd,
    extensions: flags.ext,
    concurrency: flags.concurrency,
    encoding: options.encoding,
    logger,
    verbose: flags.verbose,
    dryRun: (flags["dry-run"] ?? false) || (flags.check ?? false),
  });
}

export const rewriteCommand = buildCommand({
  async func(
    this: { process: { stdout: { write(s: string): void; isTTY?: boolean } } },
    flags: RewriteCommandFlags,
    scope?: string,
  ) {
    const result = await runRewriteCommand(scope, flags);
    if (flags.json ?? false) {
      this.process.stdout.write(`${JSON.stringify(result, null, 2)}\n`);
    } else {
      const output = formatRewriteOutput(result, {
        color: Boolean(this.process.stdout.isTTY) && !(flags["no-color"] ?? false),
      });
      this.process.stdout.write(`${output}\n`);
    }

    enforceExitStatus(flags, result);
  },
  parameters: {
    flags: rewriteCommandFlagParameters,
    positional: {
      kind: "tuple" as const,
      parameters: [
        {
          brief: "Corpus file or directory (defaults to current directory)",
          placeholder: "scope",
          parse: (input: string) => input,
          optional: true,
        },
      ],
    },
  },
  docs: {
    brief: "Apply structural rules and phrase tables to a corpus",
  },
});

export function enforceExitStatus(flags: RewriteCommandFlags, result: RewriteResult): void {
  if (result.failures.length > 0) {
    throw new Error(
      `${result.failures.length} ${result.failures.length === 1 ? "file" : "files"} could not be processed.`,
    );
  }

  if ((flags.check ?? false) && result.filesChanged > 0) {
    throw new Error(
      `Check failed: ${result.filesChanged} ${result.filesChanged === 1 ? "file" : "files"} would be rewritten.`,
    );
  }
}
