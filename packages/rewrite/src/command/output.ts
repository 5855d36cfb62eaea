import chalk, { Chalk, type ChalkInstance } from "chalk";
import type { RewriteResult } from "../types.ts";

export type FormatRewriteOutputOptions = {
  color?: boolean;
  chalkInstance?: ChalkInstance;
};

export function formatRewriteOutput(
  result: RewriteResult,
  options: FormatRewriteOutputOptions = {},
): string {
  const chalkInstance = buildChalk(options);
  const lines: string[] = [];
  const changedFiles = result.files.filter((file) => file.changed);
  const marker = result.dryRun ? "~" : "M";

  for (const file of changedFiles) {
    const counts = `structural=${file.structuralMatches} phrases=${file.phraseReplacements}`;
    lines.push(`${chalkInstance.green(marker)} ${chalkInstance.bold(file.file)}  ${chalkInstance.gray(counts)}`);
  }

  for (const failure of result.failures) {
    lines.push(chalkInstance.red(`! ${failure.file} (${failure.phase}): ${failure.message}`));
  }

  if (changedFiles.length === 0 && result.failures.length === 0) {
    lines.push(chalkInstance.gray("No changes."));
  }

  const summary = [
    `${result.filesChanged} ${pluralize("file", result.filesChanged)} changed of ${result.filesScanned} scanned`,
    `${result.totalStructuralMatches} structural ${pluralize("match", result.totalStructuralMatches, "matches")}`,
    `${result.totalPhraseReplacements} phrase ${pluralize("replacement", result.totalPhraseReplacements)}`,
    result.failures.length > 0 ? `${result.failures.length} failed` : null,
    result.dryRun ? "(dry-run)" : null,
  ]
    .filter((part) => part !== null)
    .join(", ");
  lines.push(chalkInstance.gray(summary));

  return lines.join("\n");
}

export function buildChalk(options: FormatRewriteOutputOptions): ChalkInstance {
  if (options.chalkInstance) {
    return options.chalkInstance;
  }

  if (!(options.color ?? false)) {
    return new Chalk({ level: 0 });
  }

  const level = chalk.level > 0 ? chalk.level : 1;
  return new Chalk({ level });
}

function pluralize(word: string, count: number, plural = `${word}s`): string {
  return count === 1 ? word : plural;
}
