import { opendir, stat } from "node:fs/promises";
import path from "node:path";
import { isErrorWithCode } from "./common/paths.ts";

export const DEFAULT_CORPUS_EXTENSIONS = [
  ".rs",
  ".ts",
  ".tsx",
  ".mts",
  ".cts",
  ".js",
  ".jsx",
  ".mjs",
  ".cjs",
] as const;

export const DEFAULT_EXCLUDED_DIRECTORIES = [
  ".git",
  "node_modules",
  "target",
  "dist",
  "build",
  "coverage",
  "out",
] as const;

export type CollectCorpusFilesOptions = {
  cwd: string;
  scope: string;
  extensions?: readonly string[];
  excludedDirectories?: readonly string[];
};

export async function collectCorpusFiles(options: CollectCorpusFilesOptions): Promise<string[]> {
  const scopePath = path.resolve(options.cwd, options.scope);
  let scopeStats: Awaited<ReturnType<typeof stat>>;
  try {
    scopeStats = await stat(scopePath);
  } catch (error) {
    if (isErrorWithCode(error) && error.code === "ENOENT") {
      throw new Error(`Corpus not found: ${scopePath}`);
    }
    throw error;
  }

  const extensionList: readonly string[] = options.extensions ?? DEFAULT_CORPUS_EXTENSIONS;
  const extensions = new Set(extensionList.map(normalizeExtension));
  const excludedDirectories = new Set<string>(
    options.excludedDirectories ?? DEFAULT_EXCLUDED_DIRECTORIES,
  );

  if (scopeStats.isFile()) {
    return extensions.has(path.extname(scopePath).toLowerCase()) ? [scopePath] : [];
  }

  if (!scopeStats.isDirectory()) {
    return [];
  }

  const files: string[] = [];
  await walkDirectory(scopePath, extensions, excludedDirectories, files);
  return files;
}

async function walkDirectory(
  directory: string,
  extensions: ReadonlySet<string>,
  excludedDirectories: ReadonlySet<string>,
  files: string[],
): Promise<void> {
  const entries = [];
  for await (const entry of await opendir(directory)) {
    entries.push(entry);
  }

  // Code-unit order, so the walk is the same under every locale.
  entries.sort((left, right) => (left.name < right.name ? -1 : left.name > right.name ? 1 : 0));

  for (const entry of entries) {
    const absolute = path.join(directory, entry.name);
    if (entry.isDirectory()) {
      if (!excludedDirectories.has(entry.name)) {
        await walkDirectory(absolute, extensions, excludedDirectories, files);
      }
      continue;
    }

    if (entry.isFile() && extensions.has(path.extname(entry.name).toLowerCase())) {
      files.push(absolute);
    }
  }
}

function normalizeExtension(extension: string): string {
  const normalized = extension.trim().toLowerCase();
  return normalized.startsWith(".") ? normalized : `.${normalized}`;
}
