import { realpath, stat } from "node:fs/promises";
import path from "node:path";

export function isErrorWithCode(error: unknown): error is { code: string } {
  return typeof error === "object" && error !== null && "code" in error;
}

export async function findNearestGitRepoRoot(startDirectory: string): Promise<string | null> {
  let current = path.resolve(startDirectory);

  while (true) {
    try {
      await stat(path.join(current, ".git"));
      return current;
    } catch {
      // Not here; keep walking up.
    }

    const parent = path.dirname(current);
    if (parent === current) {
      return null;
    }
    current = parent;
  }
}

export function isRelativeWithinBase(relativePath: string): boolean {
  if (relativePath.length === 0) {
    return true;
  }

  if (path.isAbsolute(relativePath)) {
    return false;
  }

  return relativePath !== ".." && !relativePath.startsWith(`..${path.sep}`);
}

export function isPathWithinBase(basePath: string, candidatePath: string): boolean {
  return isRelativeWithinBase(path.relative(basePath, candidatePath));
}

export async function resolveCanonicalPath(filePath: string): Promise<string> {
  try {
    return await realpath(filePath);
  } catch (error) {
    if (isErrorWithCode(error) && error.code === "ENOENT") {
      return path.resolve(filePath);
    }
    throw error;
  }
}

/**
 * Rejects `candidatePath` when it resolves (through symlinks) outside the
 * nearest git repository root above `cwd`, or outside `cwd` when there is none.
 */
export async function assertWithinBoundary(
  cwd: string,
  candidatePath: string,
  label: string,
): Promise<void> {
  const repoRoot = await findNearestGitRepoRoot(cwd);
  const boundary = repoRoot ?? cwd;
  const canonicalBoundary = await resolveCanonicalPath(boundary);
  const canonicalCandidate = await resolveCanonicalPath(candidatePath);
  if (isPathWithinBase(canonicalBoundary, canonicalCandidate)) {
    return;
  }

  if (repoRoot) {
    throw new Error(
      `${label} resolves outside repository root: ${label.toLowerCase()}=${candidatePath} repoRoot=${repoRoot}.`,
    );
  }
  throw new Error(
    `${label} resolves outside cwd: ${label.toLowerCase()}=${candidatePath} cwd=${cwd}.`,
  );
}

export function toDisplayPath(cwd: string, filePath: string): string {
  const relative = path.relative(cwd, filePath);
  if (isRelativeWithinBase(relative)) {
    return relative.length > 0 ? relative : path.basename(filePath);
  }
  return filePath;
}
