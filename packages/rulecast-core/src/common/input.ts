import { readFile, stat } from "node:fs/promises";
import path from "node:path";
import { assertWithinBoundary, isErrorWithCode } from "./paths.ts";

export type ReadInputFileOptions = {
  cwd?: string;
  encoding?: BufferEncoding;
};

/**
 * Reads a user-supplied file path relative to `cwd`. Returns null when nothing
 * exists at the path so callers can report an unknown source in their own terms.
 */
export async function readInputFile(
  input: string,
  options: ReadInputFileOptions = {},
): Promise<{ path: string; text: string } | null> {
  const cwd = path.resolve(options.cwd ?? process.cwd());
  const inputPath = path.resolve(cwd, input);

  let inputStats: Awaited<ReturnType<typeof stat>>;
  try {
    inputStats = await stat(inputPath);
  } catch (error) {
    if (isErrorWithCode(error) && error.code === "ENOENT") {
      return null;
    }
    throw error;
  }

  if (!inputStats.isFile()) {
    throw new Error(`Input path is not a file: ${inputPath}`);
  }

  await assertWithinBoundary(cwd, inputPath, "Input path");

  return {
    path: inputPath,
    text: await readFile(inputPath, options.encoding ?? "utf8"),
  };
}
