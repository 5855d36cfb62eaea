import { randomUUID } from "node:crypto";
import { readFile, rename, rm, stat, writeFile } from "node:fs/promises";
import path from "node:path";
import { TextDecoder } from "node:util";

export type CorpusFileFs = {
  readFile: (path: string) => Promise<Buffer>;
  stat: (path: string) => Promise<{ mode: number }>;
  writeFile: (path: string, data: Uint8Array, options: { mode: number }) => Promise<void>;
  rename: (oldPath: string, newPath: string) => Promise<void>;
  rm: (path: string, options: { force: boolean }) => Promise<void>;
};

/** A corpus file as it was read: the exact bytes and their decoded text. */
export type CorpusFile = {
  path: string;
  bytes: Buffer;
  text: string;
};

type WriteCorpusFileInput = {
  file: CorpusFile;
  rewrittenText: string;
  encoding: BufferEncoding;
  fs?: CorpusFileFs;
};

const defaultFs: CorpusFileFs = {
  readFile,
  stat,
  writeFile,
  rename,
  rm,
};

// ignoreBOM keeps a leading byte order mark in the text, so it is written back.
const strictUtf8Decoder = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true });

export async function readCorpusFile(
  filePath: string,
  encoding: BufferEncoding,
  fs: CorpusFileFs = defaultFs,
): Promise<CorpusFile> {
  const bytes = await fs.readFile(filePath);
  return { path: filePath, bytes, text: decodeLosslessly(bytes, encoding, filePath) };
}

/**
 * Decodes `bytes` only when the text encodes back to the same bytes. Lossy
 * decoding would write replacement characters over bytes no rule touched.
 */
export function decodeLosslessly(
  bytes: Buffer,
  encoding: BufferEncoding,
  filePath: string,
): string {
  if (encoding === "utf8" || encoding === "utf-8") {
    try {
      return strictUtf8Decoder.decode(bytes);
    } catch (error) {
      throw new Error(`Cannot decode ${filePath} as utf8: ${describeError(error)}.`);
    }
  }

  const text = bytes.toString(encoding);
  if (!Buffer.from(text, encoding).equals(bytes)) {
    throw new Error(`Cannot decode ${filePath} as ${encoding} without loss.`);
  }
  return text;
}

/**
 * Replaces the file through a sibling temp file and a rename, only while its
 * bytes still equal the bytes that were read. The original file mode is kept.
 */
export async function writeCorpusFileIfUnchanged(input: WriteCorpusFileInput): Promise<void> {
  const fs = input.fs ?? defaultFs;
  const filePath = input.file.path;

  const data = Buffer.from(input.rewrittenText, input.encoding);
  if (data.toString(input.encoding) !== input.rewrittenText) {
    throw new Error(`Rewritten text for ${filePath} cannot be encoded as ${input.encoding}.`);
  }

  let currentBytes: Buffer;
  let mode: number;
  try {
    currentBytes = await fs.readFile(filePath);
    mode = (await fs.stat(filePath)).mode;
  } catch {
    throw buildStaleWriteError(filePath);
  }
  if (!currentBytes.equals(input.file.bytes)) {
    throw buildStaleWriteError(filePath);
  }

  const tempPath = path.join(
    path.dirname(filePath),
    `.${path.basename(filePath)}.rulecast-${process.pid}-${randomUUID()}.tmp`,
  );
  await fs.writeFile(tempPath, data, { mode });

  try {
    await fs.rename(tempPath, filePath);
  } catch (error) {
    await fs.rm(tempPath, { force: true }).catch(() => undefined);
    throw error;
  }
}

function buildStaleWriteError(filePath: string): Error {
  return new Error(
    `File changed during rewrite: ${filePath}. Re-run rulecast to avoid overwriting concurrent edits.`,
  );
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
