import { mkdtemp, readFile, readdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { expect, test } from "vitest";
import {
  readCorpusFile,
  writeCorpusFileIfUnchanged,
  type CorpusFileFs,
} from "../src/corpus-file.ts";

const bom = Buffer.from([0xef, 0xbb, 0xbf]);

test("readCorpusFile keeps the exact bytes and a leading byte order mark", async () => {
  const workspace = await mkdtemp(path.join(tmpdir(), "rulecast-file-"));

  try {
    const file = path.join(workspace, "sample.rs");
    const bytes = Buffer.concat([bom, Buffer.from("// 返回\n", "utf8")]);
    await writeFile(file, bytes);

    const read = await readCorpusFile(file, "utf8");

    expect(read.text).toBe("\uFEFF// 返回\n");
    expect(read.bytes.equals(bytes)).toBe(true);
  } finally {
    await rm(workspace, { recursive: true, force: true });
  }
});

test("readCorpusFile refuses bytes that are not valid utf8", async () => {
  const workspace = await mkdtemp(path.join(tmpdir(), "rulecast-file-"));

  try {
    const file = path.join(workspace, "latin.rs");
    await writeFile(file, Buffer.from([0x63, 0x61, 0x66, 0xe9, 0x0a]));

    await expect(readCorpusFile(file, "utf8")).rejects.toThrow(`Cannot decode ${file} as utf8:`);
  } finally {
    await rm(workspace, { recursive: true, force: true });
  }
});

test("readCorpusFile decodes single-byte encodings that round-trip", async () => {
  const workspace = await mkdtemp(path.join(tmpdir(), "rulecast-file-"));

  try {
    const file = path.join(workspace, "latin.rs");
    await writeFile(file, Buffer.from([0x63, 0x61, 0x66, 0xe9]));

    expect((await readCorpusFile(file, "latin1")).text).toBe("café");
  } finally {
    await rm(workspace, { recursive: true, force: true });
  }
});

test("writeCorpusFileIfUnchanged writes the rewritten bytes", async () => {
  const workspace = await mkdtemp(path.join(tmpdir(), "rulecast-file-"));

  try {
    const file = path.join(workspace, "sample.rs");
    await writeFile(file, Buffer.concat([bom, Buffer.from("// 返回\n", "utf8")]));
    const original = await readCorpusFile(file, "utf8");

    await writeCorpusFileIfUnchanged({
      file: original,
      rewrittenText: original.text.replace("返回", "Return"),
      encoding: "utf8",
    });

    const written = await readFile(file);
    expect(written.equals(Buffer.concat([bom, Buffer.from("// Return\n", "utf8")]))).toBe(true);
    const entries = await readdir(workspace);
    expect(entries).toEqual(["sample.rs"]);
  } finally {
    await rm(workspace, { recursive: true, force: true });
  }
});

test("writeCorpusFileIfUnchanged rejects a file whose bytes changed after the read", async () => {
  const workspace = await mkdtemp(path.join(tmpdir(), "rulecast-file-"));

  try {
    const file = path.join(workspace, "sample.rs");
    await writeFile(file, "// 返回\n", "utf8");
    const original = await readCorpusFile(file, "utf8");
    await writeFile(file, "// 返回值\n", "utf8");

    await expect(
      writeCorpusFileIfUnchanged({ file: original, rewrittenText: "// Return\n", encoding: "utf8" }),
    ).rejects.toThrow(
      `File changed during rewrite: ${file}. Re-run rulecast to avoid overwriting concurrent edits.`,
    );

    expect(await readFile(file, "utf8")).toBe("// 返回值\n");
  } finally {
    await rm(workspace, { recursive: true, force: true });
  }
});

test("writeCorpusFileIfUnchanged treats a vanished file as stale", async () => {
  const workspace = await mkdtemp(path.join(tmpdir(), "rulecast-file-"));

  try {
    const file = path.join(workspace, "gone.rs");

    await expect(
      writeCorpusFileIfUnchanged({
        file: { path: file, bytes: Buffer.from("a"), text: "a" },
        rewrittenText: "b",
        encoding: "utf8",
      }),
    ).rejects.toThrow(`File changed during rewrite: ${file}.`);
    expect(await readdir(workspace)).toEqual([]);
  } finally {
    await rm(workspace, { recursive: true, force: true });
  }
});

test("writeCorpusFileIfUnchanged refuses text the encoding cannot hold", async () => {
  const workspace = await mkdtemp(path.join(tmpdir(), "rulecast-file-"));

  try {
    const file = path.join(workspace, "latin.rs");
    await writeFile(file, Buffer.from([0x63, 0x61, 0x66, 0xe9]));
    const original = await readCorpusFile(file, "latin1");

    await expect(
      writeCorpusFileIfUnchanged({ file: original, rewrittenText: "café 返回", encoding: "latin1" }),
    ).rejects.toThrow(`Rewritten text for ${file} cannot be encoded as latin1.`);

    expect((await readFile(file)).equals(Buffer.from([0x63, 0x61, 0x66, 0xe9]))).toBe(true);
  } finally {
    await rm(workspace, { recursive: true, force: true });
  }
});

test("writeCorpusFileIfUnchanged removes the temp file when rename fails", async () => {
  const events: string[] = [];
  const originalBytes = Buffer.from("// 返回\n", "utf8");
  const fs: CorpusFileFs = {
    readFile: async () => Buffer.from(originalBytes),
    stat: async () => ({ mode: 0o644 }),
    writeFile: async (filePath, data, options) => {
      const temp = path.basename(filePath).startsWith(".example.rs.rulecast-");
      events.push(
        `write temp=${temp} mode=${options.mode.toString(8)} data=${Buffer.from(data).toString("utf8")}`,
      );
    },
    rename: async () => {
      throw new Error("rename boom");
    },
    rm: async () => {
      events.push("rm");
    },
  };

  await expect(
    writeCorpusFileIfUnchanged({
      file: { path: "/tmp/example.rs", bytes: originalBytes, text: "// 返回\n" },
      rewrittenText: "// Return\n",
      encoding: "utf8",
      fs,
    }),
  ).rejects.toThrow("rename boom");

  expect(events).toEqual(["write temp=true mode=644 data=// Return\n", "rm"]);
});
