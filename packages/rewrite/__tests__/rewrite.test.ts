import { mkdtemp, readFile, readdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { expect, test } from "vitest";
import { rewriteProject } from "../src/rewrite.ts";

const alphaSource = [
  "fn main() {",
  '    let m = Message { role: Role::User, content: "hi".to_string(), ..Default::default() };',
  "}",
  "",
].join("\n");
const alphaRewritten = ["fn main() {", '    let m = Message::text(Role::User, "hi");', "}", ""].join(
  "\n",
);
const betaSource = "// 创建OpenAI客户端\nfn beta() {}\n";
const betaRewritten = "// Create OpenAI client\nfn beta() {}\n";
const gammaSource = "fn gamma() {}\n";

async function createCorpus(workspace: string) {
  const files = {
    alpha: path.join(workspace, "alpha.rs"),
    beta: path.join(workspace, "beta.rs"),
    gamma: path.join(workspace, "gamma.rs"),
    notes: path.join(workspace, "notes.md"),
  };
  await writeFile(files.alpha, alphaSource, "utf8");
  await writeFile(files.beta, betaSource, "utf8");
  await writeFile(files.gamma, gammaSource, "utf8");
  await writeFile(files.notes, alphaSource, "utf8");
  return files;
}

test("rewriteProject rewrites matching files and leaves the rest alone", async () => {
  const workspace = await mkdtemp(path.join(tmpdir(), "rulecast-"));

  try {
    const files = await createCorpus(workspace);

    const result = await rewriteProject({
      rules: ["message-text"],
      phrases: ["zh-en-comments"],
      cwd: workspace,
      scope: ".",
    });

    expect(result.ruleSets).toEqual(["message-text"]);
    expect(result.phraseTables).toEqual(["zh-en-comments"]);
    expect(result.dryRun).toBe(false);
    expect(result.scope).toBe(workspace);
    expect(result.filesScanned).toBe(3);
    expect(result.filesMatched).toBe(2);
    expect(result.filesChanged).toBe(2);
    expect(result.totalStructuralMatches).toBe(1);
    expect(result.totalPhraseReplacements).toBe(1);
    expect(result.failures).toEqual([]);
    expect(result.files).toEqual([
      {
        file: "alpha.rs",
        changed: true,
        structuralMatches: 1,
        phraseReplacements: 0,
        byteDelta: -46,
      },
      {
        file: "beta.rs",
        changed: true,
        structuralMatches: 0,
        phraseReplacements: 1,
        byteDelta: Buffer.byteLength(betaRewritten) - Buffer.byteLength(betaSource),
      },
    ]);

    expect(await readFile(files.alpha, "utf8")).toBe(alphaRewritten);
    expect(await readFile(files.beta, "utf8")).toBe(betaRewritten);
    expect(await readFile(files.gamma, "utf8")).toBe(gammaSource);
    expect(await readFile(files.notes, "utf8")).toBe(alphaSource);
    const entries = await readdir(workspace);
    expect(entries.some((entry) => entry.includes(".rulecast-"))).toBe(false);
  } finally {
    await rm(workspace, { recursive: true, force: true });
  }
});

test("rewriteProject writes only files whose content changed", async () => {
  const workspace = await mkdtemp(path.join(tmpdir(), "rulecast-"));

  try {
    await createCorpus(workspace);
    const written: string[] = [];

    await rewriteProject({
      rules: ["message-text"],
      phrases: ["zh-en-comments"],
      cwd: workspace,
      beforeWriteFile: ({ filePath }) => {
        written.push(path.basename(filePath));
      },
    });

    expect(written.sort()).toEqual(["alpha.rs", "beta.rs"]);
  } finally {
    await rm(workspace, { recursive: true, force: true });
  }
});

test("rewriteProject is a no-op on a rewritten corpus", async () => {
  const workspace = await mkdtemp(path.join(tmpdir(), "rulecast-"));

  try {
    await createCorpus(workspace);
    const options = {
      rules: ["message-text"],
      phrases: ["zh-en-comments"],
      cwd: workspace,
    };

    await rewriteProject(options);
    const second = await rewriteProject(options);

    expect(second.filesScanned).toBe(3);
    expect(second.filesMatched).toBe(0);
    expect(second.filesChanged).toBe(0);
    expect(second.files).toEqual([]);
  } finally {
    await rm(workspace, { recursive: true, force: true });
  }
});

test("rewriteProject dry run does not write files", async () => {
  const workspace = await mkdtemp(path.join(tmpdir(), "rulecast-"));

  try {
    const files = await createCorpus(workspace);

    const result = await rewriteProject({
      rules: ["message-text"],
      cwd: workspace,
      dryRun: true,
    });

    expect(result.dryRun).toBe(true);
    expect(result.filesChanged).toBe(1);
    expect(result.totalStructuralMatches).toBe(1);
    expect(await readFile(files.alpha, "utf8")).toBe(alphaSource);
  } finally {
    await rm(workspace, { recursive: true, force: true });
  }
});

test("rewriteProject reports stale files and keeps going", async () => {
  const workspace = await mkdtemp(path.join(tmpdir(), "rulecast-"));

  try {
    const files = await createCorpus(workspace);
    const externallyMutated = "fn main() {}\n";

    const result = await rewriteProject({
      rules: ["message-text"],
      phrases: ["zh-en-comments"],
      cwd: workspace,
      beforeWriteFile: async ({ filePath }) => {
        if (filePath === files.alpha) {
          await writeFile(filePath, externallyMutated, "utf8");
        }
      },
    });

    expect(result.failures).toEqual([
      {
        file: "alpha.rs",
        phase: "write",
        message: `File changed during rewrite: ${files.alpha}. Re-run rulecast to avoid overwriting concurrent edits.`,
      },
    ]);
    expect(result.filesChanged).toBe(1);
    expect(result.files.map((file) => file.file)).toEqual(["beta.rs"]);
    expect(await readFile(files.alpha, "utf8")).toBe(externallyMutated);
    expect(await readFile(files.beta, "utf8")).toBe(betaRewritten);
  } finally {
    await rm(workspace, { recursive: true, force: true });
  }
});

test("rewriteProject records unreadable files and processes the rest", async () => {
  const workspace = await mkdtemp(path.join(tmpdir(), "rulecast-"));

  try {
    const files = await createCorpus(workspace);

    const result = await rewriteProject({
      rules: ["message-text"],
      phrases: ["zh-en-comments"],
      cwd: workspace,
      concurrency: 1,
      beforeWriteFile: async ({ filePath }) => {
        if (filePath === files.alpha) {
          await rm(files.beta);
        }
      },
    });

    expect(result.failures).toHaveLength(1);
    expect(result.failures[0]?.file).toBe("beta.rs");
    expect(result.failures[0]?.phase).toBe("read");
    expect(result.failures[0]?.message).toContain("ENOENT");
    expect(result.filesScanned).toBe(3);
    expect(result.filesChanged).toBe(1);
    expect(await readFile(files.alpha, "utf8")).toBe(alphaRewritten);
  } finally {
    await rm(workspace, { recursive: true, force: true });
  }
});

test("rewriteProject leaves a file that is not valid utf8 byte-for-byte intact", async () => {
  const workspace = await mkdtemp(path.join(tmpdir(), "rulecast-"));

  try {
    const target = path.join(workspace, "mixed.rs");
    const bytes = Buffer.concat([
      Buffer.from([0x2f, 0x2f, 0x20, 0x63, 0x61, 0x66, 0xe9, 0x0a]),
      Buffer.from("// 创建OpenAI客户端\n", "utf8"),
    ]);
    await writeFile(target, bytes);

    const result = await rewriteProject({ phrases: ["zh-en-comments"], cwd: workspace });

    expect(result.failures).toHaveLength(1);
    expect(result.failures[0]?.file).toBe("mixed.rs");
    expect(result.failures[0]?.phase).toBe("read");
    expect(result.failures[0]?.message.startsWith(`Cannot decode ${target} as utf8:`)).toBe(true);
    expect(result.filesChanged).toBe(0);
    expect((await readFile(target)).equals(bytes)).toBe(true);
  } finally {
    await rm(workspace, { recursive: true, force: true });
  }
});

test("rewriteProject keeps a leading byte order mark", async () => {
  const workspace = await mkdtemp(path.join(tmpdir(), "rulecast-"));

  try {
    const target = path.join(workspace, "beta.rs");
    const bom = Buffer.from([0xef, 0xbb, 0xbf]);
    await writeFile(target, Buffer.concat([bom, Buffer.from(betaSource, "utf8")]));

    const result = await rewriteProject({ phrases: ["zh-en-comments"], cwd: workspace });

    expect(result.filesChanged).toBe(1);
    expect(result.files[0]?.byteDelta).toBe(
      Buffer.byteLength(betaRewritten) - Buffer.byteLength(betaSource),
    );
    const written = await readFile(target);
    expect(written.equals(Buffer.concat([bom, Buffer.from(betaRewritten, "utf8")]))).toBe(true);
  } finally {
    await rm(workspace, { recursive: true, force: true });
  }
});

test("rewriteProject rejects a missing corpus", async () => {
  const workspace = await mkdtemp(path.join(tmpdir(), "rulecast-"));

  try {
    await expect(
      rewriteProject({ rules: ["message-text"], cwd: workspace, scope: "missing" }),
    ).rejects.toThrow(`Corpus not found: ${path.join(workspace, "missing")}`);
  } finally {
    await rm(workspace, { recursive: true, force: true });
  }
});

test("rewriteProject rejects a scope outside cwd", async () => {
  const workspace = await mkdtemp(path.join(tmpdir(), "rulecast-"));

  try {
    await expect(
      rewriteProject({ rules: ["message-text"], cwd: workspace, scope: ".." }),
    ).rejects.toThrow("Scope resolves outside cwd");
  } finally {
    await rm(workspace, { recursive: true, force: true });
  }
});

test("rewriteProject logs a summary at verbose level 1", async () => {
  const workspace = await mkdtemp(path.join(tmpdir(), "rulecast-"));

  try {
    await createCorpus(workspace);
    const lines: string[] = [];

    await rewriteProject({
      rules: ["message-text"],
      phrases: ["zh-en-comments"],
      cwd: workspace,
      verbose: 1,
      logger: (line) => lines.push(line),
    });

    expect(lines.at(-1)).toBe(
      "[rulecast] summary mode=apply flow=3->2->2 failures=0 totals=structural:1,phrases:1",
    );
    expect(lines.some((line) => line.startsWith("[rulecast] collectFiles "))).toBe(true);
    expect(lines.some((line) => line.startsWith("[rulecast] slowFile "))).toBe(false);
  } finally {
    await rm(workspace, { recursive: true, force: true });
  }
});
