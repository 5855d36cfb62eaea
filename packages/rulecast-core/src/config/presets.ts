import { readdir, readFile } from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { isErrorWithCode } from "../common/paths.ts";

export type PresetKind = "rules" | "phrases";

export type PresetInfo = {
  kind: PresetKind;
  name: string;
  description: string;
  file: string;
};

const DATA_DIRECTORY = fileURLToPath(new URL("../../data/", import.meta.url));
const PRESET_NAME_PATTERN = /^[a-z0-9][a-z0-9-]*$/;

export function presetPath(kind: PresetKind, name: string): string | null {
  if (!PRESET_NAME_PATTERN.test(name)) {
    return null;
  }
  return path.join(DATA_DIRECTORY, kind, `${name}.json`);
}

export async function readPreset(
  kind: PresetKind,
  name: string,
): Promise<{ path: string; text: string } | null> {
  const file = presetPath(kind, name);
  if (!file) {
    return null;
  }

  try {
    return { path: file, text: await readFile(file, "utf8") };
  } catch (error) {
    if (isErrorWithCode(error) && error.code === "ENOENT") {
      return null;
    }
    throw error;
  }
}

export async function listPresets(): Promise<PresetInfo[]> {
  const presets: PresetInfo[] = [];

  for (const kind of ["rules", "phrases"] as const) {
    const directory = path.join(DATA_DIRECTORY, kind);
    const names = (await readdir(directory))
      .filter((entry) => entry.endsWith(".json"))
      .map((entry) => entry.slice(0, -".json".length))
      .sort();

    for (const name of names) {
      const file = path.join(directory, `${name}.json`);
      const document: unknown = JSON.parse(await readFile(file, "utf8"));
      presets.push({ kind, name, description: readDescription(document), file });
    }
  }

  return presets;
}

function readDescription(document: unknown): string {
  if (typeof document === "object" && document !== null && "description" in document) {
    const { description } = document;
    if (typeof description === "string") {
      return description;
    }
  }
  return "";
}
