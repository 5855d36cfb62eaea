import { buildCommand } from "@stricli/core";
import { listPresets, type PresetInfo } from "@rulecast/core";
import { Chalk, type ChalkInstance } from "chalk";

export type PresetsCommandFlags = {
  json?: boolean;
  "no-color"?: boolean;
};

export function formatPresetsOutput(
  presets: readonly PresetInfo[],
  chalkInstance: ChalkInstance = new Chalk({ level: 0 }),
): string {
  if (presets.length === 0) {
    return chalkInstance.gray("No presets.");
  }

  const width = Math.max(...presets.map((preset) => preset.name.length));
  return presets
    .map((preset) => {
      const flag = preset.kind === "rules" ? "--rules  " : "--phrases";
      const description = preset.description.length > 0 ? `  ${preset.description}` : "";
      return `${chalkInstance.gray(flag)} ${chalkInstance.bold(preset.name.padEnd(width))}${description}`;
    })
    .join("\n");
}

export const presetsCommand = buildCommand({
  async func(
    this: { process: { stdout: { write(s: string): void; isTTY?: boolean } } },
    flags: PresetsCommandFlags,
  ) {
    const presets = await listPresets();
    if (flags.json ?? false) {
      this.process.stdout.write(`${JSON.stringify(presets, null, 2)}\n`);
      return;
    }

    const color = Boolean(this.process.stdout.isTTY) && !(flags["no-color"] ?? false);
    this.process.stdout.write(
      `${formatPresetsOutput(presets, new Chalk({ level: color ? 1 : 0 }))}\n`,
    );
  },
  parameters: {
    flags: {
      json: {
        kind: "boolean" as const,
        optional: true,
        withNegated: false,
        brief: "Output structured JSON",
      },
      "no-color": {
        kind: "boolean" as const,
        optional: true,
        withNegated: false,
        brief: "Disable colored output",
      },
    },
    positional: {
      kind: "tuple" as const,
      parameters: [],
    },
  },
  docs: {
    brief: "List built-in rule sets and phrase tables",
  },
});
