import { buildApplication, buildRouteMap, text_en } from "@stricli/core";
import { rewriteCommand } from "@rulecast/rewrite";
import { presetsCommand } from "./presets.ts";

function formatCommandException(exc: unknown): string {
  if (exc instanceof Error) {
    // Avoid printing stack traces for user-facing command errors by default.
    return exc.message.length > 0 ? `Error: ${exc.message}` : "Error";
  }
  return String(exc);
}

const text = {
  ...text_en,
  exceptionWhileParsingArguments: (exc: unknown) =>
    `Unable to parse arguments, ${formatCommandException(exc)}`,
  exceptionWhileLoadingCommandFunction: (exc: unknown) =>
    `Unable to load command function, ${formatCommandException(exc)}`,
  exceptionWhileLoadingCommandContext: (exc: unknown) =>
    `Unable to load command context, ${formatCommandException(exc)}`,
  exceptionWhileRunningCommand: (exc: unknown) =>
    `Command failed, ${formatCommandException(exc)}`,
};

const rootRouteMap = buildRouteMap({
  routes: {
    rewrite: rewriteCommand,
    presets: presetsCommand,
  },
  docs: {
    brief: "Rule-driven bulk rewriting of source text",
  },
});

export const app = buildApplication(rootRouteMap, {
  name: "rulecast",
  scanner: {
    caseStyle: "original",
  },
  documentation: {
    caseStyle: "original",
  },
  localization: {
    defaultLocale: "en",
    loadText: () => text,
  },
});
