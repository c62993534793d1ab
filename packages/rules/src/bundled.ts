// packages/rules/src/bundled.ts
import { fileURLToPath } from "node:url";

import { ConfigError } from "../../model/src/index.js";

const RULESETS = new URL("../rulesets/", import.meta.url);

export const BASELINE_RULESET = "fema.yaml";

/** State overlays layered on the federal baseline, by name and postal code. */
export const STATE_OVERLAYS: Readonly<Record<string, string>> = {
  texas: "texas.yaml",
  tx: "texas.yaml",
  maine: "maine.yaml",
  me: "maine.yaml",
};

export function bundledRuleSetPath(file: string): string {
  return fileURLToPath(new URL(file, RULESETS));
}

/** Baseline first, then the state overlay when one is named. */
export function bundledRuleSetPaths(state?: string | null): string[] {
  const paths = [bundledRuleSetPath(BASELINE_RULESET)];
  if (state === undefined || state === null || state.trim() === "") return paths;

  const overlay = STATE_OVERLAYS[state.trim().toLowerCase()];
  if (!overlay) {
    throw new ConfigError(`no bundled rules for state "${state}"; known: ${Object.keys(STATE_OVERLAYS).join(", ")}`, { state });
  }
  paths.push(bundledRuleSetPath(overlay));
  return paths;
}
