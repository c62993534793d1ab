// packages/build/src/policy.ts
import type { Value } from "../../model/src/index.js";

export type MergeOutcome = {
  effective: Value;
  /** Text value displaced by the effective value, recorded under `design_values`. */
  displaced: Value | null;
};

/**
 * Decides the effective value when a text source and a result container both
 * supply the same attribute of the same entity. Injected through
 * `BuildOptions.mergePolicy`; nothing else in the builder compares the two.
 */
export interface MergePolicy {
  readonly name: string;
  resolve(attribute: string, design: Value, result: Value): MergeOutcome;
}

/** Results reflect the model that actually ran, so they win. */
export const resultsOverrideDesign: MergePolicy = {
  name: "resultsOverrideDesign",
  resolve: (_attribute, design, result) => ({ effective: result, displaced: design }),
};

export const designOverridesResults: MergePolicy = {
  name: "designOverridesResults",
  resolve: (_attribute, design) => ({ effective: design, displaced: null }),
};
