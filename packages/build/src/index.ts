// packages/build/src/index.ts
export { activePlan, buildModel, canonicalTexts, type ActivePlan, type BuildInputs, type BuildOptions } from "./builder.js";
export { designOverridesResults, resultsOverrideDesign, type MergeOutcome, type MergePolicy } from "./policy.js";
export { checkModelInvariants, compareEntities, type ModelViolation, type ModelViolationCode } from "./invariants.js";
export { contributionsOf, reachId, stationId, type Contribution } from "./contributions.js";
export * from "./derive.js";
