// packages/model/src/rule.ts
import type { EntityType } from "./entity.js";
import type { Severity } from "./finding.js";

export type RuleSelector = {
  entity: EntityType[];
  /** Filter expression source; null selects every entity of the types. */
  where: string | null;
  /** Evaluate the condition once over the whole matched set. */
  aggregate: boolean;
};

/** A rule as authored, after validation. Immutable once loaded. */
export type RuleSpec = {
  id: string;
  name: string;
  citation: string;
  citation_url: string | null;
  severity: Severity;
  category: string | null;
  selector: RuleSelector;
  condition: string;
  /** Template with `{attribute}` holes. */
  message: string | null;
  /** Document the rule was loaded from. */
  source: string;
};
