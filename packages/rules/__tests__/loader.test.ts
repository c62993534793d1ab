// packages/rules/__tests__/loader.test.ts
import { fileURLToPath } from "node:url";

import { describe, expect, test } from "vitest";

import { ConfigError, RuleLoadError } from "../../model/src/index.js";
import {
  bundledRuleSetPaths,
  categoryOf,
  compileRule,
  compileRuleDocuments,
  loadRuleDocuments,
} from "../src/index.js";

const doc = (rules: string, head = "ruleset:\n  id: local\n  version: 1\n") => `${head}rules:\n${rules}`;

const GOOD = `  - id: LOC-MANN-001
    citation: Local ordinance 4.2
    severity: warning
    selector: cross_section
    condition: manning_n_channel > 0
`;

describe("compileRule", () => {
  test("fills defaults from the id", () => {
    const r = compileRule(
      { id: "LOC-MANN-001", citation: "Local ordinance 4.2", severity: "warning", selector: ["cross_section", "structure"], condition: "true" },
      "local.yaml",
      1
    );
    if (!r.ok) throw r.error;
    expect(r.rule.spec).toEqual({
      id: "LOC-MANN-001",
      name: "LOC-MANN-001",
      citation: "Local ordinance 4.2",
      citation_url: null,
      severity: "warning",
      category: "MANN",
      selector: { entity: ["cross_section", "structure"], where: null, aggregate: false },
      condition: "true",
      message: null,
      source: "local.yaml",
    });
    expect(r.rule.where).toBeNull();
  });

  test("a rule without a citation is rejected by id", () => {
    const r = compileRule({ id: "LOC-X-001", severity: "info", selector: "plan", condition: "true" }, "local.yaml", 3);
    expect(r.ok).toBe(false);
    if (r.ok) return;
    expect(r.error).toBeInstanceOf(RuleLoadError);
    expect(r.error.ruleId).toBe("LOC-X-001");
    expect(r.error.reason).toBe("missing citation");
    expect(r.error.message).toBe("Rule LOC-X-001 (local.yaml): missing citation");
  });

  test("an unnamed rule is identified by its position", () => {
    const r = compileRule("not a rule", "local.yaml", 4);
    expect(r.ok ? null : [r.error.ruleId, r.error.reason]).toEqual(["local.yaml#4", "rule is not a mapping"]);
  });

  test("schema, condition and filter problems name the field", () => {
    const base = { id: "LOC-X-001", citation: "c", selector: "plan", condition: "true", severity: "warning" };
    const reason = (raw: Record<string, unknown>) => {
      const r = compileRule(raw, "local.yaml", 1);
      return r.ok ? null : r.error.reason;
    };

    expect(reason({ ...base, severity: "fatal" })).toMatch(/^severity: /);
    expect(reason({ ...base, selector: "weir" })).toMatch(/^selector: /);
    expect(reason({ ...base, condition: "a <" })).toBe("condition: unexpected end of expression");
    expect(reason({ ...base, selector: { entity: "plan", where: "frob(1)" } })).toBe(
      'selector.where: unknown function "frob" at column 1'
    );
  });

  test("categories come from the middle of the id", () => {
    expect(categoryOf("FEMA-MANN-001")).toBe("MANN");
    expect(categoryOf("LOCAL-1")).toBeNull();
  });
});

describe("compileRuleDocuments", () => {
  test("a bad rule is reported and the rest load", () => {
    const text = doc(`${GOOD}  - id: LOC-FW-001
    severity: violation
    selector: plan
    condition: target_surcharge <= 0.5
`);
    const set = compileRuleDocuments([{ source: "local.yaml", text }]);
    expect(set.rules.map((r) => r.spec.id)).toEqual(["LOC-MANN-001"]);
    expect(set.errors.map((e) => e.message)).toEqual(["Rule LOC-FW-001 (local.yaml): missing citation"]);
    expect(set.identity.rule_count).toBe(1);
    expect(set.identity.documents).toEqual([{ id: "local", version: "1", source: "local.yaml" }]);
  });

  test("later documents supersede earlier rules", () => {
    const overlay = doc(
      `  - id: LOC-MANN-002
    citation: Overlay 1
    severity: info
    selector: cross_section
    condition: "true"
`,
      "ruleset: {id: overlay, version: '2'}\nsupersedes: [LOC-MANN-001, LOC-GONE-001]\n"
    );
    const set = compileRuleDocuments([
      { source: "local.yaml", text: doc(GOOD) },
      { source: "overlay.yaml", text: overlay },
    ]);
    expect(set.rules.map((r) => r.spec.id)).toEqual(["LOC-MANN-002"]);
    expect(set.errors).toEqual([]);
    expect(set.warnings).toEqual(["overlay.yaml: supersedes LOC-GONE-001, which is not loaded"]);
  });

  test("a repeated id keeps the first definition", () => {
    const set = compileRuleDocuments([
      { source: "a.yaml", text: doc(GOOD) },
      { source: "b.yaml", text: doc(GOOD) },
    ]);
    expect(set.rules.map((r) => r.spec.source)).toEqual(["a.yaml"]);
    expect(set.errors.map((e) => e.reason)).toEqual(["duplicate rule id (first defined in a.yaml)"]);
  });

  test("unreadable documents are reported whole", () => {
    const set = compileRuleDocuments([
      { source: "broken.yaml", text: "rules: [unclosed" },
      { source: "bare.yaml", text: "rules: []\n" },
    ]);
    expect(set.rules).toEqual([]);
    expect(set.errors.map((e) => [e.ruleId, e.source])).toEqual([
      ["*", "broken.yaml"],
      ["*", "bare.yaml"],
    ]);
    expect(set.errors[0]?.reason).toMatch(/^not valid YAML: /);
    expect(set.errors[1]?.reason).toMatch(/^ruleset: /);
  });

  test("the identity hash follows the documents", () => {
    const a = compileRuleDocuments([{ source: "local.yaml", text: doc(GOOD) }]);
    const b = compileRuleDocuments([{ source: "local.yaml", text: `# comment\n${doc(GOOD)}` }]);
    const c = compileRuleDocuments([{ source: "local.yaml", text: doc(GOOD.replace("warning", "info")) }]);
    expect(a.identity.sha256).toMatch(/^[0-9a-f]{64}$/);
    expect(b.identity.sha256).toBe(a.identity.sha256);
    expect(c.identity.sha256).not.toBe(a.identity.sha256);
  });
});

describe("bundled rule sets", () => {
  test("every bundled document loads cleanly", async () => {
    const federal = await loadRuleDocuments(bundledRuleSetPaths());
    const texas = await loadRuleDocuments(bundledRuleSetPaths("TX"));
    const maine = await loadRuleDocuments(bundledRuleSetPaths("maine"));

    for (const set of [federal, texas, maine]) {
      expect(set.errors).toEqual([]);
      expect(set.warnings).toEqual([]);
    }
    expect(federal.identity.documents.map((d) => d.source)).toEqual(["fema.yaml"]);
    expect(federal.rules).toHaveLength(8);
    expect(texas.rules.map((r) => r.spec.id)).not.toContain("FEMA-FW-001");
    expect(texas.rules).toHaveLength(7 + 6);
    expect(maine.rules).toHaveLength(8 + 3);
  });

  test("an unreadable rule file is reported and the bundled rules still load", async () => {
    const missing = fileURLToPath(new URL("./no-such-rules.yaml", import.meta.url));
    const set = await loadRuleDocuments([...bundledRuleSetPaths(), missing]);

    expect(set.rules).toHaveLength(8);
    expect(set.errors.map((e) => [e.ruleId, e.source])).toEqual([["*", "no-such-rules.yaml"]]);
    expect(set.errors[0]?.reason).toMatch(/^cannot read: ENOENT/);
    expect(set.identity.documents.map((d) => d.source)).toEqual(["fema.yaml"]);
  });

  test("an unknown state is a configuration error", () => {
    expect(() => bundledRuleSetPaths("atlantis")).toThrow(ConfigError);
  });
});
