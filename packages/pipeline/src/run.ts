// packages/pipeline/src/run.ts
import { basename } from "node:path";

import { buildModel, type MergePolicy } from "../../build/src/index.js";
import {
  entityKey,
  HydrocheckError,
  ParseError,
  readFileBounded,
  ResultReadError,
  sha256Hex,
  type ComplianceReport,
  type HydraulicModel,
  type InputIdentity,
  type ModelWarning,
  type ReportWarning,
  type ResultSource,
  type TextSource,
} from "../../model/src/index.js";
import { parseTextFile } from "../../parse/src/index.js";
import { aggregateReport } from "../../report/src/index.js";
import { readResultFile } from "../../results/src/index.js";
import { bundledRuleSetPaths, evaluateRules, loadRuleDocuments, type LoadedRuleSet } from "../../rules/src/index.js";

import { discoverInputs, type Manifest } from "./manifest.js";
import { ProgressEmitter, type ProgressListener } from "./progress.js";

export const DEFAULT_READ_TIMEOUT_MS = 30_000;

export type LoadOptions = {
  strict?: boolean;
  readTimeoutMs?: number;
  mergePolicy?: MergePolicy;
  onProgress?: ProgressListener;
};

export type LoadedProject = {
  manifest: Manifest;
  model: HydraulicModel;
  inputs: InputIdentity[];
  /** File-level problems: missing references and files that could not be read. */
  warnings: ReportWarning[];
};

export type FileOutcome<T> = { ok: true; value: T; identity: InputIdentity } | { ok: false; warning: ReportWarning };

function identity(path: string, kind: string, bytes: Uint8Array): InputIdentity {
  return { name: basename(path), kind, bytes: bytes.length, sha256: sha256Hex(bytes) };
}

const isOsError = (e: unknown): e is NodeJS.ErrnoException =>
  e instanceof Error && !(e instanceof HydrocheckError) && "code" in e && typeof e.code === "string";

/**
 * Coded errors, and OS errors reading the file, abort only the file they came
 * from; anything else is a defect and propagates.
 */
function fileFailure(path: string, e: unknown, wrap: (reason: string) => HydrocheckError): { ok: false; warning: ReportWarning } {
  const err = isOsError(e) ? wrap(`cannot read file: ${e.message}`) : e;
  if (err instanceof HydrocheckError) return { ok: false, warning: { source: basename(path), message: `${err.code}: ${err.message}` } };
  throw err;
}

/** Read and parse one referenced text file. */
export async function readTextInput(path: string, options: LoadOptions = {}): Promise<FileOutcome<TextSource>> {
  try {
    const bytes = await readFileBounded(path, options.readTimeoutMs ?? DEFAULT_READ_TIMEOUT_MS);
    const source = parseTextFile(basename(path), bytes.toString("utf8"), { strict: options.strict ?? false });
    return { ok: true, value: source, identity: identity(path, source.kind, bytes) };
  } catch (e) {
    return fileFailure(path, e, (reason) => new ParseError({ file: basename(path), line: 0, reason }));
  }
}

/** Read one plan's result container. */
export async function readResultInput(path: string, plan: string, options: LoadOptions = {}): Promise<FileOutcome<ResultSource>> {
  try {
    const file = await readResultFile(path, { plan, timeoutMs: options.readTimeoutMs ?? DEFAULT_READ_TIMEOUT_MS });
    return { ok: true, value: file.source, identity: { name: basename(path), kind: "results", bytes: file.bytes, sha256: file.sha256 } };
  } catch (e) {
    return fileFailure(path, e, (reason) => new ResultReadError({ file: path, reason }));
  }
}

export function modelWarning(w: ModelWarning): ReportWarning {
  return {
    source: w.source,
    message: w.message,
    ...(w.line !== undefined ? { line: w.line } : {}),
    ...(w.entity ? { entity: entityKey(w.entity) } : {}),
  };
}

async function loadWith(projectPath: string, options: LoadOptions, progress: ProgressEmitter): Promise<LoadedProject> {
  const timeoutMs = options.readTimeoutMs ?? DEFAULT_READ_TIMEOUT_MS;

  const { project, projectBytes, manifest } = await progress.stage("discover", async () => {
    const bytes = await readFileBounded(projectPath, timeoutMs);
    const parsed = parseTextFile(basename(projectPath), bytes.toString("utf8"), { strict: options.strict ?? false });
    return { project: parsed, projectBytes: bytes, manifest: await discoverInputs(projectPath, parsed) };
  });

  const outcomes = await progress.stage("parse", () =>
    Promise.all([
      Promise.all(manifest.texts.map((p) => readTextInput(p, options))),
      Promise.all(manifest.results.map((r) => readResultInput(r.path, r.plan, options))),
    ])
  );
  const [textOutcomes, resultOutcomes] = outcomes;

  const warnings: ReportWarning[] = manifest.missing.map((p) => ({
    source: basename(projectPath),
    message: `references ${basename(p)}, which was not found`,
  }));
  const inputs: InputIdentity[] = [identity(projectPath, "project", projectBytes)];
  const texts: TextSource[] = [project];
  const results: ResultSource[] = [];

  for (const o of textOutcomes) {
    if (o.ok) {
      texts.push(o.value);
      inputs.push(o.identity);
    } else warnings.push(o.warning);
  }
  for (const o of resultOutcomes) {
    if (o.ok) {
      results.push(o.value);
      inputs.push(o.identity);
    } else warnings.push(o.warning);
  }
  for (const w of warnings) progress.emit({ type: "warning", warning: w });

  const model = await progress.stage("build", () =>
    buildModel({ texts, results }, { mergePolicy: options.mergePolicy })
  );
  for (const w of model.warnings) progress.emit({ type: "warning", warning: modelWarning(w) });

  inputs.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  return { manifest, model, inputs, warnings };
}

/**
 * Read a project and everything it references, then merge once. Files are
 * read and parsed concurrently; the merge does not depend on completion order.
 */
export async function loadProject(projectPath: string, options: LoadOptions = {}): Promise<LoadedProject> {
  return loadWith(projectPath, options, new ProgressEmitter(options.onProgress));
}

export type CheckOptions = LoadOptions & {
  tool: { name: string; version: string };
  /** Extra rule documents, loaded after the bundled ones. */
  rulePaths?: readonly string[];
  /** Bundled state overlay, e.g. "texas" or "TX". */
  state?: string | null;
  /** Load the bundled baseline (and overlay). Defaults to true. */
  bundled?: boolean;
  now?: () => Date;
};

export type CheckResult = {
  report: ComplianceReport;
  model: HydraulicModel;
  ruleSet: LoadedRuleSet;
};

export function rulePathsFor(options: Pick<CheckOptions, "rulePaths" | "state" | "bundled">): string[] {
  const bundled = (options.bundled ?? true) ? bundledRuleSetPaths(options.state) : [];
  return [...bundled, ...(options.rulePaths ?? [])];
}

/** Load, evaluate every rule in load order, aggregate. */
export async function checkProject(projectPath: string, options: CheckOptions): Promise<CheckResult> {
  const progress = new ProgressEmitter(options.onProgress);
  const loaded = await loadWith(projectPath, options, progress);

  const ruleSet = await progress.stage("rules", () =>
    loadRuleDocuments(rulePathsFor(options), { readTimeoutMs: options.readTimeoutMs ?? DEFAULT_READ_TIMEOUT_MS })
  );
  const ruleWarnings: ReportWarning[] = ruleSet.warnings.map((message) => ({ source: "rules", message }));
  for (const w of ruleWarnings) progress.emit({ type: "warning", warning: w });

  const findings = await progress.stage("evaluate", () => evaluateRules(ruleSet.rules, loaded.model));

  const report = await progress.stage("report", () =>
    aggregateReport(findings, {
      tool: options.tool,
      generatedAt: (options.now ?? (() => new Date()))(),
      inputs: loaded.inputs,
      ruleSet: ruleSet.identity,
      warnings: [
        ...loaded.warnings,
        ...loaded.model.warnings.map(modelWarning),
        ...ruleWarnings,
        ...progress.listenerWarnings(),
      ],
      ruleErrors: ruleSet.errors,
    })
  );
  return { report, model: loaded.model, ruleSet };
}
