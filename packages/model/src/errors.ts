// packages/model/src/errors.ts
// Coded errors. Messages carry file/line/identifier context for the reader of the report.

export type ErrorCode =
  | "PARSE_ERROR"
  | "RESULT_READ_ERROR"
  | "MODEL_CONSISTENCY_ERROR"
  | "RULE_LOAD_ERROR"
  | "RULE_EVALUATION_ERROR"
  | "READ_TIMEOUT"
  | "CONFIG_ERROR";

export class HydrocheckError extends Error {
  readonly code: ErrorCode;
  readonly context: Readonly<Record<string, unknown>>;

  constructor(code: ErrorCode, message: string, context: Record<string, unknown> = {}) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.context = context;
  }
}

export class ParseError extends HydrocheckError {
  readonly file: string;
  readonly line: number;
  readonly reason: string;

  constructor(params: { file: string; line: number; reason: string }) {
    super("PARSE_ERROR", `${params.file}:${params.line}: ${params.reason}`, params);
    this.file = params.file;
    this.line = params.line;
    this.reason = params.reason;
  }
}

export class ResultReadError extends HydrocheckError {
  readonly file: string;
  readonly reason: string;

  constructor(params: { file: string; reason: string }) {
    super("RESULT_READ_ERROR", `${params.file}: ${params.reason}`, params);
    this.file = params.file;
    this.reason = params.reason;
  }
}

export type ConflictingSource = { source: string; value: string };

export class ModelConsistencyError extends HydrocheckError {
  readonly entity: string;
  readonly attribute: string;
  readonly sources: readonly ConflictingSource[];

  /** `plan` is set when the active plan references more than one of the disagreeing files. */
  constructor(params: { entity: string; attribute: string; sources: ConflictingSource[]; plan?: string }) {
    const listed = params.sources.map((s) => `${s.source} says ${s.value}`).join("; ");
    const hint =
      params.plan === undefined
        ? "No plan links any of these files; reference one geometry from the active plan or remove the others."
        : `Plan ${params.plan} references all of these files; keep one of them in the plan.`;
    super("MODEL_CONSISTENCY_ERROR", `Conflicting design data for ${params.entity} attribute "${params.attribute}": ${listed}. ${hint}`, params);
    this.entity = params.entity;
    this.attribute = params.attribute;
    this.sources = params.sources;
  }
}

export class RuleLoadError extends HydrocheckError {
  readonly ruleId: string;
  readonly source: string;
  readonly reason: string;

  constructor(params: { ruleId: string; source: string; reason: string }) {
    super("RULE_LOAD_ERROR", `Rule ${params.ruleId} (${params.source}): ${params.reason}`, params);
    this.ruleId = params.ruleId;
    this.source = params.source;
    this.reason = params.reason;
  }
}

/** Never thrown out of the engine; carried into `error` findings. */
export class RuleEvaluationError extends HydrocheckError {
  constructor(ruleId: string, message: string) {
    super("RULE_EVALUATION_ERROR", message, { ruleId });
  }
}

export class ReadTimeoutError extends HydrocheckError {
  constructor(file: string, timeoutMs: number) {
    super("READ_TIMEOUT", `${file}: read did not complete within ${timeoutMs} ms`, { file, timeoutMs });
  }
}

export class ConfigError extends HydrocheckError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super("CONFIG_ERROR", message, context);
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
