// packages/model/src/records.ts
// Raw parse outputs. Both shapes are frozen once produced.

/**
 * A typed field value. `null` marks a token that was present but could not be
 * coerced; a warning always accompanies it.
 */
export type FieldValue =
  | number
  | string
  | null
  | readonly (number | null)[]
  | readonly string[];

export type ParseWarningCode =
  | "MALFORMED_NUMBER"
  | "SHORT_TABLE"
  | "TABLE_OVERFLOW"
  | "UNKNOWN_KEYWORD"
  | "UNKNOWN_SECTION"
  | "TRUNCATED_SECTION"
  | "UNTERMINATED_SECTION"
  | "STRAY_END"
  | "UNKNOWN_VERSION";

export type ParseWarning = {
  line: number;
  code: ParseWarningCode;
  message: string;
};

export type RawRecord = {
  section: string;
  ordinal: number;
  /** 1-based line of the opening keyword; 0 for the file root record. */
  line: number;
  fields: Readonly<Record<string, FieldValue>>;
  /** Lines inside the section that no layout recognised, in file order. */
  opaque: readonly string[];
  warnings: readonly ParseWarning[];
};

export type DatasetScalar = number | string;

export type RawDataset = {
  /** Slash-separated path without a leading slash. */
  path: string;
  /** `[]` for an attribute-only group node. */
  shape: readonly number[];
  /** Row-major values. */
  values: readonly DatasetScalar[];
  attributes: Readonly<Record<string, DatasetScalar>>;
};

export type TextFileKind = "project" | "geometry" | "plan" | "steady_flow" | "unsteady_flow" | "quasi_flow";

export type InputKind = TextFileKind | "results";

export type TextSource = {
  /** File name, e.g. "Creek.g01". */
  source: string;
  kind: TextFileKind;
  /** Extension key used by plans and projects to refer to the file, e.g. "g01". */
  key: string;
  variant: string;
  records: readonly RawRecord[];
};

export type ResultSource = {
  source: string;
  /** Plan key the result container belongs to, e.g. "p01". */
  plan: string;
  /** Result layout id selected from the container's version marker. */
  layout: string;
  version: string;
  datasets: readonly RawDataset[];
};

export function isNumberList(v: FieldValue): v is readonly (number | null)[] {
  return Array.isArray(v) && v.every((x) => x === null || typeof x === "number");
}

export function isStringList(v: FieldValue): v is readonly string[] {
  return Array.isArray(v) && v.length > 0 && v.every((x) => typeof x === "string");
}
