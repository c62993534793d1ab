// packages/parse/src/file-kinds.ts
import type { InputKind, TextFileKind } from "../../model/src/index.js";

export type DetectedKind = {
  kind: InputKind;
  /** Extension key, e.g. "g01" for "Creek.g01"; "prj" for the project file. */
  key: string;
  /** File name without the extension key, e.g. "Creek". */
  stem: string;
};

const NUMBERED: Record<string, TextFileKind> = {
  g: "geometry",
  p: "plan",
  f: "steady_flow",
  u: "unsteady_flow",
  q: "quasi_flow",
};

/**
 * Suffix based detection. Binary containers are named after the plan they
 * belong to ("Creek.p01.hdf"), so their key is the plan key.
 */
export function detectFileKind(fileName: string): DetectedKind | null {
  const base = fileName.split(/[\\/]/).pop() ?? fileName;

  const binary = /^(.*?)(?:\.(p\d{2}))?\.(hdf|h5)$/i.exec(base);
  if (binary) {
    const stem = binary[1] ?? "";
    const plan = binary[2];
    return { kind: "results", key: plan ? plan.toLowerCase() : stem, stem };
  }

  const prj = /^(.*)\.prj$/i.exec(base);
  if (prj) return { kind: "project", key: "prj", stem: prj[1] ?? "" };

  const numbered = /^(.*)\.([gpfuq])(\d{2})$/i.exec(base);
  if (numbered) {
    const letter = (numbered[2] ?? "").toLowerCase();
    const kind = NUMBERED[letter];
    if (kind) return { kind, key: `${letter}${numbered[3] ?? ""}`, stem: numbered[1] ?? "" };
  }

  return null;
}

export function isTextKind(kind: InputKind): kind is TextFileKind {
  return kind !== "results";
}
