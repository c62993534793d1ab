// packages/results/src/glob.ts
// Path globs over container nodes: `*` and `?` stay within one segment, `**` spans any depth.
import { compareBinary } from "../../model/src/index.js";

import type { ResultContainer } from "./container.js";

type Pattern = readonly string[];

const segmentCache = new Map<string, RegExp>();

function segmentRegex(glob: string): RegExp {
  let re = segmentCache.get(glob);
  if (!re) {
    const body = glob
      .split("")
      .map((ch) => (ch === "*" ? "[^/]*" : ch === "?" ? "[^/]" : ch.replace(/[.+^${}()|[\]\\]/g, "\\$&")))
      .join("");
    re = new RegExp(`^${body}$`);
    segmentCache.set(glob, re);
  }
  return re;
}

export function compileGlob(glob: string): Pattern {
  return glob
    .replace(/^\/+/, "")
    .split("/")
    .filter((s) => s.length > 0);
}

export function matchesGlob(pattern: Pattern, path: readonly string[]): boolean {
  if (pattern.length === 0) return path.length === 0;
  const [head, ...rest] = pattern;
  if (head === "**") {
    for (let i = 0; i <= path.length; i++) {
      if (matchesGlob(rest, path.slice(i))) return true;
    }
    return false;
  }
  if (path.length === 0 || head === undefined) return false;
  return segmentRegex(head).test(path[0] ?? "") && matchesGlob(rest, path.slice(1));
}

/** Whether some descendant of `path` could still match. */
function couldMatchBelow(pattern: Pattern, path: readonly string[]): boolean {
  if (path.length === 0) return pattern.length > 0;
  const [head, ...rest] = pattern;
  if (head === undefined) return false;
  if (head === "**") return true;
  return segmentRegex(head).test(path[0] ?? "") && couldMatchBelow(rest, path.slice(1));
}

/**
 * Every node path matching at least one glob, deduplicated, binary-sorted.
 * A glob that matches nothing contributes nothing.
 */
export function expandGlobs(container: ResultContainer, globs: readonly string[]): string[] {
  const patterns = globs.map(compileGlob).filter((p) => p.length > 0);
  const found = new Set<string>();

  const walk = (path: string, segs: readonly string[]) => {
    if (segs.length > 0 && patterns.some((p) => matchesGlob(p, segs))) found.add(path);
    if (!patterns.some((p) => couldMatchBelow(p, segs))) return;
    for (const child of container.children(path) ?? []) {
      walk(path === "" ? child : `${path}/${child}`, [...segs, child]);
    }
  };

  walk("", []);
  return [...found].sort(compareBinary);
}
