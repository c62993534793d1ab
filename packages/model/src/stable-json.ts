// packages/model/src/stable-json.ts
import { createHash } from "node:crypto";

/**
 * Canonical JSON:
 * - object keys are sorted (binary order)
 * - arrays preserve order
 * - undefined is omitted in objects (like JSON.stringify)
 * - non-finite numbers become null
 */
export function stableStringify(value: unknown, indent?: number): string {
  return JSON.stringify(canonicalize(value), null, indent);
}

function canonicalize(value: unknown): unknown {
  if (value === null) return null;

  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (typeof value === "string" || typeof value === "boolean") return value;

  if (Array.isArray(value)) return value.map(canonicalize);

  if (typeof value === "object") {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value).sort(([a], [b]) => compareBinary(a, b))) {
      if (typeof v === "undefined") continue;
      out[k] = canonicalize(v);
    }
    return out;
  }

  // functions/symbols/bigint are not representable in JSON
  return null;
}

export function compareBinary(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export function sha256Hex(input: string | Uint8Array): string {
  return createHash("sha256").update(input).digest("hex");
}

export function deepFreeze<T>(value: T): T {
  if (value && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const v of Object.values(value)) deepFreeze(v);
  }
  return value;
}
