// packages/results/src/decode.ts
// Flattening of container values into RawDataset scalars.
import type { DatasetScalar } from "../../model/src/index.js";

export function trimNul(s: string): string {
  return s.replace(/\0+$/, "");
}

const NUMBER_ARRAYS = [
  Float64Array,
  Float32Array,
  Int8Array,
  Int16Array,
  Int32Array,
  Uint8Array,
  Uint8ClampedArray,
  Uint16Array,
  Uint32Array,
] as const;

/**
 * Row-major scalars of a decoded value. 64-bit integers widen to the nearest
 * double; booleans become 0/1; nested arrays flatten.
 */
export function widenValues(raw: unknown): DatasetScalar[] {
  if (raw === null || raw === undefined) return [];
  if (typeof raw === "number") return [raw];
  if (typeof raw === "bigint") return [Number(raw)];
  if (typeof raw === "boolean") return [raw ? 1 : 0];
  if (typeof raw === "string") return [trimNul(raw)];
  if (raw instanceof BigInt64Array || raw instanceof BigUint64Array) return Array.from(raw, (b) => Number(b));
  for (const Ctor of NUMBER_ARRAYS) {
    if (raw instanceof Ctor) return Array.from(raw);
  }
  if (Array.isArray(raw)) return raw.flatMap((x: unknown) => widenValues(x));
  return [];
}

/** Attributes are kept only when they reduce to a single scalar. */
export function attributeScalar(raw: unknown): DatasetScalar | undefined {
  const values = widenValues(raw);
  return values.length === 1 ? values[0] : undefined;
}
