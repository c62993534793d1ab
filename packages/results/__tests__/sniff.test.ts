// packages/results/__tests__/sniff.test.ts
import { mkdtempSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { describe, expect, test } from "vitest";

import { widenValues } from "../src/decode.js";
import { assertSignature, CONTAINER_SIGNATURE, findSignature, sniffContainer } from "../src/sniff.js";

function withSignatureAt(offset: number, length: number): Uint8Array {
  const bytes = new Uint8Array(length);
  bytes.set(CONTAINER_SIGNATURE, offset);
  return bytes;
}

describe("container signature", () => {
  test("found at offset 0 or behind a user block", () => {
    expect(findSignature(withSignatureAt(0, 64))).toBe(0);
    expect(findSignature(withSignatureAt(512, 1024))).toBe(512);
    expect(findSignature(withSignatureAt(1024, 2048))).toBe(1024);
  });

  test("not found elsewhere", () => {
    expect(findSignature(withSignatureAt(100, 1024))).toBeNull();
    expect(findSignature(new Uint8Array(3))).toBeNull();
    expect(() => assertSignature("a.hdf", new Uint8Array(16))).toThrow("a.hdf: not a result container (signature missing)");
  });

  test("a text file renamed to .hdf is rejected before opening", async () => {
    const dir = mkdtempSync(join(tmpdir(), "hydrocheck-sniff-"));
    const path = join(dir, "Creek.p01.hdf");
    writeFileSync(path, "Geom Title=not binary\n");
    await expect(sniffContainer(path, { timeoutMs: 5_000 })).rejects.toThrow("not a result container");
  });
});

describe("widenValues", () => {
  test("typed arrays widen to doubles", () => {
    expect(widenValues(BigInt64Array.of(5n, -7n))).toEqual([5, -7]);
    expect(widenValues(Float32Array.of(0.5, 1.25))).toEqual([0.5, 1.25]);
    expect(widenValues(Float64Array.of(0.1))).toEqual([0.1]);
    expect(widenValues(Int16Array.of(-3))).toEqual([-3]);
  });

  test("strings lose trailing NULs; nested arrays flatten", () => {
    expect(widenValues(["A\0\0", "B"])).toEqual(["A", "B"]);
    expect(widenValues([[1, 2], [3, 4]])).toEqual([1, 2, 3, 4]);
    expect(widenValues(true)).toEqual([1]);
    expect(widenValues(null)).toEqual([]);
  });
});
