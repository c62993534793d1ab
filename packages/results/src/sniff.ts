// packages/results/src/sniff.ts
import { readFileBounded, ResultReadError } from "../../model/src/index.js";

export const CONTAINER_SIGNATURE: readonly number[] = [0x89, 0x48, 0x44, 0x46, 0x0d, 0x0a, 0x1a, 0x0a];

/**
 * Offset of the container signature, or null. The signature sits at 0 or,
 * behind a user block, at 512 and successive doublings.
 */
export function findSignature(bytes: Uint8Array): number | null {
  for (let offset = 0; offset + CONTAINER_SIGNATURE.length <= bytes.length; offset = offset === 0 ? 512 : offset * 2) {
    if (CONTAINER_SIGNATURE.every((b, i) => bytes[offset + i] === b)) return offset;
  }
  return null;
}

export function assertSignature(file: string, bytes: Uint8Array): number {
  const offset = findSignature(bytes);
  if (offset === null) throw new ResultReadError({ file, reason: "not a result container (signature missing)" });
  return offset;
}

export async function sniffContainer(path: string, options: { timeoutMs: number }): Promise<number> {
  return assertSignature(path, await readFileBounded(path, options.timeoutMs));
}
