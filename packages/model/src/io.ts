// packages/model/src/io.ts
import { readFile } from "node:fs/promises";

import { ReadTimeoutError } from "./errors.js";

/** Read a whole file, aborting once `timeoutMs` elapses. */
export async function readFileBounded(path: string, timeoutMs: number): Promise<Buffer> {
  try {
    return await readFile(path, { signal: AbortSignal.timeout(timeoutMs) });
  } catch (e) {
    if (e instanceof Error && (e.name === "AbortError" || e.name === "TimeoutError")) {
      throw new ReadTimeoutError(path, timeoutMs);
    }
    throw e;
  }
}
