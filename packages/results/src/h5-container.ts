// packages/results/src/h5-container.ts
// ResultContainer over an on-disk file, read through h5wasm.
import { basename } from "node:path";
import h5wasm from "h5wasm/node";

import {
  compareBinary,
  errorMessage,
  readFileBounded,
  ResultReadError,
  sha256Hex,
  type DatasetScalar,
  type RawDataset,
  type ResultSource,
} from "../../model/src/index.js";

import type { ResultContainer } from "./container.js";
import { attributeScalar, widenValues } from "./decode.js";
import type { ResultLayoutRegistry } from "./layouts.js";
import { DEFAULT_RESULT_GLOBS, readResultDatasets } from "./reader.js";
import { assertSignature } from "./sniff.js";

type H5File = InstanceType<typeof h5wasm.File>;
type H5Node = ReturnType<H5File["get"]>;

class H5Container implements ResultContainer {
  constructor(
    readonly name: string,
    private readonly file: H5File
  ) {}

  private node(path: string): H5File | H5Node {
    return path === "" ? this.file : this.file.get(path);
  }

  children(path: string): readonly string[] | undefined {
    const n = this.node(path);
    return n instanceof h5wasm.Group ? [...n.keys()].sort(compareBinary) : undefined;
  }

  read(path: string): RawDataset | undefined {
    const n = this.node(path);
    if (n instanceof h5wasm.Group) return { path, shape: [], values: [], attributes: this.attributes(n) };
    if (n instanceof h5wasm.Dataset) {
      return { path, shape: [...(n.shape ?? [])], values: widenValues(n.value), attributes: this.attributes(n) };
    }
    return undefined;
  }

  private attributes(n: InstanceType<typeof h5wasm.Group> | InstanceType<typeof h5wasm.Dataset>): Record<string, DatasetScalar> {
    const out: Record<string, DatasetScalar> = {};
    for (const [name, attr] of Object.entries(n.attrs)) {
      const v = attributeScalar(attr.value);
      if (v !== undefined) out[name] = v;
    }
    return out;
  }

  close(): void {
    this.file.close();
  }
}

export type OpenOptions = { timeoutMs: number };

/**
 * Open a result container. The signature is checked on bytes read under the
 * timeout before the container library sees the file. Callers must close it.
 */
export async function openResultContainer(path: string, options: OpenOptions): Promise<ResultContainer> {
  return openChecked(path, await readFileBounded(path, options.timeoutMs));
}

async function openChecked(path: string, bytes: Uint8Array): Promise<ResultContainer> {
  assertSignature(path, bytes);
  await h5wasm.ready;
  try {
    return new H5Container(basename(path), new h5wasm.File(path, "r"));
  } catch (e) {
    throw new ResultReadError({ file: path, reason: `cannot open container: ${errorMessage(e)}` });
  }
}

export type ResultFile = {
  source: ResultSource;
  bytes: number;
  sha256: string;
};

/** Open, read the globbed datasets, close. */
export async function readResultFile(
  path: string,
  options: OpenOptions & { plan: string; globs?: readonly string[]; registry?: ResultLayoutRegistry }
): Promise<ResultFile> {
  const bytes = await readFileBounded(path, options.timeoutMs);
  const container = await openChecked(path, bytes);
  try {
    const read = readResultDatasets(container, options.globs ?? DEFAULT_RESULT_GLOBS, options.registry);
    return {
      source: { source: basename(path), plan: options.plan, ...read },
      bytes: bytes.length,
      sha256: sha256Hex(bytes),
    };
  } finally {
    container.close();
  }
}
