// packages/results/src/container.ts
import { compareBinary, type DatasetScalar, type RawDataset } from "../../model/src/index.js";

/**
 * Hierarchical result container, read-only.
 * Paths are slash-separated without a leading slash; "" is the root group.
 */
export interface ResultContainer {
  readonly name: string;
  /** Child names of a group in binary order, or undefined when `path` is not a group. */
  children(path: string): readonly string[] | undefined;
  read(path: string): RawDataset | undefined;
  close(): void;
}

export type MemoryGroup = {
  attributes?: Record<string, DatasetScalar>;
  children: Record<string, MemoryNode>;
};

export type MemoryDataset = {
  attributes?: Record<string, DatasetScalar>;
  shape: readonly number[];
  values: readonly DatasetScalar[];
};

export type MemoryNode = MemoryGroup | MemoryDataset;

function isGroup(n: MemoryNode): n is MemoryGroup {
  return "children" in n;
}

/** In-process container over plain objects; stands in for binary files in tests and tools. */
export class MemoryContainer implements ResultContainer {
  private closed = false;

  constructor(
    readonly name: string,
    private readonly root: MemoryGroup
  ) {}

  private lookup(path: string): MemoryNode | undefined {
    if (this.closed) throw new Error(`${this.name}: container is closed`);
    let node: MemoryNode = this.root;
    if (path === "") return node;
    for (const seg of path.split("/")) {
      if (!isGroup(node)) return undefined;
      const next: MemoryNode | undefined = node.children[seg];
      if (!next) return undefined;
      node = next;
    }
    return node;
  }

  children(path: string): readonly string[] | undefined {
    const node = this.lookup(path);
    if (!node || !isGroup(node)) return undefined;
    return Object.keys(node.children).sort(compareBinary);
  }

  read(path: string): RawDataset | undefined {
    const node = this.lookup(path);
    if (!node) return undefined;
    const attributes = { ...(node.attributes ?? {}) };
    if (isGroup(node)) return { path, shape: [], values: [], attributes };
    return { path, shape: [...node.shape], values: [...node.values], attributes };
  }

  close(): void {
    this.closed = true;
  }
}
