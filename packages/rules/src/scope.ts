// packages/rules/src/scope.ts
import { seq, missing, str, valueToJson, type Binding, type Entity, type SequenceItem, type Value } from "../../model/src/index.js";

import type { Scope } from "./evaluate.js";

/**
 * Attributes of one entity. `design.x` reads the text value a result displaced,
 * falling back to the effective value when nothing was displaced.
 */
export function entityScope(e: Entity): Scope {
  return {
    lookup(name) {
      if (name.startsWith("design.")) {
        const attribute = name.slice("design.".length);
        return e.design_values[attribute] ?? e.attributes[attribute];
      }
      const v: Value | undefined = e.attributes[name];
      if (v !== undefined) return v;
      if (name === "id") return str(e.id);
      return undefined;
    },
  };
}

/** An identifier becomes the sequence of its present values across the set. */
export function aggregateScope(entities: readonly Entity[]): Scope {
  const scopes = entities.map(entityScope);
  return {
    lookup(name) {
      const items: SequenceItem[] = [];
      let defined = false;
      for (const s of scopes) {
        const v = s.lookup(name);
        if (v === undefined) continue;
        defined = true;
        switch (v.kind) {
          case "number":
          case "string":
            items.push(v.value);
            break;
          case "boolean":
            items.push(v.value ? 1 : 0);
            break;
          case "sequence":
            items.push(...v.items);
            break;
          case "missing":
            break;
        }
      }
      if (!defined) return undefined;
      return items.length > 0 ? seq(items) : missing("no matched entity has a value");
    },
  };
}

/** Remembers every identifier read, in first-read order. */
export class RecordingScope implements Scope {
  private readonly reads = new Map<string, Value | undefined>();

  constructor(private readonly inner: Scope) {}

  lookup(name: string): Value | undefined {
    const v = this.inner.lookup(name);
    if (!this.reads.has(name)) this.reads.set(name, v);
    return v;
  }

  bindings(): Binding[] {
    return [...this.reads].map(([name, v]) => ({ name, value: v === undefined ? null : valueToJson(v) }));
  }
}
