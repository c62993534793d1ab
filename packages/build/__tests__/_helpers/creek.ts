// packages/build/__tests__/_helpers/creek.ts
import { readFileSync } from "node:fs";

import type { ResultSource, TextSource } from "../../../model/src/index.js";
import { parseTextFile } from "../../../parse/src/index.js";
import { readResultDatasets } from "../../../results/src/reader.js";
import { creekContainer } from "../../../results/__tests__/_helpers/creek-container.js";

const FIXTURES = new URL("../../../parse/__tests__/fixtures/", import.meta.url);

export function creekFile(name: string): string {
  return readFileSync(new URL(name, FIXTURES), "utf8");
}

export function creekText(name: string): TextSource {
  return parseTextFile(name, creekFile(name));
}

export function creekTexts(): TextSource[] {
  return ["Creek.prj", "Creek.g01", "Creek.p01", "Creek.f01"].map(creekText);
}

export function creekResults(plan = "p01"): ResultSource {
  const read = readResultDatasets(creekContainer());
  return { source: `Creek.${plan}.hdf`, plan, ...read };
}
