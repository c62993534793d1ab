// packages/results/src/reader.ts
import { deepFreeze, ResultReadError, type RawDataset } from "../../model/src/index.js";

import type { ResultContainer } from "./container.js";
import { expandGlobs } from "./glob.js";
import { defaultResultLayoutRegistry, selectResultLayout, type ResultLayoutRegistry } from "./layouts.js";

export const FILE_TYPE_ATTRIBUTE = "File Type";
export const FILE_VERSION_ATTRIBUTE = "File Version";

export const DEFAULT_RESULT_GLOBS: readonly string[] = [
  "Plan Data/Plan Information",
  "Geometry/Cross Sections/*",
  "Results/Steady/Output/Output Blocks/Base Output/Steady Profiles/**",
];

export type ResultRead = {
  version: string;
  layout: string;
  datasets: readonly RawDataset[];
};

/**
 * Datasets under the caller's globs, after checking the root schema markers
 * against the registered result layouts.
 */
export function readResultDatasets(
  container: ResultContainer,
  globs: readonly string[] = DEFAULT_RESULT_GLOBS,
  registry: ResultLayoutRegistry = defaultResultLayoutRegistry()
): ResultRead {
  const root = container.read("");
  const fileType = root?.attributes[FILE_TYPE_ATTRIBUTE];
  const version = root?.attributes[FILE_VERSION_ATTRIBUTE];
  if (typeof fileType !== "string" || typeof version !== "string") {
    throw new ResultReadError({
      file: container.name,
      reason: `root is missing the "${FILE_TYPE_ATTRIBUTE}" or "${FILE_VERSION_ATTRIBUTE}" attribute`,
    });
  }

  const layout = selectResultLayout(registry, fileType, version);
  if (!layout) {
    throw new ResultReadError({
      file: container.name,
      reason: `no result layout for ${FILE_TYPE_ATTRIBUTE} "${fileType}", ${FILE_VERSION_ATTRIBUTE} "${version}"`,
    });
  }

  const datasets: RawDataset[] = [];
  for (const path of expandGlobs(container, globs)) {
    const ds = container.read(path);
    if (ds) datasets.push(ds);
  }
  return deepFreeze({ version, layout: layout.id, datasets });
}
