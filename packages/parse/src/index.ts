// packages/parse/src/index.ts
import { ParseError, type TextSource } from "../../model/src/index.js";

import { detectFileKind, isTextKind } from "./file-kinds.js";
import { parseSections, type ParseOptions } from "./parser.js";

export * from "./layouts.js";
export * from "./file-kinds.js";
export { parseSections, type ParseOptions, type ParsedText } from "./parser.js";
export { serializeSections } from "./serializer.js";
export { coerceNumber, isNumericToken, rowTokens } from "./tokens.js";

/** Parse one named text file; the kind comes from its suffix. */
export function parseTextFile(fileName: string, text: string, options: Omit<ParseOptions, "kind" | "source"> = {}): TextSource {
  const detected = detectFileKind(fileName);
  if (!detected || !isTextKind(detected.kind)) {
    throw new ParseError({ file: fileName, line: 0, reason: "not a recognised model text file" });
  }
  const parsed = parseSections(text, { ...options, kind: detected.kind, source: fileName });
  return {
    source: fileName,
    kind: parsed.kind,
    key: detected.key,
    variant: parsed.variant,
    records: parsed.records,
  };
}
