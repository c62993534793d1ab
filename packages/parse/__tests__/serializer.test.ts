// packages/parse/__tests__/serializer.test.ts
import { readFileSync } from "node:fs";
import { describe, expect, test } from "vitest";

import type { RawRecord, TextFileKind } from "../../model/src/index.js";
import { defaultLayoutRegistry, findVariant, parseSections, serializeSections } from "../src/index.js";

const fixture = (name: string) => readFileSync(new URL(`./fixtures/${name}`, import.meta.url), "utf8");

// line numbers and warnings legitimately move when a file is rewritten
const content = (records: readonly RawRecord[]) =>
  records.map((r) => ({ section: r.section, ordinal: r.ordinal, fields: r.fields, opaque: r.opaque }));

function roundTrip(text: string, kind: TextFileKind) {
  const first = parseSections(text, { kind });
  const variant = findVariant(defaultLayoutRegistry(), first.variant);
  if (!variant) throw new Error(`variant ${first.variant} missing`);
  const second = parseSections(serializeSections(first.records, variant), { kind });
  return { first, second };
}

describe("serializeSections", () => {
  test.each([
    ["Creek.g01", "geometry"],
    ["Creek.p01", "plan"],
    ["Creek.f01", "steady_flow"],
    ["Creek.prj", "project"],
  ] as const)("%s survives parse, serialize, parse", (name, kind) => {
    const { first, second } = roundTrip(fixture(name), kind);
    expect(second.variant).toBe(first.variant);
    expect(content(second.records)).toEqual(content(first.records));
  });

  test("writes fixed-width rows and opener lines", () => {
    const { first } = roundTrip(fixture("Creek.f01"), "steady_flow");
    const variant = findVariant(defaultLayoutRegistry(), first.variant);
    if (!variant) throw new Error("variant missing");
    const lines = serializeSections(first.records, variant).split("\n");
    expect(lines.slice(0, 6)).toEqual([
      "Flow Title=Design Flows",
      "Program Version=5.07",
      "Number of Profiles=3",
      "Profile Names=10yr,100yr,500yr",
      "DSS Import StartDate=",
      "River Rch & RM=Mill Creek,Upper,5280",
    ]);
    expect(lines[6]).toBe("    1200    2500    3400");
  });

  test("values wider than a column fall back to spaced rows", () => {
    const text = ["River Reach=A,B", "Type RM Length L Ch R = 1 ,100 ,0,0,0", "#Sta/Elev= 1", "123456.789 100"].join("\n");
    const { first, second } = roundTrip(text, "geometry");
    expect(first.records[2]?.fields["sta_elev"]).toEqual([123456.789, 100]);
    expect(content(second.records)).toEqual(content(first.records));
  });

  test("unknown blocks and keywords come back verbatim", () => {
    const text = [
      "Geom Title=T",
      "River Reach=A,B",
      "Type RM Length L Ch R = 1 ,100 ,0,0,0",
      "XS Flag=1",
      "BEGIN GIS DATA:",
      "1,2",
      "END GIS DATA:",
      "Bank Sta=0,50",
    ].join("\n");
    const { first, second } = roundTrip(text, "geometry");
    expect(first.records[2]?.opaque).toEqual(["XS Flag=1", "BEGIN GIS DATA:", "1,2", "END GIS DATA:"]);
    expect(content(second.records)).toEqual(content(first.records));
  });
});
