// packages/build/src/derive.ts
// Engineering quantities computed from parsed tables.
import { missing, num, type Value } from "../../model/src/index.js";

export const PLAN_TYPES: Readonly<Record<number, string>> = {
  1: "Steady Flow",
  2: "Unsteady Flow",
  3: "Quasi-Unsteady Flow",
};

export const ENCROACHMENT_METHODS: Readonly<Record<number, string>> = {
  1: "Specified Stations",
  2: "Fixed Top Width",
  3: "Percent Reduction in Conveyance",
  4: "Target Surcharge",
  5: "Optimized Surcharge and Energy",
};

export const FRICTION_SLOPE_METHODS: Readonly<Record<number, string>> = {
  1: "Average Conveyance",
  2: "Average Friction Slope",
  3: "Geometric Mean Friction Slope",
  4: "Harmonic Mean Friction Slope",
};

export const BOUNDARY_TYPES: Readonly<Record<number, string>> = {
  0: "Known WS",
  1: "Critical Depth",
  2: "Rating Curve",
  3: "Normal Depth",
};

export function codeName(table: Readonly<Record<number, string>>, code: number): string {
  return table[code] ?? `Unknown (${code})`;
}

type Cells = readonly (number | null)[];

/** Split a flat table into entries of `size` cells; a trailing partial entry is dropped. */
export function entries(cells: Cells, size: number): (number | null)[][] {
  const out: (number | null)[][] = [];
  for (let i = 0; i + size <= cells.length; i += size) out.push(cells.slice(i, i + size));
  return out;
}

/* ---- Manning's n ---- */

export type ManningZones = { left: Value; channel: Value; right: Value };

const unparsableN = () => missing("Manning's n value could not be parsed");

const nValue = (n: number | null | undefined): Value => (typeof n === "number" ? num(n) : unparsableN());

/**
 * Left overbank is the first region, right overbank the last. The channel is
 * the first region starting at or beyond the left bank station, else the last.
 */
export function manningZones(mann: Cells | undefined, bankLeft: number | undefined): ManningZones {
  const regions = entries(mann ?? [], 3).map(([n, start]) => ({ n, start }));
  const first = regions[0];
  const last = regions[regions.length - 1];
  if (!first || !last) {
    const none = missing("no Manning's n table");
    return { left: none, channel: none, right: none };
  }

  let channel: Value;
  if (bankLeft === undefined) {
    channel = missing("no bank stations");
  } else {
    const region = regions.find((r) => typeof r.start === "number" && r.start >= bankLeft) ?? last;
    channel = nValue(region.n);
  }
  return { left: nValue(first.n), channel, right: nValue(last.n) };
}

/* ---- Station/elevation ---- */

export type Extents = {
  station_start: number;
  station_end: number;
  min_elevation: number;
  max_elevation: number;
};

/** Extents over the parsable pairs, or null when none are. */
export function stationElevationExtents(staElev: Cells | undefined): Extents | null {
  const pairs = entries(staElev ?? [], 2).filter((p): p is [number, number] => typeof p[0] === "number" && typeof p[1] === "number");
  if (pairs.length === 0) return null;
  const stations = pairs.map((p) => p[0]);
  const elevations = pairs.map((p) => p[1]);
  return {
    station_start: Math.min(...stations),
    station_end: Math.max(...stations),
    min_elevation: Math.min(...elevations),
    max_elevation: Math.max(...elevations),
  };
}

/* ---- Bridges ---- */

export type DeckChords = { min_low_chord: number; max_high_chord: number };

/** Deck entries are (station, high chord, low chord). */
export function deckChords(deck: Cells | undefined): DeckChords | null {
  const points = entries(deck ?? [], 3).filter(
    (p): p is [number, number, number] => p.every((c) => typeof c === "number")
  );
  if (points.length === 0) return null;
  return {
    min_low_chord: Math.min(...points.map((p) => p[2])),
    max_high_chord: Math.max(...points.map((p) => p[1])),
  };
}

/**
 * Pier width at `elevation` from (elevation, width) pairs, interpolated
 * linearly and held constant beyond the ends of the table.
 */
export function pierWidthAt(table: Cells, elevation: number): number {
  const pts = entries(table, 2).filter((p): p is [number, number] => typeof p[0] === "number" && typeof p[1] === "number");
  const first = pts[0];
  const last = pts[pts.length - 1];
  if (!first || !last) return 0;
  if (elevation <= first[0]) return first[1];
  if (elevation >= last[0]) return last[1];
  for (let i = 0; i + 1 < pts.length; i++) {
    const lo = pts[i];
    const hi = pts[i + 1];
    if (!lo || !hi) break;
    if (lo[0] <= elevation && elevation <= hi[0]) {
      if (hi[0] === lo[0]) return hi[1];
      const frac = (elevation - lo[0]) / (hi[0] - lo[0]);
      return lo[1] + frac * (hi[1] - lo[1]);
    }
  }
  return last[1];
}

/* ---- Plans ---- */

export type Floodway = {
  encroachment_enabled: boolean;
  is_floodway: boolean;
  target_surcharge: Value;
};

/**
 * Encroachment is on when the first `Encroach Param` value is non-zero;
 * methods 4 and 5 are floodway analyses whose first value is the allowed surcharge.
 */
export function floodway(param: Cells | undefined, method: number | undefined, value1: number | null | undefined): Floodway {
  const first = param?.[0];
  const enabled = typeof first === "number" && first !== 0;
  const isFloodway = enabled && (method === 4 || method === 5);
  let target: Value = missing("not a floodway analysis");
  if (isFloodway) target = typeof value1 === "number" ? num(value1) : missing("Encroach Val 1 absent or unparsable");
  return { encroachment_enabled: enabled, is_floodway: isFloodway, target_surcharge: target };
}
