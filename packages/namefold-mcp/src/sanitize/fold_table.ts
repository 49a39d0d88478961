import foldData from "../../data/fold_table.json" with { type: "json" };

export type FoldAction =
  | { kind: "literal"; text: string }
  | { kind: "silent" }
  | { kind: "hyphen" }
  | { kind: "unrecognized" };

const EN_DASH = 0x2013;

const COMBINING_RANGES: ReadonlyArray<readonly [number, number]> = [
  [0x0300, 0x036f],
  [0x1ab0, 0x1aff],
  [0x1dc0, 0x1dff]
];

const SILENT: FoldAction = { kind: "silent" };
const HYPHEN: FoldAction = { kind: "hyphen" };
const UNRECOGNIZED: FoldAction = { kind: "unrecognized" };

function buildFoldMap(): Map<number, string> {
  const map = new Map<number, string>();
  for (const group of foldData.groups) {
    for (const ch of group.chars) {
      const cp = ch.codePointAt(0);
      if (cp !== undefined && !map.has(cp)) {
        map.set(cp, group.ascii);
      }
    }
  }
  return map;
}

const FOLD_MAP = buildFoldMap();

export function foldTableSize(): number {
  return FOLD_MAP.size;
}

export function isCombiningMark(value: number): boolean {
  return COMBINING_RANGES.some(([lo, hi]) => value >= lo && value <= hi);
}

/** Looks up the ASCII replacement for one decoded scalar; `null` is the undecodable sentinel. */
export function foldScalar(value: number | null): FoldAction {
  if (value === null) {
    return UNRECOGNIZED;
  }
  const text = FOLD_MAP.get(value);
  if (text !== undefined) {
    return { kind: "literal", text };
  }
  if (value === EN_DASH) {
    return HYPHEN;
  }
  if (isCombiningMark(value)) {
    return SILENT;
  }
  return UNRECOGNIZED;
}
