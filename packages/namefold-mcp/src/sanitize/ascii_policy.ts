export type AsciiClass = "literal" | "period" | "collapse";

const PERIOD = 0x2e;

// [lo, hi] inclusive; `_` (95) sits in 91-96 and is re-emitted by collapsing
const COLLAPSE_RANGES: ReadonlyArray<readonly [number, number]> = [
  [0, 44],
  [47, 47],
  [58, 64],
  [91, 96],
  [123, 127]
];

export function classifyAsciiByte(byte: number): AsciiClass {
  if (byte === PERIOD) {
    return "period";
  }
  for (const [lo, hi] of COLLAPSE_RANGES) {
    if (byte >= lo && byte <= hi) {
      return "collapse";
    }
  }
  return "literal";
}
