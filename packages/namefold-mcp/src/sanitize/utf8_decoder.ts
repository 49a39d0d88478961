export type DecodedToken =
  | { kind: "ascii"; byte: number }
  | { kind: "scalar"; value: number | null; length: number };

const MAX_SCALAR = 0x10ffff;

/**
 * Walks raw name bytes and reassembles multi-byte UTF-8 sequences.
 *
 * The sequence length is picked from the leading byte alone and every byte
 * after it is swallowed into the sequence, whatever its value. A trailing
 * sequence cut short by the end of input produces no token.
 */
export function* decodeNameBytes(bytes: Uint8Array): Generator<DecodedToken> {
  const pending: number[] = [];
  for (const byte of bytes) {
    if (pending.length === 0 && byte < 0x80) {
      yield { kind: "ascii", byte };
      continue;
    }
    pending.push(byte);
    if (pending.length === sequenceLength(pending[0])) {
      yield { kind: "scalar", value: assembleScalar(pending), length: pending.length };
      pending.length = 0;
    }
  }
}

export function sequenceLength(leadingByte: number): 2 | 3 | 4 {
  if (leadingByte >= 0xf0) {
    return 4;
  }
  if (leadingByte >= 0xe0) {
    return 3;
  }
  // stray continuation bytes (0x80-0xBF) are read as two-byte leaders
  return 2;
}

export function assembleScalar(seq: readonly number[]): number | null {
  let value: number;
  switch (seq.length) {
    case 2:
      value = ((seq[0] & 0x1f) << 6) | (seq[1] & 0x3f);
      break;
    case 3:
      value = ((seq[0] & 0x0f) << 12) | ((seq[1] & 0x3f) << 6) | (seq[2] & 0x3f);
      break;
    case 4:
      value = ((seq[0] & 0x07) << 18) | ((seq[1] & 0x3f) << 12) | ((seq[2] & 0x3f) << 6) | (seq[3] & 0x3f);
      break;
    default:
      return null;
  }
  return isScalarValue(value) ? value : null;
}

export function isScalarValue(value: number): boolean {
  if (value >= 0xd800 && value <= 0xdfff) {
    return false;
  }
  return value >= 0 && value <= MAX_SCALAR;
}
