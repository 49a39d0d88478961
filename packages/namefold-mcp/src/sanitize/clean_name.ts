import { classifyAsciiByte } from "./ascii_policy.js";
import { foldScalar, type FoldAction } from "./fold_table.js";
import { decodeNameBytes, type DecodedToken } from "./utf8_decoder.js";

export const COLLAPSE_CHAR = "_";

export type FoldState = {
  readonly text: string;
  readonly lastWasCollapse: boolean;
};

const INITIAL_STATE: FoldState = { text: "", lastWasCollapse: false };

function emitLiteral(state: FoldState, text: string): FoldState {
  return { text: state.text + text, lastWasCollapse: false };
}

function emitCollapse(state: FoldState): FoldState {
  if (state.lastWasCollapse) {
    return state;
  }
  return { text: state.text + COLLAPSE_CHAR, lastWasCollapse: true };
}

function applyFold(state: FoldState, action: FoldAction): FoldState {
  switch (action.kind) {
    case "literal":
      return emitLiteral(state, action.text);
    case "hyphen":
      return emitLiteral(state, "-");
    case "silent":
      return state;
    case "unrecognized":
      return emitCollapse(state);
  }
}

export function step(state: FoldState, token: DecodedToken): FoldState {
  if (token.kind === "scalar") {
    return applyFold(state, foldScalar(token.value));
  }
  if (classifyAsciiByte(token.byte) === "collapse") {
    return emitCollapse(state);
  }
  return emitLiteral(state, String.fromCharCode(token.byte));
}

/** Sanitizes one raw path component into ASCII-only bytes. */
export function cleanName(raw: Uint8Array): Buffer {
  let state = INITIAL_STATE;
  for (const token of decodeNameBytes(raw)) {
    state = step(state, token);
  }
  return Buffer.from(state.text, "latin1");
}

export function cleanNameText(name: string): string {
  return cleanName(Buffer.from(name, "utf8")).toString("latin1");
}

export function needsRename(raw: Uint8Array): boolean {
  return !cleanName(raw).equals(raw);
}
