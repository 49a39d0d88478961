import path from "node:path";

const SEP = path.sep.charCodeAt(0);
const DOT = 0x2e;

export type SplitPath = {
  parent: Buffer;
  name: Buffer;
};

export function toRawPath(p: string | Buffer): Buffer {
  return typeof p === "string" ? Buffer.from(p, "utf8") : p;
}

export function displayPath(raw: Buffer): string {
  return raw.toString("utf8");
}

/**
 * Splits off the final component. Trailing separators and `/.` are ignored,
 * and `parent` keeps its separator so `parent + name` rebuilds the path.
 */
export function splitRawPath(raw: Buffer): SplitPath {
  let end = raw.length;
  for (;;) {
    while (end > 1 && raw[end - 1] === SEP) {
      end -= 1;
    }
    if (end >= 2 && raw[end - 1] === DOT && raw[end - 2] === SEP) {
      end -= 1;
      continue;
    }
    break;
  }
  const trimmed = raw.subarray(0, end);
  const cut = trimmed.lastIndexOf(SEP);
  return {
    parent: trimmed.subarray(0, cut + 1),
    name: trimmed.subarray(cut + 1)
  };
}

/** `null` for roots and `.`/`..`, which have no component to rename. */
export function fileNameOf(raw: Buffer): Buffer | null {
  const { name } = splitRawPath(raw);
  if (name.length === 0 || isDotName(name)) {
    return null;
  }
  return name;
}

export function withFileName(raw: Buffer, name: Uint8Array): Buffer {
  const { parent } = splitRawPath(raw);
  return Buffer.concat([parent, name]);
}

export function joinRawPath(dir: Buffer, name: Uint8Array): Buffer {
  if (dir.length > 0 && dir[dir.length - 1] === SEP) {
    return Buffer.concat([dir, name]);
  }
  return Buffer.concat([dir, Buffer.of(SEP), name]);
}

/**
 * Drops empty and `.` segments, so `dir`, `dir/` and `./dir/.` compare equal.
 * `..` is kept as is.
 */
export function normalizeRawPath(raw: Buffer): Buffer {
  const parts: Buffer[] = [];
  let start = 0;
  for (let i = 0; i <= raw.length; i += 1) {
    if (i < raw.length && raw[i] !== SEP) {
      continue;
    }
    const part = raw.subarray(start, i);
    if (part.length > 0 && !(part.length === 1 && part[0] === DOT)) {
      parts.push(part);
    }
    start = i + 1;
  }
  const absolute = raw.length > 0 && raw[0] === SEP;
  const joined = Buffer.concat(parts.flatMap((part, index) => (index === 0 ? [part] : [Buffer.of(SEP), part])));
  if (absolute) {
    return Buffer.concat([Buffer.of(SEP), joined]);
  }
  return joined.length > 0 ? joined : Buffer.from(".");
}

function isDotName(name: Buffer): boolean {
  return name.equals(Buffer.from(".")) || name.equals(Buffer.from(".."));
}
