import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";

export async function mkTempDir(): Promise<string> {
  return await fs.mkdtemp(path.join(os.tmpdir(), "namefold-"));
}

/** Every entry below `dir`, relative and sorted, for before/after comparisons. */
export async function listTree(dir: string): Promise<string[]> {
  const out: string[] = [];
  const visit = async (current: string, prefix: string): Promise<void> => {
    for (const entry of await fs.readdir(current, { withFileTypes: true })) {
      const rel = prefix ? `${prefix}/${entry.name}` : entry.name;
      out.push(rel);
      if (entry.isDirectory()) {
        await visit(path.join(current, entry.name), rel);
      }
    }
  };
  await visit(dir, "");
  return out.sort();
}

export async function exists(p: string): Promise<boolean> {
  try {
    await fs.lstat(p);
    return true;
  } catch {
    return false;
  }
}
