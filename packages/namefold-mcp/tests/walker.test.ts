import fs from "node:fs/promises";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { walkDirectory } from "../src/fs/walker.js";
import { exists, listTree, mkTempDir } from "./helpers.js";

const raw = (p: string) => Buffer.from(p, "utf8");

describe("walkDirectory", () => {
  it("lists a renamed directory under its new name", async () => {
    const base = await mkTempDir();
    const root = path.join(base, "Dossier été");
    await fs.mkdir(root);
    await fs.writeFile(path.join(root, "notes.txt"), "");

    const changes = await walkDirectory(raw(root), { dryRun: false, concurrency: 1 });

    const renamed = path.join(base, "Dossier_ete");
    expect(changes).toEqual([
      { kind: "changed", path: root, modified: renamed },
      { kind: "unchanged", path: path.join(renamed, "notes.txt") }
    ]);
    expect(await exists(path.join(renamed, "notes.txt"))).toBe(true);
  });

  it("visits self, then children depth first", async () => {
    const root = await mkTempDir();
    await fs.mkdir(path.join(root, "sub dir"));
    await fs.writeFile(path.join(root, "sub dir", "inner.txt"), "");

    const changes = await walkDirectory(raw(root), { dryRun: false, concurrency: 1 });

    expect(changes).toEqual([
      { kind: "unchanged", path: root },
      { kind: "changed", path: path.join(root, "sub dir"), modified: path.join(root, "sub_dir") },
      { kind: "unchanged", path: path.join(root, "sub_dir", "inner.txt") }
    ]);
  });

  it("does not touch the tree in dry-run mode", async () => {
    const root = await mkTempDir();
    await fs.mkdir(path.join(root, "a b"));
    await fs.writeFile(path.join(root, "a b", "c?d.txt"), "");
    await fs.mkdir(path.join(root, "a b", "sub ü"));
    await fs.writeFile(path.join(root, "a b", "sub ü", "x y"), "");
    const before = await listTree(root);

    const changes = await walkDirectory(raw(root), { dryRun: true, concurrency: 1 });

    expect(await listTree(root)).toEqual(before);
    expect(changes[0]).toEqual({ kind: "unchanged", path: root });
    const previews = changes.filter((c) => c.kind === "error_rename").map((c) => c.path);
    expect(previews.sort()).toEqual(
      [
        path.join(root, "a b"),
        path.join(root, "a b", "c?d.txt"),
        path.join(root, "a b", "sub ü"),
        path.join(root, "a b", "sub ü", "x y")
      ].sort()
    );
    expect(changes).toContainEqual({
      kind: "error_rename",
      path: path.join(root, "a b", "sub ü", "x y"),
      modified: path.join(root, "a b", "sub ü", "x_y"),
      error: "dry-run"
    });
  });

  it("records an unreadable directory and keeps going", async () => {
    const base = await mkTempDir();
    const gone = path.join(base, "gone");

    const changes = await walkDirectory(raw(gone), { dryRun: false, concurrency: 1 });

    expect(changes).toEqual([
      { kind: "unchanged", path: gone },
      { kind: "error", path: gone, error: "Error while reading directory" }
    ]);
  });

  it("returns every outcome when siblings run in parallel", async () => {
    const root = await mkTempDir();
    for (let i = 1; i <= 20; i += 1) {
      await fs.writeFile(path.join(root, `f ${i}`), "");
    }

    const changes = await walkDirectory(raw(root), { dryRun: false, concurrency: 4 });

    expect(changes).toHaveLength(21);
    expect(changes.filter((c) => c.kind === "changed")).toHaveLength(20);
    const names = await fs.readdir(root);
    expect(names.sort()).toEqual(Array.from({ length: 20 }, (_, i) => `f_${i + 1}`).sort());
  });

  it("renames entries whose names are not valid UTF-8", async () => {
    const root = await mkTempDir();
    const name = Buffer.from([0x78, 0xed, 0xa0, 0x80, 0x79]);
    await fs.writeFile(Buffer.concat([Buffer.from(`${root}/`), name]), "");

    const changes = await walkDirectory(raw(root), { dryRun: false, concurrency: 1 });

    expect(changes.map((c) => c.kind)).toEqual(["unchanged", "changed"]);
    expect(await exists(path.join(root, "x_y"))).toBe(true);
  });

  it("does not descend through symlinks", async () => {
    const root = await mkTempDir();
    const outside = await mkTempDir();
    await fs.writeFile(path.join(outside, "keep me.txt"), "");
    await fs.symlink(outside, path.join(root, "link"));

    const changes = await walkDirectory(raw(root), { dryRun: false, concurrency: 1 });

    expect(changes).toEqual([
      { kind: "unchanged", path: root },
      { kind: "unchanged", path: path.join(root, "link") }
    ]);
    expect(await exists(path.join(outside, "keep me.txt"))).toBe(true);
  });
});
