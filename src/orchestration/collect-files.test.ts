import { describe, it, expect, afterEach } from "vitest";
import * as node_fs from "node:fs/promises";
import * as node_os from "node:os";
import * as node_path from "node:path";
import { collectFiles, isAuditable, toDisplayPath } from "./collect-files.js";
import type { DirEntry, ReaddirFn } from "./collect-files.js";
import { defaultPolicy } from "../policy/loader.js";

const tmpDirs: string[] = [];

afterEach(async () => {
  for (const dir of tmpDirs) {
    await node_fs.rm(dir, { recursive: true, force: true });
  }
  tmpDirs.length = 0;
});

describe("isAuditable", () => {
  const extensions = defaultPolicy().extensions;

  it("accepts source extensions", () => {
    expect(isAuditable("a.ts", extensions)).toBe(true);
    expect(isAuditable("a.tsx", extensions)).toBe(true);
    expect(isAuditable("a.mjs", extensions)).toBe(true);
  });

  it("rejects declaration files and other extensions", () => {
    expect(isAuditable("a.d.ts", extensions)).toBe(false);
    expect(isAuditable("a.d.mts", extensions)).toBe(false);
    expect(isAuditable("a.json", extensions)).toBe(false);
    expect(isAuditable("Makefile", extensions)).toBe(false);
  });
});

describe("toDisplayPath", () => {
  it("is relative and uses forward slashes", () => {
    const root = node_path.join(node_os.tmpdir(), "proj");
    expect(toDisplayPath(root, node_path.join(root, "src", "a.ts"))).toBe("src/a.ts");
  });

  it("shows the root itself as a dot", () => {
    const root = node_path.join(node_os.tmpdir(), "proj");
    expect(toDisplayPath(root, root)).toBe(".");
  });
});

describe("collectFiles", () => {
  it("walks nested directories and sorts by display path", async () => {
    const dir = await node_fs.mkdtemp(node_path.join(node_os.tmpdir(), "archaudit-walk-"));
    tmpDirs.push(dir);
    for (const name of ["b.ts", "a/z.ts", "a/b/c.tsx", "coverage/x.js", "a/node_modules/y.ts"]) {
      const full = node_path.join(dir, name);
      await node_fs.mkdir(node_path.dirname(full), { recursive: true });
      await node_fs.writeFile(full, "export {};\n", "utf-8");
    }

    const { files, unreadable } = await collectFiles(dir, defaultPolicy());

    expect(files.map((f) => toDisplayPath(dir, f))).toEqual(["a/b/c.tsx", "a/z.ts", "b.ts"]);
    expect(unreadable).toEqual([]);
  });

  it("records a directory it cannot list and keeps walking", async () => {
    const root = node_path.join(node_os.tmpdir(), "proj");
    const tree: Record<string, readonly DirEntry[]> = {
      [root]: [dirEntry("locked", "dir"), dirEntry("open", "dir"), dirEntry("top.ts", "file")],
      [node_path.join(root, "open")]: [dirEntry("inner.ts", "file")],
    };
    const readdirFn: ReaddirFn = async (dir) => {
      const entries = tree[dir];
      if (entries === undefined) {
        throw new Error(`EACCES: permission denied, scandir '${dir}'`);
      }
      return entries;
    };

    const { files, unreadable } = await collectFiles(root, defaultPolicy(), readdirFn);

    expect(files.map((f) => toDisplayPath(root, f))).toEqual(["open/inner.ts", "top.ts"]);
    expect(unreadable).toEqual([
      {
        dir: node_path.join(root, "locked"),
        message: `EACCES: permission denied, scandir '${node_path.join(root, "locked")}'`,
      },
    ]);
  });

  it("records the root when it cannot be listed", async () => {
    const root = node_path.join(node_os.tmpdir(), "proj");
    const readdirFn: ReaddirFn = async () => {
      throw new Error("EIO: i/o error");
    };

    const { files, unreadable } = await collectFiles(root, defaultPolicy(), readdirFn);

    expect(files).toEqual([]);
    expect(unreadable).toEqual([{ dir: root, message: "EIO: i/o error" }]);
  });
});

function dirEntry(name: string, kind: "dir" | "file"): DirEntry {
  return {
    name,
    isDirectory: () => kind === "dir",
    isFile: () => kind === "file",
  };
}
