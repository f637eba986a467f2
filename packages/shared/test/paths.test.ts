import { describe, test, expect } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import {
  canonicalPath,
  createMockFileSystem,
  createNodeFileSystem,
  hashContent,
  toFsPath,
} from "@cradlekit/shared";

function withTempDir<T>(fn: (dir: string) => T): T {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "cradlekit-paths-"));
  try {
    return fn(dir);
  } finally {
    fs.rmSync(dir, { recursive: true, force: true });
  }
}

describe("canonicalPath", () => {
  test("accepts file URIs", () => {
    expect(toFsPath("file:///repo/src/Lib.hs")).toBe("/repo/src/Lib.hs");
    expect(toFsPath("/repo/src/Lib.hs")).toBe("/repo/src/Lib.hs");
  });

  test("agrees across a symlink and a relative spelling", () => {
    const mock = createMockFileSystem({ root: "/repo", files: { "/repo/src/Lib.hs": "" } });
    mock.addSymlink("/alias", "/repo");

    const direct = canonicalPath(mock, "/repo/src/Lib.hs");
    expect(canonicalPath(mock, "/alias/src/Lib.hs")).toBe(direct);
    expect(canonicalPath(mock, "src/./Lib.hs")).toBe(direct);
    expect(canonicalPath(mock, "file:///repo/src/Lib.hs")).toBe(direct);
  });

  test("folds case where the file system ignores it", () => {
    const mock = createMockFileSystem({ caseSensitive: false, files: { "/Repo/Lib.hs": "" } });
    expect(canonicalPath(mock, "/REPO/lib.hs")).toBe("/repo/lib.hs");
  });

  test("resolves real symlinks on disk", () => {
    withTempDir((dir) => {
      const real = path.join(dir, "real");
      fs.mkdirSync(real);
      fs.writeFileSync(path.join(real, "Lib.hs"), "module Lib where\n");
      fs.symlinkSync(real, path.join(dir, "link"));

      const nodeFs = createNodeFileSystem({ root: dir, caseSensitive: true });
      const expected = fs.realpathSync.native(path.join(real, "Lib.hs")).split(path.sep).join("/");

      expect(canonicalPath(nodeFs, path.join(dir, "link", "Lib.hs"))).toBe(expected);
      expect(canonicalPath(nodeFs, "link/Lib.hs")).toBe(expected);
      expect(nodeFs.readFile("link/Lib.hs")).toBe("module Lib where\n");
    });
  });
});

describe("hashContent", () => {
  test("is stable for equal content and differs for different content", () => {
    expect(hashContent("a")).toBe(hashContent(new TextEncoder().encode("a")));
    expect(hashContent("a")).not.toBe(hashContent("b"));
    expect(hashContent("")).toBe("e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855");
  });
});
