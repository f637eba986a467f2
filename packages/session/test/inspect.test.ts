import { describe, it, expect } from "vitest";
import { createMockFileSystem } from "@cradlekit/shared";
import { createStaticToolLocator } from "@cradlekit/cradle";
import { createResolverHost, formatReport, inspectFile } from "@cradlekit/session";

function host(tools: string[]) {
  const fileSystem = createMockFileSystem({
    files: {
      "/Repo/stack.yaml": "packages:\n- lib\n",
      "/Repo/lib/lib.cabal": "name: lib\nlibrary\n  hs-source-dirs: src\n  exposed-modules: Lib\n",
      "/Repo/lib/src/Lib.hs": "module Lib where\n",
      "/Repo/lib/src/Hidden.hs": "module Hidden where\n",
    },
  });
  return createResolverHost({ fileSystem, tools: createStaticToolLocator(tools), env: {} });
}

describe("inspectFile", () => {
  it("reports the flags of a covered file", async () => {
    const report = await inspectFile(host(["stack"]).resolver, "/Repo/lib/src/Lib.hs");

    expect(report).toEqual({
      file: "/Repo/lib/src/Lib.hs",
      rootDir: "/Repo/lib",
      actionName: "Cabal-Helper-Stack",
      project: "Stack(/Repo/stack.yaml)",
      status: "success",
      flags: ["-i/Repo/lib/src", "Lib"],
      dependencies: ["/Repo/lib/lib.cabal", "/Repo/stack.yaml"],
    });
  });

  it("reports why a file has no flags", async () => {
    const report = await inspectFile(host(["stack"]).resolver, "/Repo/lib/src/Hidden.hs");

    expect(report.status).toBe("failure");
    expect(report.reason).toBe("Could not obtain flags for /Repo/lib/src/Hidden.hs");
  });

  it("reports a missing project", async () => {
    const report = await inspectFile(host([]).resolver, "/Repo/lib/src/Lib.hs");

    expect(report).toEqual({
      file: "/Repo/lib/src/Lib.hs",
      rootDir: "/",
      actionName: "Cabal-Helper-None",
      project: null,
      status: "none",
      reason: "no-project",
    });
  });
});

describe("formatReport", () => {
  it("lists flags and dependencies one per line", () => {
    const text = formatReport({
      file: "src/Lib.hs",
      rootDir: "/Repo/lib",
      actionName: "Cabal-Helper-Stack",
      project: "Stack(/Repo/stack.yaml)",
      status: "success",
      flags: ["-i/Repo/lib/src", "Lib"],
      dependencies: ["/Repo/stack.yaml"],
    });

    expect(text.split("\n")).toEqual([
      "File: src/Lib.hs",
      "Project: Stack(/Repo/stack.yaml)",
      "Root: /Repo/lib",
      "Action: Cabal-Helper-Stack",
      "Status: success",
      "Flags: 2",
      "  -i/Repo/lib/src",
      "  Lib",
      "Dependencies: 1",
      "  - /Repo/stack.yaml",
    ]);
  });

  it("shows the reason when there are no flags", () => {
    const text = formatReport({
      file: "Setup.hs",
      rootDir: "/",
      actionName: "Cabal-Helper-None",
      project: null,
      status: "none",
      reason: "no-project",
    });

    expect(text).toBe(
      ["File: Setup.hs", "Project: (none)", "Root: /", "Action: Cabal-Helper-None", "Status: none", "Reason: no-project"].join("\n"),
    );
  });
});
