import { describe, it, expect } from "vitest";
import {
  componentsForUnit,
  listUnits,
  packageName,
  parseCabalFile,
  splitList,
  splitWords,
} from "@cradlekit/cradle";

const DEMO = `cabal-version: 2.4
name:          demo
version:       0.1.0

-- shared options
common warnings
  ghc-options: -Wall

library
  import:           warnings
  hs-source-dirs:   src
  exposed-modules:  Lib
                    Lib.Foo
  other-modules:    Lib.Internal
  default-extensions: OverloadedStrings, LambdaCase
  if flag(dev)
    ghc-options: -Werror

library internal
  exposed-modules:
    Internal.Types

executable demo
  main-is:        Main.hs
  hs-source-dirs: app
  other-modules:  Paths_demo

test-suite unit
  type:           exitcode-stdio-1.0
  main-is:        Spec.hs
  hs-source-dirs: test

test-suite props
  type:        detailed-0.9
  test-module: Props

benchmark bench
  main-is: Bench.hs
`;

describe("package description reader", () => {
  const file = parseCabalFile(DEMO);

  it("reads the package name from the top-level fields", () => {
    expect(packageName(file)).toBe("demo");
    expect(file.fields.get("cabal-version")).toEqual(["2.4"]);
  });

  it("lists one unit per buildable stanza, skipping common stanzas", () => {
    expect(listUnits(file, "demo")).toEqual([
      { id: "lib:demo", packageName: "demo", kind: "lib" },
      { id: "lib:internal", packageName: "demo", kind: "lib" },
      { id: "exe:demo", packageName: "demo", kind: "exe" },
      { id: "test:unit", packageName: "demo", kind: "test" },
      { id: "test:props", packageName: "demo", kind: "test" },
      { id: "bench:bench", packageName: "demo", kind: "bench" },
    ]);
  });

  it("builds the library component with imported and conditional options", () => {
    const [component] = componentsForUnit(file, { id: "lib:demo", packageName: "demo", kind: "lib" });

    expect(component).toEqual({
      name: "lib:demo",
      sourceDirs: ["src"],
      entrypoint: { kind: "library", exposedModules: ["Lib", "Lib.Foo"], otherModules: ["Lib.Internal"] },
      flags: ["-isrc", "-Wall", "-Werror", "-XOverloadedStrings", "-XLambdaCase"],
    });
  });

  it("reads a list that starts on the line after its field", () => {
    const [component] = componentsForUnit(file, { id: "lib:internal", packageName: "demo", kind: "lib" });

    expect(component?.entrypoint).toEqual({
      kind: "library",
      exposedModules: ["Internal.Types"],
      otherModules: [],
    });
    expect(component?.sourceDirs).toEqual(["."]);
  });

  it("builds executable-like components around main-is", () => {
    const [exe] = componentsForUnit(file, { id: "exe:demo", packageName: "demo", kind: "exe" });
    const [bench] = componentsForUnit(file, { id: "bench:bench", packageName: "demo", kind: "bench" });

    expect(exe?.entrypoint).toEqual({ kind: "executable", mainIs: "Main.hs", otherModules: ["Paths_demo"] });
    expect(exe?.flags).toEqual(["-iapp"]);
    expect(bench?.entrypoint).toEqual({ kind: "executable", mainIs: "Bench.hs", otherModules: [] });
    expect(bench?.flags).toEqual(["-i."]);
  });

  it("treats a detailed test suite's test-module as a library module", () => {
    const [props] = componentsForUnit(file, { id: "test:props", packageName: "demo", kind: "test" });
    expect(props?.entrypoint).toEqual({ kind: "library", exposedModules: ["Props"], otherModules: [] });
  });

  it("returns no components for a unit the file does not declare", () => {
    expect(componentsForUnit(file, { id: "exe:gone", packageName: "demo", kind: "exe" })).toEqual([]);
  });

  it("splits lists on commas and whitespace and options on whitespace", () => {
    expect(splitList(' Lib,  Lib.Foo\n"Quoted"')).toEqual(["Lib", "Lib.Foo", "Quoted"]);
    expect(splitWords("-Wall -with-rtsopts=-N,-A64m")).toEqual(["-Wall", "-with-rtsopts=-N,-A64m"]);
  });
});
