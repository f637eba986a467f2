import { describe, it, expect, vi } from "vitest";
import { createMockFileSystem, type Logger, type MockFileSystemContext } from "@cradlekit/shared";
import { ConfigurationResolver, ManifestBackend, createStaticToolLocator } from "@cradlekit/cradle";
import {
  ModuleSession,
  createModuleSession,
  type CompileFunction,
  type CompileResult,
} from "@cradlekit/session";

interface Compiled {
  readonly module: string;
  readonly flags: readonly string[];
}

interface CompiledData {
  exports: string[];
}

const REPO_FILES = {
  "/Repo/cabal.project": "packages: core/ app/\n",
  "/Repo/Setup.hs": "main = pure ()\n",
  "/Repo/core/core.cabal": "name: core\nlibrary\n  hs-source-dirs: src\n  exposed-modules: Core.Types Core.Util\n",
  "/Repo/core/src/Core/Types.hs": "module Core.Types where\n",
  "/Repo/core/src/Core/Util.hs": "module Core.Util where\n",
  "/Repo/core/src/Core/Other.hs": "module Core.Other where\n",
  "/Repo/app/app.cabal": "name: app\nexecutable app\n  hs-source-dirs: app\n  main-is: Main.hs\n",
  "/Repo/app/app/Main.hs": "main = pure ()\n",
};

const TYPES = "/Repo/core/src/Core/Types.hs";
const UTIL = "/Repo/core/src/Core/Util.hs";

function createLogger() {
  return { log: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() } satisfies Logger;
}

const compileOk: CompileFunction<Compiled> = async (_configuration, file, options) => ({
  kind: "ok",
  artifact: { module: file.slice(file.lastIndexOf("/") + 1), flags: options.flags },
});

function deferred<T>() {
  let resolve: (value: T) => void = () => {};
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

function setup(compile: CompileFunction<Compiled> = compileOk, files: Record<string, string> = REPO_FILES) {
  const fileSystem: MockFileSystemContext = createMockFileSystem({ files });
  const logger = createLogger();
  const backend = new ManifestBackend({ fileSystem });
  const introspectUnit = vi.spyOn(backend, "introspectUnit");
  const resolver = new ConfigurationResolver({
    backend,
    fileSystem,
    tools: createStaticToolLocator(["cabal"]),
  });
  const resolve = vi.spyOn(resolver, "resolve");
  const compileSpy = vi.fn(compile);
  const session = new ModuleSession<Compiled, CompiledData>({ fileSystem, resolver, compile: compileSpy, logger });
  const introspected = () => introspectUnit.mock.calls.map(([, , unit]) => unit.id);
  return { fileSystem, logger, resolve, introspected, compile: compileSpy, session };
}

describe("ModuleSession", () => {
  // ==========================================================================
  // Loading
  // ==========================================================================

  describe("load", () => {
    it("compiles a library module with its component flags", async () => {
      const { session } = setup();

      const outcome = await session.load(TYPES);

      expect(outcome.kind).toBe("compiled");
      if (outcome.kind !== "compiled") throw new Error("expected a compiled outcome");
      expect(outcome.configuration.actionName).toBe("Cabal-Helper-Cabal-V2");
      expect(outcome.configuration.rootDir).toBe("/Repo/core");
      expect(outcome.options).toEqual({
        flags: ["-i/Repo/core/src", "Core.Types", "Core.Util"],
        dependencies: ["/Repo/core/core.cabal", "/Repo/cabal.project"],
      });
      expect(outcome.artifact).toEqual({ module: "Types.hs", flags: outcome.options.flags });
      expect(session.lookup(TYPES)?.kind).toBe("success");
    });

    it("compiles an executable's main file", async () => {
      const { session } = setup();

      const outcome = await session.load("/Repo/app/app/Main.hs");

      if (outcome.kind !== "compiled") throw new Error("expected a compiled outcome");
      expect(outcome.options.flags).toEqual(["-i/Repo/app/app", "app/Main.hs"]);
    });

    it("wakes readers that were waiting for the artifact", async () => {
      const { session } = setup();

      const answer = session.query(TYPES, "missing", (artifact) => artifact.module);
      await session.load(TYPES);

      await expect(answer).resolves.toBe("Types.hs");
    });

    it("reuses the active configuration for files it covers", async () => {
      const { session, resolve } = setup();

      await session.load(TYPES);
      const outcome = await session.load(UTIL);

      expect(outcome.kind).toBe("compiled");
      expect(resolve).toHaveBeenCalledTimes(1);
    });

    it("keeps the covering configuration when it rejects a file", async () => {
      const { session, resolve, introspected } = setup();

      await session.load(TYPES);
      const core = session.activeConfiguration;
      const outcome = await session.load("/Repo/core/src/Core/Other.hs");

      expect(resolve).toHaveBeenCalledTimes(2);
      expect(outcome.kind).toBe("not-configured");
      if (outcome.kind !== "not-configured") throw new Error("expected a not-configured outcome");
      expect(outcome.result).toEqual({
        kind: "failure",
        error: {
          code: "no-component",
          file: "/Repo/core/src/Core/Other.hs",
          message: "Could not obtain flags for /Repo/core/src/Core/Other.hs",
        },
      });
      expect(outcome.configuration).toBe(core);
      expect(session.activeConfiguration).toBe(core);

      await expect(session.load(UTIL)).resolves.toMatchObject({ kind: "compiled" });
      expect(resolve).toHaveBeenCalledTimes(2);
      expect(introspected()).toEqual(["lib:core"]);
    });

    it("introspects each unit once while alternating between nested packages", async () => {
      const { session, introspected } = setup(compileOk, {
        "/Nest/cabal.project": "packages: ./ Sub/\n",
        "/Nest/top.cabal": "name: top\nlibrary\n  hs-source-dirs: .\n  exposed-modules: Lib\n",
        "/Nest/Lib.hs": "module Lib where\n",
        "/Nest/Sub/sub.cabal": "name: sub\nlibrary\n  exposed-modules: Lib2\n",
        "/Nest/Sub/Lib2.hs": "module Lib2 where\n",
      });

      const flags: (readonly string[])[] = [];
      for (let round = 0; round < 3; round++) {
        for (const file of ["/Nest/Lib.hs", "/Nest/Sub/Lib2.hs"]) {
          const outcome = await session.load(file);
          if (outcome.kind !== "compiled") throw new Error(`expected ${file} to compile`);
          flags.push(outcome.options.flags);
        }
      }

      expect(introspected()).toEqual(["lib:top", "lib:sub"]);
      expect(flags.slice(0, 2)).toEqual([
        ["-i/Nest", "Lib"],
        ["-i/Nest/Sub", "Lib2"],
      ]);
    });

    it("resolves again once a manifest the configuration depends on changes", async () => {
      const { session, resolve, fileSystem } = setup();

      await session.load(TYPES);
      fileSystem.addFile(
        "/Repo/core/core.cabal",
        "name: core\nlibrary\n  hs-source-dirs: src\n  exposed-modules: Core.Types Core.Util\n  ghc-options: -Wall\n",
      );
      const outcome = await session.load(UTIL);

      expect(resolve).toHaveBeenCalledTimes(2);
      if (outcome.kind !== "compiled") throw new Error("expected a compiled outcome");
      expect(outcome.options.flags).toEqual(["-i/Repo/core/src", "-Wall", "Core.Types", "Core.Util"]);
    });

    it("records files outside every package as failed", async () => {
      const { session, compile, logger } = setup();

      const answer = session.query("/Repo/Setup.hs", "fallback", (artifact) => artifact.module);
      const outcome = await session.load("/Repo/Setup.hs");

      if (outcome.kind !== "not-configured") throw new Error("expected a not-configured outcome");
      expect(outcome.result).toEqual({ kind: "none", reason: "no-package" });
      expect(outcome.configuration.actionName).toBe("Cabal-Helper-Cabal-V2-None");
      expect(outcome.configuration.rootDir).toBe("/Repo");
      expect(compile).not.toHaveBeenCalled();
      expect(session.lookup("/Repo/Setup.hs")?.kind).toBe("failed");
      expect(logger.warn).toHaveBeenCalledWith(
        "[session] /Repo/Setup.hs is not covered by Cabal-Helper-Cabal-V2-None (no-package)",
      );
      await expect(answer).resolves.toBe("fallback");
    });

    it("marks the module failed when compilation reports an error", async () => {
      const { session } = setup(async () => ({ kind: "error", message: "parse error on input" }));

      const outcome = await session.load(TYPES);

      expect(outcome).toMatchObject({ kind: "compile-failed", message: "parse error on input" });
      expect(session.lookup(TYPES)?.kind).toBe("failed");
      await expect(session.query<string | null>(TYPES, null, (artifact) => artifact.module)).resolves.toBeNull();
    });

    it("treats a throwing compiler as a compile failure", async () => {
      const { session, logger } = setup(async () => {
        throw new Error("boom");
      });

      const outcome = await session.load(TYPES);

      expect(outcome).toMatchObject({ kind: "compile-failed", message: "boom" });
      expect(logger.error).toHaveBeenCalledWith(`[session] compiling ${TYPES} threw: boom`);
    });

    it("stores the other modules a compile produced", async () => {
      const { session } = setup(async (_configuration, _file, options) => ({
        kind: "ok",
        artifact: { module: "Types.hs", flags: options.flags },
        related: [[UTIL, { module: "Util.hs", flags: options.flags }]],
      }));

      await session.load(TYPES);

      expect(session.queryNow<string | null>(UTIL, null, (artifact) => artifact.module)).toBe("Util.hs");
    });

    it("shares one run between overlapping loads of the same file", async () => {
      const gate = deferred<CompileResult<Compiled>>();
      const { session, compile } = setup(() => gate.promise);

      const first = session.load(TYPES);
      const second = session.load("/Repo/core/src/Core/../Core/Types.hs");
      expect(second).toBe(first);

      // let resolution reach the compiler before releasing it
      await vi.waitFor(() => expect(compile).toHaveBeenCalledTimes(1));
      gate.resolve({ kind: "ok", artifact: { module: "Types.hs", flags: [] } });

      await expect(first).resolves.toMatchObject({ kind: "compiled" });
      expect(compile).toHaveBeenCalledTimes(1);

      await session.load(TYPES);
      expect(compile).toHaveBeenCalledTimes(2);
    });
  });

  // ==========================================================================
  // Queries
  // ==========================================================================

  describe("queries", () => {
    it("answers immediately only from the cache", async () => {
      const { session } = setup();

      expect(session.queryNow(TYPES, "none", (artifact) => artifact.module)).toBe("none");
      await session.load(TYPES);
      expect(session.queryNow(TYPES, "none", (artifact) => artifact.module)).toBe("Types.hs");
    });

    it("computes derived data once per artifact", async () => {
      const { session } = setup();
      const producer = vi.fn((artifact: Compiled) => [artifact.module]);

      await session.load(TYPES);
      const first = await session.queryData<"exports", string[]>(TYPES, "exports", [], producer, (_artifact, exports) => exports);
      const second = await session.queryData<"exports", string[]>(TYPES, "exports", [], producer, (_artifact, exports) => exports);

      expect(first).toEqual(["Types.hs"]);
      expect(second).toEqual(["Types.hs"]);
      expect(producer).toHaveBeenCalledTimes(1);
    });

    it("treats an edited file as not loaded", async () => {
      const { session, fileSystem } = setup();

      await session.load(TYPES);
      fileSystem.addFile(TYPES, "module Core.Types (T) where\n");

      expect(session.lookup(TYPES)).toBeNull();
    });

    it("resolves a configuration without compiling", async () => {
      const { session, compile } = setup();

      const { configuration, result } = await session.configurationFor("/Repo/app/app/Main.hs");

      expect(configuration.actionName).toBe("Cabal-Helper-Cabal-V2");
      expect(result.kind).toBe("success");
      expect(compile).not.toHaveBeenCalled();
    });
  });

  // ==========================================================================
  // Lifecycle
  // ==========================================================================

  describe("dispose", () => {
    it("drops artifacts and configurations", async () => {
      const { session } = setup();

      await session.load(TYPES);
      session.dispose();

      expect(session.cache.size).toBe(0);
      expect(session.activeConfiguration).toBeNull();
      expect(() => session.load(TYPES)).toThrow("ModuleSession has been disposed");
    });

    it("does not record loads that finish afterwards", async () => {
      const gate = deferred<CompileResult<Compiled>>();
      const { session, compile } = setup(() => gate.promise);

      const outcome = session.load(TYPES);
      await vi.waitFor(() => expect(compile).toHaveBeenCalledTimes(1));
      session.dispose();
      gate.resolve({ kind: "ok", artifact: { module: "Types.hs", flags: [] } });

      await expect(outcome).resolves.toMatchObject({ kind: "compiled" });
      expect(session.cache.size).toBe(0);
    });
  });
});

describe("createModuleSession", () => {
  it("wires the manifest backend and tool names from options", async () => {
    const fileSystem = createMockFileSystem({ files: REPO_FILES });
    const session = createModuleSession<Compiled>({
      compile: compileOk,
      fileSystem,
      tools: createStaticToolLocator(["cabal-3.10"]),
      toolNames: { cabal: "cabal-3.10" },
      env: {},
    });

    const outcome = await session.load(TYPES);

    expect(outcome.kind).toBe("compiled");
  });

  it("finds no project when the build tool is missing", async () => {
    const fileSystem = createMockFileSystem({ files: REPO_FILES });
    const session = createModuleSession<Compiled>({
      compile: compileOk,
      fileSystem,
      tools: createStaticToolLocator([]),
      env: {},
    });

    const outcome = await session.load(TYPES);

    expect(outcome).toMatchObject({
      kind: "not-configured",
      result: { kind: "none", reason: "no-project" },
    });
    expect(outcome.configuration.actionName).toBe("Cabal-Helper-None");
  });
});
