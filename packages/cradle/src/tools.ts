import * as fs from "node:fs";
import * as nodePath from "node:path";

/**
 * Presence check for build tools. Only answers "could this be run", never
 * runs anything.
 */
export interface ToolLocator {
  isExecutableOnPath(name: string): boolean;
}

export interface PathToolLocatorOptions {
  readonly env?: NodeJS.ProcessEnv;
  readonly platform?: NodeJS.Platform;
}

/**
 * Search `PATH` for an executable. On Windows each `PATHEXT` extension is
 * tried as well. Answers are memoised per name for the locator's lifetime.
 */
export function createPathToolLocator(options?: PathToolLocatorOptions): ToolLocator {
  const env = options?.env ?? process.env;
  const platform = options?.platform ?? process.platform;
  const isWindows = platform === "win32";
  const delimiter = isWindows ? ";" : ":";
  const known = new Map<string, boolean>();

  const dirs = (env["PATH"] ?? env["Path"] ?? "").split(delimiter).filter((d) => d.length > 0);
  const extensions = isWindows
    ? ["", ...(env["PATHEXT"] ?? ".EXE;.CMD;.BAT;.COM").split(";").filter((e) => e.length > 0)]
    : [""];

  function probe(candidate: string): boolean {
    try {
      if (!fs.statSync(candidate).isFile()) return false;
      if (!isWindows) fs.accessSync(candidate, fs.constants.X_OK);
      return true;
    } catch {
      return false;
    }
  }

  return {
    isExecutableOnPath(name: string): boolean {
      const cached = known.get(name);
      if (cached !== undefined) return cached;
      const found = dirs.some((dir) => extensions.some((ext) => probe(nodePath.join(dir, name + ext))));
      known.set(name, found);
      return found;
    },
  };
}

/** Fixed answer set, for hosts that already know what is installed. */
export function createStaticToolLocator(names: Iterable<string>): ToolLocator {
  const installed = new Set(names);
  return {
    isExecutableOnPath: (name) => installed.has(name),
  };
}
