/* =======================================================================================
 * Session options
 * ---------------------------------------------------------------------------------------
 * - Explicit options win over CRADLEKIT_* environment variables
 * - Unknown or empty values are usage errors and throw
 * ======================================================================================= */

import * as nodePath from "node:path";
import type { BuildTool } from "@cradlekit/cradle";

export type DebugFormat = "pretty" | "json";

export interface SessionOptions {
  /** Directory relative paths are resolved against. `CRADLEKIT_WORKSPACE`, then the cwd. */
  readonly workspaceRoot?: string;
  /** Executable names probed on `PATH`. `CRADLEKIT_STACK` / `CRADLEKIT_CABAL`. */
  readonly toolNames?: Partial<Record<BuildTool, string>>;
  /** `CRADLEKIT_DEBUG_FORMAT`, then `pretty`. */
  readonly debugFormat?: DebugFormat;
}

export interface ResolvedSessionConfig {
  readonly workspaceRoot: string;
  readonly toolNames: Readonly<Record<BuildTool, string>>;
  readonly debugFormat: DebugFormat;
}

const DEBUG_FORMATS: readonly DebugFormat[] = ["pretty", "json"];

function isDebugFormat(value: string): value is DebugFormat {
  return DEBUG_FORMATS.some((format) => format === value);
}

function pick(name: string, explicit: string | undefined, fromEnv: string | undefined, fallback: string): string {
  const value = explicit ?? fromEnv ?? fallback;
  if (value.trim().length === 0) {
    throw new Error(`Invalid session option ${name}: value is empty`);
  }
  return value;
}

export function resolveSessionConfig(
  options: SessionOptions = {},
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): ResolvedSessionConfig {
  const root = pick("workspaceRoot", options.workspaceRoot, env["CRADLEKIT_WORKSPACE"], cwd);

  const format = pick("debugFormat", options.debugFormat, env["CRADLEKIT_DEBUG_FORMAT"], "pretty");
  if (!isDebugFormat(format)) {
    throw new Error(`Invalid session option debugFormat: "${format}" (expected ${DEBUG_FORMATS.join(" or ")})`);
  }

  return {
    workspaceRoot: nodePath.resolve(cwd, root),
    toolNames: {
      stack: pick("toolNames.stack", options.toolNames?.stack, env["CRADLEKIT_STACK"], "stack"),
      cabal: pick("toolNames.cabal", options.toolNames?.cabal, env["CRADLEKIT_CABAL"], "cabal"),
    },
    debugFormat: format,
  };
}
