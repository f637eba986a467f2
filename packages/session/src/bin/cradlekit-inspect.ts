#!/usr/bin/env node
/**
 * cradlekit-inspect CLI
 *
 * Show which project, package and component a source file resolves to, and
 * the compiler flags that would be used for it.
 *
 * Usage:
 *   cradlekit-inspect src/Lib.hs
 *   cradlekit-inspect app/Main.hs --json
 *
 * Options:
 *   --json        Output the report as JSON
 *   --help        Show this help message
 */

import { createConsoleLogger, describeError } from "@cradlekit/shared";
import { createResolverHost } from "../create-session.js";
import { formatReport, inspectFile } from "../inspect.js";

async function main(): Promise<void> {
  const args = process.argv.slice(2);

  const flags = {
    help: args.includes("--help") || args.includes("-h"),
    json: args.includes("--json"),
  };

  const file = args.find((arg) => !arg.startsWith("-"));

  if (flags.help || !file) {
    printUsage();
    process.exit(flags.help ? 0 : 1);
  }

  try {
    const { resolver } = createResolverHost({ logger: createConsoleLogger("cradlekit-inspect") });
    const report = await inspectFile(resolver, file);

    console.log(flags.json ? JSON.stringify(report, null, 2) : formatReport(report));

    if (report.status !== "success") {
      process.exit(2);
    }
  } catch (err) {
    console.error(`Error inspecting ${file}: ${describeError(err)}`);
    process.exit(1);
  }
}

function printUsage(): void {
  console.log(`
cradlekit-inspect - Show the build configuration of a source file

Usage:
  cradlekit-inspect <file> [options]

Arguments:
  file            Source file, relative to CRADLEKIT_WORKSPACE or the current directory

Options:
  --json          Output the report as JSON
  --help, -h      Show this help message

Environment:
  CRADLEKIT_WORKSPACE   Directory relative paths are resolved against
  CRADLEKIT_STACK       Name of the stack executable (default: stack)
  CRADLEKIT_CABAL       Name of the cabal executable (default: cabal)
  CRADLEKIT_DEBUG       Debug channels: project, cradle, cache, session or *

Exit codes:
  0  Flags resolved
  1  Error (invalid args, unexpected failure)
  2  Resolved, but no flags for this file (no project, package or component)
`);
}

main().catch((err: unknown) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
