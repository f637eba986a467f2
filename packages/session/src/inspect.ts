import { describeProject, type ConfigurationResolver } from "@cradlekit/cradle";

export interface InspectReport {
  readonly file: string;
  readonly rootDir: string;
  readonly actionName: string;
  /** e.g. `Cabal-V2(/repo/cabal.project)`, or null when no project was found. */
  readonly project: string | null;
  readonly status: "success" | "none" | "failure";
  readonly flags?: readonly string[];
  readonly dependencies?: readonly string[];
  readonly reason?: string;
}

/** Resolve `file` and flatten the outcome into something printable. */
export async function inspectFile(
  resolver: Pick<ConfigurationResolver, "resolve">,
  file: string,
): Promise<InspectReport> {
  const configuration = await resolver.resolve(file);
  const base = {
    file,
    rootDir: configuration.rootDir,
    actionName: configuration.actionName,
    project: configuration.project ? describeProject(configuration.project) : null,
  };

  const result = await configuration.resolve(file);
  switch (result.kind) {
    case "success":
      return { ...base, status: "success", flags: result.options.flags, dependencies: result.options.dependencies };
    case "none":
      return { ...base, status: "none", reason: result.reason };
    case "failure":
      return { ...base, status: "failure", reason: result.error.message };
  }
}

export function formatReport(report: InspectReport): string {
  const lines = [
    `File: ${report.file}`,
    `Project: ${report.project ?? "(none)"}`,
    `Root: ${report.rootDir}`,
    `Action: ${report.actionName}`,
    `Status: ${report.status}`,
  ];
  if (report.reason !== undefined) lines.push(`Reason: ${report.reason}`);
  if (report.flags) {
    lines.push(`Flags: ${report.flags.length}`, ...report.flags.map((flag) => `  ${flag}`));
  }
  if (report.dependencies) {
    lines.push(`Dependencies: ${report.dependencies.length}`, ...report.dependencies.map((dep) => `  - ${dep}`));
  }
  return lines.join("\n");
}
