export type { CompileResult, CompileFunction } from "./compile.js";
export {
  type DebugFormat,
  type SessionOptions,
  type ResolvedSessionConfig,
  resolveSessionConfig,
} from "./options.js";
export {
  type ModuleSessionOptions,
  type FileConfiguration,
  type LoadOutcome,
  ModuleSession,
} from "./session.js";
export {
  type ResolverHostOptions,
  type ResolverHost,
  type CreateModuleSessionOptions,
  createResolverHost,
  createModuleSession,
} from "./create-session.js";
export { type InspectReport, inspectFile, formatReport } from "./inspect.js";
