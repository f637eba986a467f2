import {
  ConfigurationResolver,
  ManifestBackend,
  ProjectLocator,
  createPathToolLocator,
  type BuildToolBackend,
  type ToolLocator,
} from "@cradlekit/cradle";
import {
  SILENT_LOGGER,
  configureDebug,
  createNodeFileSystem,
  type FileSystemContext,
  type Logger,
} from "@cradlekit/shared";
import type { CompileFunction } from "./compile.js";
import { resolveSessionConfig, type ResolvedSessionConfig, type SessionOptions } from "./options.js";
import { ModuleSession } from "./session.js";

export interface ResolverHostOptions extends SessionOptions {
  /** Defaults to the Node.js file system rooted at the workspace root. */
  readonly fileSystem?: FileSystemContext;
  /** Defaults to reading manifests from disk. */
  readonly backend?: BuildToolBackend;
  /** Defaults to a `PATH` lookup over `env`. */
  readonly tools?: ToolLocator;
  readonly logger?: Logger;
  readonly env?: NodeJS.ProcessEnv;
}

export interface ResolverHost {
  readonly config: ResolvedSessionConfig;
  readonly fileSystem: FileSystemContext;
  readonly resolver: ConfigurationResolver;
}

/** Wire file system, backend, tool lookup and locator into a resolver. */
export function createResolverHost(options: ResolverHostOptions = {}): ResolverHost {
  const env = options.env ?? process.env;
  const config = resolveSessionConfig(options, env);
  configureDebug({ format: config.debugFormat });

  const logger = options.logger ?? SILENT_LOGGER;
  const fileSystem = options.fileSystem ?? createNodeFileSystem({ root: config.workspaceRoot });
  const backend = options.backend ?? new ManifestBackend({ fileSystem, logger });
  const locator = new ProjectLocator({
    backend,
    tools: options.tools ?? createPathToolLocator({ env }),
    toolNames: config.toolNames,
    logger,
  });

  return {
    config,
    fileSystem,
    resolver: new ConfigurationResolver({ backend, fileSystem, locator, logger }),
  };
}

export interface CreateModuleSessionOptions<A> extends ResolverHostOptions {
  readonly compile: CompileFunction<A>;
}

export function createModuleSession<A, D extends object = Record<never, never>>(
  options: CreateModuleSessionOptions<A>,
): ModuleSession<A, D> {
  const { fileSystem, resolver } = createResolverHost(options);
  return new ModuleSession<A, D>({ fileSystem, resolver, compile: options.compile, logger: options.logger });
}
