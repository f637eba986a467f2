/**
 * Debug channels
 *
 * Targeted, structured logging for following resolution and cache decisions.
 * Channels are always present in code and cost a single no-op call when
 * disabled.
 *
 * ```bash
 * CRADLEKIT_DEBUG=project npm test        # project discovery only
 * CRADLEKIT_DEBUG=cradle,cache npm test   # several channels
 * CRADLEKIT_DEBUG=* npm test              # everything
 * CRADLEKIT_DEBUG_FORMAT=json ...         # one JSON object per line
 * ```
 *
 * ```typescript
 * debug.project("candidates", { file, projects });
 * debug.cache("stale", { path });
 * ```
 */

export type DebugData = Record<string, unknown>;

export type DebugChannel = (point: string, data?: DebugData) => void;

export interface DebugConfig {
  format: "json" | "pretty";
  timestamps: boolean;
  output: (message: string) => void;
}

const DEFAULT_CONFIG: DebugConfig = {
  format: process.env["CRADLEKIT_DEBUG_FORMAT"] === "json" ? "json" : "pretty",
  timestamps: false,
  output: (message) => console.error(message),
};

let config: DebugConfig = { ...DEFAULT_CONFIG };

function parseDebugEnv(): Set<string> {
  const env = process.env["CRADLEKIT_DEBUG"] ?? "";
  if (!env || env === "0" || env === "false") return new Set();
  if (env === "*" || env === "1" || env === "true") return new Set(["*"]);
  return new Set(env.split(",").map((s) => s.trim().toLowerCase()));
}

let enabledChannels = parseDebugEnv();

function isEnabled(channel: string): boolean {
  return enabledChannels.has("*") || enabledChannels.has(channel.toLowerCase());
}

function formatMessage(channel: string, point: string, data: DebugData | undefined): string {
  if (config.format === "json") {
    return JSON.stringify({
      channel,
      point,
      ...(data && { data }),
      ...(config.timestamps && { timestamp: Date.now() }),
    });
  }

  const prefix = config.timestamps ? `[${new Date().toISOString()}] ` : "";
  const label = `[${channel}.${point}]`;
  if (!data || Object.keys(data).length === 0) return `${prefix}${label}`;
  const parts = Object.entries(data).map(([key, value]) => `${key}=${formatValue(value)}`);
  return `${prefix}${label} { ${parts.join(", ")} }`;
}

function formatValue(value: unknown): string {
  if (value === null) return "null";
  if (value === undefined) return "undefined";
  if (typeof value === "string") {
    return value.length > 80 ? `"${value.slice(0, 77)}..."` : `"${value}"`;
  }
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  if (Array.isArray(value)) {
    if (value.length === 0) return "[]";
    if (value.length <= 4) return `[${value.map(formatValue).join(", ")}]`;
    return `[${value.length} items]`;
  }
  try {
    return JSON.stringify(value);
  } catch {
    return "[unserializable]";
  }
}

function createChannel(name: string): DebugChannel {
  if (!isEnabled(name)) {
    return () => {};
  }
  return (point: string, data?: DebugData) => {
    config.output(formatMessage(name, point, data));
  };
}

/** Re-read `CRADLEKIT_DEBUG` and rebuild every channel. */
export function refreshDebugChannels(): void {
  enabledChannels = parseDebugEnv();
  debug.project = createChannel("project");
  debug.cradle = createChannel("cradle");
  debug.cache = createChannel("cache");
  debug.session = createChannel("session");
}

export function configureDebug(options: Partial<DebugConfig>): void {
  config = { ...config, ...options };
}

export function isDebugEnabled(channel?: string): boolean {
  if (channel) return isEnabled(channel);
  return enabledChannels.size > 0;
}

export const debug = {
  /** Project discovery: ancestor walk, markers, tool filtering */
  project: createChannel("project"),

  /** Package, unit and component matching; flag derivation */
  cradle: createChannel("cradle"),

  /** Artifact cache: stores, staleness, deferred delivery */
  cache: createChannel("cache"),

  /** Load pipeline wiring resolver, compiler and cache */
  session: createChannel("session"),
};

export type Debug = typeof debug;
