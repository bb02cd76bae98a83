import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { z } from "zod";

import { ConnectionStringError, parseConnectionString, type ConnectionInfo } from "./cloud/connection-string.js";

const DEFAULT_CONFIG_PATH = "relay.config.json";

const LevelSchema = z.enum(["trace", "debug", "info", "warn", "error", "silent"]);

const PersistenceSchema = z
  .object({
    filePath: z.string().optional(),
  })
  .default({});

const RelaySchema = z
  .object({
    queueSize: z.number().int().positive().default(10),
  })
  .default({});

const TransportSchema = z
  .object({
    pollIntervalMs: z.number().int().positive().default(30_000),
    timeoutMs: z.number().int().positive().default(10_000),
    reconnectDelayMs: z.number().int().positive().default(1_000),
    maxReconnectDelayMs: z.number().int().positive().default(30_000),
    outboundQueueSize: z.number().int().min(0).default(100),
    url: z.string().url().optional(),
  })
  .default({});

const CommandsSchema = z
  .object({
    successStatus: z.number().int().default(200),
    failureStatus: z.number().int().default(500),
    timeoutMs: z.number().int().positive().optional(),
  })
  .default({});

const BusSchema = z
  .object({
    stringEncoding: z.enum(["utf8", "ascii-escape"]).default("utf8"),
  })
  .default({});

const LoggingSchema = z
  .object({
    level: LevelSchema.default("info"),
    filePath: z.string().optional(),
    fileLevel: LevelSchema.optional(),
  })
  .default({});

const ConfigSchema = z.object({
  connectionString: z.string().optional(),
  stateDir: z.string().default(".relay"),
  persistence: PersistenceSchema,
  relay: RelaySchema,
  transport: TransportSchema,
  commands: CommandsSchema,
  bus: BusSchema,
  logging: LoggingSchema,
});

export type RawRelayConfig = z.infer<typeof ConfigSchema>;

export type RelayConfig = RawRelayConfig & {
  resolved: {
    configPath: string;
    stateDir: string;
    statePath: string;
    logFilePath?: string;
    connection: ConnectionInfo;
  };
};

/**
 * Startup configuration that cannot be resolved. Fatal.
 */
export class ConfigResolutionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigResolutionError";
  }
}

export interface LoadConfigOptions {
  connectionString?: string;
  env?: NodeJS.ProcessEnv;
}

export async function loadConfig(explicitPath?: string, options: LoadConfigOptions = {}): Promise<RelayConfig> {
  const env = options.env ?? process.env;
  const { base, configPath } = await loadRawConfig(explicitPath, env);
  return resolveConfig(base, {
    configPath,
    connectionString: options.connectionString?.trim() || env.RELAY_CONNECTION_STRING?.trim(),
  });
}

/**
 * Parse and validate the config file without resolving the connection
 */
export async function loadRawConfig(
  explicitPath?: string,
  env: NodeJS.ProcessEnv = process.env,
): Promise<{ base: RawRelayConfig; configPath: string }> {
  const configPath = resolveConfigPath(explicitPath, env);
  const raw = await readConfigFile(configPath, Boolean(explicitPath?.trim() || env.RELAY_CONFIG?.trim()));
  const parsed = ConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigResolutionError(`Invalid config ${issue?.path.join(".") || "(root)"}: ${issue?.message ?? "unknown issue"}`);
  }
  return { base: parsed.data, configPath };
}

export function resolveConfigPath(explicitPath?: string, env: NodeJS.ProcessEnv = process.env): string {
  const envPath = env.RELAY_CONFIG?.trim();
  const pathToUse = explicitPath?.trim() || envPath || DEFAULT_CONFIG_PATH;
  return path.resolve(pathToUse);
}

/**
 * A missing default config file means "all defaults"; a missing file that
 * was asked for explicitly is an error.
 */
async function readConfigFile(configPath: string, required: boolean): Promise<unknown> {
  let content: string;
  try {
    content = await fs.readFile(configPath, "utf-8");
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT" && !required) {
      return {};
    }
    throw new ConfigResolutionError(`Cannot read config file ${configPath}`);
  }
  try {
    return JSON.parse(content);
  } catch {
    throw new ConfigResolutionError(`Config file ${configPath} is not valid JSON`);
  }
}

export function resolveConfig(
  base: RawRelayConfig,
  params: { configPath: string; connectionString?: string },
): RelayConfig {
  const baseDir = path.dirname(params.configPath);
  const connectionString = params.connectionString || base.connectionString?.trim();
  if (!connectionString) {
    throw new ConfigResolutionError(
      "No connection string configured (set connectionString, RELAY_CONNECTION_STRING or --connection-string)",
    );
  }

  let connection: ConnectionInfo;
  try {
    connection = parseConnectionString(connectionString);
  } catch (err) {
    if (err instanceof ConnectionStringError) {
      throw new ConfigResolutionError(err.message);
    }
    throw err;
  }

  const { stateDir, statePath } = resolveStatePaths(base, params.configPath);
  const logFilePath = base.logging.filePath?.trim() ? resolveUserPath(base.logging.filePath, baseDir) : undefined;

  return {
    ...base,
    connectionString,
    resolved: {
      configPath: params.configPath,
      stateDir,
      statePath,
      logFilePath,
      connection,
    },
  };
}

export function resolveStatePaths(base: RawRelayConfig, configPath: string): { stateDir: string; statePath: string } {
  const baseDir = path.dirname(configPath);
  const stateDir = resolveUserPath(base.stateDir, baseDir);
  const statePath = resolveUserPath(base.persistence.filePath?.trim() || path.join(stateDir, "relays.json"), baseDir);
  return { stateDir, statePath };
}

function resolveUserPath(value: string, baseDir: string): string {
  const trimmed = value.trim();
  if (!trimmed) return trimmed;
  if (trimmed.startsWith("~")) {
    return path.join(os.homedir(), trimmed.slice(1));
  }
  if (path.isAbsolute(trimmed)) {
    return path.normalize(trimmed);
  }
  return path.resolve(baseDir, trimmed);
}
