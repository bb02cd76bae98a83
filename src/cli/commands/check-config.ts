/**
 * Check Config Command - Resolve configuration and print what the relay would use
 */

import type { RelayConfig } from "../../config.js";
import { deviceUrl } from "../../cloud/connection-string.js";
import { OutputFormatter, type OutputFormatterOptions } from "../output-formatter.js";

export interface CheckConfigOptions {
  json?: boolean;
  quiet?: boolean;
}

export interface ConfigSummary {
  configPath: string;
  deviceId: string;
  hostName: string;
  url: string;
  statePath: string;
  logLevel: string;
  logFilePath: string | null;
  queueSize: number;
  outboundQueueSize: number;
  commandTimeoutMs: number | null;
}

/**
 * The shared access key is never part of the summary
 */
export function summarizeConfig(cfg: RelayConfig): ConfigSummary {
  return {
    configPath: cfg.resolved.configPath,
    deviceId: cfg.resolved.connection.deviceId,
    hostName: cfg.resolved.connection.hostName,
    url: cfg.transport.url ?? deviceUrl(cfg.resolved.connection),
    statePath: cfg.resolved.statePath,
    logLevel: cfg.logging.level,
    logFilePath: cfg.resolved.logFilePath ?? null,
    queueSize: cfg.relay.queueSize,
    outboundQueueSize: cfg.transport.outboundQueueSize,
    commandTimeoutMs: cfg.commands.timeoutMs ?? null,
  };
}

export async function checkConfig(
  cfg: RelayConfig,
  options: CheckConfigOptions = {},
  output: OutputFormatterOptions = {},
): Promise<ConfigSummary> {
  const out = new OutputFormatter({ quiet: options.quiet, ...output });
  const summary = summarizeConfig(cfg);

  if (options.json) {
    out.json(summary);
    return summary;
  }

  out.success("Configuration is valid");
  out.keyValue("Config file", summary.configPath);
  out.keyValue("Device", summary.deviceId);
  out.keyValue("Cloud URL", summary.url);
  out.keyValue("State file", summary.statePath);
  out.keyValue("Log level", summary.logLevel);
  if (summary.logFilePath) {
    out.keyValue("Log file", summary.logFilePath);
  }
  out.keyValue("Relay queue size", summary.queueSize);
  out.keyValue("Outbound queue size", summary.outboundQueueSize);
  out.keyValue("Command timeout", summary.commandTimeoutMs === null ? "none" : `${summary.commandTimeoutMs}ms`);
  return summary;
}
