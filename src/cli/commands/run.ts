/**
 * Run Command - Start the relay and keep it running until interrupted
 */

import type { RelayConfig } from "../../config.js";
import { MemoryBus } from "../../bus/memory-bus.js";
import { WebSocketCloudTransport } from "../../cloud/ws-transport.js";
import { createLoggerWithCleanup, errorMessage, type Logger } from "../../log.js";
import { RelayService, registerDiagnosticServices } from "../../relay/service.js";
import { FileRelayStateStore } from "../../relay/state-store.js";
import { OutputFormatter } from "../output-formatter.js";

export interface RunOptions {
  quiet?: boolean;
}

export interface RelayRuntime {
  bus: MemoryBus;
  transport: WebSocketCloudTransport;
  service: RelayService;
  /** Removes the diagnostic services from the bus */
  dispose: () => void;
}

/**
 * Wire a relay from resolved configuration. Nothing is started.
 */
export function createRelayRuntime(cfg: RelayConfig, logger: Logger): RelayRuntime {
  const bus = new MemoryBus({ logger, stringEncoding: cfg.bus.stringEncoding });
  const store = new FileRelayStateStore({ filePath: cfg.resolved.statePath, logger });
  const transport = new WebSocketCloudTransport({
    connection: cfg.resolved.connection,
    logger,
    pollIntervalMs: cfg.transport.pollIntervalMs,
    timeoutMs: cfg.transport.timeoutMs,
    reconnectDelayMs: cfg.transport.reconnectDelayMs,
    maxReconnectDelayMs: cfg.transport.maxReconnectDelayMs,
    outboundQueueSize: cfg.transport.outboundQueueSize,
    url: cfg.transport.url,
    failureStatus: cfg.commands.failureStatus,
  });
  const service = new RelayService({
    bus,
    transport,
    store,
    logger,
    queueSize: cfg.relay.queueSize,
    commands: cfg.commands,
  });
  const dispose = registerDiagnosticServices(bus, service);
  return { bus, transport, service, dispose };
}

export async function run(cfg: RelayConfig, options: RunOptions = {}): Promise<void> {
  const out = new OutputFormatter({ quiet: options.quiet });
  const { logger, close: closeLogger } = createLoggerWithCleanup(
    cfg.logging.level,
    cfg.resolved.logFilePath,
    cfg.logging.fileLevel,
  );

  const runtime = createRelayRuntime(cfg, logger);
  await runtime.service.start();

  out.success(`Relay started for device ${cfg.resolved.connection.deviceId}`);
  out.info(`State file: ${cfg.resolved.statePath}`);

  await new Promise<void>((resolve) => {
    let stopping = false;
    const shutdown = async () => {
      if (stopping) return;
      stopping = true;
      out.info("Shutting down...");

      const timeout = setTimeout(() => {
        console.error("Shutdown timed out, forcing exit...");
        process.exit(1);
      }, 5000);
      timeout.unref();

      try {
        runtime.dispose();
        await runtime.service.stop();
      } catch (err) {
        out.error(`Error during shutdown: ${errorMessage(err)}`);
        process.exitCode = 1;
      } finally {
        clearTimeout(timeout);
        await closeLogger();
        resolve();
      }
    };

    process.once("SIGINT", () => void shutdown());
    process.once("SIGTERM", () => void shutdown());
  });
}
