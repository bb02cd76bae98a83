/**
 * WebSocket Cloud Transport - JSON frames over a single device connection
 *
 * Down (cloud → device): desired-state, message, command
 * Up (device → cloud): telemetry, message-ack, command-response, reported-state
 */

import { WebSocket, type RawData } from "ws";
import { z } from "zod";

import type { Logger } from "../log.js";
import { errorMessage } from "../log.js";
import { TransportFailureError } from "../relay/errors.js";
import type { ReportedState } from "../relay/reconciler.js";
import type { CommandResult, OutboundMessage } from "../relay/types.js";
import { deviceUrl, type ConnectionInfo } from "./connection-string.js";
import { OutboundQueue } from "./outbound-queue.js";
import type {
  CloudTransport,
  CommandHandler,
  ConnectionState,
  DesiredStateHandler,
  InboundMessageHandler,
} from "./types.js";

const DownFrameSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("desired-state"), document: z.unknown() }),
  z.object({ type: z.literal("message"), id: z.string(), body: z.unknown() }),
  z.object({ type: z.literal("command"), id: z.string(), method: z.string().min(1), payload: z.unknown() }),
]);

type DownFrame = z.infer<typeof DownFrameSchema>;

export type UpFrame =
  | ({ type: "telemetry" } & OutboundMessage)
  | { type: "message-ack"; id: string; accepted: boolean; error?: string }
  | ({ type: "command-response"; id: string } & CommandResult)
  | { type: "reported-state"; document: ReportedState };

export interface WebSocketTransportOptions {
  connection: ConnectionInfo;
  logger: Logger;
  /** Keepalive ping interval */
  pollIntervalMs: number;
  /** Handshake timeout for each connection attempt */
  timeoutMs: number;
  reconnectDelayMs: number;
  maxReconnectDelayMs: number;
  outboundQueueSize: number;
  /** Overrides the URL derived from the connection string */
  url?: string;
  /** Status for commands that arrive before a handler is registered (default 500) */
  failureStatus?: number;
}

export class WebSocketCloudTransport implements CloudTransport {
  private readonly options: WebSocketTransportOptions;
  private readonly logger: Logger;
  private readonly queue: OutboundQueue<UpFrame>;
  private ws: WebSocket | null = null;
  private state: ConnectionState = "disconnected";
  private reconnectAttempts = 0;
  private reconnectTimer: NodeJS.Timeout | null = null;
  private keepaliveTimer: NodeJS.Timeout | null = null;
  private awaitingPong = false;
  private desiredStateHandler?: DesiredStateHandler;
  private inboundHandler?: InboundMessageHandler;
  private commandHandler?: CommandHandler;

  constructor(options: WebSocketTransportOptions) {
    this.options = options;
    this.logger = options.logger.child({ component: "cloud-transport", deviceId: options.connection.deviceId });
    this.queue = new OutboundQueue<UpFrame>(options.outboundQueueSize);
  }

  get connectionState(): ConnectionState {
    return this.state;
  }

  get url(): string {
    return this.options.url ?? deviceUrl(this.options.connection);
  }

  onDesiredState(handler: DesiredStateHandler): void {
    this.desiredStateHandler = handler;
  }

  onInboundMessage(handler: InboundMessageHandler): void {
    this.inboundHandler = handler;
  }

  onCommand(handler: CommandHandler): void {
    this.commandHandler = handler;
  }

  /**
   * Open the connection. Resolves once the first attempt has either
   * connected or failed; failed attempts keep retrying in the background.
   * Rejects only when the URL itself is unusable.
   */
  connect(): Promise<void> {
    if (this.state === "connected" || this.state === "connecting") {
      return Promise.resolve();
    }
    return this.open();
  }

  async close(): Promise<void> {
    this.state = "closed";
    this.clearTimers();
    const ws = this.ws;
    this.ws = null;
    if (!ws || ws.readyState === WebSocket.CLOSED) return;

    await new Promise<void>((resolve) => {
      const timeout = setTimeout(() => {
        ws.terminate();
        resolve();
      }, this.options.timeoutMs);
      ws.once("close", () => {
        clearTimeout(timeout);
        resolve();
      });
      ws.close(1000, "Relay shutting down");
    });
    this.logger.info("Cloud connection closed");
  }

  send(message: OutboundMessage): void {
    this.sendFrame({ type: "telemetry", ...message });
  }

  async reportState(state: ReportedState): Promise<void> {
    this.sendFrame({ type: "reported-state", document: state });
  }

  private open(): Promise<void> {
    this.state = this.reconnectAttempts > 0 ? "reconnecting" : "connecting";
    const url = this.url;
    this.logger.debug({ url, attempt: this.reconnectAttempts }, "Connecting to cloud");

    return new Promise<void>((resolve) => {
      const ws = new WebSocket(url, {
        headers: { Authorization: `SharedAccessKey ${this.options.connection.sharedAccessKey}` },
        handshakeTimeout: this.options.timeoutMs,
      });
      this.ws = ws;
      let settled = false;
      const settle = () => {
        if (!settled) {
          settled = true;
          resolve();
        }
      };

      ws.on("open", () => {
        if (this.ws !== ws) return;
        this.state = "connected";
        this.reconnectAttempts = 0;
        this.logger.info({ url }, "Connected to cloud");
        this.startKeepalive(ws);
        this.flushQueue(ws);
        settle();
      });

      ws.on("message", (data) => {
        void this.handleRaw(data);
      });

      ws.on("pong", () => {
        this.awaitingPong = false;
      });

      ws.on("error", (err) => {
        const failure = new TransportFailureError(err.message, { url });
        this.logger.warn({ code: failure.code, error: failure.message }, "Cloud connection error");
      });

      ws.on("close", (code, reason) => {
        settle();
        if (this.ws !== ws) return;
        this.ws = null;
        this.stopKeepalive();
        if (this.state === "closed") return;
        this.logger.warn({ code, reason: reason.toString() }, "Cloud connection lost");
        this.scheduleReconnect();
      });
    });
  }

  private scheduleReconnect(): void {
    this.state = "reconnecting";
    this.reconnectAttempts++;
    const delay = Math.min(
      this.options.reconnectDelayMs * Math.pow(2, this.reconnectAttempts - 1),
      this.options.maxReconnectDelayMs,
    );
    this.logger.info({ delay, attempt: this.reconnectAttempts }, "Reconnecting to cloud");
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      if (this.state === "closed") return;
      void this.open();
    }, delay);
  }

  private startKeepalive(ws: WebSocket): void {
    this.stopKeepalive();
    this.awaitingPong = false;
    this.keepaliveTimer = setInterval(() => {
      if (this.awaitingPong) {
        this.logger.warn("Cloud keepalive missed, dropping connection");
        ws.terminate();
        return;
      }
      this.awaitingPong = true;
      ws.ping();
    }, this.options.pollIntervalMs);
  }

  private stopKeepalive(): void {
    if (this.keepaliveTimer) {
      clearInterval(this.keepaliveTimer);
      this.keepaliveTimer = null;
    }
  }

  private clearTimers(): void {
    this.stopKeepalive();
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
  }

  private sendFrame(frame: UpFrame): void {
    const ws = this.ws;
    if (!ws || this.state !== "connected" || ws.readyState !== WebSocket.OPEN) {
      const dropped = this.queue.enqueue(frame);
      if (dropped) {
        this.logger.warn({ type: dropped.type, queued: this.queue.size }, "Outbound queue full, dropped oldest frame");
      }
      return;
    }
    this.write(ws, frame);
  }

  private write(ws: WebSocket, frame: UpFrame): void {
    ws.send(JSON.stringify(frame), (err) => {
      if (err) {
        const failure = new TransportFailureError(err.message, { type: frame.type });
        this.logger.warn({ code: failure.code, error: failure.message }, "Failed to send frame");
      }
    });
  }

  private flushQueue(ws: WebSocket): void {
    const frames = this.queue.drain();
    if (frames.length === 0) return;
    this.logger.debug({ count: frames.length }, "Flushing queued frames");
    for (const frame of frames) {
      this.write(ws, frame);
    }
  }

  private async handleRaw(data: RawData): Promise<void> {
    let frame: DownFrame;
    try {
      frame = DownFrameSchema.parse(JSON.parse(rawToString(data)));
    } catch (err) {
      this.logger.warn({ error: errorMessage(err) }, "Ignoring malformed cloud frame");
      return;
    }

    try {
      await this.dispatch(frame);
    } catch (err) {
      this.logger.error({ type: frame.type, error: errorMessage(err) }, "Cloud frame handler failed");
    }
  }

  private async dispatch(frame: DownFrame): Promise<void> {
    switch (frame.type) {
      case "desired-state": {
        if (!this.desiredStateHandler) {
          this.logger.warn("Desired state received before a handler was registered");
          return;
        }
        await this.desiredStateHandler(frame.document);
        return;
      }
      case "message": {
        const ack = this.inboundHandler
          ? await this.inboundHandler(frame.body)
          : { accepted: false, error: "no inbound handler" };
        this.sendFrame({ type: "message-ack", id: frame.id, ...ack });
        return;
      }
      case "command": {
        let result: CommandResult;
        if (this.commandHandler) {
          result = await this.commandHandler(frame.method, frame.payload);
        } else {
          this.logger.warn({ method: frame.method }, "Command received before a handler was registered");
          result = { status: this.options.failureStatus ?? 500, response: JSON.stringify("no command handler") };
        }
        this.sendFrame({ type: "command-response", id: frame.id, ...result });
        return;
      }
    }
  }
}

function rawToString(data: RawData): string {
  if (Buffer.isBuffer(data)) return data.toString("utf-8");
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf-8");
  return Buffer.from(data).toString("utf-8");
}
