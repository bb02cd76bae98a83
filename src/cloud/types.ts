/**
 * Cloud Transport Types - the opaque bidirectional channel to the cloud
 */

import type { ReportedState } from "../relay/reconciler.js";
import type { CommandResult, OutboundMessage } from "../relay/types.js";

export interface InboundAck {
  accepted: boolean;
  error?: string;
}

export type DesiredStateHandler = (document: unknown) => Promise<void>;
export type InboundMessageHandler = (envelope: unknown) => Promise<InboundAck>;
export type CommandHandler = (method: string, payload: unknown) => Promise<CommandResult>;

export type ConnectionState = "disconnected" | "connecting" | "connected" | "reconnecting" | "closed";

export interface CloudTransport {
  onDesiredState(handler: DesiredStateHandler): void;
  onInboundMessage(handler: InboundMessageHandler): void;
  onCommand(handler: CommandHandler): void;
  /** Fire-and-forget; failures are logged by the transport and never thrown */
  send(message: OutboundMessage): void;
  reportState?(state: ReportedState): Promise<void>;
  connect(): Promise<void>;
  close(): Promise<void>;
}
