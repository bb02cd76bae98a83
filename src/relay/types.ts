/**
 * Relay Types - descriptors, envelopes and commands shared by the relay core
 */

/**
 * Direction(s) in which a channel's traffic is mirrored.
 * The numeric codes are the ones used on the wire and in the state file.
 */
export const RelayMode = {
  ToLocal: 1,
  ToCloud: 2,
  Bidirectional: 3,
} as const;

export type RelayMode = (typeof RelayMode)[keyof typeof RelayMode];

/**
 * Identifies one relayed channel
 */
export interface ChannelDescriptor {
  channel: string;
  payloadType: string;
  mode: RelayMode;
}

/**
 * Descriptor as written to the state file and exchanged with the cloud
 */
export interface PersistedDescriptor {
  topic: string;
  msg_type: string;
  relay_mode: RelayMode;
}

/**
 * Message body exchanged with the cloud in both directions
 */
export interface RelayEnvelope {
  topic: string;
  msg_type: string;
  payload: unknown;
}

/**
 * Outbound message plus transport-level properties
 */
export interface OutboundMessage {
  properties: { topic: string };
  body: RelayEnvelope;
}

export interface CommandResult {
  status: number;
  /** JSON-encoded result or error description */
  response: string;
}

export type CommandState = "received" | "dispatched" | "succeeded" | "failed" | "completed";

/**
 * Transient record of an in-flight command invocation
 */
export interface PendingCommand {
  id: string;
  method: string;
  args: unknown;
  state: CommandState;
  createdAt: number;
}

export function toPersisted(descriptor: ChannelDescriptor): PersistedDescriptor {
  return {
    topic: descriptor.channel,
    msg_type: descriptor.payloadType,
    relay_mode: descriptor.mode,
  };
}

export function fromPersisted(persisted: PersistedDescriptor): ChannelDescriptor {
  return {
    channel: persisted.topic,
    payloadType: persisted.msg_type,
    mode: persisted.relay_mode,
  };
}
