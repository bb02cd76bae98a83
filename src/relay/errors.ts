/**
 * Relay Errors - per-channel and per-entry failures of the relay core
 *
 * None of these are fatal: callers log them and keep the other relays running.
 */

export type RelayErrorCode =
  | "INVALID_SCHEMA"
  | "CHANNEL_MISMATCH"
  | "PAYLOAD_DECODE"
  | "MALFORMED_DESIRED_STATE"
  | "LOCAL_CALL_FAILURE"
  | "TRANSPORT_FAILURE";

export class RelayError extends Error {
  readonly code: RelayErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(message: string, code: RelayErrorCode, details?: Record<string, unknown>) {
    super(message);
    this.name = "RelayError";
    this.code = code;
    this.details = details;
  }
}

/**
 * Payload type does not resolve on the local bus
 */
export class InvalidSchemaError extends RelayError {
  constructor(payloadType: string, channel?: string) {
    super(`Unknown message type '${payloadType}'`, "INVALID_SCHEMA", { payloadType, channel });
    this.name = "InvalidSchemaError";
  }
}

/**
 * Inbound cloud message does not fit the relay it was routed to
 */
export class ChannelMismatchError extends RelayError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, "CHANNEL_MISMATCH", details);
    this.name = "ChannelMismatchError";
  }
}

export class PayloadDecodeError extends RelayError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, "PAYLOAD_DECODE", details);
    this.name = "PayloadDecodeError";
  }
}

/**
 * Desired-state entry with a missing field or an unparseable mode
 */
export class MalformedDesiredStateError extends RelayError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, "MALFORMED_DESIRED_STATE", details);
    this.name = "MalformedDesiredStateError";
  }
}

export class LocalCallFailureError extends RelayError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, "LOCAL_CALL_FAILURE", details);
    this.name = "LocalCallFailureError";
  }
}

export class TransportFailureError extends RelayError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, "TRANSPORT_FAILURE", details);
    this.name = "TransportFailureError";
  }
}
