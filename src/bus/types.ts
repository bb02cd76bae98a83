/**
 * Local Bus Types - the narrow interface the relay core consumes
 */

import type { z } from "zod";

/**
 * A named message schema, e.g. "std_msgs/String"
 */
export interface MessageType {
  name: string;
  schema: z.ZodTypeAny;
}

export type BusHandleKind = "subscription" | "publisher";

export interface BusHandle {
  readonly id: number;
  readonly channel: string;
  readonly typeName: string;
  readonly kind: BusHandleKind;
}

export interface BusPublisher extends BusHandle {
  readonly kind: "publisher";
  publish(message: unknown): void;
}

export interface BusSubscription extends BusHandle {
  readonly kind: "subscription";
}

export interface MessageMeta {
  /** Handle id of the publisher that produced the message */
  publisherId: number;
}

export type MessageCallback = (message: unknown, meta: MessageMeta) => void;

export interface AdvertiseOptions {
  /** Outgoing messages buffered per publisher before the oldest is dropped */
  queueSize?: number;
}

export type ServiceSuccess = (result: unknown) => void;
export type ServiceFailure = (description: string) => void;

export interface LocalBus {
  resolveType(typeName: string): MessageType | undefined;
  subscribe(channel: string, typeName: string, onMessage: MessageCallback): BusSubscription;
  advertise(channel: string, typeName: string, options?: AdvertiseOptions): BusPublisher;
  unregister(handle: BusHandle): void;
  /** Message → JSON payload for the cloud */
  encode(typeName: string, message: unknown): unknown;
  /** JSON payload from the cloud → message; throws when the payload does not fit the type */
  decode(typeName: string, payload: unknown): unknown;
  /**
   * Invoke a local service. Exactly one of the callbacks fires, unless the
   * call throws synchronously.
   */
  callService(name: string, args: unknown, onSuccess: ServiceSuccess, onFailure: ServiceFailure): void;
}
