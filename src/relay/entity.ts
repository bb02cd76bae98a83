/**
 * Relay Entity - live local-bus bindings for one relayed channel
 *
 * A to-cloud entity holds a subscription whose deliveries are forwarded
 * upstream; a to-local entity holds a publisher that cloud messages are
 * pushed through. Bidirectional holds both.
 */

import type { BusPublisher, BusSubscription, LocalBus, MessageMeta } from "../bus/types.js";
import type { Logger } from "../log.js";
import { errorMessage } from "../log.js";
import { ChannelMismatchError, InvalidSchemaError, PayloadDecodeError, type RelayError } from "./errors.js";
import { publishesLocally, relayModeName, subscribesLocally } from "./relay-mode.js";
import type { ChannelDescriptor, OutboundMessage, RelayMode } from "./types.js";

/**
 * Fire-and-forget sink toward the cloud channel
 */
export type CloudForwarder = (message: OutboundMessage) => void;

export type DeliveryResult = { ok: true } | { ok: false; error: RelayError };

export interface RelayEntityDeps {
  bus: LocalBus;
  logger: Logger;
  forward: CloudForwarder;
  /** Publisher queue size for messages republished locally */
  queueSize?: number;
}

export class RelayEntity {
  private readonly descriptorValue: ChannelDescriptor;
  private readonly bus: LocalBus;
  private readonly logger: Logger;
  private readonly forward: CloudForwarder;
  private readonly queueSize?: number;
  private subscription: BusSubscription | null = null;
  private publisher: BusPublisher | null = null;
  private binds = 0;
  private bound = false;

  private constructor(descriptor: ChannelDescriptor, deps: RelayEntityDeps) {
    this.descriptorValue = { ...descriptor };
    this.bus = deps.bus;
    this.forward = deps.forward;
    this.queueSize = deps.queueSize;
    this.logger = deps.logger.child({ component: "relay-entity", channel: descriptor.channel });
  }

  /**
   * Validate the payload type and perform the initial bind.
   * @throws InvalidSchemaError when the type does not resolve on the bus
   */
  static create(descriptor: ChannelDescriptor, deps: RelayEntityDeps): RelayEntity {
    if (!deps.bus.resolveType(descriptor.payloadType)) {
      throw new InvalidSchemaError(descriptor.payloadType, descriptor.channel);
    }
    const entity = new RelayEntity(descriptor, deps);
    entity.rebind();
    return entity;
  }

  get channel(): string {
    return this.descriptorValue.channel;
  }

  get payloadType(): string {
    return this.descriptorValue.payloadType;
  }

  get mode(): RelayMode {
    return this.descriptorValue.mode;
  }

  /** Completed binds, the initial one included */
  get bindCount(): number {
    return this.binds;
  }

  /** False after a rebind that failed, until the next successful one */
  get isBound(): boolean {
    return this.bound;
  }

  get isSubscribed(): boolean {
    return this.subscription !== null;
  }

  get isPublishing(): boolean {
    return this.publisher !== null;
  }

  descriptor(): ChannelDescriptor {
    return { ...this.descriptorValue };
  }

  /**
   * Release every handle, then acquire exactly those the current mode needs.
   * On failure nothing stays bound and the error propagates.
   */
  rebind(): void {
    this.release();
    const { channel, payloadType, mode } = this.descriptorValue;

    try {
      if (subscribesLocally(mode)) {
        this.subscription = this.bus.subscribe(channel, payloadType, (message, meta) =>
          this.onLocalMessage(message, meta),
        );
      }
      if (publishesLocally(mode)) {
        this.publisher = this.bus.advertise(channel, payloadType, { queueSize: this.queueSize });
      }
    } catch (err) {
      this.release();
      throw err;
    }

    this.bound = true;
    this.binds++;
    this.logger.debug({ mode: relayModeName(mode) }, "Relay bound");
  }

  /**
   * Switch mode and rebind. If the new bindings cannot be acquired the
   * previous mode and its bindings are restored before rethrowing.
   */
  changeMode(mode: RelayMode): void {
    const previous = this.descriptorValue.mode;
    if (previous === mode) return;

    this.descriptorValue.mode = mode;
    try {
      this.rebind();
    } catch (err) {
      this.descriptorValue.mode = previous;
      this.rebind();
      throw err;
    }
    this.logger.info({ from: relayModeName(previous), to: relayModeName(mode) }, "Relay mode changed");
  }

  /**
   * Publish a cloud-originated payload on the local bus
   */
  deliverFromCloud(channel: string, payloadType: string, payload: unknown): DeliveryResult {
    if (channel !== this.channel || payloadType !== this.payloadType) {
      return this.reject(
        new ChannelMismatchError(
          `Message for ${channel} (${payloadType}) does not match relay ${this.channel} (${this.payloadType})`,
          { channel, payloadType },
        ),
      );
    }
    if (!this.publisher) {
      return this.reject(
        new ChannelMismatchError(`Relay ${this.channel} is ${relayModeName(this.mode)} and does not publish locally`, {
          channel,
          mode: this.mode,
        }),
      );
    }

    let message: unknown;
    try {
      message = this.bus.decode(payloadType, payload);
    } catch (err) {
      return this.reject(new PayloadDecodeError(`Cannot decode ${payloadType} payload: ${errorMessage(err)}`, { channel }));
    }

    this.publisher.publish(message);
    return { ok: true };
  }

  /**
   * Release all handles. Only used at teardown.
   */
  close(): void {
    this.release();
  }

  private release(): void {
    this.bound = false;
    if (this.subscription) {
      this.bus.unregister(this.subscription);
      this.subscription = null;
    }
    if (this.publisher) {
      this.bus.unregister(this.publisher);
      this.publisher = null;
    }
  }

  private reject(error: RelayError): DeliveryResult {
    this.logger.warn({ code: error.code, error: error.message }, "Inbound cloud message rejected");
    return { ok: false, error };
  }

  private onLocalMessage(message: unknown, meta: MessageMeta): void {
    // Our own republished cloud messages come back on bidirectional channels
    if (this.publisher && meta.publisherId === this.publisher.id) return;

    try {
      const payload = this.bus.encode(this.payloadType, message);
      this.forward({
        properties: { topic: this.channel },
        body: { topic: this.channel, msg_type: this.payloadType, payload },
      });
    } catch (err) {
      this.logger.error({ error: errorMessage(err) }, "Failed to forward local message");
    }
  }
}
