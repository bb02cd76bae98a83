/**
 * Memory Bus - in-process publish/subscribe bus with typed channels and services
 */

import type { Logger } from "../log.js";
import { errorMessage } from "../log.js";
import { createTextCodec, mapStrings, type StringEncoding, type TextCodec } from "./codec.js";
import { MessageTypeRegistry } from "./message-types.js";
import type {
  AdvertiseOptions,
  BusHandle,
  BusPublisher,
  BusSubscription,
  LocalBus,
  MessageCallback,
  MessageType,
  ServiceFailure,
  ServiceSuccess,
} from "./types.js";

export type ServiceHandler = (args: unknown) => unknown;

const DEFAULT_QUEUE_SIZE = 10;

interface SubscriptionEntry extends BusSubscription {
  onMessage: MessageCallback;
}

interface PublisherEntry extends BusPublisher {
  queueSize: number;
  queue: unknown[];
  flushScheduled: boolean;
  closed: boolean;
}

interface ChannelEntry {
  typeName: string;
  subscriptions: Map<number, SubscriptionEntry>;
  publishers: Map<number, PublisherEntry>;
}

export class MemoryBus implements LocalBus {
  private readonly channels = new Map<string, ChannelEntry>();
  private readonly services = new Map<string, ServiceHandler>();
  private readonly types: MessageTypeRegistry;
  private readonly codec: TextCodec;
  private readonly logger: Logger;
  private nextHandleId = 1;
  private pendingFlushes = 0;

  constructor(params: { logger: Logger; types?: MessageTypeRegistry; stringEncoding?: StringEncoding }) {
    this.logger = params.logger.child({ component: "memory-bus" });
    this.types = params.types ?? new MessageTypeRegistry();
    this.codec = createTextCodec(params.stringEncoding ?? "utf8");
  }

  get typeRegistry(): MessageTypeRegistry {
    return this.types;
  }

  resolveType(typeName: string): MessageType | undefined {
    return this.types.resolve(typeName);
  }

  subscribe(channel: string, typeName: string, onMessage: MessageCallback): BusSubscription {
    const entry = this.channelFor(channel, typeName);
    const subscription: SubscriptionEntry = {
      id: this.nextHandleId++,
      channel,
      typeName,
      kind: "subscription",
      onMessage,
    };
    entry.subscriptions.set(subscription.id, subscription);
    this.logger.debug({ channel, typeName, handle: subscription.id }, "Subscribed");
    return subscription;
  }

  advertise(channel: string, typeName: string, options: AdvertiseOptions = {}): BusPublisher {
    const entry = this.channelFor(channel, typeName);
    const id = this.nextHandleId++;
    const publisher: PublisherEntry = {
      id,
      channel,
      typeName,
      kind: "publisher",
      queueSize: Math.max(1, options.queueSize ?? DEFAULT_QUEUE_SIZE),
      queue: [],
      flushScheduled: false,
      closed: false,
      publish: (message: unknown) => this.enqueue(publisher, message),
    };
    entry.publishers.set(id, publisher);
    this.logger.debug({ channel, typeName, handle: id }, "Advertised");
    return publisher;
  }

  unregister(handle: BusHandle): void {
    const entry = this.channels.get(handle.channel);
    if (!entry) return;

    if (handle.kind === "publisher") {
      const publisher = entry.publishers.get(handle.id);
      if (publisher) {
        // Messages already accepted for publishing still reach current subscribers
        this.flush(publisher);
        publisher.closed = true;
        entry.publishers.delete(handle.id);
      }
    } else {
      entry.subscriptions.delete(handle.id);
    }

    if (entry.publishers.size === 0 && entry.subscriptions.size === 0) {
      this.channels.delete(handle.channel);
    }
  }

  encode(typeName: string, message: unknown): unknown {
    const parsed = this.requireType(typeName).schema.parse(message);
    return mapStrings(parsed, this.codec.encode);
  }

  decode(typeName: string, payload: unknown): unknown {
    const type = this.requireType(typeName);
    return type.schema.parse(mapStrings(payload, this.codec.decode));
  }

  /**
   * Register a local service. Returns an unregister function.
   */
  advertiseService(name: string, handler: ServiceHandler): () => void {
    this.services.set(name, handler);
    return () => {
      if (this.services.get(name) === handler) {
        this.services.delete(name);
      }
    };
  }

  callService(name: string, args: unknown, onSuccess: ServiceSuccess, onFailure: ServiceFailure): void {
    const handler = this.services.get(name);
    if (!handler) {
      throw new Error(`Service not found: ${name}`);
    }

    void Promise.resolve()
      .then(() => handler(args))
      .then(onSuccess, (err: unknown) => onFailure(errorMessage(err)))
      .catch((err: unknown) => {
        this.logger.error({ service: name, error: errorMessage(err) }, "Service callback error");
      });
  }

  /**
   * Resolve once every queued message has been delivered
   */
  async drain(): Promise<void> {
    while (this.pendingFlushes > 0) {
      await new Promise<void>((resolve) => setImmediate(resolve));
    }
  }

  /**
   * Number of live handles on a channel
   */
  handleCount(channel: string): { subscriptions: number; publishers: number } {
    const entry = this.channels.get(channel);
    return {
      subscriptions: entry?.subscriptions.size ?? 0,
      publishers: entry?.publishers.size ?? 0,
    };
  }

  private channelFor(channel: string, typeName: string): ChannelEntry {
    this.requireType(typeName);
    let entry = this.channels.get(channel);
    if (!entry) {
      entry = { typeName, subscriptions: new Map(), publishers: new Map() };
      this.channels.set(channel, entry);
    } else if (entry.typeName !== typeName) {
      throw new Error(`Channel '${channel}' carries ${entry.typeName}, not ${typeName}`);
    }
    return entry;
  }

  private requireType(typeName: string): MessageType {
    const type = this.types.resolve(typeName);
    if (!type) {
      throw new Error(`Unknown message type '${typeName}'`);
    }
    return type;
  }

  private enqueue(publisher: PublisherEntry, message: unknown): void {
    if (publisher.closed) {
      throw new Error(`Publisher on '${publisher.channel}' is closed`);
    }
    const parsed = this.requireType(publisher.typeName).schema.parse(message);

    publisher.queue.push(parsed);
    if (publisher.queue.length > publisher.queueSize) {
      publisher.queue.shift();
      this.logger.warn({ channel: publisher.channel, queueSize: publisher.queueSize }, "Publish queue full, dropped oldest message");
    }

    if (!publisher.flushScheduled) {
      publisher.flushScheduled = true;
      this.pendingFlushes++;
      setImmediate(() => {
        publisher.flushScheduled = false;
        this.pendingFlushes--;
        this.flush(publisher);
      });
    }
  }

  private flush(publisher: PublisherEntry): void {
    const messages = publisher.queue.splice(0);
    const entry = this.channels.get(publisher.channel);
    if (!entry || publisher.closed) return;

    for (const message of messages) {
      for (const subscription of Array.from(entry.subscriptions.values())) {
        try {
          subscription.onMessage(message, { publisherId: publisher.id });
        } catch (err) {
          this.logger.error(
            { channel: publisher.channel, handle: subscription.id, error: errorMessage(err) },
            "Subscriber error",
          );
        }
      }
    }
  }
}
