/**
 * Relay Service - wires the registry, reconciler and command bridge to the
 * local bus and the cloud transport
 *
 * Startup order: restore persisted relays, register cloud handlers, then
 * connect. Nothing from the cloud is processed before the restore finishes.
 */

import { z } from "zod";

import type { MemoryBus } from "../bus/memory-bus.js";
import type { LocalBus } from "../bus/types.js";
import type { CloudTransport, InboundAck } from "../cloud/types.js";
import type { Logger } from "../log.js";
import { errorMessage } from "../log.js";
import { CommandBridge } from "./command-bridge.js";
import { DesiredStateReconciler } from "./reconciler.js";
import { RelayRegistry } from "./registry.js";
import type { RelayStateStore } from "./state-store.js";
import { RelayMode, toPersisted } from "./types.js";

/**
 * Mode given to relays created by an inbound message for an unknown channel
 */
export const AUTO_CREATED_MODE = RelayMode.ToLocal;

const InboundEnvelopeSchema = z.object({
  topic: z.string().trim().min(1),
  msg_type: z.string().trim().min(1),
  payload: z.unknown(),
});

export interface RelayServiceParams {
  bus: LocalBus;
  transport: CloudTransport;
  store: RelayStateStore;
  logger: Logger;
  /** Publisher queue size for messages republished locally */
  queueSize?: number;
  commands: {
    successStatus: number;
    failureStatus: number;
    timeoutMs?: number;
  };
}

export class RelayService {
  readonly registry: RelayRegistry;
  readonly reconciler: DesiredStateReconciler;
  readonly bridge: CommandBridge;
  private readonly transport: CloudTransport;
  private readonly logger: Logger;
  private started = false;

  constructor(params: RelayServiceParams) {
    const { bus, transport, store } = params;
    this.transport = transport;
    this.logger = params.logger.child({ component: "relay-service" });

    this.registry = new RelayRegistry({
      bus,
      store,
      logger: params.logger,
      queueSize: params.queueSize,
      forward: (message) => transport.send(message),
    });

    const reportState = transport.reportState?.bind(transport);
    this.reconciler = new DesiredStateReconciler({
      registry: this.registry,
      logger: params.logger,
      report: reportState,
    });

    this.bridge = new CommandBridge({
      bus,
      logger: params.logger,
      successStatus: params.commands.successStatus,
      failureStatus: params.commands.failureStatus,
      timeoutMs: params.commands.timeoutMs,
    });
  }

  async start(): Promise<void> {
    if (this.started) return;
    this.started = true;

    const restored = await this.registry.restore();
    this.logger.info({ restored }, "Relays restored");

    this.transport.onDesiredState(async (document) => {
      await this.reconciler.reconcile(document);
    });
    this.transport.onInboundMessage((envelope) => this.handleInboundMessage(envelope));
    this.transport.onCommand((method, payload) => this.bridge.invoke(method, payload));

    await this.transport.connect();
    this.logger.info({ relays: this.registry.size }, "Relay service started");
  }

  /**
   * Route a cloud message to its relay, creating a to-local relay for
   * channels seen for the first time
   */
  async handleInboundMessage(envelope: unknown): Promise<InboundAck> {
    const parsed = InboundEnvelopeSchema.safeParse(envelope);
    if (!parsed.success) {
      this.logger.warn("Inbound cloud message without topic or msg_type dropped");
      return { accepted: false, error: "message needs topic and msg_type" };
    }
    const { topic, msg_type: payloadType, payload } = parsed.data;

    let entity = this.registry.find(topic);
    if (!entity) {
      try {
        entity = await this.registry.ensure(topic, payloadType, AUTO_CREATED_MODE);
      } catch (err) {
        this.logger.error({ topic, payloadType, error: errorMessage(err) }, "Cannot create relay for inbound message");
        return { accepted: false, error: errorMessage(err) };
      }
    }

    const result = entity.deliverFromCloud(topic, payloadType, payload);
    return result.ok ? { accepted: true } : { accepted: false, error: result.error.message };
  }

  async stop(): Promise<void> {
    try {
      await this.transport.close();
    } catch (err) {
      this.logger.warn({ error: errorMessage(err) }, "Failed to close cloud transport");
    }
    await this.registry.close();
    this.started = false;
    this.logger.info("Relay service stopped");
  }
}

/**
 * Services that let cloud commands inspect a running relay
 */
export function registerDiagnosticServices(bus: MemoryBus, service: RelayService): () => void {
  const removers = [
    bus.advertiseService("relay/list", () => service.registry.descriptors().map(toPersisted)),
    bus.advertiseService("relay/ping", (args) => args),
  ];
  return () => {
    for (const remove of removers) remove();
  };
}
