/**
 * Relay Registry - the authoritative set of relay entities, keyed by channel
 *
 * Every mutation (create, mode change + rebind, snapshot) runs inside one
 * serialized critical section, so a half-applied change is never observable
 * and at most one entity exists per channel.
 */

import type { LocalBus } from "../bus/types.js";
import type { Logger } from "../log.js";
import { errorMessage } from "../log.js";
import { RelayEntity, type CloudForwarder } from "./entity.js";
import { relayModeName } from "./relay-mode.js";
import type { RelayStateStore } from "./state-store.js";
import { fromPersisted, RelayMode, toPersisted, type ChannelDescriptor, type PersistedDescriptor } from "./types.js";

export type RegisterOutcome = "created" | "updated" | "unchanged";

export interface RegisterResult {
  entity: RelayEntity;
  outcome: RegisterOutcome;
}

export interface RelayRegistryParams {
  bus: LocalBus;
  logger: Logger;
  store: RelayStateStore;
  forward: CloudForwarder;
  queueSize?: number;
}

export class RelayRegistry {
  private readonly entities = new Map<string, RelayEntity>();
  private readonly bus: LocalBus;
  private readonly logger: Logger;
  private readonly store: RelayStateStore;
  private readonly forward: CloudForwarder;
  private readonly queueSize?: number;
  private queue: Promise<void> = Promise.resolve();

  constructor(params: RelayRegistryParams) {
    this.bus = params.bus;
    this.logger = params.logger.child({ component: "relay-registry" });
    this.store = params.store;
    this.forward = params.forward;
    this.queueSize = params.queueSize;
  }

  find(channel: string): RelayEntity | undefined {
    return this.entities.get(channel);
  }

  get size(): number {
    return this.entities.size;
  }

  /**
   * Current descriptors in registration order
   */
  descriptors(): ChannelDescriptor[] {
    return Array.from(this.entities.values(), (entity) => entity.descriptor());
  }

  /**
   * Create, update or leave alone the entity for a descriptor.
   * A bidirectional entity is never downgraded.
   * @throws InvalidSchemaError when a new entity's type does not resolve
   */
  async register(descriptor: ChannelDescriptor): Promise<RelayEntity> {
    const { entity } = await this.apply(descriptor);
    return entity;
  }

  /**
   * Like register, but also reports what changed
   */
  apply(descriptor: ChannelDescriptor): Promise<RegisterResult> {
    return this.exclusive(async () => {
      const result = this.applyUnlocked(descriptor);
      if (result.outcome !== "unchanged") {
        await this.persist();
      }
      return result;
    });
  }

  /**
   * Return the entity for a channel as-is, or create one with `defaultMode`.
   * Existing entities keep their mode whatever `defaultMode` says.
   */
  ensure(channel: string, payloadType: string, defaultMode: RelayMode = RelayMode.ToLocal): Promise<RelayEntity> {
    return this.exclusive(async () => {
      const existing = this.entities.get(channel);
      if (existing) return existing;

      const { entity } = this.applyUnlocked({ channel, payloadType, mode: defaultMode });
      this.logger.info({ channel, payloadType, mode: relayModeName(defaultMode) }, "Relay auto-created");
      await this.persist();
      return entity;
    });
  }

  /**
   * Replay the persisted topology in order. Snapshots are held back until
   * the whole sequence is applied, so an interrupted restore never shrinks
   * the state file. Bad entries are logged and skipped.
   */
  restore(): Promise<number> {
    return this.exclusive(async () => {
      let persisted: PersistedDescriptor[] | undefined;
      try {
        persisted = await this.store.read();
      } catch (err) {
        this.logger.error({ error: errorMessage(err) }, "Failed to read relay state, starting empty");
        return 0;
      }
      if (!persisted) return 0;

      let restored = 0;
      for (const entry of persisted) {
        try {
          this.applyUnlocked(fromPersisted(entry));
          restored++;
        } catch (err) {
          this.logger.error({ channel: entry.topic, error: errorMessage(err) }, "Failed to restore relay");
        }
      }

      await this.persist();
      this.logger.info({ restored, total: persisted.length }, "Relay state restored");
      return restored;
    });
  }

  /**
   * Write the current topology through the state store
   */
  snapshot(): Promise<void> {
    return this.exclusive(() => this.persist());
  }

  /**
   * Release every entity's bindings. Process teardown only.
   */
  close(): Promise<void> {
    return this.exclusive(async () => {
      for (const entity of this.entities.values()) {
        entity.close();
      }
      this.entities.clear();
    });
  }

  private applyUnlocked(descriptor: ChannelDescriptor): RegisterResult {
    const existing = this.entities.get(descriptor.channel);

    if (!existing) {
      const entity = RelayEntity.create(descriptor, {
        bus: this.bus,
        logger: this.logger,
        forward: this.forward,
        queueSize: this.queueSize,
      });
      this.entities.set(descriptor.channel, entity);
      this.logger.info(
        { channel: descriptor.channel, payloadType: descriptor.payloadType, mode: relayModeName(descriptor.mode) },
        "Relay registered",
      );
      return { entity, outcome: "created" };
    }

    if (existing.payloadType !== descriptor.payloadType) {
      this.logger.warn(
        { channel: descriptor.channel, current: existing.payloadType, requested: descriptor.payloadType },
        "Relay payload type cannot change, keeping current type",
      );
    }

    if (existing.mode === descriptor.mode || existing.mode === RelayMode.Bidirectional) {
      if (existing.isBound) {
        return { entity: existing, outcome: "unchanged" };
      }
      // A failed mode change whose rollback also failed leaves no handles
      existing.rebind();
      this.logger.info({ channel: descriptor.channel, mode: relayModeName(existing.mode) }, "Relay rebound");
      return { entity: existing, outcome: "updated" };
    }

    existing.changeMode(descriptor.mode);
    return { entity: existing, outcome: "updated" };
  }

  private async persist(): Promise<void> {
    try {
      await this.store.write(this.descriptors().map(toPersisted));
    } catch (err) {
      this.logger.error({ error: errorMessage(err) }, "Failed to write relay state");
    }
  }

  private exclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task);
    this.queue = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }
}
