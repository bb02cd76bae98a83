/**
 * Relay State Store - snapshot and restore of the relay topology
 */

import { z } from "zod";

import type { Logger } from "../log.js";
import { parseRelayMode } from "./relay-mode.js";
import { FileStorageBackend, type StorageBackend } from "./storage.js";
import type { PersistedDescriptor } from "./types.js";

const CURRENT_VERSION = 1;

const PersistedEntrySchema = z.object({
  topic: z.string().min(1),
  msg_type: z.string().min(1),
  relay_mode: z.union([z.number(), z.string()]),
});

const StateFileSchema = z.object({
  version: z.number().int(),
  relays: z.array(z.unknown()),
});

export interface RelayStateStore {
  /** Persisted descriptors in registration order, or undefined on first run */
  read(): Promise<PersistedDescriptor[] | undefined>;
  write(descriptors: PersistedDescriptor[]): Promise<void>;
}

export class FileRelayStateStore implements RelayStateStore {
  private readonly filePath: string;
  private readonly logger: Logger;
  private readonly storage: StorageBackend;

  constructor(params: { filePath: string; logger: Logger; storage?: StorageBackend }) {
    this.filePath = params.filePath;
    this.logger = params.logger.child({ component: "state-store" });
    this.storage = params.storage ?? new FileStorageBackend();
  }

  get path(): string {
    return this.filePath;
  }

  async read(): Promise<PersistedDescriptor[] | undefined> {
    const raw = await this.storage.readJson(this.filePath);
    if (raw === undefined) {
      this.logger.debug({ filePath: this.filePath }, "No relay state file found, starting fresh");
      return undefined;
    }

    const file = StateFileSchema.parse(raw);
    if (file.version !== CURRENT_VERSION) {
      this.logger.warn(
        { fileVersion: file.version, currentVersion: CURRENT_VERSION },
        "Relay state file version mismatch",
      );
    }

    const descriptors: PersistedDescriptor[] = [];
    file.relays.forEach((entry, index) => {
      const parsed = PersistedEntrySchema.safeParse(entry);
      const mode = parsed.success ? parseRelayMode(parsed.data.relay_mode) : undefined;
      if (!parsed.success || mode === undefined) {
        this.logger.warn({ index }, "Skipping invalid persisted relay");
        return;
      }
      descriptors.push({ topic: parsed.data.topic, msg_type: parsed.data.msg_type, relay_mode: mode });
    });

    this.logger.info({ count: descriptors.length }, "Relay state loaded");
    return descriptors;
  }

  async write(descriptors: PersistedDescriptor[]): Promise<void> {
    await this.storage.writeJson(this.filePath, { version: CURRENT_VERSION, relays: descriptors });
    this.logger.debug({ count: descriptors.length }, "Relay state saved");
  }
}

/**
 * Keeps the snapshot in memory; for embedding without a state file
 */
export class MemoryRelayStateStore implements RelayStateStore {
  private snapshot: PersistedDescriptor[] | undefined;
  writes = 0;

  constructor(initial?: PersistedDescriptor[]) {
    this.snapshot = initial ? initial.map((d) => ({ ...d })) : undefined;
  }

  async read(): Promise<PersistedDescriptor[] | undefined> {
    return this.snapshot?.map((d) => ({ ...d }));
  }

  async write(descriptors: PersistedDescriptor[]): Promise<void> {
    this.snapshot = descriptors.map((d) => ({ ...d }));
    this.writes++;
  }
}
