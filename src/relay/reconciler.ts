/**
 * Desired-State Reconciler - applies cloud-pushed relay topology documents
 *
 * Entries are applied one by one; a bad entry is logged and skipped and
 * never aborts the rest of the document.
 */

import { z } from "zod";

import type { Logger } from "../log.js";
import { errorMessage } from "../log.js";
import { MalformedDesiredStateError, RelayError, type RelayErrorCode } from "./errors.js";
import type { RelayRegistry } from "./registry.js";
import { parseRelayMode } from "./relay-mode.js";
import { toPersisted, type PersistedDescriptor } from "./types.js";

const DesiredStateSchema = z
  .object({
    relays: z.record(z.unknown()),
  })
  .passthrough();

const DesiredEntrySchema = z.object({
  topic: z.string().trim().min(1),
  msg_type: z.string().trim().min(1),
  relay_mode: z.unknown(),
});

export interface SkippedEntry {
  key: string;
  code: RelayErrorCode | "BIND_FAILED";
  reason: string;
}

export interface ReconcileReport {
  applied: string[];
  unchanged: string[];
  skipped: SkippedEntry[];
}

/**
 * Topology reported back upstream after each reconciliation
 */
export interface ReportedState {
  relays: Record<string, PersistedDescriptor>;
}

export type StateReporter = (state: ReportedState) => void | Promise<void>;

export class DesiredStateReconciler {
  private readonly registry: RelayRegistry;
  private readonly logger: Logger;
  private readonly report?: StateReporter;
  private queue: Promise<void> = Promise.resolve();

  constructor(params: { registry: RelayRegistry; logger: Logger; report?: StateReporter }) {
    this.registry = params.registry;
    this.logger = params.logger.child({ component: "reconciler" });
    this.report = params.report;
  }

  /**
   * Apply a desired-state document. Documents are applied in arrival order.
   */
  reconcile(document: unknown): Promise<ReconcileReport> {
    const run = this.queue.then(() => this.apply(document));
    this.queue = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  private async apply(document: unknown): Promise<ReconcileReport> {
    const report: ReconcileReport = { applied: [], unchanged: [], skipped: [] };

    const parsed = DesiredStateSchema.safeParse(document);
    if (!parsed.success) {
      const error = new MalformedDesiredStateError("Desired state has no 'relays' mapping");
      this.logger.error({ code: error.code, error: error.message }, "Desired state rejected");
    } else {
      for (const [key, value] of Object.entries(parsed.data.relays)) {
        if (key.startsWith("$")) continue;
        if (value === null) {
          this.logger.debug({ key }, "Ignoring removed relay entry");
          continue;
        }
        await this.applyEntry(key, value, report);
      }
    }

    await this.registry.snapshot();
    await this.reportState();

    this.logger.info(
      { applied: report.applied.length, unchanged: report.unchanged.length, skipped: report.skipped.length },
      "Desired state reconciled",
    );
    return report;
  }

  private async applyEntry(key: string, value: unknown, report: ReconcileReport): Promise<void> {
    const entry = DesiredEntrySchema.safeParse(value);
    if (!entry.success) {
      this.skip(report, key, new MalformedDesiredStateError("Relay entry needs topic and msg_type", { key }));
      return;
    }

    const mode = parseRelayMode(entry.data.relay_mode);
    if (mode === undefined) {
      this.skip(
        report,
        key,
        new MalformedDesiredStateError(`Unrecognized relay_mode ${JSON.stringify(entry.data.relay_mode) ?? "undefined"}`, {
          key,
        }),
      );
      return;
    }

    try {
      const { outcome } = await this.registry.apply({
        channel: entry.data.topic,
        payloadType: entry.data.msg_type,
        mode,
      });
      (outcome === "unchanged" ? report.unchanged : report.applied).push(key);
    } catch (err) {
      this.skip(report, key, err);
    }
  }

  private skip(report: ReconcileReport, key: string, err: unknown): void {
    const code = err instanceof RelayError ? err.code : "BIND_FAILED";
    const reason = errorMessage(err);
    report.skipped.push({ key, code, reason });
    this.logger.error({ key, code, error: reason }, "Desired relay entry skipped");
  }

  private async reportState(): Promise<void> {
    if (!this.report) return;
    const relays: Record<string, PersistedDescriptor> = {};
    for (const descriptor of this.registry.descriptors()) {
      relays[descriptor.channel] = toPersisted(descriptor);
    }
    try {
      await this.report({ relays });
    } catch (err) {
      this.logger.warn({ error: errorMessage(err) }, "Failed to report relay state");
    }
  }
}
