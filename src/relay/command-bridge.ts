/**
 * Command Bridge - cloud command invocation → local service call → cloud response
 *
 * Each invocation awaits a one-shot outcome that the first service callback
 * settles; later callbacks are ignored. Concurrent invocations are
 * independent and none can be cancelled once dispatched.
 */

import { randomUUID } from "node:crypto";

import type { LocalBus } from "../bus/types.js";
import type { Logger } from "../log.js";
import { errorMessage } from "../log.js";
import { LocalCallFailureError } from "./errors.js";
import type { CommandResult, CommandState, PendingCommand } from "./types.js";

const LEGAL_TRANSITIONS: Record<CommandState, CommandState[]> = {
  received: ["dispatched", "failed"],
  dispatched: ["succeeded", "failed"],
  succeeded: ["completed"],
  failed: ["completed"],
  completed: [],
};

export function canTransition(from: CommandState, to: CommandState): boolean {
  return LEGAL_TRANSITIONS[from].includes(to);
}

type LocalCallOutcome = { ok: true; value: unknown } | { ok: false; error: LocalCallFailureError };

export interface CommandBridgeOptions {
  bus: LocalBus;
  logger: Logger;
  successStatus: number;
  failureStatus: number;
  /** Fail commands whose local call has not completed after this long. Unset waits forever. */
  timeoutMs?: number;
}

export class CommandBridge {
  private readonly bus: LocalBus;
  private readonly logger: Logger;
  private readonly successStatus: number;
  private readonly failureStatus: number;
  private readonly timeoutMs?: number;
  private readonly pending = new Map<string, PendingCommand>();

  constructor(options: CommandBridgeOptions) {
    this.bus = options.bus;
    this.logger = options.logger.child({ component: "command-bridge" });
    this.successStatus = options.successStatus;
    this.failureStatus = options.failureStatus;
    this.timeoutMs = options.timeoutMs;
  }

  /**
   * Commands received but not yet answered
   */
  get pendingCommands(): PendingCommand[] {
    return Array.from(this.pending.values(), (command) => ({ ...command }));
  }

  /**
   * Run one command. `rawArgs` is the JSON-encoded argument object; an
   * empty string means no arguments. Never rejects.
   */
  async invoke(method: string, rawArgs: unknown, id: string = randomUUID()): Promise<CommandResult> {
    const command: PendingCommand = { id, method, args: undefined, state: "received", createdAt: Date.now() };
    this.pending.set(id, command);
    this.logger.debug({ id, method }, "Command received");

    try {
      let outcome: LocalCallOutcome;
      try {
        command.args = decodeArgs(rawArgs);
        outcome = await this.dispatch(command);
      } catch (err) {
        outcome = {
          ok: false,
          error: new LocalCallFailureError(`Invalid command arguments: ${errorMessage(err)}`, { method }),
        };
      }

      const result = this.toResult(command, outcome);
      this.transition(command, "completed");
      return result;
    } finally {
      this.pending.delete(id);
    }
  }

  private dispatch(command: PendingCommand): Promise<LocalCallOutcome> {
    return new Promise<LocalCallOutcome>((resolve) => {
      let settled = false;
      let timer: NodeJS.Timeout | undefined;

      const settle = (outcome: LocalCallOutcome): void => {
        if (settled) {
          this.logger.warn({ id: command.id, method: command.method }, "Ignoring late service callback");
          return;
        }
        settled = true;
        if (timer) clearTimeout(timer);
        resolve(outcome);
      };

      this.transition(command, "dispatched");

      if (this.timeoutMs !== undefined && this.timeoutMs > 0) {
        const timeoutMs = this.timeoutMs;
        timer = setTimeout(() => {
          settle({
            ok: false,
            error: new LocalCallFailureError(`command timed out after ${timeoutMs}ms`, { method: command.method }),
          });
        }, timeoutMs);
      }

      try {
        this.bus.callService(
          command.method,
          command.args,
          (value) => settle({ ok: true, value }),
          (description) =>
            settle({ ok: false, error: new LocalCallFailureError(description, { method: command.method }) }),
        );
      } catch (err) {
        settle({ ok: false, error: new LocalCallFailureError(errorMessage(err), { method: command.method }) });
      }
    });
  }

  private toResult(command: PendingCommand, outcome: LocalCallOutcome): CommandResult {
    if (outcome.ok) {
      try {
        const response = JSON.stringify(outcome.value ?? null);
        this.transition(command, "succeeded");
        this.logger.debug({ id: command.id, method: command.method }, "Command succeeded");
        return { status: this.successStatus, response };
      } catch (err) {
        return this.toResult(command, {
          ok: false,
          error: new LocalCallFailureError(`Cannot encode result: ${errorMessage(err)}`, { method: command.method }),
        });
      }
    }

    this.transition(command, "failed");
    this.logger.warn({ id: command.id, method: command.method, error: outcome.error.message }, "Command failed");
    return { status: this.failureStatus, response: JSON.stringify(outcome.error.message) };
  }

  private transition(command: PendingCommand, to: CommandState): void {
    if (!canTransition(command.state, to)) {
      throw new Error(`Illegal command transition ${command.state} -> ${to}`);
    }
    command.state = to;
  }
}

function decodeArgs(rawArgs: unknown): unknown {
  if (typeof rawArgs !== "string") return rawArgs ?? {};
  if (rawArgs.trim() === "") return {};
  return JSON.parse(rawArgs);
}
