import { describe, expect, it } from "vitest";

import { MemoryBus } from "../../../src/bus/memory-bus.js";
import type { BusPublisher, BusSubscription, LocalBus, MessageType, ServiceFailure, ServiceSuccess } from "../../../src/bus/types.js";
import { canTransition, CommandBridge } from "../../../src/relay/command-bridge.js";
import { captureLogger, LEVEL, silentLogger } from "../../helpers/logger.js";

function createBridge(bus: LocalBus, options: { timeoutMs?: number } = {}, logger = silentLogger()) {
  return new CommandBridge({ bus, logger, successStatus: 200, failureStatus: 500, timeoutMs: options.timeoutMs });
}

function deferred<T>() {
  let resolve: (value: T) => void = () => {};
  const promise = new Promise<T>((res) => {
    resolve = res;
  });
  return { promise, resolve };
}

/**
 * Bus whose service call fires both callbacks, success first
 */
class DoubleCallbackBus implements LocalBus {
  resolveType(): MessageType | undefined {
    return undefined;
  }
  subscribe(): BusSubscription {
    throw new Error("not used");
  }
  advertise(): BusPublisher {
    throw new Error("not used");
  }
  unregister(): void {}
  encode(): unknown {
    throw new Error("not used");
  }
  decode(): unknown {
    throw new Error("not used");
  }
  callService(_name: string, _args: unknown, onSuccess: ServiceSuccess, onFailure: ServiceFailure): void {
    onSuccess("first");
    onFailure("second");
  }
}

describe("CommandBridge", () => {
  it("returns the service result with the success status", async () => {
    const bus = new MemoryBus({ logger: silentLogger() });
    bus.advertiseService("echo", (args) => args);

    await expect(createBridge(bus).invoke("echo", '{"x":1,"name":"arm"}')).resolves.toEqual({
      status: 200,
      response: '{"x":1,"name":"arm"}',
    });
  });

  it("passes an empty object for an empty argument string", async () => {
    const bus = new MemoryBus({ logger: silentLogger() });
    bus.advertiseService("echo", (args) => args);

    await expect(createBridge(bus).invoke("echo", "")).resolves.toEqual({ status: 200, response: "{}" });
  });

  it("accepts already-decoded arguments", async () => {
    const bus = new MemoryBus({ logger: silentLogger() });
    bus.advertiseService("echo", (args) => args);

    await expect(createBridge(bus).invoke("echo", { speed: 2 })).resolves.toEqual({
      status: 200,
      response: '{"speed":2}',
    });
  });

  it("encodes an undefined result as null", async () => {
    const bus = new MemoryBus({ logger: silentLogger() });
    bus.advertiseService("noop", () => undefined);

    await expect(createBridge(bus).invoke("noop", "")).resolves.toEqual({ status: 200, response: "null" });
  });

  it("returns the failure description with the failure status", async () => {
    const bus = new MemoryBus({ logger: silentLogger() });
    bus.advertiseService("arm/move", async () => {
      throw new Error("joint limit exceeded");
    });

    await expect(createBridge(bus).invoke("arm/move", "{}")).resolves.toEqual({
      status: 500,
      response: '"joint limit exceeded"',
    });
  });

  it("fails when the service does not exist", async () => {
    const bus = new MemoryBus({ logger: silentLogger() });

    await expect(createBridge(bus).invoke("missing", "{}")).resolves.toEqual({
      status: 500,
      response: '"Service not found: missing"',
    });
  });

  it("fails without calling the service when the arguments are not JSON", async () => {
    const bus = new MemoryBus({ logger: silentLogger() });
    let calls = 0;
    bus.advertiseService("echo", (args) => {
      calls++;
      return args;
    });

    const result = await createBridge(bus).invoke("echo", "{not json");

    expect(result.status).toBe(500);
    expect(JSON.parse(result.response)).toMatch(/^Invalid command arguments: /);
    expect(calls).toBe(0);
  });

  it("uses the first outcome and ignores later callbacks", async () => {
    const { logger, messages } = captureLogger();
    const bridge = createBridge(new DoubleCallbackBus(), {}, logger);

    await expect(bridge.invoke("anything", "")).resolves.toEqual({ status: 200, response: '"first"' });
    expect(messages(LEVEL.warn)).toEqual(["Ignoring late service callback"]);
  });

  it("fails a command that outlives the timeout", async () => {
    const bus = new MemoryBus({ logger: silentLogger() });
    bus.advertiseService("slow", () => new Promise(() => {}));

    await expect(createBridge(bus, { timeoutMs: 20 }).invoke("slow", "")).resolves.toEqual({
      status: 500,
      response: '"command timed out after 20ms"',
    });
  });

  it("tracks in-flight commands until they complete", async () => {
    const bus = new MemoryBus({ logger: silentLogger() });
    const gate = deferred<string>();
    bus.advertiseService("wait", () => gate.promise);
    const bridge = createBridge(bus);

    const pending = bridge.invoke("wait", "", "cmd-1");
    expect(bridge.pendingCommands.map(({ id, method, state }) => ({ id, method, state }))).toEqual([
      { id: "cmd-1", method: "wait", state: "dispatched" },
    ]);

    gate.resolve("done");
    await expect(pending).resolves.toEqual({ status: 200, response: '"done"' });
    expect(bridge.pendingCommands).toEqual([]);
  });

  it("answers concurrent commands independently", async () => {
    const bus = new MemoryBus({ logger: silentLogger() });
    const gates = new Map([
      ["a", deferred<string>()],
      ["b", deferred<string>()],
    ]);
    bus.advertiseService("wait", (args) => {
      const key = typeof args === "object" && args !== null && "key" in args ? String(args.key) : "";
      return gates.get(key)?.promise;
    });
    const bridge = createBridge(bus);

    const first = bridge.invoke("wait", '{"key":"a"}');
    const second = bridge.invoke("wait", '{"key":"b"}');
    gates.get("b")?.resolve("second");
    await expect(second).resolves.toEqual({ status: 200, response: '"second"' });

    gates.get("a")?.resolve("first");
    await expect(first).resolves.toEqual({ status: 200, response: '"first"' });
  });

  it("uses the configured status codes", async () => {
    const bus = new MemoryBus({ logger: silentLogger() });
    bus.advertiseService("ok", () => true);
    const bridge = new CommandBridge({ bus, logger: silentLogger(), successStatus: 0, failureStatus: 1 });

    await expect(bridge.invoke("ok", "")).resolves.toEqual({ status: 0, response: "true" });
    await expect(bridge.invoke("nope", "")).resolves.toEqual({ status: 1, response: '"Service not found: nope"' });
  });
});

describe("canTransition()", () => {
  it("follows the command lifecycle", () => {
    expect(canTransition("received", "dispatched")).toBe(true);
    expect(canTransition("dispatched", "succeeded")).toBe(true);
    expect(canTransition("dispatched", "failed")).toBe(true);
    expect(canTransition("succeeded", "completed")).toBe(true);
    expect(canTransition("received", "completed")).toBe(false);
    expect(canTransition("completed", "dispatched")).toBe(false);
  });
});
