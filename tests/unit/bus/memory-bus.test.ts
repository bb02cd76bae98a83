import { describe, expect, it } from "vitest";

import { MemoryBus } from "../../../src/bus/memory-bus.js";
import type { MessageMeta } from "../../../src/bus/types.js";
import { captureLogger, LEVEL, silentLogger } from "../../helpers/logger.js";

function callService(bus: MemoryBus, name: string, args: unknown): Promise<{ ok: boolean; value: unknown }> {
  return new Promise((resolve) => {
    bus.callService(
      name,
      args,
      (value) => resolve({ ok: true, value }),
      (description) => resolve({ ok: false, value: description }),
    );
  });
}

describe("MemoryBus", () => {
  it("delivers published messages to subscribers with the publisher id", async () => {
    const bus = new MemoryBus({ logger: silentLogger() });
    const received: Array<{ message: unknown; meta: MessageMeta }> = [];
    bus.subscribe("/chatter", "std_msgs/String", (message, meta) => received.push({ message, meta }));
    const publisher = bus.advertise("/chatter", "std_msgs/String");

    publisher.publish({ data: "hello" });
    expect(received).toEqual([]);

    await bus.drain();
    expect(received).toEqual([{ message: { data: "hello" }, meta: { publisherId: publisher.id } }]);
  });

  it("rejects unknown message types", () => {
    const bus = new MemoryBus({ logger: silentLogger() });
    expect(() => bus.subscribe("/x", "nope/Type", () => {})).toThrow("Unknown message type 'nope/Type'");
  });

  it("keeps one message type per channel", () => {
    const bus = new MemoryBus({ logger: silentLogger() });
    bus.advertise("/chatter", "std_msgs/String");
    expect(() => bus.subscribe("/chatter", "std_msgs/Int32", () => {})).toThrow(
      "Channel '/chatter' carries std_msgs/String, not std_msgs/Int32",
    );
  });

  it("drops the oldest message when a publisher queue overflows", async () => {
    const { logger, messages } = captureLogger();
    const bus = new MemoryBus({ logger });
    const received: unknown[] = [];
    bus.subscribe("/chatter", "std_msgs/String", (message) => received.push(message));
    const publisher = bus.advertise("/chatter", "std_msgs/String", { queueSize: 2 });

    publisher.publish({ data: "a" });
    publisher.publish({ data: "b" });
    publisher.publish({ data: "c" });
    await bus.drain();

    expect(received).toEqual([{ data: "b" }, { data: "c" }]);
    expect(messages(LEVEL.warn)).toEqual(["Publish queue full, dropped oldest message"]);
  });

  it("validates messages on publish", () => {
    const bus = new MemoryBus({ logger: silentLogger() });
    const publisher = bus.advertise("/count", "std_msgs/Int32");
    expect(() => publisher.publish({ data: "three" })).toThrow();
  });

  it("delivers queued messages before a publisher is unregistered", async () => {
    const bus = new MemoryBus({ logger: silentLogger() });
    const received: unknown[] = [];
    bus.subscribe("/chatter", "std_msgs/String", (message) => received.push(message));
    const publisher = bus.advertise("/chatter", "std_msgs/String");

    publisher.publish({ data: "queued" });
    bus.unregister(publisher);
    expect(received).toEqual([{ data: "queued" }]);

    await bus.drain();
    expect(received).toEqual([{ data: "queued" }]);
  });

  it("removes the channel once its last handle is unregistered", () => {
    const bus = new MemoryBus({ logger: silentLogger() });
    const subscription = bus.subscribe("/chatter", "std_msgs/String", () => {});
    const publisher = bus.advertise("/chatter", "std_msgs/String");
    expect(bus.handleCount("/chatter")).toEqual({ subscriptions: 1, publishers: 1 });

    bus.unregister(subscription);
    bus.unregister(publisher);
    expect(bus.handleCount("/chatter")).toEqual({ subscriptions: 0, publishers: 0 });
    expect(() => publisher.publish({ data: "late" })).toThrow("Publisher on '/chatter' is closed");

    // channel is free again, so another type may claim it
    expect(() => bus.advertise("/chatter", "std_msgs/Int32")).not.toThrow();
  });

  it("keeps delivering when one subscriber throws", async () => {
    const { logger, messages } = captureLogger();
    const bus = new MemoryBus({ logger });
    const received: unknown[] = [];
    bus.subscribe("/chatter", "std_msgs/String", () => {
      throw new Error("subscriber broke");
    });
    bus.subscribe("/chatter", "std_msgs/String", (message) => received.push(message));

    bus.advertise("/chatter", "std_msgs/String").publish({ data: "hi" });
    await bus.drain();

    expect(received).toEqual([{ data: "hi" }]);
    expect(messages(LEVEL.error)).toEqual(["Subscriber error"]);
  });

  it("applies the string encoding in encode and decode", () => {
    const bus = new MemoryBus({ logger: silentLogger(), stringEncoding: "ascii-escape" });
    expect(bus.encode("std_msgs/String", { data: "café" })).toEqual({ data: "caf\\u00e9" });
    expect(bus.decode("std_msgs/String", { data: "caf\\u00e9" })).toEqual({ data: "café" });
  });

  it("rejects payloads that do not fit the type on decode", () => {
    const bus = new MemoryBus({ logger: silentLogger() });
    expect(() => bus.decode("std_msgs/Bool", { data: "yes" })).toThrow();
    expect(() => bus.decode("nope/Type", {})).toThrow("Unknown message type 'nope/Type'");
  });

  describe("services", () => {
    it("reports handler results through the success callback", async () => {
      const bus = new MemoryBus({ logger: silentLogger() });
      bus.advertiseService("math/double", async (args) => {
        const value = typeof args === "object" && args !== null && "n" in args ? Number(args.n) : 0;
        return { n: value * 2 };
      });

      await expect(callService(bus, "math/double", { n: 21 })).resolves.toEqual({ ok: true, value: { n: 42 } });
    });

    it("reports handler errors through the failure callback", async () => {
      const bus = new MemoryBus({ logger: silentLogger() });
      bus.advertiseService("always/fails", () => {
        throw new Error("not today");
      });

      await expect(callService(bus, "always/fails", {})).resolves.toEqual({ ok: false, value: "not today" });
    });

    it("throws synchronously for unknown services", () => {
      const bus = new MemoryBus({ logger: silentLogger() });
      expect(() => bus.callService("missing", {}, () => {}, () => {})).toThrow("Service not found: missing");
    });

    it("unregisters services", () => {
      const bus = new MemoryBus({ logger: silentLogger() });
      const remove = bus.advertiseService("relay/ping", (args) => args);
      remove();
      expect(() => bus.callService("relay/ping", {}, () => {}, () => {})).toThrow("Service not found: relay/ping");
    });
  });
});
