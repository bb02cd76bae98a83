import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { WebSocketServer } from "ws";

import { WebSocketCloudTransport } from "../../../src/cloud/ws-transport.js";
import { silentLogger } from "../../helpers/logger.js";
import { listen, nextPeer, shutdown } from "../../helpers/ws-peer.js";

const telemetry = (data: string) => ({
  properties: { topic: "/chatter" },
  body: { topic: "/chatter", msg_type: "std_msgs/String", payload: { data } },
});

describe("WebSocketCloudTransport", () => {
  let server: WebSocketServer;
  let port: number;
  let transport: WebSocketCloudTransport;

  beforeEach(async () => {
    ({ server, port } = await listen());
    transport = new WebSocketCloudTransport({
      connection: { hostName: `127.0.0.1:${port}`, deviceId: "robot-1", sharedAccessKey: "test-secret", protocol: "ws" },
      logger: silentLogger(),
      pollIntervalMs: 60_000,
      timeoutMs: 1_000,
      reconnectDelayMs: 200,
      maxReconnectDelayMs: 1_000,
      outboundQueueSize: 10,
    });
  });

  afterEach(async () => {
    await transport.close();
    await shutdown(server);
  });

  it("derives the device URL from the connection string", () => {
    expect(transport.url).toBe(`ws://127.0.0.1:${port}/devices/robot-1`);
  });

  it("authenticates and flushes frames queued while offline", async () => {
    const peerReady = nextPeer(server);
    transport.send(telemetry("early"));
    expect(transport.connectionState).toBe("disconnected");

    await transport.connect();
    const peer = await peerReady;

    expect(transport.connectionState).toBe("connected");
    expect(peer.authorization).toBe("SharedAccessKey test-secret");
    await expect(peer.next(1)).resolves.toEqual([{ type: "telemetry", ...telemetry("early") }]);
  });

  it("answers commands with a command-response frame", async () => {
    transport.onCommand(async (method, payload) => ({ status: 200, response: JSON.stringify({ method, payload }) }));
    const peerReady = nextPeer(server);
    await transport.connect();
    const peer = await peerReady;

    peer.send({ type: "command", id: "c1", method: "relay/ping", payload: '{"seq":1}' });

    await expect(peer.next(1)).resolves.toEqual([
      {
        type: "command-response",
        id: "c1",
        status: 200,
        response: JSON.stringify({ method: "relay/ping", payload: '{"seq":1}' }),
      },
    ]);
  });

  it("answers commands with a failure while no handler is registered", async () => {
    const peerReady = nextPeer(server);
    await transport.connect();
    const peer = await peerReady;

    peer.send({ type: "command", id: "c2", method: "relay/list", payload: "" });

    await expect(peer.next(1)).resolves.toEqual([
      { type: "command-response", id: "c2", status: 500, response: JSON.stringify("no command handler") },
    ]);
  });

  it("acknowledges inbound messages and skips malformed frames", async () => {
    const bodies: unknown[] = [];
    transport.onInboundMessage(async (body) => {
      bodies.push(body);
      return { accepted: false, error: "no relay" };
    });
    const peerReady = nextPeer(server);
    await transport.connect();
    const peer = await peerReady;

    peer.send("not json");
    peer.send({ type: "unknown" });
    peer.send({ type: "message", id: "m1", body: { topic: "/cmd" } });

    await expect(peer.next(1)).resolves.toEqual([{ type: "message-ack", id: "m1", accepted: false, error: "no relay" }]);
    expect(bodies).toEqual([{ topic: "/cmd" }]);
  });

  it("hands desired-state documents to the handler and reports state back", async () => {
    const documents: unknown[] = [];
    transport.onDesiredState(async (document) => {
      documents.push(document);
      await transport.reportState({ relays: {} });
    });
    const peerReady = nextPeer(server);
    await transport.connect();
    const peer = await peerReady;

    peer.send({ type: "desired-state", document: { relays: { a: null } } });

    await expect(peer.next(1)).resolves.toEqual([{ type: "reported-state", document: { relays: {} } }]);
    expect(documents).toEqual([{ relays: { a: null } }]);
  });

  it("reconnects after the connection drops and sends what was queued meanwhile", async () => {
    const firstReady = nextPeer(server);
    await transport.connect();
    const first = await firstReady;
    const secondReady = nextPeer(server);

    first.socket.terminate();
    await vi.waitFor(() => expect(transport.connectionState).toBe("reconnecting"), { interval: 5, timeout: 1_000 });
    transport.send(telemetry("while offline"));

    const second = await secondReady;
    await expect(second.next(1)).resolves.toEqual([{ type: "telemetry", ...telemetry("while offline") }]);
    expect(transport.connectionState).toBe("connected");
  });

  it("stays closed after close()", async () => {
    const peerReady = nextPeer(server);
    await transport.connect();
    await peerReady;

    await transport.close();

    expect(transport.connectionState).toBe("closed");
  });
});
