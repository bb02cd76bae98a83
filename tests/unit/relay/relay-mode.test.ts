import { describe, expect, it } from "vitest";

import { parseRelayMode, publishesLocally, relayModeName, subscribesLocally } from "../../../src/relay/relay-mode.js";
import { RelayMode } from "../../../src/relay/types.js";

describe("parseRelayMode()", () => {
  it("accepts integer codes", () => {
    expect(parseRelayMode(1)).toBe(RelayMode.ToLocal);
    expect(parseRelayMode(2)).toBe(RelayMode.ToCloud);
    expect(parseRelayMode(3)).toBe(RelayMode.Bidirectional);
  });

  it("accepts numeric strings", () => {
    expect(parseRelayMode("1")).toBe(RelayMode.ToLocal);
    expect(parseRelayMode("2")).toBe(RelayMode.ToCloud);
    expect(parseRelayMode(" 3 ")).toBe(RelayMode.Bidirectional);
  });

  it("accepts symbolic names", () => {
    expect(parseRelayMode("RELAY_MODE_TO_ROS")).toBe(RelayMode.ToLocal);
    expect(parseRelayMode("RELAY_MODE_TO_LOCAL")).toBe(RelayMode.ToLocal);
    expect(parseRelayMode("RELAY_MODE_TO_IOT_HUB")).toBe(RelayMode.ToCloud);
    expect(parseRelayMode("RELAY_MODE_TO_CLOUD")).toBe(RelayMode.ToCloud);
    expect(parseRelayMode("RELAY_MODE_BIDIRECTIONAL")).toBe(RelayMode.Bidirectional);
  });

  it.each([0, 4, 1.5, -1, "0", "4", "1.0", "", "not_a_mode", "relay_mode_to_ros", "toString", null, undefined, true, {}])(
    "rejects %j",
    (value) => {
      expect(parseRelayMode(value)).toBeUndefined();
    },
  );
});

describe("mode helpers", () => {
  it("names modes", () => {
    expect(relayModeName(RelayMode.ToLocal)).toBe("to-local");
    expect(relayModeName(RelayMode.ToCloud)).toBe("to-cloud");
    expect(relayModeName(RelayMode.Bidirectional)).toBe("bidirectional");
  });

  it("maps modes to local bindings", () => {
    expect([subscribesLocally(RelayMode.ToLocal), publishesLocally(RelayMode.ToLocal)]).toEqual([false, true]);
    expect([subscribesLocally(RelayMode.ToCloud), publishesLocally(RelayMode.ToCloud)]).toEqual([true, false]);
    expect([subscribesLocally(RelayMode.Bidirectional), publishesLocally(RelayMode.Bidirectional)]).toEqual([true, true]);
  });
});
