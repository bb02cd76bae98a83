import { RelayMode } from "./types.js";

/**
 * Symbolic mode names accepted in desired-state documents.
 * The TO_ROS / TO_IOT_HUB spellings are kept for documents written against
 * older device twins.
 */
const SYMBOLIC_MODES = new Map<string, RelayMode>([
  ["RELAY_MODE_TO_LOCAL", RelayMode.ToLocal],
  ["RELAY_MODE_TO_ROS", RelayMode.ToLocal],
  ["RELAY_MODE_TO_CLOUD", RelayMode.ToCloud],
  ["RELAY_MODE_TO_IOT_HUB", RelayMode.ToCloud],
  ["RELAY_MODE_BIDIRECTIONAL", RelayMode.Bidirectional],
]);

const MODE_NAMES: Record<RelayMode, string> = {
  [RelayMode.ToLocal]: "to-local",
  [RelayMode.ToCloud]: "to-cloud",
  [RelayMode.Bidirectional]: "bidirectional",
};

function fromCode(code: number): RelayMode | undefined {
  switch (code) {
    case RelayMode.ToLocal:
      return RelayMode.ToLocal;
    case RelayMode.ToCloud:
      return RelayMode.ToCloud;
    case RelayMode.Bidirectional:
      return RelayMode.Bidirectional;
    default:
      return undefined;
  }
}

/**
 * Parse a mode field. Tried in order: integer code, numeric string, symbolic name.
 * Returns undefined for anything else.
 */
export function parseRelayMode(value: unknown): RelayMode | undefined {
  if (typeof value === "number") {
    return Number.isInteger(value) ? fromCode(value) : undefined;
  }
  if (typeof value !== "string") return undefined;

  const trimmed = value.trim();
  if (/^\d+$/.test(trimmed)) {
    return fromCode(Number.parseInt(trimmed, 10));
  }
  return SYMBOLIC_MODES.get(trimmed);
}

export function relayModeName(mode: RelayMode): string {
  return MODE_NAMES[mode];
}

export function subscribesLocally(mode: RelayMode): boolean {
  return mode === RelayMode.ToCloud || mode === RelayMode.Bidirectional;
}

export function publishesLocally(mode: RelayMode): boolean {
  return mode === RelayMode.ToLocal || mode === RelayMode.Bidirectional;
}
