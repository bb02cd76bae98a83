/**
 * Relays Command - List the relays persisted by the last run
 */

import { loadRawConfig, resolveStatePaths } from "../../config.js";
import { createLogger } from "../../log.js";
import { relayModeName } from "../../relay/relay-mode.js";
import { FileRelayStateStore } from "../../relay/state-store.js";
import type { PersistedDescriptor } from "../../relay/types.js";
import { OutputFormatter, type OutputFormatterOptions } from "../output-formatter.js";

export interface RelaysOptions {
  json?: boolean;
  quiet?: boolean;
}

export async function listRelays(
  configPath: string | undefined,
  options: RelaysOptions = {},
  output: OutputFormatterOptions = {},
): Promise<PersistedDescriptor[]> {
  const out = new OutputFormatter({ quiet: options.quiet, ...output });
  const { base, configPath: resolvedPath } = await loadRawConfig(configPath);
  const { statePath } = resolveStatePaths(base, resolvedPath);

  const store = new FileRelayStateStore({ filePath: statePath, logger: createLogger("warn") });
  const relays = (await store.read()) ?? [];

  if (options.json) {
    out.json(relays);
    return relays;
  }

  if (relays.length === 0) {
    out.info(`No relays recorded in ${statePath}`);
    return relays;
  }

  out.header(`Relays (${relays.length})`);
  out.table(
    relays.map((relay) => ({
      topic: relay.topic,
      type: relay.msg_type,
      mode: `${relayModeName(relay.relay_mode)} (${relay.relay_mode})`,
    })),
    [
      { key: "topic", header: "Topic" },
      { key: "type", header: "Message type" },
      { key: "mode", header: "Mode" },
    ],
  );
  return relays;
}
