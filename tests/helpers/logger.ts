import pino from "pino";

import type { Logger } from "../../src/log.js";

export type LogRecord = Record<string, unknown>;

export const LEVEL = { debug: 20, info: 30, warn: 40, error: 50 } as const;

/**
 * Logger whose JSON lines are kept in memory for assertions
 */
export function captureLogger(): {
  logger: Logger;
  records: LogRecord[];
  messages: (level?: number) => unknown[];
} {
  const records: LogRecord[] = [];
  const logger = pino(
    { level: "trace" },
    {
      write(line: string) {
        records.push(JSON.parse(line));
      },
    },
  );
  const messages = (level?: number) =>
    records.filter((record) => level === undefined || record.level === level).map((record) => record.msg);
  return { logger, records, messages };
}

export function silentLogger(): Logger {
  return pino({ level: "silent" });
}
