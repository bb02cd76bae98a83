/**
 * Text codec strategies applied to string fields of relayed payloads
 */

export type StringEncoding = "utf8" | "ascii-escape";

export interface TextCodec {
  readonly encoding: StringEncoding;
  /** local string → payload string */
  encode(value: string): string;
  /** payload string → local string */
  decode(value: string): string;
}

const utf8Codec: TextCodec = {
  encoding: "utf8",
  encode: (value) => value,
  decode: (value) => value,
};

/**
 * Backslashes are doubled and every UTF-16 code unit above 0x7f becomes
 * \uXXXX, so the payload stays 7-bit clean and decodes back exactly.
 */
const asciiEscapeCodec: TextCodec = {
  encoding: "ascii-escape",
  encode: (value) =>
    value.replace(/[\\\u0080-\uffff]/g, (ch) =>
      ch === "\\" ? "\\\\" : `\\u${ch.charCodeAt(0).toString(16).padStart(4, "0")}`,
    ),
  decode: (value) =>
    value.replace(/\\(\\|u([0-9a-fA-F]{4}))/g, (_match, escaped: string, hex: string | undefined) =>
      hex ? String.fromCharCode(Number.parseInt(hex, 16)) : escaped,
    ),
};

export function createTextCodec(encoding: StringEncoding): TextCodec {
  return encoding === "ascii-escape" ? asciiEscapeCodec : utf8Codec;
}

/**
 * Apply `fn` to every string inside a JSON-like value
 */
export function mapStrings(value: unknown, fn: (value: string) => string): unknown {
  if (typeof value === "string") return fn(value);
  if (Array.isArray(value)) return value.map((item) => mapStrings(item, fn));
  if (value !== null && typeof value === "object") {
    const out: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(value)) {
      out[key] = mapStrings(item, fn);
    }
    return out;
  }
  return value;
}
