/**
 * Message Type Registry - maps type identifiers to zod schemas
 */

import { z } from "zod";

import type { MessageType } from "./types.js";

const TYPE_NAME_PATTERN = /^[A-Za-z][\w]*\/[A-Za-z]\w*$/;

const Time = z.object({
  secs: z.number().int().min(0).default(0),
  nsecs: z.number().int().min(0).default(0),
});

const Header = z.object({
  seq: z.number().int().min(0).default(0),
  stamp: Time.default({}),
  frame_id: z.string().default(""),
});

const Vector3 = z.object({
  x: z.number().default(0),
  y: z.number().default(0),
  z: z.number().default(0),
});

const Quaternion = z.object({
  x: z.number().default(0),
  y: z.number().default(0),
  z: z.number().default(0),
  w: z.number().default(1),
});

const BUILTIN_TYPES: Record<string, z.ZodTypeAny> = {
  "std_msgs/Empty": z.object({}),
  "std_msgs/String": z.object({ data: z.string() }),
  "std_msgs/Bool": z.object({ data: z.boolean() }),
  "std_msgs/Int32": z.object({ data: z.number().int().min(-2147483648).max(2147483647) }),
  "std_msgs/Int64": z.object({ data: z.number().int() }),
  "std_msgs/Float32": z.object({ data: z.number() }),
  "std_msgs/Float64": z.object({ data: z.number() }),
  "std_msgs/Header": Header,
  "geometry_msgs/Vector3": Vector3,
  "geometry_msgs/Point": Vector3,
  "geometry_msgs/Quaternion": Quaternion,
  "geometry_msgs/Pose": z.object({ position: Vector3.default({}), orientation: Quaternion.default({}) }),
  "geometry_msgs/Twist": z.object({ linear: Vector3.default({}), angular: Vector3.default({}) }),
  "sensor_msgs/Temperature": z.object({
    header: Header.default({}),
    temperature: z.number(),
    variance: z.number().default(0),
  }),
};

export class MessageTypeRegistry {
  private readonly types = new Map<string, MessageType>();

  constructor(options: { builtins?: boolean } = {}) {
    if (options.builtins !== false) {
      for (const [name, schema] of Object.entries(BUILTIN_TYPES)) {
        this.types.set(name, { name, schema });
      }
    }
  }

  /**
   * Register (or replace) a message type
   */
  register(name: string, schema: z.ZodTypeAny): MessageType {
    if (!TYPE_NAME_PATTERN.test(name)) {
      throw new Error(`Invalid message type name '${name}', expected "package/Type"`);
    }
    const type: MessageType = { name, schema };
    this.types.set(name, type);
    return type;
  }

  resolve(name: string): MessageType | undefined {
    return this.types.get(name);
  }

  list(): string[] {
    return Array.from(this.types.keys()).sort();
  }
}
