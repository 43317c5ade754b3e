import type { z } from "zod";
import { DeserializeError, SerializeError } from "../core/errors.js";
import type { SessionState } from "../session/state.js";

/** Decoder for a stored value; any zod schema whose output is `T`. */
export type ValueSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

/**
 * Typed access to a string-valued store.
 *
 * Without a schema, reads return the decoded JSON as `unknown`.
 * `remove` always clears the slot, even when decoding then fails.
 */
export type Storage<K> = {
  insert<T>(key: K, value: T): void;
  remove(key: K): unknown;
  remove<T>(key: K, schema: ValueSchema<T>): T | undefined;
  get(key: K): unknown;
  get<T>(key: K, schema: ValueSchema<T>): T | undefined;
};

export function encodeValue(key: string, value: unknown): string {
  let text: string | undefined;
  try {
    text = JSON.stringify(value);
  } catch (e) {
    throw new SerializeError(key, e);
  }
  // JSON.stringify yields undefined for undefined, functions and symbols
  if (text === undefined) {
    throw new SerializeError(key, new TypeError(`value of type ${typeof value} is not JSON-encodable`));
  }
  return text;
}

export function decodeValue<T>(
  op: "get" | "remove",
  key: string,
  text: string,
  schema?: ValueSchema<T>,
): unknown {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (e) {
    throw new DeserializeError(op, key, e);
  }
  if (!schema) return parsed;

  const result = schema.safeParse(parsed);
  if (!result.success) throw new DeserializeError(op, key, result.error);
  return result.data;
}

export class StateStorage implements Storage<string> {
  constructor(private readonly state: SessionState) {}

  insert<T>(key: string, value: T): void {
    this.state.insert(key, encodeValue(key, value));
  }

  remove(key: string): unknown;
  remove<T>(key: string, schema: ValueSchema<T>): T | undefined;
  remove<T>(key: string, schema?: ValueSchema<T>): unknown {
    const text = this.state.remove(key);
    if (text === undefined) return undefined;
    return decodeValue("remove", key, text, schema);
  }

  get(key: string): unknown;
  get<T>(key: string, schema: ValueSchema<T>): T | undefined;
  get<T>(key: string, schema?: ValueSchema<T>): unknown {
    const text = this.state.get(key);
    if (text === undefined) return undefined;
    return decodeValue("get", key, text, schema);
  }
}

