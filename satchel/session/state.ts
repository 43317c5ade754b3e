import { ERR, SatchelError, errorMessage } from "../core/errors.js";

function corrupt(message: string, cause?: unknown): SatchelError {
  return new SatchelError(ERR.STATE_CORRUPT, message, undefined, cause === undefined ? undefined : { cause });
}

function checkJsonText(key: string, value: string): void {
  try {
    JSON.parse(value);
  } catch (e) {
    throw corrupt(`session state value for "${key}" is not valid JSON text`, e);
  }
}

/**
 * Raw key/value payload of a session: each value is the JSON text of some value.
 * Which type a value decodes to is checked on read, not here.
 *
 * Values that are not JSON text are rejected on the way in (`SATCHEL_STATE_CORRUPT`),
 * so every state encodes to a blob that decodes back to an equal state.
 */
export class SessionState {
  private readonly map = new Map<string, string>();

  constructor(entries?: Iterable<readonly [string, string]>) {
    if (!entries) return;
    for (const [key, value] of entries) this.insert(key, value);
  }

  insert(key: string, value: string): void {
    checkJsonText(key, value);
    this.map.set(key, value);
  }

  remove(key: string): string | undefined {
    const value = this.map.get(key);
    this.map.delete(key);
    return value;
  }

  get(key: string): string | undefined {
    return this.map.get(key);
  }

  has(key: string): boolean {
    return this.map.has(key);
  }

  keys(): string[] {
    return [...this.map.keys()];
  }

  entries(): Array<[string, string]> {
    return [...this.map.entries()];
  }

  get size(): number {
    return this.map.size;
  }

  clone(): SessionState {
    return new SessionState(this.map);
  }

  equals(other: SessionState): boolean {
    if (other.size !== this.size) return false;
    for (const [key, value] of this.map) {
      if (other.get(key) !== value) return false;
    }
    return true;
  }

  toJSON(): Record<string, string> {
    // fromEntries defines own properties, so a "__proto__" key stays a plain key
    return Object.fromEntries(this.map);
  }
}

export function encodeSessionState(state: SessionState): string {
  return JSON.stringify(state.toJSON());
}

export function decodeSessionState(blob: string): SessionState {
  let parsed: unknown;
  try {
    parsed = JSON.parse(blob);
  } catch (e) {
    throw corrupt(`session state is not valid JSON: ${errorMessage(e)}`, e);
  }

  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw corrupt("session state must be a JSON object");
  }

  const entries: Array<[string, string]> = [];
  for (const [key, value] of Object.entries(parsed)) {
    if (typeof value !== "string") {
      throw corrupt(`session state value for "${key}" must be a string`);
    }
    entries.push([key, value]);
  }
  // the constructor rejects values that are not JSON text
  return new SessionState(entries);
}
