import { z } from "zod";
import { ERR, SatchelError } from "../core/errors.js";
import { randomToken } from "../core/ids.js";

const KEY_BYTES = 32;

const SessionKeyText = z
  .string()
  .regex(/^[A-Za-z0-9_-]{16,256}$/, "session key must be 16-256 base64url characters");

/** Opaque identifier a store uses to find one session's state. */
export class SessionKey {
  private constructor(readonly value: string) {}

  static generate(): SessionKey {
    return new SessionKey(randomToken(KEY_BYTES));
  }

  static parse(text: string): SessionKey {
    const parsed = SessionKeyText.safeParse(text);
    if (!parsed.success) {
      throw new SatchelError(ERR.INVALID_SESSION_KEY, parsed.error.issues[0]?.message ?? "invalid session key");
    }
    return new SessionKey(parsed.data);
  }

  equals(other: SessionKey): boolean {
    return this.value === other.value;
  }

  toBytes(): Uint8Array {
    return new TextEncoder().encode(this.value);
  }

  toString(): string {
    return this.value;
  }

  toJSON(): string {
    return this.value;
  }
}
