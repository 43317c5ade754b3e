import { SessionDestroyedError } from "../core/errors.js";
import { StateStorage, type Storage, type ValueSchema } from "../storage/storage.js";
import { SessionState } from "./state.js";
import type { SessionStatus } from "./status.js";

/**
 * Sole mutation surface for one session's state.
 *
 * A destroyed session rejects every read and write with `SessionDestroyedError`
 * before touching its state. Storage errors (`SerializeError`, `DeserializeError`)
 * propagate as thrown.
 */
export class Session implements Storage<string> {
  private readonly state: SessionState;
  private readonly storage: StateStorage;
  private _status: SessionStatus = "clean";

  private constructor(state: SessionState) {
    this.state = state;
    this.storage = new StateStorage(state);
  }

  static create(): Session {
    return new Session(new SessionState());
  }

  /** Starts `clean` regardless of what the state holds. */
  static fromState(state: SessionState): Session {
    return new Session(state.clone());
  }

  /** Copy of the current state; the status is not part of it. */
  intoState(): SessionState {
    return this.state.clone();
  }

  get status(): SessionStatus {
    return this._status;
  }

  active(): boolean {
    return this._status !== "destroyed";
  }

  destroy(): void {
    this._status = "destroyed";
  }

  insert<T>(key: string, value: T): void {
    this.guard();
    this.storage.insert(key, value);
    this._status = "changed";
  }

  /**
   * Marks the session `changed` even when nothing was stored under `key`.
   * On `DeserializeError` the slot is already gone.
   */
  remove(key: string): unknown;
  remove<T>(key: string, schema: ValueSchema<T>): T | undefined;
  remove<T>(key: string, schema?: ValueSchema<T>): unknown {
    this.guard();
    const value = schema ? this.storage.remove(key, schema) : this.storage.remove(key);
    this._status = "changed";
    return value;
  }

  get(key: string): unknown;
  get<T>(key: string, schema: ValueSchema<T>): T | undefined;
  get<T>(key: string, schema?: ValueSchema<T>): unknown {
    this.guard();
    return schema ? this.storage.get(key, schema) : this.storage.get(key);
  }

  private guard(): void {
    if (!this.active()) throw new SessionDestroyedError();
  }
}
