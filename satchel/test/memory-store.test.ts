import { describe, it, expect, afterEach } from "vitest";
import { createMemoryBackend, createMemorySessionStore } from "../store/memory.js";
import { SessionKey } from "../store/key.js";
import { SessionState } from "../session/state.js";
import { ERR, StoreError } from "../core/errors.js";
import { MAX_KEY_ATTEMPTS } from "../store/store.js";
import { installTestClock, silentLogger } from "./harness.js";
import { describeSessionStore } from "./store-contract.js";

describeSessionStore("memory store", async () => {
  const { clock, uninstall } = installTestClock();
  const backend = createMemoryBackend();
  const logger = silentLogger();

  return {
    clock,
    open: (opts = {}) => createMemorySessionStore({ backend, logger, ...opts }),
    async writeRaw(id, blob) {
      backend.set(id, { blob, expiresAt: null });
    },
    async readRaw(id) {
      return backend.get(id)?.blob ?? null;
    },
    destroy: uninstall,
  };
});

describe("memory store", () => {
  let uninstall: (() => void) | null = null;

  afterEach(() => {
    uninstall?.();
    uninstall = null;
  });

  it("drops an expired entry from the backend on load", async () => {
    const installed = installTestClock();
    uninstall = installed.uninstall;
    const store = createMemorySessionStore({ ttlMs: 10, logger: silentLogger() });
    const key = SessionKey.generate();

    await store.save(key, new SessionState([["a", "1"]]));
    expect(store.backend.size).toBe(1);

    installed.clock.advance(10);
    expect(await store.load(key)).toBeNull();
    expect(store.backend.size).toBe(0);
  });

  it("gives up generating keys when every candidate is taken", async () => {
    const store = createMemorySessionStore({ logger: silentLogger() });
    // every lookup of this backend reports a live entry
    store.backend.get = () => ({ blob: "{}", expiresAt: null });

    await expect(store.generateKey()).rejects.toBeInstanceOf(StoreError);
    await expect(store.generateKey()).rejects.toMatchObject({
      code: ERR.STORE_KEY_EXHAUSTED,
      message: `no unused session key after ${MAX_KEY_ATTEMPTS} attempts`,
    });
  });
});
