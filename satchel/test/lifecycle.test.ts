import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { z } from "zod";
import { sql } from "drizzle-orm";
import { createSessions } from "../session/lifecycle.js";
import { createMemorySessionStore, type MemorySessionStore } from "../store/memory.js";
import type { SessionStore } from "../store/store.js";
import { SessionKey } from "../store/key.js";
import { SessionState } from "../session/state.js";
import { StoreError } from "../core/errors.js";
import { createTestEnv, silentLogger, type TestEnv } from "./harness.js";

const Cart = z.array(z.string());

/** Wraps a store and records which backend calls were made. */
function recording(store: SessionStore): { store: SessionStore; calls: string[] } {
  const calls: string[] = [];
  return {
    calls,
    store: {
      async generateKey() {
        calls.push("generateKey");
        return store.generateKey();
      },
      async load(key) {
        calls.push("load");
        return store.load(key);
      },
      async save(key, state) {
        calls.push("save");
        return store.save(key, state);
      },
      async remove(key) {
        calls.push("remove");
        return store.remove(key);
      },
    },
  };
}

describe("createSessions", () => {
  let memory: MemorySessionStore;
  const logger = silentLogger();

  beforeEach(() => {
    memory = createMemorySessionStore({ logger });
  });

  it("opens a fresh session under a new key when none is given", async () => {
    const { store, calls } = recording(memory);
    const opened = await createSessions({ store, logger }).open();

    expect(opened.fresh).toBe(true);
    expect(opened.session.status).toBe("clean");
    expect(calls).toEqual(["generateKey"]);
  });

  it("resumes a stored session clean", async () => {
    const key = SessionKey.generate();
    await memory.save(key, new SessionState([["cart", "[\"apple\"]"]]));

    const opened = await createSessions({ store: memory, logger }).open(key.toString());
    expect(opened.fresh).toBe(false);
    expect(opened.key.equals(key)).toBe(true);
    expect(opened.session.status).toBe("clean");
    expect(opened.session.get("cart", Cart)).toEqual(["apple"]);
  });

  it("does not adopt an unknown or malformed key", async () => {
    const sessions = createSessions({ store: memory, logger });
    const unknown = SessionKey.generate();

    const a = await sessions.open(unknown);
    expect(a.fresh).toBe(true);
    expect(a.key.equals(unknown)).toBe(false);

    const b = await sessions.open("not a key");
    expect(b.fresh).toBe(true);
  });

  it("skips the backend write for a clean session", async () => {
    const { store, calls } = recording(memory);
    const sessions = createSessions({ store, logger });
    const opened = await sessions.open();
    opened.session.get("anything");

    expect(await sessions.commit(opened)).toBe("skipped");
    expect(calls).toEqual(["generateKey"]);
  });

  it("saves a changed session", async () => {
    const sessions = createSessions({ store: memory, logger });
    const opened = await sessions.open();
    opened.session.insert("cart", ["pear"]);

    expect(await sessions.commit(opened)).toBe("saved");
    expect((await memory.load(opened.key))?.get("cart")).toBe("[\"pear\"]");
  });

  it("saves after a no-op remove", async () => {
    const sessions = createSessions({ store: memory, logger });
    const opened = await sessions.open();
    opened.session.remove("never-there");

    expect(await sessions.commit(opened)).toBe("saved");
  });

  it("removes a destroyed session from the backend", async () => {
    const key = SessionKey.generate();
    await memory.save(key, new SessionState([["cart", "[]"]]));
    const sessions = createSessions({ store: memory, logger });

    const opened = await sessions.open(key);
    opened.session.insert("cart", ["fig"]);
    opened.session.destroy();

    expect(await sessions.commit(opened)).toBe("removed");
    expect(await memory.load(key)).toBeNull();
  });

  describe("run", () => {
    it("carries state across requests", async () => {
      const sessions = createSessions({ store: memory, logger });

      const first = await sessions.run(null, (session) => {
        session.insert("cart", ["apple"]);
        return "added";
      });
      expect(first).toMatchObject({ result: "added", outcome: "saved" });

      const second = await sessions.run(first.key.toString(), (session) => {
        const cart = session.get("cart", Cart) ?? [];
        session.insert("cart", [...cart, "plum"]);
        return cart.length;
      });
      expect(second.key.equals(first.key)).toBe(true);
      expect(second.result).toBe(1);

      const third = await sessions.run(second.key, async (session) => session.get("cart", Cart));
      expect(third).toMatchObject({ result: ["apple", "plum"], outcome: "skipped" });
    });

    it("writes nothing when the callback throws", async () => {
      const { store, calls } = recording(memory);
      const sessions = createSessions({ store, logger });

      await expect(
        sessions.run(null, (session) => {
          session.insert("cart", ["apple"]);
          throw new Error("handler failed");
        }),
      ).rejects.toThrow("handler failed");
      expect(calls).toEqual(["generateKey"]);
    });
  });
});

describe("createSessions over libsql", () => {
  let env: TestEnv;

  beforeEach(async () => {
    env = await createTestEnv({ ttlMs: 60_000 });
  });

  afterEach(() => {
    env.destroy();
  });

  it("resumes across store handles and expires idle sessions", async () => {
    const first = await createSessions({ store: env.store, logger: env.logger }).run(null, (session) => {
      session.insert("user", { username: "brandon", password: "hunter2" });
    });

    const sessions = createSessions({ store: env.openStore({ ttlMs: 60_000 }), logger: env.logger });
    const resumed = await sessions.open(first.key);
    expect(resumed.fresh).toBe(false);
    expect(resumed.session.get("user")).toEqual({ username: "brandon", password: "hunter2" });

    env.clock.advance(60_000);
    const expired = await sessions.open(first.key);
    expect(expired.fresh).toBe(true);
  });

  it("propagates a corrupt entry as StoreError", async () => {
    const key = SessionKey.generate();
    await env.store.save(key, new SessionState([["ok", "1"]]));
    // bypass the codec to plant a blob the decoder must reject
    await env.db.run(sql`UPDATE satchel_sessions SET state = '[1,2]' WHERE session_key = ${`session:${key.value}`}`);

    await expect(createSessions({ store: env.store, logger: env.logger }).open(key)).rejects.toBeInstanceOf(
      StoreError,
    );
  });
});

