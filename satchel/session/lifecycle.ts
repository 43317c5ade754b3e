import { SatchelError } from "../core/errors.js";
import { getLogger, type Logger } from "../core/logger.js";
import { SessionKey } from "../store/key.js";
import { keyHint, type SessionStore } from "../store/store.js";
import { Session } from "./session.js";

export type OpenedSession = {
  key: SessionKey;
  session: Session;
  /** True when no stored state was found and a new key was minted. */
  fresh: boolean;
};

export type CommitOutcome = "removed" | "saved" | "skipped";

export type RunResult<T> = {
  key: SessionKey;
  result: T;
  outcome: CommitOutcome;
};

export type Sessions = {
  open: (key?: SessionKey | string | null) => Promise<OpenedSession>;
  commit: (opened: OpenedSession) => Promise<CommitOutcome>;
  run: <T>(
    key: SessionKey | string | null | undefined,
    fn: (session: Session, key: SessionKey) => Promise<T> | T,
  ) => Promise<RunResult<T>>;
};

export type SessionsOptions = {
  store: SessionStore;
  logger?: Logger;
};

export function createSessions(opts: SessionsOptions): Sessions {
  const { store } = opts;
  const log = opts.logger ?? getLogger("sessions");

  function parseKey(key: SessionKey | string | null | undefined): SessionKey | null {
    if (key === null || key === undefined) return null;
    if (key instanceof SessionKey) return key;
    try {
      return SessionKey.parse(key);
    } catch (e) {
      if (!(e instanceof SatchelError)) throw e;
      log.debug({ reason: e.message }, "ignoring malformed session key");
      return null;
    }
  }

  async function open(key?: SessionKey | string | null): Promise<OpenedSession> {
    const parsed = parseKey(key);
    if (parsed) {
      const state = await store.load(parsed);
      if (state) {
        log.debug({ key: keyHint(parsed), entries: state.size }, "resumed session");
        return { key: parsed, session: Session.fromState(state), fresh: false };
      }
    }

    // A key the store does not know is never adopted.
    const minted = await store.generateKey();
    log.debug({ key: keyHint(minted) }, "started session");
    return { key: minted, session: Session.create(), fresh: true };
  }

  async function commit({ key, session }: OpenedSession): Promise<CommitOutcome> {
    if (!session.active()) {
      await store.remove(key);
      log.debug({ key: keyHint(key) }, "session destroyed");
      return "removed";
    }
    if (session.status === "changed") {
      await store.save(key, session.intoState());
      return "saved";
    }
    return "skipped";
  }

  return {
    open,
    commit,

    async run(key, fn) {
      const opened = await open(key);
      const result = await fn(opened.session, opened.key);
      const outcome = await commit(opened);
      return { key: opened.key, result, outcome };
    },
  };
}
