/**
 * `clean` until the first successful insert/remove, then `changed`.
 * `destroyed` is terminal and reachable from either.
 */
export type SessionStatus = "clean" | "changed" | "destroyed";
