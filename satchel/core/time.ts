let clock: (() => number) | null = null;

/** Epoch milliseconds used for every expiry decision. */
export function nowMs(): number {
  return clock ? clock() : Date.now();
}

export function _setTestClock(fn: (() => number) | null): void {
  clock = fn;
}
