import { strict as assert } from "node:assert";
import { afterEach, beforeEach, describe, test } from "node:test";

/** Resolves after the current macrotask and any timers already due. */
export function nextMacrotask(): Promise<void> {
  return new Promise((resolve) => {
    setTimeout(resolve, 0);
  });
}

/** Runs `n` macrotask turns so staged background work can make progress. */
export async function drainMacrotasks(n = 8): Promise<void> {
  for (let i = 0; i < n; i++) await nextMacrotask();
}

export { afterEach, assert, beforeEach, describe, test };
