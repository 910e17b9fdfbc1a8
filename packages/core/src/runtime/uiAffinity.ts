/**
 * packages/core/src/runtime/uiAffinity.ts — UI-turn affinity guard.
 *
 * Why: View handles may only be touched from the UI side. JS has one thread,
 * but the background executor runs parse/bind/layout on later macrotasks;
 * while such a task runs, any view-touching entry point is a programming
 * error. Development builds throw TRELLIS_WRONG_THREAD; production skips the
 * check.
 */

import { TrellisError } from "../errors.js";
import { DEV_MODE } from "../logging.js";

let backgroundDepth = 0;

/** Run `fn` as background work; view-touching calls inside it fail the guard. */
export function runOffUiTurn<T>(fn: () => T): T {
  backgroundDepth++;
  try {
    return fn();
  } finally {
    backgroundDepth--;
  }
}

export function isOnUiTurn(): boolean {
  return backgroundDepth === 0;
}

export function assertUiTurn(operation: string, devMode: boolean = DEV_MODE): void {
  if (!devMode || backgroundDepth === 0) return;
  throw new TrellisError(
    "TRELLIS_WRONG_THREAD",
    `${operation} touches view handles and must not run on the background context`,
  );
}
