/**
 * packages/core/src/pipeline/executor.ts — Background executor and cancellation.
 *
 * Why: Parse, bind and layout run off the UI turn. Each submitted step runs
 * on a later macrotask inside runOffUiTurn(), so any view-touching call it
 * makes trips the affinity guard in development builds.
 */

import { TrellisError } from "../errors.js";
import { runOffUiTurn } from "../runtime/uiAffinity.js";

export type CancellationToken = Readonly<{
  isCancelled: () => boolean;
  cancel: () => void;
  /** Throws TRELLIS_CANCELLED once cancel() was called. */
  throwIfCancelled: (phase: string) => void;
}>;

export function createCancellationToken(): CancellationToken {
  let cancelled = false;
  return Object.freeze({
    isCancelled: () => cancelled,
    cancel: () => {
      cancelled = true;
    },
    throwIfCancelled: (phase: string) => {
      if (cancelled) throw new TrellisError("TRELLIS_CANCELLED", `cancelled before ${phase}`);
    },
  });
}

export type Scheduler = (callback: () => void) => void;

export type BackgroundExecutor = Readonly<{
  submit: <T>(work: () => T) => Promise<T>;
  /** Steps submitted but not yet run. */
  pending: () => number;
}>;

const defaultScheduler: Scheduler = (callback) => {
  setTimeout(callback, 0);
};

export function createBackgroundExecutor(schedule: Scheduler = defaultScheduler): BackgroundExecutor {
  let pending = 0;
  return Object.freeze({
    submit<T>(work: () => T): Promise<T> {
      pending++;
      return new Promise<T>((resolve, reject) => {
        schedule(() => {
          pending--;
          try {
            resolve(runOffUiTurn(work));
          } catch (err: unknown) {
            reject(err);
          }
        });
      });
    },
    pending: () => pending,
  });
}
