/**
 * packages/core/src/pipeline/operationQueue.ts — Deferred UI operations.
 *
 * Why: Background work cannot touch views, so it queues closures that the UI
 * turn runs later. The queue also carries the pipeline state machine and the
 * "background finished" signal that syncFlush waits on.
 *
 * State machine:
 *   idle → preparing → ready → flushing → idle
 *   any state → idle on reset(), or when a queued op throws
 *
 * Rules:
 *   - syncFlush() waits for "ready" at most `timeoutMs`; on timeout it logs
 *     and flushes whatever was queued so far
 *   - High-priority ops run first; within a priority, FIFO
 *   - The flush result is the value returned by the first op tagged "root"
 */

import { TrellisError, describeThrown } from "../errors.js";
import { type Logger, SILENT_LOGGER, formatLogMessage } from "../logging.js";
import { perfMarkEnd, perfMarkStart } from "../perf/perf.js";
import { assertUiTurn } from "../runtime/uiAffinity.js";

export type QueueState = "idle" | "preparing" | "ready" | "flushing";
export type OperationPriority = "high" | "normal";

export type EnqueueOptions = Readonly<{
  /** "root" marks the op whose return value is the flush result. */
  tag?: string;
  priority?: OperationPriority;
}>;

export type OperationQueueOptions = Readonly<{
  defaultTimeoutMs?: number;
  logger?: Logger;
  devMode?: boolean;
}>;

export type OperationQueue<V> = Readonly<{
  state: () => QueueState;
  size: () => number;
  markPreparing: () => void;
  markReady: () => void;
  enqueue: (op: () => V | undefined, opts?: EnqueueOptions) => void;
  syncFlush: (timeoutMs?: number) => Promise<V | undefined>;
  /** Runs whatever is queued now, without waiting for "ready". */
  forceFlush: () => V | undefined;
  reset: () => void;
}>;

type QueuedOp<V> = Readonly<{
  run: () => V | undefined;
  tag: string | undefined;
  priority: OperationPriority;
}>;

type Signal = {
  promise: Promise<void>;
  resolve: () => void;
};

function createSignal(): Signal {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

export const DEFAULT_FLUSH_TIMEOUT_MS = 100;

export function createOperationQueue<V>(opts: OperationQueueOptions = {}): OperationQueue<V> {
  const defaultTimeoutMs = opts.defaultTimeoutMs ?? DEFAULT_FLUSH_TIMEOUT_MS;
  const logger = opts.logger ?? SILENT_LOGGER;
  const devMode = opts.devMode ?? false;

  let state: QueueState = "idle";
  let ops: QueuedOp<V>[] = [];
  let ready: Signal = createSignal();
  // Settled state of `ready`, tracked separately since a promise can't be inspected.
  let readySignaled = true;
  ready.resolve();

  function signalReady(): void {
    readySignaled = true;
    ready.resolve();
  }

  function takeOrdered(): QueuedOp<V>[] {
    const taken = ops;
    ops = [];
    const high = taken.filter((op) => op.priority === "high");
    if (high.length === 0) return taken;
    return [...high, ...taken.filter((op) => op.priority !== "high")];
  }

  function runAll(): V | undefined {
    assertUiTurn("flush", devMode);
    const token = perfMarkStart("flush");
    state = "flushing";
    let result: V | undefined;
    let rootSeen = false;
    try {
      // Ops may enqueue more ops; drain until empty.
      while (ops.length > 0) {
        for (const op of takeOrdered()) {
          const value = op.run();
          if (!rootSeen && op.tag === "root") {
            rootSeen = true;
            result = value;
          }
        }
      }
    } catch (err: unknown) {
      ops = [];
      state = "idle";
      signalReady();
      perfMarkEnd("flush", token);
      throw new TrellisError("TRELLIS_FLUSH_FAILED", `queued operation threw: ${describeThrown(err)}`, {
        cause: err,
      });
    }
    state = "idle";
    perfMarkEnd("flush", token);
    return result;
  }

  async function waitReady(timeoutMs: number): Promise<boolean> {
    if (readySignaled) return true;
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timedOut = new Promise<boolean>((resolve) => {
      timer = setTimeout(() => resolve(false), timeoutMs);
    });
    try {
      return await Promise.race([ready.promise.then(() => true), timedOut]);
    } finally {
      if (timer !== undefined) clearTimeout(timer);
    }
  }

  return Object.freeze({
    state: () => state,
    size: () => ops.length,

    markPreparing(): void {
      state = "preparing";
      if (readySignaled) {
        ready = createSignal();
        readySignaled = false;
      }
    },

    markReady(): void {
      if (state === "preparing") state = "ready";
      signalReady();
    },

    enqueue(op: () => V | undefined, enqueueOpts: EnqueueOptions = {}): void {
      ops.push({ run: op, tag: enqueueOpts.tag, priority: enqueueOpts.priority ?? "normal" });
    },

    async syncFlush(timeoutMs: number = defaultTimeoutMs): Promise<V | undefined> {
      if (state !== "idle") {
        const ok = await waitReady(timeoutMs);
        if (!ok) {
          logger.warn(
            formatLogMessage(
              "queue",
              `TRELLIS_FLUSH_TIMEOUT: background work not ready after ${timeoutMs}ms; flushing ${ops.length} queued op(s)`,
            ),
          );
        }
      }
      return runAll();
    },

    forceFlush(): V | undefined {
      return runAll();
    },

    reset(): void {
      ops = [];
      state = "idle";
      signalReady();
    },
  });
}
