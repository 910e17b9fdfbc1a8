/**
 * packages/core/src/pipeline/renderPipeline.ts — Background render pipeline.
 *
 * Why: Parsing, binding and layout do not need the UI turn, so they run on
 * the background executor, one macrotask per phase. Only view creation and
 * attachment are queued for the UI turn, where syncFlush() picks them up.
 *
 * Rules:
 *   - The task's cancellation token is checked before every phase
 *   - Cancelling before "ready" clears the queue and drops the work silently;
 *     after "ready" it does not touch the queued ops
 *   - A parse failure is terminal for the task: nothing is queued, the queue
 *     is marked ready and the outcome carries TRELLIS_PARSE_FAILURE
 *   - Starting a new task cancels the previous one on the same pipeline
 *   - startWithPrototype() skips the parser and binds a clone of the
 *     prototype; the prototype itself is never bound
 *   - With a list preloader, list item heights are computed after layout,
 *     still off the UI turn
 */

import type { DataBinder, TemplateParser } from "../app/types.js";
import { TrellisError, describeThrown, isTrellisError } from "../errors.js";
import { applyLayoutFrames } from "../layout/applyFrames.js";
import type { LayoutEngine } from "../layout/engine/layoutEngine.js";
import type { ContainerSize } from "../layout/types.js";
import { type Logger, formatLogMessage } from "../logging.js";
import { type TemplateNode, type ValueMap, cloneTree } from "../model/node.js";
import { perfMarkEnd, perfMarkStart } from "../perf/perf.js";
import type { Materializer } from "../runtime/materialize.js";
import { type BackgroundExecutor, type CancellationToken, createCancellationToken } from "./executor.js";
import { type OperationQueue, type QueueState, createOperationQueue } from "./operationQueue.js";

/** Item heights of one list, in item order, measured with its cell template. */
export type ListPreload = Readonly<{
  listId: string;
  templateId: string;
  heights: readonly number[];
}>;

export type ListPreloader<V> = (root: TemplateNode<V>, containerSize: ContainerSize) => readonly ListPreload[];

export type RenderOutcome<V> =
  | Readonly<{
      status: "ready";
      root: TemplateNode<V>;
      prototype: TemplateNode<V>;
      lists: readonly ListPreload[];
    }>
  | Readonly<{ status: "cancelled" }>
  | Readonly<{ status: "failed"; error: unknown }>;

export type RenderTask<V> = Readonly<{
  id: number;
  token: CancellationToken;
  /** Settles when background work ends; never rejects. */
  done: Promise<RenderOutcome<V>>;
  /** Bound tree, available once the bind phase has run. */
  root: () => TemplateNode<V> | undefined;
  prototype: () => TemplateNode<V> | undefined;
  /** List preloads, available once the preload phase has run. */
  lists: () => readonly ListPreload[];
  cancel: () => void;
}>;

export type RenderPipelineDeps<T, V> = Readonly<{
  parser: TemplateParser<T>;
  binder: DataBinder;
  layout: LayoutEngine;
  materializer: Materializer<V>;
  executor: BackgroundExecutor;
  logger: Logger;
  devMode: boolean;
  flushTimeoutMs: number;
  preloadLists?: ListPreloader<V>;
}>;

export type RenderPipeline<T, V> = Readonly<{
  start: (template: T, data: ValueMap, containerSize: ContainerSize) => RenderTask<V>;
  /** Like start(), with an already parsed tree in place of the parse phase. */
  startWithPrototype: (prototype: TemplateNode<V>, data: ValueMap, containerSize: ContainerSize) => RenderTask<V>;
  syncFlush: (timeoutMs?: number) => Promise<V | undefined>;
  forceFlush: () => V | undefined;
  /** Cancels the current task and clears queued ops. */
  reset: () => void;
  /** Sets the default syncFlush timeout; omitted fields return to the pipeline's defaults. */
  configure: (opts: Readonly<{ flushTimeoutMs?: number }>) => void;
  state: () => QueueState;
  current: () => RenderTask<V> | undefined;
}>;

type Hold<V> = {
  root?: TemplateNode<V>;
  prototype?: TemplateNode<V>;
  lists?: readonly ListPreload[];
};

const NO_LISTS: readonly ListPreload[] = Object.freeze([]);

let nextTaskId = 1;

export function createRenderPipeline<T, V>(deps: RenderPipelineDeps<T, V>): RenderPipeline<T, V> {
  const { parser, binder, layout, materializer, executor, logger } = deps;
  let flushTimeoutMs = deps.flushTimeoutMs;
  const queue: OperationQueue<V> = createOperationQueue<V>({
    defaultTimeoutMs: flushTimeoutMs,
    logger,
    devMode: deps.devMode,
  });
  let current: RenderTask<V> | undefined;

  function parseTemplate(template: T): TemplateNode<V> {
    const t = perfMarkStart("parse");
    const parsed = parser.parse<V>(template);
    perfMarkEnd("parse", t);
    if (parsed === undefined) {
      throw new TrellisError("TRELLIS_PARSE_FAILURE", "template parser returned no tree");
    }
    return parsed;
  }

  async function runPhases(
    token: CancellationToken,
    load: () => TemplateNode<V>,
    data: ValueMap,
    containerSize: ContainerSize,
    hold: Hold<V>,
  ): Promise<RenderOutcome<V>> {
    const prototype = await executor.submit(() => {
      token.throwIfCancelled("parse");
      return load();
    });
    hold.prototype = prototype;

    const root = await executor.submit(() => {
      token.throwIfCancelled("bind");
      const t = perfMarkStart("bind");
      const bound = cloneTree(prototype);
      binder.bind(data, bound);
      perfMarkEnd("bind", t);
      return bound;
    });
    hold.root = root;

    await executor.submit(() => {
      token.throwIfCancelled("layout");
      applyLayoutFrames(root, layout.computeLayout(root, containerSize));
    });

    const preload = deps.preloadLists;
    const lists =
      preload === undefined
        ? NO_LISTS
        : await executor.submit(() => {
            token.throwIfCancelled("preload");
            return preload(root, containerSize);
          });
    hold.lists = lists;

    await executor.submit(() => {
      token.throwIfCancelled("materialize");
      for (const step of materializer.planMount(root)) {
        queue.enqueue(step.run, { tag: step.tag });
      }
      queue.markReady();
    });

    return { status: "ready", root, prototype, lists };
  }

  function launch(load: () => TemplateNode<V>, data: ValueMap, containerSize: ContainerSize): RenderTask<V> {
    current?.cancel();
    queue.reset();
    queue.markPreparing();

    const token = createCancellationToken();
    const hold: Hold<V> = {};
    const id = nextTaskId++;

    const isCurrent = (): boolean => current?.id === id;

    const done = runPhases(token, load, data, containerSize, hold).catch(
      (err: unknown): RenderOutcome<V> => {
        if (isTrellisError(err, "TRELLIS_CANCELLED")) {
          logger.debug(formatLogMessage("pipeline", `task ${id}: ${err.message}`));
          return { status: "cancelled" };
        }
        logger.error(formatLogMessage("pipeline", `task ${id} failed: ${describeThrown(err)}`));
        // Let a waiting syncFlush return now instead of at its timeout.
        if (isCurrent()) queue.markReady();
        return { status: "failed", error: err };
      },
    );

    const task: RenderTask<V> = Object.freeze({
      id,
      token,
      done,
      root: () => hold.root,
      prototype: () => hold.prototype,
      lists: () => hold.lists ?? NO_LISTS,
      cancel: () => {
        if (token.isCancelled()) return;
        token.cancel();
        if (isCurrent() && queue.state() === "preparing") queue.reset();
      },
    });
    current = task;
    return task;
  }

  return Object.freeze({
    start: (template: T, data: ValueMap, containerSize: ContainerSize) =>
      launch(() => parseTemplate(template), data, containerSize),
    startWithPrototype: (prototype: TemplateNode<V>, data: ValueMap, containerSize: ContainerSize) =>
      launch(() => prototype, data, containerSize),
    syncFlush: (timeoutMs?: number) => queue.syncFlush(timeoutMs ?? flushTimeoutMs),
    forceFlush: () => queue.forceFlush(),
    reset(): void {
      current?.cancel();
      current = undefined;
      queue.reset();
    },
    configure(opts: Readonly<{ flushTimeoutMs?: number }>): void {
      flushTimeoutMs = opts.flushTimeoutMs ?? deps.flushTimeoutMs;
    },
    state: () => queue.state(),
    current: () => current,
  });
}
