/**
 * packages/core/src/app/createRenderer.ts — Renderer assembly and entry points.
 *
 * Why: Wires the parser, binder, layout engine, materializer, patch applier
 * and pipeline pool into the render / update / quickUpdate API, and owns the
 * caches that sit in front of them.
 *
 * Caches:
 *   - records: view handle → live tree, prototype and last data
 *   - templates: templateId → parsed prototype (LRU)
 *   - heights: `${templateId}_${width}_${data.id}` → content height (LRU);
 *     data without an `id` is never cached
 *
 * Pipeline renders go through the same template cache and preload the item
 * heights of every list whose `itemTemplate` the parser can read, under
 * `list_cell_<list id>` unless the list names a `cellTemplateId`.
 *
 * All entry points that touch views assert the UI turn.
 */

import { LruCache } from "../cache/lru.js";
import { type ResolvedRenderConfig, resolveRenderConfig } from "../config.js";
import { TrellisError, isTrellisError } from "../errors.js";
import { applyLayoutFrames } from "../layout/applyFrames.js";
import { type LayoutEngine, createLayoutEngine } from "../layout/engine/layoutEngine.js";
import { createLayoutNodePool } from "../layout/engine/pool.js";
import type { ContainerSize } from "../layout/types.js";
import { type Logger, createConsoleLogger, formatLogMessage } from "../logging.js";
import { type TemplateNode, type ValueMap, cloneTree, walkTree } from "../model/node.js";
import { perfMarkEnd, perfMarkStart } from "../perf/perf.js";
import { createBackgroundExecutor } from "../pipeline/executor.js";
import { type PipelinePool, createPipelinePool } from "../pipeline/pipelinePool.js";
import { type ListPreload, type RenderPipeline, type RenderTask, createRenderPipeline } from "../pipeline/renderPipeline.js";
import { diff } from "../runtime/diff.js";
import { type Materializer, createMaterializer } from "../runtime/materialize.js";
import { type PatchContext, applyEditScript, quickUpdate, releaseLayoutHandles } from "../runtime/patch.js";
import { assertUiTurn } from "../runtime/uiAffinity.js";
import { createViewRecyclePool } from "../widgets/recyclePool.js";
import type { RecyclePool } from "../widgets/types.js";
import type {
  BatchRenderItem,
  BatchRenderResult,
  HeightBatchItem,
  HeightBatchResult,
  HeightOptions,
  RenderRecord,
  Renderer,
  RendererOptions,
  RendererTask,
} from "./types.js";

function heightCacheKey(templateId: string, width: number, data: ValueMap): string | undefined {
  const id = data["id"] ?? data["_id"];
  if (typeof id !== "string" && !(typeof id === "number" && Number.isFinite(id))) return undefined;
  return `${templateId}_${Math.round(width)}_${String(id)}`;
}

function isRecord(v: unknown): v is Readonly<Record<string, unknown>> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function itemData(item: unknown, index: number): ValueMap {
  return isRecord(item) ? { ...item, item, index } : { item, index };
}

export function createRenderer<T, V>(opts: RendererOptions<T, V>): Renderer<T, V> {
  const config: ResolvedRenderConfig = resolveRenderConfig(opts.config);
  const devMode = config.devMode;
  const logger: Logger = opts.logger ?? createConsoleLogger();
  const { parser, binder, host } = opts;

  const layoutPool = opts.layoutPool ?? createLayoutNodePool({ maxIdle: config.layoutPoolMaxIdle });
  if (config.layoutPoolWarmUp > 0) layoutPool.warmUp(config.layoutPoolWarmUp);
  const layout: LayoutEngine = createLayoutEngine({ pool: layoutPool, measurer: opts.measurer, logger });

  const recyclePool: RecyclePool<V> =
    opts.recyclePool ??
    createViewRecyclePool<V>({ maxPerKind: config.recyclePerKind, maxTotal: config.recycleTotal });
  const materializer: Materializer<V> = createMaterializer({ host, recyclePool, devMode, logger });
  const patchCtx: PatchContext<V> = Object.freeze({ layout, materializer, logger, devMode });

  const records = new Map<V, RenderRecord<V>>();
  const templates = new LruCache<string, TemplateNode<V>>(config.templateCacheCapacity);
  const heights = new LruCache<string, number>(config.heightCacheCapacity);

  const executor = createBackgroundExecutor();
  const pipelines: PipelinePool<T, V> = createPipelinePool<T, V>(
    () =>
      createRenderPipeline<T, V>({
        parser,
        binder,
        layout,
        materializer,
        executor,
        logger,
        devMode,
        flushTimeoutMs: config.flushTimeoutMs,
        preloadLists,
      }),
    config.pipelinePoolCapacity,
  );

  function parsePrototype(template: T): TemplateNode<V> {
    const token = perfMarkStart("parse");
    const parsed = parser.parse<V>(template);
    perfMarkEnd("parse", token);
    if (parsed === undefined) {
      throw new TrellisError("TRELLIS_PARSE_FAILURE", "template parser returned no tree");
    }
    return parsed;
  }

  function cachedPrototype(template: T, templateId: string): TemplateNode<V> {
    const hit = templates.get(templateId);
    if (hit !== undefined) return hit;
    const parsed = parsePrototype(template);
    templates.set(templateId, parsed);
    return parsed;
  }

  function bindClone(prototype: TemplateNode<V>, data: ValueMap): TemplateNode<V> {
    const root = cloneTree(prototype);
    const token = perfMarkStart("bind");
    binder.bind(data, root);
    perfMarkEnd("bind", token);
    return root;
  }

  /** Throws TRELLIS_PARSE_FAILURE when the template does not parse. */
  function measureHeight(
    template: T,
    templateId: string,
    data: ValueMap,
    containerWidth: number,
    useCache: boolean,
  ): number {
    const key = heightCacheKey(templateId, containerWidth, data);
    if (useCache && key !== undefined) {
      const hit = heights.get(key);
      if (hit !== undefined) return hit;
    }
    const root = bindClone(cachedPrototype(template, templateId), data);
    const frames = layout.computeLayout(root, { width: containerWidth, height: Number.NaN });
    const height = frames.get(root.id)?.height ?? 0;
    if (useCache && key !== undefined) heights.set(key, height);
    return height;
  }

  function preloadLists(root: TemplateNode<V>, containerSize: ContainerSize): ListPreload[] {
    const readTemplate = parser.readTemplate;
    if (readTemplate === undefined) return [];
    const out: ListPreload[] = [];
    walkTree(root, (node) => {
      if (node.kind !== "list") return true;
      const template = readTemplate(node.resolved("itemTemplate"));
      const items = node.resolved("items");
      if (template === undefined || !Array.isArray(items)) return true;
      const named = node.props["cellTemplateId"];
      const templateId = typeof named === "string" && named.length > 0 ? named : `list_cell_${node.id}`;
      const width = node.layoutResult.width > 0 ? node.layoutResult.width : containerSize.width;
      const rows: readonly unknown[] = items;
      try {
        const heightsOut = rows.map((item, i) => measureHeight(template, templateId, itemData(item, i), width, true));
        out.push(Object.freeze({ listId: node.id, templateId, heights: Object.freeze(heightsOut) }));
      } catch (err: unknown) {
        if (!isTrellisError(err)) throw err;
        logger.error(formatLogMessage("render", `list #${node.id}: ${err.message} (${templateId})`));
      }
      return true;
    });
    return out;
  }

  function renderPrototype(prototype: TemplateNode<V>, data: ValueMap, containerSize: ContainerSize): V {
    assertUiTurn("render", devMode);
    const root = bindClone(prototype, data);
    applyLayoutFrames(root, layout.computeLayout(root, containerSize));
    const view = materializer.mountTree(root);
    records.set(view, Object.freeze({ view, root, prototype, data, containerSize }));
    return view;
  }

  function requireRecord(view: V, operation: string): RenderRecord<V> {
    const record = records.get(view);
    if (record === undefined) {
      throw new TrellisError("TRELLIS_UNKNOWN_VIEW", `${operation}: view was not produced by this renderer`);
    }
    return record;
  }

  function render(template: T, data: ValueMap, containerSize: ContainerSize): V {
    return renderPrototype(parsePrototype(template), data, containerSize);
  }

  function update(view: V, data: ValueMap, containerSize: ContainerSize): number {
    assertUiTurn("update", devMode);
    const record = requireRecord(view, "update");
    const next = bindClone(record.prototype, data);
    const script = diff(record.root, next);
    const sameSize =
      Object.is(containerSize.width, record.containerSize.width) &&
      Object.is(containerSize.height, record.containerSize.height);
    if (!script.hasDiff && sameSize) {
      records.set(view, Object.freeze({ ...record, data }));
      return 0;
    }
    const result = applyEditScript(patchCtx, script, record.root, containerSize);
    const root = result.root ?? record.root;
    records.set(view, Object.freeze({ ...record, root, data, containerSize }));
    if (result.skipped > 0) {
      logger.debug(formatLogMessage("render", `update skipped ${result.skipped} op(s)`));
    }
    return result.applied;
  }

  function track(
    pipeline: RenderPipeline<T, V>,
    task: RenderTask<V>,
    data: ValueMap,
    containerSize: ContainerSize,
    templateId?: string,
  ): RendererTask<V> {
    let ended = false;

    const end = (): void => {
      if (ended) return;
      ended = true;
      pipelines.release(pipeline);
    };

    const adopt = (view: V | undefined): V | undefined => {
      const root = task.root();
      const prototype = task.prototype();
      if (view !== undefined && root !== undefined && prototype !== undefined) {
        records.set(view, Object.freeze({ view, root, prototype, data, containerSize }));
        if (templateId !== undefined && !templates.has(templateId)) templates.set(templateId, prototype);
      }
      return view;
    };

    return Object.freeze({
      task,
      async syncFlush(timeoutMs?: number): Promise<V | undefined> {
        try {
          return adopt(await pipeline.syncFlush(timeoutMs));
        } finally {
          end();
        }
      },
      forceFlush(): V | undefined {
        try {
          return adopt(pipeline.forceFlush());
        } finally {
          end();
        }
      },
      cancel(): void {
        task.cancel();
        end();
      },
    });
  }

  function start(template: T, data: ValueMap, containerSize: ContainerSize): RendererTask<V> {
    const pipeline = pipelines.acquire();
    return track(pipeline, pipeline.start(template, data, containerSize), data, containerSize);
  }

  function renderWithPipelineCache(
    template: T,
    templateId: string,
    data: ValueMap,
    containerSize: ContainerSize,
  ): RendererTask<V> {
    const pipeline = pipelines.acquire();
    const cached = templates.get(templateId);
    const task =
      cached === undefined
        ? pipeline.start(template, data, containerSize)
        : pipeline.startWithPrototype(cached, data, containerSize);
    return track(pipeline, task, data, containerSize, templateId);
  }

  async function renderBatch(items: readonly BatchRenderItem<T>[]): Promise<BatchRenderResult<V>[]> {
    const running = items.map((item) => ({
      id: item.id,
      run:
        item.templateId === undefined
          ? start(item.template, item.data, item.containerSize)
          : renderWithPipelineCache(item.template, item.templateId, item.data, item.containerSize),
    }));
    const results: BatchRenderResult<V>[] = [];
    for (const { id, run } of running) {
      const view = await run.syncFlush();
      if (view !== undefined) {
        results.push(Object.freeze({ id, view }));
        continue;
      }
      const outcome = await run.task.done;
      const error =
        outcome.status === "failed"
          ? outcome.error
          : new TrellisError("TRELLIS_FLUSH_FAILED", `batch item "${id}" produced no view`);
      results.push(Object.freeze({ id, error }));
    }
    return results;
  }

  const renderer: Renderer<T, V> = {
    render,
    update,

    quickUpdate(view: V, data: ValueMap, containerSize: ContainerSize): void {
      assertUiTurn("quickUpdate", devMode);
      const record = requireRecord(view, "quickUpdate");
      quickUpdate(patchCtx, record.root, binder, data, containerSize);
      records.set(view, Object.freeze({ ...record, data, containerSize }));
    },

    start,
    renderWithPipelineCache,
    renderBatch,

    renderWithCache(template: T, templateId: string, data: ValueMap, containerSize: ContainerSize): V {
      return renderPrototype(cachedPrototype(template, templateId), data, containerSize);
    },

    calculateHeight(
      template: T,
      templateId: string,
      data: ValueMap,
      containerWidth: number,
      heightOpts: HeightOptions = {},
    ): number {
      try {
        return measureHeight(template, templateId, data, containerWidth, heightOpts.useCache !== false);
      } catch (err: unknown) {
        if (!isTrellisError(err)) throw err;
        logger.error(formatLogMessage("render", `calculateHeight: ${err.message} (${templateId})`));
        return 0;
      }
    },

    calculateHeightsBatch(items: readonly HeightBatchItem<T>[]): HeightBatchResult[] {
      return items.map((item): HeightBatchResult => {
        try {
          const height = measureHeight(item.template, item.templateId, item.data, item.containerWidth, true);
          return Object.freeze({ id: item.id, height });
        } catch (err: unknown) {
          if (!isTrellisError(err)) throw err;
          logger.error(formatLogMessage("render", `calculateHeightsBatch: ${err.message} (${item.id})`));
          return Object.freeze({ id: item.id, height: 0, error: err });
        }
      });
    },

    getRecord: (view: V) => records.get(view),

    cleanup(view: V): void {
      assertUiTurn("cleanup", devMode);
      const record = records.get(view);
      if (record === undefined) return;
      records.delete(view);
      materializer.unmountSubtree(record.root);
      releaseLayoutHandles(layout, record.root);
    },

    clearCaches(templateId?: string): void {
      if (templateId === undefined) {
        templates.clear();
        heights.clear();
        return;
      }
      templates.delete(templateId);
      const prefix = `${templateId}_`;
      heights.deleteWhere((key) => key.startsWith(prefix));
    },

    pipelines,
  };
  return renderer;
}
