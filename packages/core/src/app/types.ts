import type { ContainerSize } from "../layout/types.js";
import type { TemplateNode, ValueMap } from "../model/node.js";
import type { RenderConfig } from "../config.js";
import type { Logger } from "../logging.js";
import type { TextMeasurer } from "../layout/textMeasure.js";
import type { LayoutNodePool } from "../layout/engine/pool.js";
import type { RecyclePool, ViewHost } from "../widgets/types.js";
import type { PipelinePool } from "../pipeline/pipelinePool.js";
import type { TrellisError } from "../errors.js";
import type { RenderTask } from "../pipeline/renderPipeline.js";

/**
 * Turns a raw template into a node tree. Returning undefined is a parse
 * failure and is terminal for the render call that asked.
 */
export type TemplateParser<T> = Readonly<{
  parse: <V>(raw: T) => TemplateNode<V> | undefined;
  /**
   * Recognizes a template nested in a prop value (a list's `itemTemplate`).
   * Without it, list items are not preloaded.
   */
  readTemplate?: (value: unknown) => T | undefined;
}>;

/** Resolves data into the tree's bindings, in place, through the node API. */
export type DataBinder = Readonly<{
  bind: <V>(data: ValueMap, root: TemplateNode<V>) => void;
}>;

export type RendererOptions<T, V> = Readonly<{
  parser: TemplateParser<T>;
  binder: DataBinder;
  host: ViewHost<V>;
  measurer?: TextMeasurer;
  /** Defaults to a bounded per-kind pool sized by the config. */
  recyclePool?: RecyclePool<V>;
  /** Shared layout node pool; one is created when omitted. */
  layoutPool?: LayoutNodePool;
  logger?: Logger;
  config?: RenderConfig;
}>;

/** What the renderer remembers about a view it produced. */
export type RenderRecord<V> = Readonly<{
  view: V;
  root: TemplateNode<V>;
  /** Parsed, unbound tree; cloned for every update. */
  prototype: TemplateNode<V>;
  data: ValueMap;
  containerSize: ContainerSize;
}>;

export type HeightOptions = Readonly<{ useCache?: boolean }>;

export type BatchRenderItem<T> = Readonly<{
  id: string;
  template: T;
  /** Renders through the template cache when set. */
  templateId?: string;
  data: ValueMap;
  containerSize: ContainerSize;
}>;

/** Exactly one of `view` and `error` is set. */
export type BatchRenderResult<V> = Readonly<{ id: string; view?: V; error?: unknown }>;

export type HeightBatchItem<T> = Readonly<{
  id: string;
  template: T;
  templateId: string;
  data: ValueMap;
  containerWidth: number;
}>;

/** A failed item has height 0 and carries the error. */
export type HeightBatchResult = Readonly<{ id: string; height: number; error?: TrellisError }>;

/**
 * A pipeline render started through the renderer. The first flush or cancel
 * ends it and returns its pipeline to the pool.
 */
export type RendererTask<V> = Readonly<{
  task: RenderTask<V>;
  /** Awaits background work (bounded by the flush timeout) and materializes. */
  syncFlush: (timeoutMs?: number) => Promise<V | undefined>;
  forceFlush: () => V | undefined;
  cancel: () => void;
}>;

export interface Renderer<T, V> {
  render(template: T, data: ValueMap, containerSize: ContainerSize): V;
  /** Diff-and-patch re-render; returns the number of edit operations applied. */
  update(view: V, data: ValueMap, containerSize: ContainerSize): number;
  /** Re-bind in place without diffing. The template shape must not change. */
  quickUpdate(view: V, data: ValueMap, containerSize: ContainerSize): void;
  start(template: T, data: ValueMap, containerSize: ContainerSize): RendererTask<V>;
  /** render() with the parsed template cached under `templateId`. */
  renderWithCache(template: T, templateId: string, data: ValueMap, containerSize: ContainerSize): V;
  /**
   * start() through the template cache: a cached prototype skips the parse
   * phase, and a parsed one is cached when the task is flushed.
   */
  renderWithPipelineCache(
    template: T,
    templateId: string,
    data: ValueMap,
    containerSize: ContainerSize,
  ): RendererTask<V>;
  /** Prepares every item in the background, then flushes them in order. */
  renderBatch(items: readonly BatchRenderItem<T>[]): Promise<BatchRenderResult<V>[]>;
  /** Content height at `containerWidth`, laid out without creating views. */
  calculateHeight(
    template: T,
    templateId: string,
    data: ValueMap,
    containerWidth: number,
    opts?: HeightOptions,
  ): number;
  /** calculateHeight() per item, in order, through the height cache. */
  calculateHeightsBatch(items: readonly HeightBatchItem<T>[]): HeightBatchResult[];
  getRecord(view: V): RenderRecord<V> | undefined;
  /** Recycle the view tree and forget the record. */
  cleanup(view: V): void;
  /** Drops cached templates and heights; with an id, only that template's entries. */
  clearCaches(templateId?: string): void;
  readonly pipelines: PipelinePool<T, V>;
}
