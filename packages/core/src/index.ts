/**
 * @trellis-ui/core
 *
 * Template renderer core: component tree, flexbox layout through yoga, tree
 * diffing, patching and the background render pipeline.
 * This package MUST NOT use Node-specific APIs (Buffer, worker_threads, node:* imports).
 */

// =============================================================================
// Errors, logging, configuration
// =============================================================================

export { TrellisError, describeThrown, isTrellisError, type TrellisErrorCode } from "./errors.js";

export {
  DEV_MODE,
  SILENT_LOGGER,
  createConsoleLogger,
  createMemoryLogger,
  formatLogMessage,
  warnDevOnce,
  type LogArea,
  type Logger,
  type MemoryLogger,
} from "./logging.js";

export {
  DEFAULT_RENDER_CONFIG,
  resolveRenderConfig,
  type RenderConfig,
  type ResolvedRenderConfig,
} from "./config.js";

// =============================================================================
// Model
// =============================================================================

export {
  AUTO,
  DEFAULT_STYLE,
  ZERO_INSETS,
  createStyle,
  dimensionEquals,
  hasVisualEffect,
  insets,
  percent,
  point,
  styleEquals,
  withStyle,
  type AlignContent,
  type AlignItems,
  type AlignSelf,
  type Dimension,
  type Display,
  type EdgeInsets,
  type FlexDirection,
  type FlexWrap,
  type JustifyContent,
  type Overflow,
  type PositionInsets,
  type PositionType,
  type Style,
  type TextAlign,
  type Visibility,
} from "./model/style.js";

export {
  parseDimension,
  parseInsets,
  parseStyle,
  type StyleIssue,
  type StyleParseResult,
} from "./model/styleParser.js";

export { KIND_TABLE, NODE_KINDS, resolveKind, type KindSpec, type NodeKind } from "./model/kinds.js";

export {
  TemplateNode,
  cloneTree,
  countNodes,
  findById,
  walkTree,
  type NodeInit,
  type ValueMap,
} from "./model/node.js";

export { diffValueMaps, valueEquals, type ValueMapDelta } from "./model/values.js";

// =============================================================================
// Layout
// =============================================================================

export {
  ZERO_FRAME,
  frameEquals,
  type ContainerSize,
  type Frame,
  type FrameMap,
  type LayoutSlot,
  type MeasureConstraints,
  type MeasuredSize,
} from "./layout/types.js";

export {
  DEFAULT_MAX_IDLE,
  createLayoutNodePool,
  type LayoutNodePool,
  type LayoutNodePoolOptions,
  type LayoutPoolStats,
} from "./layout/engine/pool.js";

export {
  createLayoutEngine,
  findMalformation,
  type LayoutEngine,
  type LayoutEngineOptions,
} from "./layout/engine/layoutEngine.js";

export { applyStyleToYogaNode } from "./layout/engine/applyStyle.js";
export { applyLayoutFrames } from "./layout/applyFrames.js";

export {
  DEFAULT_FONT_SIZE,
  createMonospaceMeasurer,
  wrapMonospace,
  type MeasureContent,
  type MonospaceMeasurerOptions,
  type TextMeasurer,
} from "./layout/textMeasure.js";

// =============================================================================
// Diff / patch
// =============================================================================

export {
  createEditScript,
  describeEditScript,
  describeOperation,
  type DeleteOp,
  type EditOperation,
  type EditScript,
  type EditStats,
  type InsertOp,
  type MoveOp,
  type PropertyChanges,
  type ReplaceOp,
  type UpdateOp,
} from "./runtime/editScript.js";

export {
  longestIncreasingSubsequence,
  matchChildren,
  slotIdForChild,
  type ChildMatch,
  type SlotId,
} from "./runtime/reconcile.js";

export { diff, diffProperties } from "./runtime/diff.js";

export {
  applyEditScript,
  copyKindFields,
  quickUpdate,
  relayout,
  releaseLayoutHandles,
  type PatchContext,
  type PatchResult,
} from "./runtime/patch.js";

export {
  createMaterializer,
  type Materializer,
  type MaterializerOptions,
  type MountStep,
  type MountStepTag,
  type RefreshStats,
} from "./runtime/materialize.js";

export { assertUiTurn, isOnUiTurn, runOffUiTurn } from "./runtime/uiAffinity.js";

// =============================================================================
// Pipeline
// =============================================================================

export {
  createBackgroundExecutor,
  createCancellationToken,
  type BackgroundExecutor,
  type CancellationToken,
  type Scheduler,
} from "./pipeline/executor.js";

export {
  DEFAULT_FLUSH_TIMEOUT_MS,
  createOperationQueue,
  type EnqueueOptions,
  type OperationPriority,
  type OperationQueue,
  type OperationQueueOptions,
  type QueueState,
} from "./pipeline/operationQueue.js";

export {
  createRenderPipeline,
  type ListPreload,
  type ListPreloader,
  type RenderOutcome,
  type RenderPipeline,
  type RenderPipelineDeps,
  type RenderTask,
} from "./pipeline/renderPipeline.js";

export {
  DEFAULT_PIPELINE_POOL_CAPACITY,
  createPipelinePool,
  type PipelineConfig,
  type PipelinePool,
  type PipelinePoolStats,
} from "./pipeline/pipelinePool.js";

// =============================================================================
// Hosts, renderer, caches, perf
// =============================================================================

export type {
  PlaceholderFactory,
  RecyclePool,
  ViewHost,
  ViewTreeOps,
  WidgetFactory,
  WidgetTable,
} from "./widgets/types.js";

export {
  createViewRecyclePool,
  type ViewRecyclePool,
  type ViewRecyclePoolOptions,
} from "./widgets/recyclePool.js";

export { createRenderer } from "./app/createRenderer.js";
export type {
  BatchRenderItem,
  BatchRenderResult,
  DataBinder,
  HeightBatchItem,
  HeightBatchResult,
  HeightOptions,
  RenderRecord,
  Renderer,
  RendererOptions,
  RendererTask,
  TemplateParser,
} from "./app/types.js";

export { LruCache } from "./cache/lru.js";

export {
  PERF_ENABLED,
  PERF_PHASES,
  perfMarkEnd,
  perfMarkStart,
  perfReset,
  perfSnapshot,
  type PerfSnapshot,
  type PerfToken,
  type PhaseStats,
  type RenderPhase,
} from "./perf/perf.js";
