/* ========== Render Pipeline Pooling ========== */
// List cells start many short renders; pipelines are reused instead of
// rebuilt. acquire() resets and configures one, release() resets it and keeps
// it only while the pool is below capacity.

import type { RenderPipeline } from "./renderPipeline.js";

export const DEFAULT_PIPELINE_POOL_CAPACITY = 8;

export type PipelineConfig = Readonly<{ flushTimeoutMs?: number }>;

export type PipelinePoolStats = Readonly<{
  created: number;
  reused: number;
  /** Released while the pool was full. */
  dropped: number;
  idle: number;
  inUse: number;
}>;

export type PipelinePool<T, V> = Readonly<{
  acquire: (config?: PipelineConfig) => RenderPipeline<T, V>;
  release: (pipeline: RenderPipeline<T, V>) => void;
  stats: () => PipelinePoolStats;
  capacity: number;
}>;

export function createPipelinePool<T, V>(
  create: () => RenderPipeline<T, V>,
  capacity: number = DEFAULT_PIPELINE_POOL_CAPACITY,
): PipelinePool<T, V> {
  const idle: RenderPipeline<T, V>[] = [];
  const inUse = new Set<RenderPipeline<T, V>>();
  let created = 0;
  let reused = 0;
  let dropped = 0;

  return Object.freeze({
    acquire(config?: PipelineConfig): RenderPipeline<T, V> {
      let pipeline = idle.pop();
      if (pipeline === undefined) {
        pipeline = create();
        created++;
      } else {
        reused++;
      }
      pipeline.reset();
      pipeline.configure(config ?? {});
      inUse.add(pipeline);
      return pipeline;
    },

    release(pipeline: RenderPipeline<T, V>): void {
      // Unknown or double release.
      if (!inUse.delete(pipeline)) return;
      pipeline.reset();
      if (idle.length < capacity) idle.push(pipeline);
      else dropped++;
    },

    stats(): PipelinePoolStats {
      return Object.freeze({ created, reused, dropped, idle: idle.length, inUse: inUse.size });
    },

    capacity,
  });
}
