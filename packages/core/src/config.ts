/**
 * packages/core/src/config.ts — Renderer configuration defaults and validation.
 *
 * Rules:
 *   - Missing fields fall back to DEFAULT_RENDER_CONFIG.
 *   - Numeric limits must be positive integers (layoutPoolWarmUp may be 0).
 *   - Invalid values throw TRELLIS_INVALID_CONFIG.
 */

import { TrellisError } from "./errors.js";
import { DEV_MODE } from "./logging.js";

export type RenderConfig = Readonly<{
  /** Max time syncFlush waits for background work, in milliseconds. */
  flushTimeoutMs?: number;
  pipelinePoolCapacity?: number;
  /** Idle layout nodes kept by the pool before extras are freed. */
  layoutPoolMaxIdle?: number;
  layoutPoolWarmUp?: number;
  heightCacheCapacity?: number;
  templateCacheCapacity?: number;
  recyclePerKind?: number;
  recycleTotal?: number;
  /** Overrides NODE_ENV-derived development checks. */
  devMode?: boolean;
}>;

export type ResolvedRenderConfig = Readonly<{
  flushTimeoutMs: number;
  pipelinePoolCapacity: number;
  layoutPoolMaxIdle: number;
  layoutPoolWarmUp: number;
  heightCacheCapacity: number;
  templateCacheCapacity: number;
  recyclePerKind: number;
  recycleTotal: number;
  devMode: boolean;
}>;

export const DEFAULT_RENDER_CONFIG: ResolvedRenderConfig = Object.freeze({
  flushTimeoutMs: 100,
  pipelinePoolCapacity: 8,
  layoutPoolMaxIdle: 256,
  layoutPoolWarmUp: 0,
  heightCacheCapacity: 500,
  templateCacheCapacity: 64,
  recyclePerKind: 20,
  recycleTotal: 100,
  devMode: DEV_MODE,
});

function invalidConfig(detail: string): never {
  throw new TrellisError("TRELLIS_INVALID_CONFIG", detail);
}

function requirePositiveInt(name: string, v: number): number {
  if (!Number.isInteger(v) || v <= 0) invalidConfig(`${name} must be a positive integer`);
  return v;
}

function requireNonNegativeInt(name: string, v: number): number {
  if (!Number.isInteger(v) || v < 0) invalidConfig(`${name} must be a non-negative integer`);
  return v;
}

function positiveOr(name: string, v: number | undefined, fallback: number): number {
  return v === undefined ? fallback : requirePositiveInt(name, v);
}

export function resolveRenderConfig(config: RenderConfig | undefined): ResolvedRenderConfig {
  if (!config) return DEFAULT_RENDER_CONFIG;
  const d = DEFAULT_RENDER_CONFIG;
  const flushTimeoutMs =
    config.flushTimeoutMs === undefined
      ? d.flushTimeoutMs
      : requireNonNegativeInt("flushTimeoutMs", config.flushTimeoutMs);
  const layoutPoolWarmUp =
    config.layoutPoolWarmUp === undefined
      ? d.layoutPoolWarmUp
      : requireNonNegativeInt("layoutPoolWarmUp", config.layoutPoolWarmUp);

  return Object.freeze({
    flushTimeoutMs,
    pipelinePoolCapacity: positiveOr(
      "pipelinePoolCapacity",
      config.pipelinePoolCapacity,
      d.pipelinePoolCapacity,
    ),
    layoutPoolMaxIdle: positiveOr("layoutPoolMaxIdle", config.layoutPoolMaxIdle, d.layoutPoolMaxIdle),
    layoutPoolWarmUp,
    heightCacheCapacity: positiveOr(
      "heightCacheCapacity",
      config.heightCacheCapacity,
      d.heightCacheCapacity,
    ),
    templateCacheCapacity: positiveOr(
      "templateCacheCapacity",
      config.templateCacheCapacity,
      d.templateCacheCapacity,
    ),
    recyclePerKind: positiveOr("recyclePerKind", config.recyclePerKind, d.recyclePerKind),
    recycleTotal: positiveOr("recycleTotal", config.recycleTotal, d.recycleTotal),
    devMode: config.devMode === undefined ? d.devMode : config.devMode === true,
  });
}
