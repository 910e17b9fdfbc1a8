/**
 * packages/core/src/perf/perf.ts — Lightweight phase timing.
 *
 * Opt-in via TRELLIS_PERF=1 environment variable. Zero-cost when disabled:
 * every entry point returns before touching the clock.
 */

/** Phases tracked by the instrumentation system. */
export type RenderPhase =
  | "parse"
  | "bind"
  | "layout"
  | "diff"
  | "patch"
  | "materialize"
  | "flush";

export const PERF_PHASES: readonly RenderPhase[] = Object.freeze([
  "parse",
  "bind",
  "layout",
  "diff",
  "patch",
  "materialize",
  "flush",
]);

/** Statistics for a single phase. */
export type PhaseStats = Readonly<{
  count: number;
  avg: number;
  p50: number;
  p95: number;
  max: number;
}>;

/** Aggregated perf snapshot. */
export type PerfSnapshot = Readonly<{
  phases: Readonly<{ [K in RenderPhase]?: PhaseStats }>;
}>;

/** Token returned by perfMarkStart: the start timestamp. */
export type PerfToken = number;

export const PERF_ENABLED: boolean = (() => {
  try {
    const g = globalThis as { process?: { env?: { TRELLIS_PERF?: string } } };
    return g.process?.env?.TRELLIS_PERF === "1";
  } catch {
    return false;
  }
})();

const now: () => number = (() => {
  const g = globalThis as { performance?: { now?: () => number } };
  const perf = g.performance;
  if (typeof perf?.now === "function") return () => perf.now?.() ?? Date.now();
  return () => Date.now();
})();

/** Samples kept per phase; older samples are overwritten. */
const SAMPLE_CAP = 512;

type PhaseSamples = {
  samples: number[];
  cursor: number;
  count: number;
  sum: number;
  max: number;
};

const phases = new Map<RenderPhase, PhaseSamples>();

function record(phase: RenderPhase, dt: number): void {
  let ring = phases.get(phase);
  if (!ring) {
    ring = { samples: [], cursor: 0, count: 0, sum: 0, max: 0 };
    phases.set(phase, ring);
  }
  if (ring.samples.length < SAMPLE_CAP) {
    ring.samples.push(dt);
  } else {
    ring.sum -= ring.samples[ring.cursor] ?? 0;
    ring.samples[ring.cursor] = dt;
  }
  ring.cursor = (ring.cursor + 1) % SAMPLE_CAP;
  ring.count++;
  ring.sum += dt;
  if (dt > ring.max) ring.max = dt;
}

function stats(ring: PhaseSamples): PhaseStats {
  const sorted = [...ring.samples].sort((a, b) => a - b);
  const at = (q: number): number => sorted[Math.min(sorted.length - 1, Math.floor(sorted.length * q))] ?? 0;
  return Object.freeze({
    count: ring.count,
    avg: ring.samples.length === 0 ? 0 : ring.sum / ring.samples.length,
    p50: at(0.5),
    p95: at(0.95),
    max: ring.max,
  });
}

/**
 * Mark the start of a phase. Returns a token to pass to perfMarkEnd.
 * No-op when perf is disabled.
 */
export function perfMarkStart(_phase: RenderPhase): PerfToken {
  if (!PERF_ENABLED) return 0;
  return now();
}

/** No-op when perf is disabled. */
export function perfMarkEnd(phase: RenderPhase, token: PerfToken): void {
  if (!PERF_ENABLED) return;
  record(phase, now() - token);
}

/** Returns an empty snapshot when perf is disabled. */
export function perfSnapshot(): PerfSnapshot {
  const out: { [K in RenderPhase]?: PhaseStats } = {};
  if (PERF_ENABLED) {
    for (const p of PERF_PHASES) {
      const ring = phases.get(p);
      if (ring) out[p] = stats(ring);
    }
  }
  return Object.freeze({ phases: Object.freeze(out) });
}

export function perfReset(): void {
  phases.clear();
}
