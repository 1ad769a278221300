/**
 * packages/core/src/perf/perf.ts — Render cycle phase timing.
 *
 * Opt-in via TWINFRAME_PERF=1, read once at load. The module-level functions
 * share one recorder; when it is disabled every call returns immediately and
 * timestamps read as 0.
 */

/** Phases of one render cycle. */
export type InstrumentationPhase = "view" | "prepare" | "diff" | "apply" | "commit";

export const PERF_PHASES: readonly InstrumentationPhase[] = Object.freeze([
  "view",
  "prepare",
  "diff",
  "apply",
  "commit",
]);

/** Statistics over the retained samples of one phase, in milliseconds. */
export type PhaseStats = Readonly<{
  count: number;
  avg: number;
  p50: number;
  p95: number;
  p99: number;
  /** Largest sample ever recorded, including ones the ring has dropped. */
  max: number;
  /** Ten highest retained samples, highest first. */
  worst10: readonly number[];
}>;

export type PerfSnapshot = Readonly<{
  phases: Readonly<{ [K in InstrumentationPhase]?: PhaseStats }>;
}>;

/** Start timestamp returned by markStart. */
export type PerfToken = number;

export const PERF_ENABLED: boolean =
  typeof globalThis.process !== "undefined" && globalThis.process.env["TWINFRAME_PERF"] === "1";

const defaultClock: () => number =
  typeof globalThis.performance?.now === "function" ? () => performance.now() : () => Date.now();

/** Samples retained per phase. */
const RING_CAP = 1024;

class SampleRing {
  private readonly samples = new Float64Array(RING_CAP);
  private next = 0;
  private size = 0;
  private total = 0;
  private peak = 0;

  push(ms: number): void {
    if (this.size === RING_CAP) this.total -= this.samples[this.next] ?? 0;
    else this.size++;
    this.samples[this.next] = ms;
    this.next = (this.next + 1) % RING_CAP;
    this.total += ms;
    if (ms > this.peak) this.peak = ms;
  }

  stats(): PhaseStats | null {
    if (this.size === 0) return null;
    const sorted = Array.from(this.samples.subarray(0, this.size)).sort((a, b) => a - b);
    const quantile = (q: number): number =>
      sorted[Math.min(sorted.length - 1, Math.floor(sorted.length * q))] ?? 0;
    return Object.freeze({
      count: this.size,
      avg: this.total / this.size,
      p50: quantile(0.5),
      p95: quantile(0.95),
      p99: quantile(0.99),
      max: this.peak,
      worst10: Object.freeze(sorted.slice(-10).reverse()),
    });
  }
}

/** Per-phase sample rings. */
export class PerfAggregator {
  private readonly rings = new Map<InstrumentationPhase, SampleRing>();

  record(phase: InstrumentationPhase, durationMs: number): void {
    let ring = this.rings.get(phase);
    if (ring === undefined) {
      ring = new SampleRing();
      this.rings.set(phase, ring);
    }
    ring.push(durationMs);
  }

  snapshot(): PerfSnapshot {
    const phases: { [K in InstrumentationPhase]?: PhaseStats } = {};
    for (const phase of PERF_PHASES) {
      const stats = this.rings.get(phase)?.stats();
      if (stats) phases[phase] = stats;
    }
    return Object.freeze({ phases: Object.freeze(phases) });
  }

  reset(): void {
    this.rings.clear();
  }
}

export type PerfRecorder = Readonly<{
  enabled: boolean;
  /** Clock reading; 0 when disabled. */
  now: () => number;
  markStart: (phase: InstrumentationPhase) => PerfToken;
  markEnd: (phase: InstrumentationPhase, token: PerfToken) => void;
  snapshot: () => PerfSnapshot;
  reset: () => void;
}>;

const EMPTY_SNAPSHOT: PerfSnapshot = Object.freeze({ phases: Object.freeze({}) });

export function createPerfRecorder(
  enabled: boolean,
  clock: () => number = defaultClock,
): PerfRecorder {
  if (!enabled) {
    return Object.freeze({
      enabled,
      now: () => 0,
      markStart: (_phase: InstrumentationPhase) => 0,
      markEnd: (_phase: InstrumentationPhase, _token: PerfToken) => {},
      snapshot: () => EMPTY_SNAPSHOT,
      reset: () => {},
    });
  }
  const aggregator = new PerfAggregator();
  return Object.freeze({
    enabled,
    now: clock,
    markStart: (_phase: InstrumentationPhase) => clock(),
    markEnd: (phase: InstrumentationPhase, token: PerfToken) => {
      aggregator.record(phase, clock() - token);
    },
    snapshot: () => aggregator.snapshot(),
    reset: () => {
      aggregator.reset();
    },
  });
}

const shared = createPerfRecorder(PERF_ENABLED);

/** The recorder behind the module-level functions. */
export function getPerfRecorder(): PerfRecorder {
  return shared;
}

export function perfMarkStart(phase: InstrumentationPhase): PerfToken {
  return shared.markStart(phase);
}

export function perfMarkEnd(phase: InstrumentationPhase, token: PerfToken): void {
  shared.markEnd(phase, token);
}

/** Everything recorded since load or the last reset; empty when disabled. */
export function perfSnapshot(): PerfSnapshot {
  return shared.snapshot();
}

export function perfReset(): void {
  shared.reset();
}
