import type { RenderTarget } from "../apply/target.js";
import type { PatchCounts } from "../diff/patch.js";
import type { FrameMemoryStats } from "../memory/frameMemory.js";
import type { PerfRecorder } from "../perf/perf.js";
import type { MountId, MountedNode } from "../memory/mounted.js";
import type { PrepareStats } from "../tree/prepare.js";
import type { TreeNode } from "../tree/types.js";

/** Phase durations in milliseconds; all zero when the perf recorder is disabled. */
export type CycleTimings = Readonly<{
  view: number;
  prepare: number;
  diff: number;
  apply: number;
  commit: number;
}>;

export type CycleReport = Readonly<{
  cycle: number;
  patchCount: number;
  patches: PatchCounts;
  /** Patches applied; less than patchCount only when application failed. */
  applied: number;
  tree: PrepareStats;
  timings: CycleTimings;
}>;

export type RendererConfig = Readonly<{
  /** Verify region stamps of previous records while diffing. Default true. */
  checkRegions?: boolean;
  /** Emit de-duplicated dev warnings. Default false. */
  devMode?: boolean;
  /** Warning sink. Default console.warn. */
  warn?: (message: string) => void;
  /** Positive integer cap on patches per cycle. Default Infinity. */
  maxPatchesPerCycle?: number;
  onCycle?: (report: CycleReport) => void;
}>;

export type ResolvedRendererConfig = Readonly<{
  checkRegions: boolean;
  devMode: boolean;
  warn: (message: string) => void;
  maxPatchesPerCycle: number;
  onCycle: ((report: CycleReport) => void) | undefined;
}>;

export type RendererOptions<S, M> = Readonly<{
  target: RenderTarget;
  /** Host id the tree is mounted under; assumed empty at the first cycle. */
  mountPoint: MountId;
  view: (state: S) => TreeNode<M>;
  onMessage?: (msg: M) => void;
  config?: RendererConfig;
  /** Phase timing sink. Default: the shared recorder, enabled by TWINFRAME_PERF=1. */
  perf?: PerfRecorder;
}>;

export interface Renderer<S, M> {
  /** Run one build, prepare, diff, apply and commit cycle. */
  render(state: S): CycleReport;
  /**
   * Decode an event reported by the target for `host` and attribute `slot`.
   * Returns the message handed to onMessage, or undefined when there is none.
   */
  dispatchEvent(host: MountId, slot: string, payload?: unknown): M | undefined;
  /** Mounted root of the last committed cycle. */
  current(): MountedNode<M> | null;
  memoryStats(): FrameMemoryStats;
}
