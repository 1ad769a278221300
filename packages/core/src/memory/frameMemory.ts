/**
 * packages/core/src/memory/frameMemory.ts — Two alternating frame regions.
 *
 * Why: The previous tree must stay valid and untouched for the whole
 * diff + apply of the next one, while regions are reclaimed wholesale.
 *
 * Cycle k:
 *   - beginCycle(): toggle the active slot and clear it (it held cycle k-2)
 *   - build + diff cycle k inside the active region; the retired region
 *     (cycle k-1) stays sealed and is only read
 *   - commit(): the active region becomes the previous one and is sealed
 *
 * If the cycle fails before diffing, abortCycle() toggles back so cycle k-1
 * stays the previous tree.
 */

import { TwinframeError } from "../errors.js";
import type { TreeNode } from "../tree/types.js";
import type { MountedNode, RegionSlot } from "./mounted.js";
import { FrameRegion } from "./region.js";

export type FrameCycle<M> = Readonly<{
  cycle: number;
  /** Region receiving this cycle's tree and records. */
  active: FrameRegion<M>;
  /** Region holding the previous cycle's tree (read-only). */
  retired: FrameRegion<M>;
}>;

export type RegionStats = Readonly<{
  slot: RegionSlot;
  generation: number;
  records: number;
  sealed: boolean;
  hasTree: boolean;
}>;

export type FrameMemoryStats = Readonly<{
  /** Cycles begun so far, aborted ones included. */
  cycle: number;
  /** Slot of the region holding the previous (committed) tree. */
  current: RegionSlot;
  inCycle: boolean;
  regions: readonly [RegionStats, RegionStats];
}>;

function other(slot: RegionSlot): RegionSlot {
  return slot === 0 ? 1 : 0;
}

function regionStats<M>(region: FrameRegion<M>): RegionStats {
  return {
    slot: region.slot,
    generation: region.generation,
    records: region.recordCount,
    sealed: region.sealed,
    hasTree: region.tree !== null,
  };
}

export class FrameMemory<M> {
  private readonly regions: readonly [FrameRegion<M>, FrameRegion<M>];
  private currentSlot: RegionSlot = 1;
  private cycleCount = 0;
  private open: FrameCycle<M> | null = null;

  constructor() {
    this.regions = [new FrameRegion<M>(0), new FrameRegion<M>(1)];
    this.regions[1].seal();
  }

  /** Region holding the last committed tree. */
  get current(): FrameRegion<M> {
    return this.regions[this.currentSlot];
  }

  /** Mounted root of the last committed cycle, or null before the first one. */
  get previousRoot(): MountedNode<M> | null {
    return this.current.root;
  }

  get inCycle(): boolean {
    return this.open !== null;
  }

  beginCycle(): FrameCycle<M> {
    if (this.open !== null) {
      throw new TwinframeError(
        "TF_REENTRANT_CYCLE",
        `beginCycle: cycle ${String(this.open.cycle)} is still open`,
      );
    }
    const retired = this.current;
    const active = this.regions[other(this.currentSlot)];
    active.clear();
    retired.seal();
    this.cycleCount++;
    const cycle: FrameCycle<M> = { cycle: this.cycleCount, active, retired };
    this.open = cycle;
    return cycle;
  }

  /**
   * Record the active region's tree as the new previous tree. Called whether
   * or not every patch of the cycle could be applied.
   */
  commit(tree: TreeNode<M>, root: MountedNode<M> | null): void {
    const open = this.requireOpen("commit");
    open.active.setTree(tree);
    open.active.setRoot(root);
    open.active.seal();
    this.currentSlot = open.active.slot;
    this.open = null;
  }

  /** Abandon the open cycle; the retired region stays the previous tree. */
  abortCycle(): void {
    const open = this.requireOpen("abortCycle");
    open.active.clear();
    this.open = null;
  }

  stats(): FrameMemoryStats {
    return {
      cycle: this.cycleCount,
      current: this.currentSlot,
      inCycle: this.open !== null,
      regions: [regionStats(this.regions[0]), regionStats(this.regions[1])],
    };
  }

  private requireOpen(what: string): FrameCycle<M> {
    if (this.open === null) {
      throw new TwinframeError("TF_INVALID_STATE", `${what}: no cycle is open`);
    }
    return this.open;
  }
}
