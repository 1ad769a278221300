/**
 * packages/core/src/memory/region.ts — One frame region.
 *
 * Why: A region owns everything built for one render cycle: the tree handed in
 * by the view function and every mounted record the differ allocates for it.
 * Clearing is wholesale: the record list is dropped and the generation bumped,
 * so any record that escaped the region is recognisably stale afterwards.
 *
 * A sealed region is read-only. The frame memory manager seals the region
 * holding the previous tree for the whole of the next cycle.
 */

import { TwinframeError } from "../errors.js";
import type { TreeNode } from "../tree/types.js";
import type { MountId, MountedInit, MountedNode, RegionSlot, RegionStamp } from "./mounted.js";

export class FrameRegion<M> {
  readonly slot: RegionSlot;
  private generationValue = 0;
  private sealedValue = false;
  private stampValue: RegionStamp;
  private records: MountedNode<M>[] = [];
  private treeValue: TreeNode<M> | null = null;
  private rootValue: MountedNode<M> | null = null;
  private hostIndex: Map<MountId, MountedNode<M>> | null = null;

  constructor(slot: RegionSlot) {
    this.slot = slot;
    this.stampValue = Object.freeze({ slot, generation: 0 });
  }

  get generation(): number {
    return this.generationValue;
  }

  get sealed(): boolean {
    return this.sealedValue;
  }

  get recordCount(): number {
    return this.records.length;
  }

  get tree(): TreeNode<M> | null {
    return this.treeValue;
  }

  get root(): MountedNode<M> | null {
    return this.rootValue;
  }

  /** Allocate one mounted record in this region. */
  allocate(init: MountedInit<M>): MountedNode<M> {
    this.assertWritable("allocate");
    const record: MountedNode<M> = {
      node: init.node,
      host: init.host,
      children: [],
      slots: [],
      dispatch: init.dispatch,
      stamp: this.stampValue,
    };
    this.records.push(record);
    return record;
  }

  setTree(tree: TreeNode<M>): void {
    this.assertWritable("setTree");
    this.treeValue = tree;
  }

  setRoot(root: MountedNode<M> | null): void {
    this.assertWritable("setRoot");
    if (root !== null) this.assertLive(root, "setRoot");
    this.rootValue = root;
    this.hostIndex = null;
  }

  seal(): void {
    this.sealedValue = true;
  }

  /** Drop everything in bulk and start a new generation. Unseals the region. */
  clear(): void {
    this.records = [];
    this.treeValue = null;
    this.rootValue = null;
    this.hostIndex = null;
    this.generationValue++;
    this.stampValue = Object.freeze({ slot: this.slot, generation: this.generationValue });
    this.sealedValue = false;
  }

  isLive(record: MountedNode<unknown>): boolean {
    return (
      record.stamp.slot === this.slot && record.stamp.generation === this.generationValue
    );
  }

  assertLive(record: MountedNode<unknown>, what: string): void {
    if (this.isLive(record)) return;
    throw new TwinframeError(
      "TF_STALE_REGION",
      `${what}: record from region ${String(record.stamp.slot)} generation ${String(
        record.stamp.generation,
      )} is not live in region ${String(this.slot)} generation ${String(this.generationValue)}`,
    );
  }

  /** Find the record materialized as `host`, indexing the committed root on first use. */
  findHost(host: MountId): MountedNode<M> | undefined {
    if (this.rootValue === null) return undefined;
    if (this.hostIndex === null) this.hostIndex = indexHosts(this.rootValue);
    return this.hostIndex.get(host);
  }

  private assertWritable(what: string): void {
    if (!this.sealedValue) return;
    throw new TwinframeError(
      "TF_REGION_SEALED",
      `${what}: region ${String(this.slot)} is sealed (generation ${String(this.generationValue)})`,
    );
  }
}

function indexHosts<M>(root: MountedNode<M>): Map<MountId, MountedNode<M>> {
  const index = new Map<MountId, MountedNode<M>>();
  const stack: MountedNode<M>[] = [root];
  while (stack.length > 0) {
    const record = stack.pop();
    if (record === undefined) continue;
    if (record.host !== null) index.set(record.host, record);
    for (let i = record.children.length - 1; i >= 0; i--) {
      const child = record.children[i];
      if (child !== undefined) stack.push(child);
    }
  }
  return index;
}
