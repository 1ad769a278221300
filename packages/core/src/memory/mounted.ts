/**
 * packages/core/src/memory/mounted.ts — Mounted record shape.
 *
 * A mounted record mirrors one resolved tree node as materialized in the render
 * target. Records are allocated by a FrameRegion and stamped with it; the stamp
 * is what makes a record from a cleared region detectable.
 */

import type { SlotId } from "../tree/slots.js";
import type { ResolvedNode } from "../tree/types.js";

/** Host node identifier issued by the render target. */
export type MountId = number;

export type RegionSlot = 0 | 1;

export type RegionStamp = Readonly<{ slot: RegionSlot; generation: number }>;

/** Decode a payload reported for an event slot into a root-domain message. */
export type EventDispatch<M> = (slot: string, payload: unknown) => M | undefined;

export type MountedNode<M> = {
  /** Resolved node (lazy and mapped wrappers looked through). */
  readonly node: ResolvedNode<unknown>;
  /** Host id; null until applied, and always null for empty nodes. */
  host: MountId | null;
  /** Child records in tree order (element children or keyed entries). */
  readonly children: MountedNode<M>[];
  /** Slot id of each child, parallel to `children`. */
  readonly slots: SlotId[];
  /** Present on host elements carrying at least one handler attribute. */
  readonly dispatch: EventDispatch<M> | null;
  readonly stamp: RegionStamp;
};

export type MountedInit<M> = Readonly<{
  node: ResolvedNode<unknown>;
  host: MountId | null;
  dispatch: EventDispatch<M> | null;
}>;

/** Whether a record's node occupies a host position in the target. */
export function materializes(record: MountedNode<unknown>): boolean {
  return record.node.kind !== "empty";
}
