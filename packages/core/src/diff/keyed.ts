/**
 * packages/core/src/diff/keyed.ts — Keyed child reconciliation.
 *
 * Why: Matches next children against previous children by slot so a keyed
 * child keeps its mount identity across reorders. Unkeyed children in a keyed
 * list match by positional slot ("i:<index>").
 *
 * Reconciliation rules:
 *   - Matched slots are diffed recursively; a changed index records a move
 *   - Unmatched next slots are created at their next index
 *   - Unmatched previous slots are removed
 *   - Slots are unique per list; builders reject duplicate keys, so a
 *     duplicate here means the tree was assembled outside the builders
 */

import { ConstructionError } from "../errors.js";
import { type MountedNode, materializes } from "../memory/mounted.js";
import type { SlotId } from "../tree/slots.js";
import type { KeyedMove } from "./patch.js";

/** Diff one child; `prev` is null when the slot is new. Returns the next record. */
export type ChildDiffer<N, M> = (
  index: number,
  after: MountedNode<M> | null,
  prev: MountedNode<M> | null,
  next: N,
) => MountedNode<M>;

export type KeyedReconcileResult<M> = Readonly<{
  /** One entry per matched child whose index changed, in next order. */
  moves: readonly KeyedMove[];
  /** Previous children with no match, in previous order. */
  unmatched: readonly MountedNode<M>[];
}>;

const NO_MOVES: readonly KeyedMove[] = Object.freeze([]);

function duplicateSlotDetail(slot: SlotId, aIndex: number, bIndex: number): string {
  return `Duplicate slot ${slot} in one child list (child indices ${String(aIndex)} and ${String(bIndex)})`;
}

/**
 * Reconcile `nextChildren` against the children of `prevParent`, appending the
 * resulting records and slots to `nextParent`.
 */
export function reconcileKeyedChildren<N, M>(
  prevParent: MountedNode<M>,
  nextParent: MountedNode<M>,
  nextSlots: readonly SlotId[],
  nextChildren: readonly N[],
  diffChild: ChildDiffer<N, M>,
): KeyedReconcileResult<M> {
  const prevChildren = prevParent.children;
  const prevBySlot = new Map<SlotId, number>();
  for (let i = 0; i < prevParent.slots.length; i++) {
    const slot = prevParent.slots[i];
    if (slot !== undefined) prevBySlot.set(slot, i);
  }

  const seenNext = new Map<SlotId, number>();
  const usedPrev = new Array<boolean>(prevChildren.length).fill(false);
  let moves: KeyedMove[] | null = null;
  let after: MountedNode<M> | null = null;

  for (let nextIndex = 0; nextIndex < nextChildren.length; nextIndex++) {
    const slot = nextSlots[nextIndex];
    const node = nextChildren[nextIndex];
    if (slot === undefined || node === undefined) continue;

    const existing = seenNext.get(slot);
    if (existing !== undefined) {
      throw new ConstructionError(
        "TF_DUPLICATE_KEY",
        duplicateSlotDetail(slot, existing, nextIndex),
      );
    }
    seenNext.set(slot, nextIndex);

    const prevIndex = prevBySlot.get(slot);
    const prevChild = prevIndex !== undefined ? prevChildren[prevIndex] : undefined;
    let record: MountedNode<M>;
    if (prevIndex !== undefined && prevChild !== undefined && usedPrev[prevIndex] === false) {
      usedPrev[prevIndex] = true;
      record = diffChild(nextIndex, after, prevChild, node);
      if (prevIndex !== nextIndex) {
        if (moves === null) moves = [];
        moves.push({ slot, from: prevIndex, to: nextIndex });
      }
    } else {
      record = diffChild(nextIndex, after, null, node);
    }

    nextParent.children.push(record);
    nextParent.slots.push(slot);
    if (materializes(record)) after = record;
  }

  const unmatched: MountedNode<M>[] = [];
  for (let i = 0; i < prevChildren.length; i++) {
    const prev = prevChildren[i];
    if (prev !== undefined && !usedPrev[i]) unmatched.push(prev);
  }

  return { moves: moves ?? NO_MOVES, unmatched };
}
