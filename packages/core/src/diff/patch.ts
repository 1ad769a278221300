/**
 * packages/core/src/diff/patch.ts — Patch representation.
 *
 * Patches never hold backend handles. They reference mounted records; host ids
 * are read from the records when a patch is applied, which is what lets records
 * created earlier in the same patch list receive their ids first.
 */

import type { MountedNode } from "../memory/mounted.js";
import type { SlotId } from "../tree/slots.js";
import type { AttrDiff } from "./attrs.js";

/** Parent of a patched child: a mounted host element, or null for the mount point. */
export type PatchParent<M> = MountedNode<M> | null;

export type KeyedMove = Readonly<{ slot: SlotId; from: number; to: number }>;

export type CreatePatch<M> = Readonly<{
  kind: "create";
  parent: PatchParent<M>;
  /** Position in the parent's next child list. */
  index: number;
  /** Nearest preceding sibling (next order) that materializes, or null when first. */
  after: MountedNode<M> | null;
  /** Record of the full subtree to materialize; hosts are assigned on apply. */
  node: MountedNode<M>;
}>;

export type RemovePatch<M> = Readonly<{
  kind: "remove";
  parent: PatchParent<M>;
  node: MountedNode<M>;
}>;

export type ReplacePatch<M> = Readonly<{
  kind: "replace";
  parent: PatchParent<M>;
  prev: MountedNode<M>;
  next: MountedNode<M>;
}>;

export type UpdateTextPatch<M> = Readonly<{
  kind: "update_text";
  /** Next record; it carries the previous record's host. */
  node: MountedNode<M>;
  prev: string;
  next: string;
}>;

export type UpdateAttrsPatch<M> = Readonly<{
  kind: "update_attrs";
  node: MountedNode<M>;
  diff: AttrDiff<unknown>;
}>;

export type ReorderPatch<M> = Readonly<{
  kind: "reorder";
  /** Next record of the parent; its children are the final order. */
  parent: MountedNode<M>;
  moves: readonly KeyedMove[];
}>;

export type Patch<M> =
  | CreatePatch<M>
  | RemovePatch<M>
  | ReplacePatch<M>
  | UpdateTextPatch<M>
  | UpdateAttrsPatch<M>
  | ReorderPatch<M>;

export type PatchKind = Patch<never>["kind"];

export type PatchCounts = Readonly<Record<PatchKind, number>>;

export function countPatches<M>(patches: readonly Patch<M>[]): PatchCounts {
  const counts: Record<PatchKind, number> = {
    create: 0,
    remove: 0,
    replace: 0,
    update_text: 0,
    update_attrs: 0,
    reorder: 0,
  };
  for (const patch of patches) counts[patch.kind]++;
  return counts;
}
