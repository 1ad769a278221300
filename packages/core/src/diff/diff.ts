/**
 * packages/core/src/diff/diff.ts — Structural differ.
 *
 * Why: Compares the previous mounted tree with the next tree description and
 * produces an ordered, backend-agnostic patch list, plus the mounted records of
 * the next tree. Records are allocated in the cycle's active region; previous
 * records are only read.
 *
 * Policy per position, in priority order:
 *   - prev absent (or empty), next empty: nothing
 *   - prev absent (or empty), next present: create the full subtree
 *   - next empty: remove
 *   - kinds, tags or keys differ: replace
 *   - text: update_text when the text differs
 *   - element / keyed: update_attrs, then children (keyed or positional)
 *
 * Lazy nodes are forced for the cycle (their memo was filled by prepareTree).
 * Mapped nodes are looked through; their translations are composed into the
 * dispatch closures of the host elements below them and never diffed. Child
 * slots come from the resolved child, so a key under a wrapper still counts.
 */

import type { FrameRegion } from "../memory/region.js";
import {
  type EventDispatch,
  type MountId,
  type MountedNode,
  materializes,
} from "../memory/mounted.js";
import { type SlotId, containsAnyKey, keyedSlot, slotIdForChild } from "../tree/slots.js";
import {
  type Attrs,
  type ElementNode,
  type HostElementNode,
  type ResolvedNode,
  type TreeNode,
  assertNever,
} from "../tree/types.js";
import { diffAttrs } from "./attrs.js";
import { reconcileKeyedChildren } from "./keyed.js";
import type { Patch, PatchParent } from "./patch.js";

export type DiffOptions<M> = Readonly<{
  cycle: number;
  /** Region holding `prev`; when given with checkRegions, every previous record read is verified live. */
  retired?: FrameRegion<M> | null;
  checkRegions?: boolean;
}>;

export type DiffResult<M> = Readonly<{
  mountPoint: MountId;
  patches: readonly Patch<M>[];
  /** Mounted root of the next tree; null when the next tree is absent. */
  root: MountedNode<M> | null;
}>;

type DiffContext<M> = Readonly<{
  cycle: number;
  region: FrameRegion<M>;
  retired: FrameRegion<M> | null;
  patches: Patch<M>[];
}>;

type Lift<C, M> = (msg: C) => M;

/**
 * Diff `prev` (the previous cycle's mounted root, or null on the first cycle)
 * against `next`, both mounted at `mountPoint`.
 */
export function diffTrees<M>(
  prev: MountedNode<M> | null,
  next: TreeNode<M>,
  mountPoint: MountId,
  region: FrameRegion<M>,
  options: DiffOptions<M>,
): DiffResult<M> {
  const retired = options.checkRegions === false ? null : (options.retired ?? null);
  const ctx: DiffContext<M> = { cycle: options.cycle, region, retired, patches: [] };
  const root = diffNode(ctx, null, 0, null, prev, next, (msg: M) => msg);
  return {
    mountPoint,
    patches: ctx.patches,
    root: materializes(root) ? root : null,
  };
}

function diffNode<C, M>(
  ctx: DiffContext<M>,
  parent: PatchParent<M>,
  index: number,
  after: MountedNode<M> | null,
  prev: MountedNode<M> | null,
  next: TreeNode<C>,
  lift: Lift<C, M>,
): MountedNode<M> {
  switch (next.kind) {
    case "lazy":
      return diffNode(ctx, parent, index, after, prev, next.force(ctx.cycle), lift);
    case "mapped":
      return next.visit(
        <D>(content: TreeNode<D>, translate: (msg: D) => C): MountedNode<M> =>
          diffNode(ctx, parent, index, after, prev, content, (msg: D) => lift(translate(msg))),
      );
    case "element":
    case "keyed":
    case "text":
    case "empty":
      return diffResolved(ctx, parent, index, after, prev, next, lift);
    default:
      return assertNever(next, "tree node kind");
  }
}

function diffResolved<C, M>(
  ctx: DiffContext<M>,
  parent: PatchParent<M>,
  index: number,
  after: MountedNode<M> | null,
  prev: MountedNode<M> | null,
  next: ResolvedNode<C>,
  lift: Lift<C, M>,
): MountedNode<M> {
  if (prev !== null && ctx.retired !== null) ctx.retired.assertLive(prev, "diff");

  if (prev === null || !materializes(prev)) {
    if (next.kind === "empty") return ctx.region.allocate({ node: next, host: null, dispatch: null });
    const created = materialize(ctx, next, lift);
    ctx.patches.push({ kind: "create", parent, index, after, node: created });
    return created;
  }

  if (next.kind === "empty") {
    ctx.patches.push({ kind: "remove", parent, node: prev });
    return ctx.region.allocate({ node: next, host: null, dispatch: null });
  }

  const prevNode = prev.node;
  switch (next.kind) {
    case "text": {
      if (prevNode.kind !== "text") return replace(ctx, parent, prev, next, lift);
      const record = ctx.region.allocate({ node: next, host: prev.host, dispatch: null });
      if (prevNode.text !== next.text) {
        ctx.patches.push({ kind: "update_text", node: record, prev: prevNode.text, next: next.text });
      }
      return record;
    }
    case "element": {
      if (prevNode.kind !== "element" || prevNode.tag !== next.tag || prevNode.key !== next.key) {
        return replace(ctx, parent, prev, next, lift);
      }
      const record = reuseHostElement(ctx, prev, prevNode.attrs, next, lift);
      diffElementChildren(ctx, prev, record, next, lift);
      return record;
    }
    case "keyed": {
      if (prevNode.kind !== "keyed" || prevNode.tag !== next.tag || prevNode.key !== next.key) {
        return replace(ctx, parent, prev, next, lift);
      }
      const record = reuseHostElement(ctx, prev, prevNode.attrs, next, lift);
      const slots = next.entries.map((entry) => keyedSlot(entry.key));
      const nodes = next.entries.map((entry) => entry.node);
      reconcileKeyed(ctx, prev, record, slots, nodes, lift);
      return record;
    }
    default:
      return assertNever(next, "resolved node kind");
  }
}

function replace<C, M>(
  ctx: DiffContext<M>,
  parent: PatchParent<M>,
  prev: MountedNode<M>,
  next: ResolvedNode<C>,
  lift: Lift<C, M>,
): MountedNode<M> {
  const record = materialize(ctx, next, lift);
  ctx.patches.push({ kind: "replace", parent, prev, next: record });
  return record;
}

function reuseHostElement<C, M>(
  ctx: DiffContext<M>,
  prev: MountedNode<M>,
  prevAttrs: Attrs<unknown>,
  next: HostElementNode<C>,
  lift: Lift<C, M>,
): MountedNode<M> {
  const record = ctx.region.allocate({
    node: next,
    host: prev.host,
    dispatch: makeDispatch(next.attrs, lift),
  });
  const diff = diffAttrs<unknown>(prevAttrs, next.attrs);
  if (diff !== null) ctx.patches.push({ kind: "update_attrs", node: record, diff });
  return record;
}

function diffElementChildren<C, M>(
  ctx: DiffContext<M>,
  prev: MountedNode<M>,
  record: MountedNode<M>,
  next: ElementNode<C>,
  lift: Lift<C, M>,
): void {
  const slots: SlotId[] = next.children.map((child, i) => slotIdForChild(child, i, ctx.cycle));
  const keyed =
    containsAnyKey(next.children, ctx.cycle) || prev.slots.some((slot) => slot.startsWith("k:"));
  if (keyed) {
    reconcileKeyed(ctx, prev, record, slots, next.children, lift);
    return;
  }

  let after: MountedNode<M> | null = null;
  for (let i = 0; i < next.children.length; i++) {
    const child = next.children[i];
    const slot = slots[i];
    if (child === undefined || slot === undefined) continue;
    const childRecord: MountedNode<M> = diffNode(ctx, record, i, after, prev.children[i] ?? null, child, lift);
    record.children.push(childRecord);
    record.slots.push(slot);
    if (materializes(childRecord)) after = childRecord;
  }
  for (let i = next.children.length; i < prev.children.length; i++) {
    const stale = prev.children[i];
    if (stale === undefined) continue;
    if (ctx.retired !== null) ctx.retired.assertLive(stale, "diff");
    if (materializes(stale)) ctx.patches.push({ kind: "remove", parent: record, node: stale });
  }
}

function reconcileKeyed<C, M>(
  ctx: DiffContext<M>,
  prev: MountedNode<M>,
  record: MountedNode<M>,
  slots: readonly SlotId[],
  nodes: readonly TreeNode<C>[],
  lift: Lift<C, M>,
): void {
  const result = reconcileKeyedChildren(prev, record, slots, nodes, (index, after, prevChild, node) =>
    diffNode(ctx, record, index, after, prevChild, node, lift),
  );
  for (const stale of result.unmatched) {
    if (ctx.retired !== null) ctx.retired.assertLive(stale, "diff");
    if (materializes(stale)) ctx.patches.push({ kind: "remove", parent: record, node: stale });
  }
  if (result.moves.length > 0) {
    ctx.patches.push({ kind: "reorder", parent: record, moves: result.moves });
  }
}

/** Build fresh records for a whole subtree; hosts are assigned when the create is applied. */
function materialize<C, M>(ctx: DiffContext<M>, next: TreeNode<C>, lift: Lift<C, M>): MountedNode<M> {
  switch (next.kind) {
    case "lazy":
      return materialize(ctx, next.force(ctx.cycle), lift);
    case "mapped":
      return next.visit(
        <D>(content: TreeNode<D>, translate: (msg: D) => C): MountedNode<M> =>
          materialize(ctx, content, (msg: D) => lift(translate(msg))),
      );
    case "text":
    case "empty":
      return ctx.region.allocate({ node: next, host: null, dispatch: null });
    case "element": {
      const record = ctx.region.allocate({
        node: next,
        host: null,
        dispatch: makeDispatch(next.attrs, lift),
      });
      for (let i = 0; i < next.children.length; i++) {
        const child = next.children[i];
        if (child === undefined) continue;
        record.children.push(materialize(ctx, child, lift));
        record.slots.push(slotIdForChild(child, i, ctx.cycle));
      }
      return record;
    }
    case "keyed": {
      const record = ctx.region.allocate({
        node: next,
        host: null,
        dispatch: makeDispatch(next.attrs, lift),
      });
      for (const entry of next.entries) {
        record.children.push(materialize(ctx, entry.node, lift));
        record.slots.push(keyedSlot(entry.key));
      }
      return record;
    }
    default:
      return assertNever(next, "tree node kind");
  }
}

function makeDispatch<C, M>(attrs: Attrs<C>, lift: Lift<C, M>): EventDispatch<M> | null {
  let hasHandler = false;
  for (const value of attrs.values()) {
    if (typeof value !== "string") {
      hasHandler = true;
      break;
    }
  }
  if (!hasHandler) return null;
  return (slot, payload) => {
    const value = attrs.get(slot);
    if (value === undefined || typeof value === "string") return undefined;
    const msg = value.decode(payload);
    return msg === undefined ? undefined : lift(msg);
  };
}
