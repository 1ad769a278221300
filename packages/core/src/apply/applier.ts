/**
 * packages/core/src/apply/applier.ts — Patch application.
 *
 * Why: Turns a cycle's patch list into render-target calls, in order, exactly
 * once each. The applier assigns host ids to freshly created records and keeps
 * a mirror of host child order per host parent, which is what turns "insert
 * after sibling X" and "reorder to this final order" into index-based calls.
 *
 * Failure model: the first throwing target call aborts the remaining patches.
 * The error is wrapped into one ApplyError naming the operation and how far
 * application got. Nothing is rolled back.
 */

import { ApplyError, TwinframeError, describeThrown, type TargetOp } from "../errors.js";
import type { AttrDiff } from "../diff/attrs.js";
import type { Patch, PatchParent } from "../diff/patch.js";
import { type MountId, type MountedNode, materializes } from "../memory/mounted.js";
import { type AttrValue, assertNever } from "../tree/types.js";
import { computeLIS } from "./lis.js";
import { EVENT_SLOT, type RenderTarget, type TargetAttrValue } from "./target.js";

function toTargetValue(value: AttrValue<unknown>): TargetAttrValue {
  return typeof value === "string" ? value : EVENT_SLOT;
}

function unknownMount(what: string): TwinframeError {
  return new TwinframeError("TF_UNKNOWN_MOUNT", what);
}

export class PatchApplier<M> {
  private readonly target: RenderTarget;
  /** Host child order per host parent, mount point included. */
  private readonly hostChildren = new Map<MountId, MountId[]>();
  private lastOp: TargetOp | null = null;

  constructor(target: RenderTarget) {
    this.target = target;
  }

  /** Apply every patch in order. Returns the number applied (all of them). */
  apply(patches: readonly Patch<M>[], mountPoint: MountId): number {
    for (let i = 0; i < patches.length; i++) {
      const patch = patches[i];
      if (patch === undefined) continue;
      this.lastOp = null;
      try {
        this.applyOne(patch, mountPoint);
      } catch (err: unknown) {
        throw this.wrapFailure(err, i, patch.kind);
      }
    }
    return patches.length;
  }

  /** Host child order the applier believes `parent` has. */
  childrenOf(parent: MountId): readonly MountId[] {
    return this.hostChildren.get(parent) ?? [];
  }

  private applyOne(patch: Patch<M>, mountPoint: MountId): void {
    switch (patch.kind) {
      case "create": {
        const parentHost = this.parentHost(patch.parent, mountPoint);
        const host = this.build(patch.node);
        if (host === null) return;
        const siblings = this.siblings(parentHost);
        let index = 0;
        if (patch.after !== null) {
          const anchor = siblings.indexOf(this.requireHost(patch.after, "create anchor"));
          if (anchor < 0) throw unknownMount(`create: anchor is not a child of host ${String(parentHost)}`);
          index = anchor + 1;
        }
        this.lastOp = "append";
        this.target.append(parentHost, host);
        if (index < siblings.length) {
          this.lastOp = "move";
          this.target.move(parentHost, host, index);
        }
        siblings.splice(index, 0, host);
        return;
      }
      case "remove": {
        const parentHost = this.parentHost(patch.parent, mountPoint);
        const host = this.requireHost(patch.node, "remove");
        this.lastOp = "remove";
        this.target.remove(parentHost, host);
        removeFrom(this.siblings(parentHost), host);
        this.forget(patch.node);
        return;
      }
      case "replace": {
        const parentHost = this.parentHost(patch.parent, mountPoint);
        const oldHost = this.requireHost(patch.prev, "replace");
        const newHost = this.build(patch.next);
        if (newHost === null) {
          throw unknownMount("replace: replacement does not materialize");
        }
        this.lastOp = "replace";
        this.target.replace(parentHost, oldHost, newHost);
        const siblings = this.siblings(parentHost);
        const at = siblings.indexOf(oldHost);
        if (at >= 0) siblings[at] = newHost;
        this.forget(patch.prev);
        return;
      }
      case "update_text":
        this.lastOp = "setText";
        this.target.setText(this.requireHost(patch.node, "update_text"), patch.next);
        return;
      case "update_attrs":
        this.applyAttrs(this.requireHost(patch.node, "update_attrs"), patch.diff);
        return;
      case "reorder":
        this.reorder(patch.parent);
        return;
      default:
        assertNever(patch, "patch kind");
    }
  }

  private applyAttrs(host: MountId, diff: AttrDiff<unknown>): void {
    for (const name of diff.removed) {
      this.lastOp = "removeAttr";
      this.target.removeAttr(host, name);
    }
    for (const change of diff.changed) {
      this.lastOp = "setAttr";
      this.target.setAttr(host, change.name, toTargetValue(change.next));
    }
    for (const [name, value] of diff.added) {
      this.lastOp = "setAttr";
      this.target.setAttr(host, name, toTargetValue(value));
    }
  }

  /**
   * Bring the host children of `parent` into the order of its child records.
   * Nodes on the longest increasing run of current positions stay put; the rest
   * are moved, right to left, in front of their next sibling.
   */
  private reorder(parent: MountedNode<M>): void {
    const parentHost = this.requireHost(parent, "reorder");
    const desired: MountId[] = [];
    for (const child of parent.children) {
      if (materializes(child)) desired.push(this.requireHost(child, "reorder child"));
    }

    const working = this.siblings(parentHost);
    const positionOf = new Map<MountId, number>();
    for (let i = 0; i < working.length; i++) {
      const id = working[i];
      if (id !== undefined) positionOf.set(id, i);
    }
    const positions = desired.map((id) => positionOf.get(id) ?? -1);
    if (working.length !== desired.length || positions.includes(-1)) {
      throw unknownMount(
        `reorder: host ${String(parentHost)} children do not match the reconciled child list`,
      );
    }

    const stay = new Set(computeLIS(positions));
    for (let i = desired.length - 1; i >= 0; i--) {
      if (stay.has(i)) continue;
      const id = desired[i];
      if (id === undefined) continue;
      removeFrom(working, id);
      const successor = desired[i + 1];
      const index = successor === undefined ? working.length : working.indexOf(successor);
      working.splice(index, 0, id);
      this.lastOp = "move";
      this.target.move(parentHost, id, index);
    }
  }

  /** Create host nodes for a fresh record subtree. Returns null for empty. */
  private build(record: MountedNode<M>): MountId | null {
    const node = record.node;
    switch (node.kind) {
      case "empty":
        return null;
      case "text": {
        this.lastOp = "createText";
        const id = this.target.createText(node.text);
        record.host = id;
        return id;
      }
      case "element":
      case "keyed": {
        this.lastOp = "createElement";
        const id = this.target.createElement(node.tag);
        record.host = id;
        for (const [name, value] of node.attrs) {
          this.lastOp = "setAttr";
          this.target.setAttr(id, name, toTargetValue(value));
        }
        const children: MountId[] = [];
        this.hostChildren.set(id, children);
        for (const child of record.children) {
          const childHost = this.build(child);
          if (childHost === null) continue;
          this.lastOp = "append";
          this.target.append(id, childHost);
          children.push(childHost);
        }
        return id;
      }
      default:
        return assertNever(node, "resolved node kind");
    }
  }

  /** Drop mirror entries of a removed subtree. */
  private forget(record: MountedNode<M>): void {
    const stack: MountedNode<M>[] = [record];
    while (stack.length > 0) {
      const next = stack.pop();
      if (next === undefined) continue;
      if (next.host !== null) this.hostChildren.delete(next.host);
      for (const child of next.children) stack.push(child);
    }
  }

  private siblings(parentHost: MountId): MountId[] {
    let list = this.hostChildren.get(parentHost);
    if (list === undefined) {
      list = [];
      this.hostChildren.set(parentHost, list);
    }
    return list;
  }

  private parentHost(parent: PatchParent<M>, mountPoint: MountId): MountId {
    return parent === null ? mountPoint : this.requireHost(parent, "parent");
  }

  private requireHost(record: MountedNode<M>, what: string): MountId {
    if (record.host !== null) return record.host;
    throw unknownMount(`${what}: <${describeRecord(record)}> has no host id`);
  }

  private wrapFailure(err: unknown, patchIndex: number, patchKind: string): ApplyError {
    if (err instanceof TwinframeError && err.code === "TF_UNKNOWN_MOUNT") {
      return new ApplyError(
        "TF_UNKNOWN_MOUNT",
        { op: null, patchIndex, patchKind, applied: patchIndex },
        `patch ${String(patchIndex)} (${patchKind}): ${err.message}`,
        err,
      );
    }
    const op = this.lastOp;
    return new ApplyError(
      "TF_APPLY_FAILED",
      { op, patchIndex, patchKind, applied: patchIndex },
      `patch ${String(patchIndex)} (${patchKind}): ${op ?? "target"} failed: ${describeThrown(err)}`,
      err,
    );
  }
}

function removeFrom(list: MountId[], id: MountId): void {
  const at = list.indexOf(id);
  if (at >= 0) list.splice(at, 1);
}

function describeRecord(record: MountedNode<unknown>): string {
  const node = record.node;
  return node.kind === "element" || node.kind === "keyed" ? node.tag : node.kind;
}
