/**
 * Child slot identity: keyed ("k:mykey") or positional ("i:0").
 *
 * Keyed slots match across reorders; positional slots match by index. Lazy and
 * mapped wrappers are transparent: a child's key is the key of the node it
 * resolves to for the cycle.
 */

import type { ResolvedNode, TreeNode } from "./types.js";

export type SlotId = `k:${string}` | `i:${number}`;

const openContent = <C>(content: TreeNode<C>): TreeNode<unknown> => content;

/** Look through lazy (forced for `cycle`) and mapped wrappers. */
export function resolveNode(node: TreeNode<unknown>, cycle: number): ResolvedNode<unknown> {
  let current = node;
  for (;;) {
    if (current.kind === "lazy") current = current.force(cycle);
    else if (current.kind === "mapped") current = current.visit(openContent);
    else return current;
  }
}

/** Key declared directly on a child, without resolving wrappers. */
export function childKey(child: TreeNode<unknown>): string | undefined {
  if (child.kind === "element" || child.kind === "keyed") return child.key;
  return undefined;
}

/** Key of the node `child` resolves to for `cycle`. */
export function resolvedKey(child: TreeNode<unknown>, cycle: number): string | undefined {
  return childKey(resolveNode(child, cycle));
}

export function keyedSlot(key: string): SlotId {
  return `k:${key}`;
}

export function indexedSlot(index: number): SlotId {
  return `i:${index}`;
}

/** Compute the slot ID for an element child: keyed if its resolved node has a key, indexed otherwise. */
export function slotIdForChild(child: TreeNode<unknown>, childIndex: number, cycle: number): SlotId {
  const key = resolvedKey(child, cycle);
  if (key !== undefined) return keyedSlot(key);
  return indexedSlot(childIndex);
}

export function containsAnyKey(children: readonly TreeNode<unknown>[], cycle: number): boolean {
  for (let i = 0; i < children.length; i++) {
    const child = children[i];
    if (child !== undefined && resolvedKey(child, cycle) !== undefined) return true;
  }
  return false;
}
