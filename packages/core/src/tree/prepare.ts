/**
 * packages/core/src/tree/prepare.ts — Pre-diff pass over a freshly built tree.
 *
 * Why: Lazy producers run during this pass, not during the diff, so a producer
 * that throws or returns garbage fails the cycle before any patch exists. The
 * differ then forces the same lazy nodes again and hits their per-cycle memo.
 *
 * Builders only see keys declared directly on children. A key that sits under
 * a lazy or mapped wrapper is checked here, once the wrapper is resolved.
 */

import { ConstructionError } from "../errors.js";
import { describeIdentity, duplicateKeyDetail } from "./build.js";
import { resolvedKey } from "./slots.js";
import {
  type ElementNode,
  type LazyIdentity,
  type LazyNode,
  type TreeNode,
  assertNever,
} from "./types.js";

export type PrepareStats = Readonly<{
  /** Nodes visited, wrappers included. */
  nodes: number;
  /** Lazy nodes forced. */
  lazies: number;
  /** Deepest nesting seen (root = 1). */
  depth: number;
}>;

export type PrepareOptions = Readonly<{
  /** Called once per lazy identity shared by distinct lazy nodes in one tree. */
  onIdentityCollision?: (detail: string) => void;
}>;

const openContent = <C>(content: TreeNode<C>): TreeNode<unknown> => content;

function checkResolvedKeys(node: ElementNode<unknown>, cycle: number): void {
  if (node.children.length < 2) return;
  const seen = new Map<string, number>();
  for (let i = 0; i < node.children.length; i++) {
    const child = node.children[i];
    if (child === undefined) continue;
    const key = resolvedKey(child, cycle);
    if (key === undefined) continue;
    const existing = seen.get(key);
    if (existing !== undefined) {
      throw new ConstructionError("TF_DUPLICATE_KEY", duplicateKeyDetail(node.tag, key, existing, i));
    }
    seen.set(key, i);
  }
}

/**
 * Force every lazy node of `root` for `cycle` and walk everything they produce.
 * Uses an explicit stack, so tree depth is not bounded by the call stack.
 */
export function prepareTree(
  root: TreeNode<unknown>,
  cycle: number,
  opts?: PrepareOptions,
): PrepareStats {
  const stack: TreeNode<unknown>[] = [root];
  const depths: number[] = [1];
  const seenLazies = new Map<LazyIdentity, LazyNode<unknown>>();
  let nodes = 0;
  let lazies = 0;
  let maxDepth = 0;

  while (stack.length > 0) {
    const node = stack.pop();
    const depth = depths.pop() ?? 1;
    if (node === undefined) continue;
    nodes++;
    if (depth > maxDepth) maxDepth = depth;

    switch (node.kind) {
      case "text":
      case "empty":
        break;
      case "element":
        checkResolvedKeys(node, cycle);
        for (let i = node.children.length - 1; i >= 0; i--) {
          const child = node.children[i];
          if (child === undefined) continue;
          stack.push(child);
          depths.push(depth + 1);
        }
        break;
      case "keyed":
        for (let i = node.entries.length - 1; i >= 0; i--) {
          const entry = node.entries[i];
          if (entry === undefined) continue;
          stack.push(entry.node);
          depths.push(depth + 1);
        }
        break;
      case "lazy": {
        const previous = seenLazies.get(node.identity);
        if (previous === undefined) {
          seenLazies.set(node.identity, node);
        } else if (previous !== node) {
          opts?.onIdentityCollision?.(
            `lazy identity ${describeIdentity(node.identity)} is shared by distinct lazy nodes`,
          );
        }
        lazies++;
        stack.push(node.force(cycle));
        depths.push(depth + 1);
        break;
      }
      case "mapped":
        stack.push(node.visit(openContent));
        depths.push(depth + 1);
        break;
      default:
        assertNever(node, "tree node kind");
    }
  }

  return { nodes, lazies, depth: maxDepth };
}
