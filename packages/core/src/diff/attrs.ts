/**
 * packages/core/src/diff/attrs.ts — Attribute set differ.
 *
 * String values compare byte-exact. Handler values compare by identity of the
 * handler description, never by the message they would produce, which keeps the
 * cost at O(1) per attribute.
 */

import type { AttrValue, Attrs } from "../tree/types.js";

export type AttrChange<M> = Readonly<{ name: string; prev: AttrValue<M>; next: AttrValue<M> }>;

/** Three disjoint sets; no attribute name appears in more than one. */
export type AttrDiff<M> = Readonly<{
  /** Present only in next, in next order. */
  added: readonly (readonly [string, AttrValue<M>])[];
  /** Present only in prev, in prev order. */
  removed: readonly string[];
  /** Present in both with different values, in next order. */
  changed: readonly AttrChange<M>[];
}>;

export function attrValueEqual(a: AttrValue<unknown>, b: AttrValue<unknown>): boolean {
  return a === b;
}

/**
 * Diff two attribute sets. Returns null when nothing was added, removed or
 * changed.
 */
export function diffAttrs<M>(prev: Attrs<M>, next: Attrs<M>): AttrDiff<M> | null {
  if (prev === next) return null;

  const added: (readonly [string, AttrValue<M>])[] = [];
  const removed: string[] = [];
  const changed: AttrChange<M>[] = [];

  for (const [name, nextValue] of next) {
    const prevValue = prev.get(name);
    if (prevValue === undefined) {
      added.push([name, nextValue]);
    } else if (!attrValueEqual(prevValue, nextValue)) {
      changed.push({ name, prev: prevValue, next: nextValue });
    }
  }
  for (const name of prev.keys()) {
    if (!next.has(name)) removed.push(name);
  }

  if (added.length === 0 && removed.length === 0 && changed.length === 0) return null;
  return { added, removed, changed };
}
