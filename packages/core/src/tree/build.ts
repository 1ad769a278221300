/**
 * packages/core/src/tree/build.ts — Tree node factory functions.
 *
 * Why: Builders are the only place trees are constructed, so they are where
 * construction rules are enforced: duplicate keys and malformed nodes throw a
 * ConstructionError immediately, before any diffing can see a partial tree.
 * Every returned node is frozen; composition always produces new values.
 */

import { ConstructionError } from "../errors.js";
import { childKey } from "./slots.js";
import type {
  AttrValue,
  Attrs,
  ElementNode,
  EmptyNode,
  Handler,
  KeyedEntry,
  KeyedNode,
  LazyIdentity,
  LazyNode,
  MappedNode,
  MappedVisitor,
  TextNode,
  TreeNode,
} from "./types.js";

/**
 * Element props: `key` is the reconciliation key, every other defined prop is
 * an attribute. Undefined values are skipped.
 */
export type NodeProps<M> = Readonly<{ key?: string }> &
  Readonly<Record<string, AttrValue<M> | undefined>>;

const NODE_KINDS: ReadonlySet<string> = new Set([
  "element",
  "text",
  "empty",
  "keyed",
  "lazy",
  "mapped",
]);

const EMPTY: EmptyNode = Object.freeze({ kind: "empty" });
const NO_CHILDREN: readonly never[] = Object.freeze([]);

function invalidNode(detail: string, cause?: unknown): never {
  throw new ConstructionError("TF_INVALID_NODE", detail, cause);
}

/** Structural check used to reject values that are not tree nodes. */
export function isTreeNodeLike(value: unknown): boolean {
  if (typeof value !== "object" || value === null) return false;
  const kind: unknown = Reflect.get(value, "kind");
  return typeof kind === "string" && NODE_KINDS.has(kind);
}

export function isHandler(value: unknown): value is Handler<unknown> {
  return (
    typeof value === "object" &&
    value !== null &&
    Reflect.get(value, "kind") === "handler" &&
    typeof Reflect.get(value, "decode") === "function"
  );
}

export function describeIdentity(identity: LazyIdentity): string {
  if (typeof identity === "symbol") return identity.toString();
  return JSON.stringify(identity);
}

function requireTag(tag: unknown, what: string): string {
  if (typeof tag !== "string" || tag.length === 0) {
    invalidNode(`${what} tag must be a non-empty string`);
  }
  return tag;
}

function readProps<M>(
  tag: string,
  props: NodeProps<M> | undefined,
): Readonly<{ key: string | undefined; attrs: Attrs<M> }> {
  const attrs = new Map<string, AttrValue<M>>();
  if (props === undefined) return { key: undefined, attrs };

  let key: string | undefined;
  for (const name of Object.keys(props)) {
    const value = props[name];
    if (value === undefined) continue;
    if (name === "key") {
      if (typeof value !== "string") invalidNode(`<${tag}> key must be a string`);
      key = value;
      continue;
    }
    if (typeof value !== "string" && !isHandler(value)) {
      invalidNode(`<${tag}> attribute "${name}" must be a string or an event handler`);
    }
    attrs.set(name, value);
  }
  return { key, attrs };
}

export function duplicateKeyDetail(tag: string, key: string, aIndex: number, bIndex: number): string {
  return `Duplicate key "${key}" under <${tag}> (child indices ${String(aIndex)} and ${String(bIndex)})`;
}

function freezeChildren<M>(tag: string, children: readonly TreeNode<M>[]): readonly TreeNode<M>[] {
  if (children.length === 0) return NO_CHILDREN;
  const seen = new Map<string, number>();
  const out: TreeNode<M>[] = [];
  for (let i = 0; i < children.length; i++) {
    const child = children[i];
    if (child === undefined || !isTreeNodeLike(child)) {
      invalidNode(`<${tag}> child ${String(i)} is not a tree node`);
    }
    const key = childKey(child);
    if (key !== undefined) {
      const existing = seen.get(key);
      if (existing !== undefined) {
        throw new ConstructionError("TF_DUPLICATE_KEY", duplicateKeyDetail(tag, key, existing, i));
      }
      seen.set(key, i);
    }
    out.push(child);
  }
  return Object.freeze(out);
}

function element<M = never>(
  tag: string,
  props?: NodeProps<M>,
  children: readonly TreeNode<M>[] = NO_CHILDREN,
): ElementNode<M> {
  const checkedTag = requireTag(tag, "element");
  const { key, attrs } = readProps(checkedTag, props);
  return Object.freeze({
    kind: "element",
    tag: checkedTag,
    key,
    attrs,
    children: freezeChildren(checkedTag, children),
  });
}

function text(content: string): TextNode {
  if (typeof content !== "string") invalidNode("text content must be a string");
  return Object.freeze({ kind: "text", text: content });
}

function empty(): EmptyNode {
  return EMPTY;
}

function keyed<M = never>(
  tag: string,
  props: NodeProps<M> | undefined,
  entries: readonly (readonly [string, TreeNode<M>])[],
): KeyedNode<M> {
  const checkedTag = requireTag(tag, "keyed");
  const { key, attrs } = readProps(checkedTag, props);
  const seen = new Map<string, number>();
  const out: KeyedEntry<M>[] = [];
  for (let i = 0; i < entries.length; i++) {
    const entry = entries[i];
    if (entry === undefined) invalidNode(`<${checkedTag}> entry ${String(i)} is missing`);
    const [entryKey, node] = entry;
    if (typeof entryKey !== "string") {
      invalidNode(`<${checkedTag}> entry ${String(i)} key must be a string`);
    }
    if (!isTreeNodeLike(node)) {
      invalidNode(`<${checkedTag}> entry "${entryKey}" is not a tree node`);
    }
    const existing = seen.get(entryKey);
    if (existing !== undefined) {
      throw new ConstructionError(
        "TF_DUPLICATE_KEY",
        duplicateKeyDetail(checkedTag, entryKey, existing, i),
      );
    }
    seen.set(entryKey, i);
    out.push(Object.freeze({ key: entryKey, node }));
  }
  return Object.freeze({
    kind: "keyed",
    tag: checkedTag,
    key,
    attrs,
    entries: Object.freeze(out),
  });
}

function lazy<M>(identity: LazyIdentity, produce: () => TreeNode<M>): LazyNode<M> {
  const identityType = typeof identity;
  if (identityType !== "string" && identityType !== "number" && identityType !== "symbol") {
    invalidNode("lazy identity must be a string, number or symbol");
  }
  if (typeof produce !== "function") {
    invalidNode(`lazy node ${describeIdentity(identity)} needs a producer function`);
  }

  let memoCycle = -1;
  let memo: TreeNode<M> | null = null;
  const force = (cycle: number): TreeNode<M> => {
    if (memo !== null && memoCycle === cycle) return memo;
    let node: TreeNode<M>;
    try {
      node = produce();
    } catch (error) {
      invalidNode(`lazy node ${describeIdentity(identity)} producer threw`, error);
    }
    if (!isTreeNodeLike(node)) {
      invalidNode(`lazy node ${describeIdentity(identity)} produced a non-node value`);
    }
    memo = node;
    memoCycle = cycle;
    return node;
  };

  return Object.freeze({ kind: "lazy", identity, force });
}

function map<C, P>(content: TreeNode<C>, translate: (msg: C) => P): MappedNode<P> {
  if (!isTreeNodeLike(content)) invalidNode("mapped content is not a tree node");
  if (typeof translate !== "function") invalidNode("mapped node needs a translation function");
  return Object.freeze({
    kind: "mapped",
    visit: <R>(visitor: MappedVisitor<P, R>): R => visitor(content, translate),
  });
}

function on<M>(decode: (payload: unknown) => M | undefined): Handler<M> {
  if (typeof decode !== "function") invalidNode("event handler needs a decode function");
  return Object.freeze({ kind: "handler", decode });
}

/** Handler that ignores the payload and always produces `msg`. */
function send<M>(msg: M): Handler<M> {
  return on(() => msg);
}

/**
 * Tree factory namespace.
 *
 * @example
 * ```ts
 * const view = t.element("ul", { class: "todos" }, [
 *   t.element("li", { key: "a", onclick: t.send({ type: "pick", id: "a" }) }, [t.text("A")]),
 * ]);
 * ```
 */
export const t = Object.freeze({
  element,
  text,
  empty,
  keyed,
  lazy,
  map,
  on,
  send,
});
