/**
 * packages/core/src/tree/types.ts — Tree node variants.
 *
 * Why: A tree is a closed, tagged union discriminated by `kind`. Every match
 * site switches on `kind` and ends in an exhaustiveness check, so adding a
 * variant is a compile error everywhere it is not handled.
 *
 * The type parameter `M` is the message type produced by the tree's event
 * handlers. It only appears in covariant positions, so a tree without handlers
 * is a `TreeNode<never>` and fits into any message domain.
 */

/** Opaque event-handler description. Compared by identity when diffing. */
export type Handler<M> = Readonly<{
  kind: "handler";
  /** Turn a target-reported payload into a message, or undefined for none. */
  decode: (payload: unknown) => M | undefined;
}>;

export type AttrValue<M> = string | Handler<M>;

/** Ordered attribute set (insertion order is attribute order). */
export type Attrs<M> = ReadonlyMap<string, AttrValue<M>>;

export type ElementNode<M> = Readonly<{
  kind: "element";
  tag: string;
  key: string | undefined;
  attrs: Attrs<M>;
  children: readonly TreeNode<M>[];
}>;

export type TextNode = Readonly<{ kind: "text"; text: string }>;

export type EmptyNode = Readonly<{ kind: "empty" }>;

export type KeyedEntry<M> = Readonly<{ key: string; node: TreeNode<M> }>;

/** Host element whose children are identified by application-supplied keys. */
export type KeyedNode<M> = Readonly<{
  kind: "keyed";
  tag: string;
  key: string | undefined;
  attrs: Attrs<M>;
  entries: readonly KeyedEntry<M>[];
}>;

export type LazyIdentity = string | number | symbol;

export type LazyNode<M> = Readonly<{
  kind: "lazy";
  identity: LazyIdentity;
  /** Resolve the subtree for a cycle. Repeated calls with the same cycle reuse the result. */
  force: (cycle: number) => TreeNode<M>;
}>;

/**
 * Receives a mapped node's content together with its translation. The content's
 * message type stays private to the visitor.
 */
export type MappedVisitor<M, R> = <C>(content: TreeNode<C>, translate: (msg: C) => M) => R;

export type MappedNode<M> = Readonly<{
  kind: "mapped";
  visit: <R>(visitor: MappedVisitor<M, R>) => R;
}>;

export type TreeNode<M> =
  | ElementNode<M>
  | TextNode
  | EmptyNode
  | KeyedNode<M>
  | LazyNode<M>
  | MappedNode<M>;

/** Variants that remain after lazy and mapped wrappers are looked through. */
export type ResolvedNode<M> = ElementNode<M> | TextNode | EmptyNode | KeyedNode<M>;

/** Variants materialized as a host element. */
export type HostElementNode<M> = ElementNode<M> | KeyedNode<M>;

/** Exhaustiveness guard for `switch (node.kind)` sites. */
export function assertNever(_value: never, what: string): never {
  throw new Error(`unexpected ${what}`);
}
