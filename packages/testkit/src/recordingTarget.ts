/**
 * In-memory render target for tests.
 *
 * Keeps a real host tree (so tests can compare it with the view tree), records
 * every operation in call order, and can be told to throw on a chosen
 * operation. Structural misuse (appending an attached node, moving a node that
 * is not a child, an out-of-range index) throws, so applier bugs surface as
 * test failures instead of silently diverging trees.
 */

import type { MountId, RenderTarget, TargetAttrValue, TargetOp } from "@twinframe/core";
import { formatAttrs } from "./describeTree.js";

export type HostElement = {
  readonly kind: "element";
  readonly id: MountId;
  readonly tag: string;
  readonly attrs: Map<string, TargetAttrValue>;
  readonly children: MountId[];
  parent: MountId | null;
};

export type HostText = {
  readonly kind: "text";
  readonly id: MountId;
  text: string;
  parent: MountId | null;
};

export type HostNode = HostElement | HostText;

export type RecordedOp = Readonly<{ op: TargetOp; args: readonly (string | number)[] }>;

export type FailOn = Readonly<{
  op: TargetOp;
  /** Fail the nth call of `op` counted from when the rule was set (1-based). Default 1. */
  nth?: number;
  error?: Error;
}>;

export type RecordingTarget = RenderTarget &
  Readonly<{
    /** Mount point element, created with the target. */
    mountPoint: MountId;
    ops: readonly RecordedOp[];
    node: (id: MountId) => HostNode | undefined;
    childrenOf: (id: MountId) => readonly MountId[];
    /** Canonical serialization of the children of `id` (default: the mount point). */
    serialize: (id?: MountId) => string;
    countOps: (op: TargetOp) => number;
    clearOps: () => void;
    failOn: (rule: FailOn | null) => void;
  }>;

export function createRecordingTarget(): RecordingTarget {
  const nodes = new Map<MountId, HostNode>();
  const ops: RecordedOp[] = [];
  let nextId = 1;
  let rule: FailOn | null = null;
  let ruleHits = 0;

  const mountPoint: MountId = 0;
  nodes.set(mountPoint, {
    kind: "element",
    id: mountPoint,
    tag: "#mount",
    attrs: new Map(),
    children: [],
    parent: null,
  });

  const record = (op: TargetOp, args: readonly (string | number)[]): void => {
    if (rule !== null && rule.op === op) {
      ruleHits++;
      if (ruleHits === (rule.nth ?? 1)) {
        throw rule.error ?? new Error(`recording target: injected ${op} failure`);
      }
    }
    ops.push(Object.freeze({ op, args: Object.freeze([...args]) }));
  };

  const requireNode = (id: MountId, what: string): HostNode => {
    const node = nodes.get(id);
    if (node === undefined) throw new Error(`${what}: unknown host ${String(id)}`);
    return node;
  };

  const requireElement = (id: MountId, what: string): HostElement => {
    const node = requireNode(id, what);
    if (node.kind !== "element") throw new Error(`${what}: host ${String(id)} is not an element`);
    return node;
  };

  const childIndex = (parent: HostElement, child: MountId, what: string): number => {
    const at = parent.children.indexOf(child);
    if (at < 0) {
      throw new Error(`${what}: host ${String(child)} is not a child of ${String(parent.id)}`);
    }
    return at;
  };

  const serializeNode = (id: MountId): string => {
    const node = requireNode(id, "serialize");
    if (node.kind === "text") return JSON.stringify(node.text);
    return `<${node.tag}${formatAttrs(node.attrs)}>${node.children
      .map(serializeNode)
      .join("")}</${node.tag}>`;
  };

  return {
    mountPoint,
    ops,
    createElement(tag) {
      record("createElement", [tag]);
      const id = nextId++;
      nodes.set(id, { kind: "element", id, tag, attrs: new Map(), children: [], parent: null });
      return id;
    },
    createText(content) {
      record("createText", [content]);
      const id = nextId++;
      nodes.set(id, { kind: "text", id, text: content, parent: null });
      return id;
    },
    append(parentId, childId) {
      record("append", [parentId, childId]);
      const parent = requireElement(parentId, "append");
      const child = requireNode(childId, "append");
      if (child.parent !== null) {
        throw new Error(`append: host ${String(childId)} is already attached to ${String(child.parent)}`);
      }
      parent.children.push(childId);
      child.parent = parentId;
    },
    remove(parentId, childId) {
      record("remove", [parentId, childId]);
      const parent = requireElement(parentId, "remove");
      parent.children.splice(childIndex(parent, childId, "remove"), 1);
      requireNode(childId, "remove").parent = null;
    },
    replace(parentId, oldId, newId) {
      record("replace", [parentId, oldId, newId]);
      const parent = requireElement(parentId, "replace");
      const next = requireNode(newId, "replace");
      if (next.parent !== null) throw new Error(`replace: host ${String(newId)} is already attached`);
      parent.children[childIndex(parent, oldId, "replace")] = newId;
      requireNode(oldId, "replace").parent = null;
      next.parent = parentId;
    },
    setAttr(id, key, value) {
      record("setAttr", [id, key, typeof value === "string" ? value : "@event"]);
      requireElement(id, "setAttr").attrs.set(key, value);
    },
    removeAttr(id, key) {
      record("removeAttr", [id, key]);
      const element = requireElement(id, "removeAttr");
      if (!element.attrs.delete(key)) {
        throw new Error(`removeAttr: host ${String(id)} has no attribute "${key}"`);
      }
    },
    setText(id, content) {
      record("setText", [id, content]);
      const node = requireNode(id, "setText");
      if (node.kind !== "text") throw new Error(`setText: host ${String(id)} is not a text node`);
      node.text = content;
    },
    move(parentId, childId, newIndex) {
      record("move", [parentId, childId, newIndex]);
      const parent = requireElement(parentId, "move");
      const from = childIndex(parent, childId, "move");
      if (!Number.isInteger(newIndex) || newIndex < 0 || newIndex >= parent.children.length) {
        throw new Error(`move: index ${String(newIndex)} out of range for ${String(parentId)}`);
      }
      parent.children.splice(from, 1);
      parent.children.splice(newIndex, 0, childId);
    },
    node: (id) => nodes.get(id),
    childrenOf: (id) => {
      const node = nodes.get(id);
      return node !== undefined && node.kind === "element" ? node.children : [];
    },
    serialize: (id = mountPoint) => requireElement(id, "serialize").children.map(serializeNode).join(""),
    countOps: (op) => ops.filter((entry) => entry.op === op).length,
    clearOps: () => {
      ops.length = 0;
    },
    failOn: (next) => {
      rule = next;
      ruleHits = 0;
    },
  };
}
