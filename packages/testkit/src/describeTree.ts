import type { TreeNode } from "@twinframe/core";

/** Canonical rendering of an attribute value; handlers show as `@event`. */
export function formatAttrValue(value: string | Readonly<{ kind: string }>): string {
  return typeof value === "string" ? JSON.stringify(value) : "@event";
}

export function formatAttrs(attrs: Iterable<readonly [string, string | Readonly<{ kind: string }>]>): string {
  const entries = [...attrs].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  return entries.map(([name, value]) => ` ${name}=${formatAttrValue(value)}`).join("");
}

/**
 * Serialize what `node` renders, looking through lazy and mapped wrappers.
 * Uses the same format as RecordingTarget.serialize, so a tree and the host
 * tree it was rendered into compare as strings.
 */
export function describeTree(node: TreeNode<unknown>, cycle = 0): string {
  switch (node.kind) {
    case "empty":
      return "";
    case "text":
      return JSON.stringify(node.text);
    case "element":
      return `<${node.tag}${formatAttrs(node.attrs)}>${node.children
        .map((child) => describeTree(child, cycle))
        .join("")}</${node.tag}>`;
    case "keyed":
      return `<${node.tag}${formatAttrs(node.attrs)}>${node.entries
        .map((entry) => describeTree(entry.node, cycle))
        .join("")}</${node.tag}>`;
    case "lazy":
      return describeTree(node.force(cycle), cycle);
    case "mapped":
      return node.visit(<C>(content: TreeNode<C>): string => describeTree(content, cycle));
  }
}
