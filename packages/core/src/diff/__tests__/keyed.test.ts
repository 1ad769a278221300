import { assert, describe, describeTree, test } from "@twinframe/testkit";
import { createHarness, kinds } from "../../__tests__/harness.js";
import { TwinframeError } from "../../errors.js";
import type { MountedNode } from "../../memory/mounted.js";
import { FrameRegion } from "../../memory/region.js";
import { t } from "../../tree/build.js";
import { type SlotId, keyedSlot } from "../../tree/slots.js";
import type { TreeNode } from "../../tree/types.js";
import { reconcileKeyedChildren } from "../keyed.js";

function li(label: string, key?: string): TreeNode<never> {
  return t.element("li", key === undefined ? {} : { key }, [t.text(label)]);
}

function list(keys: readonly string[]): TreeNode<never> {
  return t.keyed(
    "ul",
    {},
    keys.map((key) => [key, li(key.toUpperCase())] as const),
  );
}

function parentWith(region: FrameRegion<never>, keys: readonly string[]): MountedNode<never> {
  const parent = region.allocate({ node: t.element("ul"), host: null, dispatch: null });
  for (const key of keys) {
    parent.children.push(region.allocate({ node: t.text(key), host: null, dispatch: null }));
    parent.slots.push(keyedSlot(key));
  }
  return parent;
}

describe("reconcileKeyedChildren", () => {
  test("matches by slot, records moves and collects unmatched children", () => {
    const region = new FrameRegion<never>(0);
    const prev = parentWith(region, ["a", "b", "c"]);
    const next = region.allocate({ node: t.element("ul"), host: null, dispatch: null });
    const calls: (readonly [number, string | null])[] = [];
    const nextSlots: SlotId[] = ["k:b", "k:d", "k:a"];

    const result = reconcileKeyedChildren(prev, next, nextSlots, ["b", "d", "a"], (index, _after, prevChild, label) => {
      calls.push([index, prevChild === null ? null : describeTree(prevChild.node)]);
      return region.allocate({ node: t.text(label), host: null, dispatch: null });
    });

    assert.deepEqual(calls, [
      [0, '"b"'],
      [1, null],
      [2, '"a"'],
    ]);
    assert.deepEqual(result.moves, [
      { slot: "k:b", from: 1, to: 0 },
      { slot: "k:a", from: 0, to: 2 },
    ]);
    assert.deepEqual(result.unmatched, [prev.children[2]]);
    assert.deepEqual(next.slots, nextSlots);
    assert.equal(next.children.length, 3);
  });

  test("passes the last materializing sibling as the anchor", () => {
    const region = new FrameRegion<never>(0);
    const prev = parentWith(region, []);
    const next = region.allocate({ node: t.element("ul"), host: null, dispatch: null });
    const anchors: (MountedNode<never> | null)[] = [];
    const produced: MountedNode<never>[] = [];

    reconcileKeyedChildren(
      prev,
      next,
      ["k:a", "k:gap", "k:b"],
      [t.text("a"), t.empty(), t.text("b")],
      (_index, after, _prev, node) => {
        anchors.push(after);
        const record = region.allocate({ node, host: null, dispatch: null });
        produced.push(record);
        return record;
      },
    );

    assert.deepEqual(anchors, [null, produced[0], produced[0]]);
  });

  test("a slot repeated in the next list is a duplicate key", () => {
    const region = new FrameRegion<never>(0);
    const prev = parentWith(region, []);
    const next = region.allocate({ node: t.element("ul"), host: null, dispatch: null });
    assert.throws(
      () =>
        reconcileKeyedChildren(prev, next, ["k:x", "k:x"], [1, 2], () =>
          region.allocate({ node: t.empty(), host: null, dispatch: null }),
        ),
      (err: unknown) => err instanceof TwinframeError && err.code === "TF_DUPLICATE_KEY",
    );
  });
});

describe("keyed reconciliation through apply", () => {
  test("insert, remove and reorder in one cycle keep surviving hosts", () => {
    const h = createHarness();
    const first = h.step(list(["a", "b", "c", "d"]));
    const hostsBefore = first.root?.children.map((child) => child.host);
    h.target.clearOps();

    const next = list(["d", "x", "b", "a"]);
    const result = h.step(next);

    assert.deepEqual(kinds(result.patches), ["create", "remove", "reorder"]);
    assert.equal(h.target.serialize(), describeTree(next));
    assert.equal(h.target.countOps("move"), 2);
    const hostsAfter = result.root?.children.map((child) => child.host);
    assert.deepEqual(
      [hostsAfter?.[0], hostsAfter?.[2], hostsAfter?.[3]],
      [hostsBefore?.[3], hostsBefore?.[1], hostsBefore?.[0]],
    );
  });

  test("keyed element children reorder without recreating", () => {
    const h = createHarness();
    h.step(t.element("div", {}, [t.text("h"), li("A", "a"), li("B", "b")]));
    h.target.clearOps();
    const result = h.step(t.element("div", {}, [t.text("h"), li("B", "b"), li("A", "a")]));

    assert.deepEqual(kinds(result.patches), ["reorder"]);
    const reorder = result.patches[0];
    if (reorder?.kind !== "reorder") return;
    assert.deepEqual(reorder.moves, [
      { slot: "k:b", from: 2, to: 1 },
      { slot: "k:a", from: 1, to: 2 },
    ]);
    assert.equal(h.target.serialize(), '<div>"h"<li>"B"</li><li>"A"</li></div>');
  });

  test("dropping keys from element children still reconciles by slot", () => {
    const h = createHarness();
    h.step(t.element("div", {}, [li("A", "a")]));
    const result = h.step(t.element("div", {}, [li("A")]));
    assert.deepEqual(kinds(result.patches), ["create", "remove"]);
    assert.equal(h.target.serialize(), '<div><li>"A"</li></div>');
  });

  test("an entry turning empty is removed and comes back as a create", () => {
    const h = createHarness();
    const view = (middle: TreeNode<never>) =>
      t.keyed("ul", {}, [
        ["a", li("A")],
        ["m", middle],
        ["z", li("Z")],
      ]);
    h.step(view(li("M")));
    assert.deepEqual(kinds(h.step(view(t.empty())).patches), ["remove"]);
    assert.equal(h.target.serialize(), '<ul><li>"A"</li><li>"Z"</li></ul>');
    assert.deepEqual(kinds(h.step(view(li("M2"))).patches), ["create"]);
    assert.equal(h.target.serialize(), '<ul><li>"A"</li><li>"M2"</li><li>"Z"</li></ul>');
  });
});
