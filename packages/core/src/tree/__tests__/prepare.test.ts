import { assert, describe, test } from "@twinframe/testkit";
import { ConstructionError } from "../../errors.js";
import { t } from "../build.js";
import { prepareTree } from "../prepare.js";

describe("prepareTree", () => {
  test("counts nodes, lazies and depth through wrappers", () => {
    const tree = t.element("div", {}, [
      t.lazy("a", () => t.element("p", {}, [t.text("x")])),
      t.map(t.text("y"), (m: never) => m),
    ]);
    // div, lazy, p, text x, mapped, text y
    assert.deepEqual(prepareTree(tree, 1), { nodes: 6, lazies: 1, depth: 4 });
  });

  test("surfaces a failing producer before any diffing", () => {
    const tree = t.element("div", {}, [
      t.lazy("bad", () => {
        throw new Error("nope");
      }),
    ]);
    assert.throws(() => prepareTree(tree, 1), ConstructionError);
  });

  test("reports identity collisions between distinct lazy nodes", () => {
    const detail: string[] = [];
    const tree = t.element("div", {}, [t.lazy("row", () => t.text("1")), t.lazy("row", () => t.text("2"))]);
    prepareTree(tree, 1, { onIdentityCollision: (d) => detail.push(d) });
    assert.deepEqual(detail, ['lazy identity "row" is shared by distinct lazy nodes']);
  });

  test("a lazy node referenced twice is forced once and not a collision", () => {
    let calls = 0;
    const shared = t.lazy("shared", () => {
      calls++;
      return t.text("s");
    });
    const detail: string[] = [];
    prepareTree(t.element("div", {}, [shared, shared]), 3, {
      onIdentityCollision: (d) => detail.push(d),
    });
    assert.equal(calls, 1);
    assert.deepEqual(detail, []);
  });

  test("handles trees deeper than a typical call stack", () => {
    let node = t.element("leaf");
    for (let i = 0; i < 20_000; i++) node = t.element("n", {}, [node]);
    assert.equal(prepareTree(node, 1).depth, 20_001);
  });
});
