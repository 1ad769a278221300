import { assert, describe, test } from "@twinframe/testkit";
import { ConstructionError, TwinframeError } from "../../errors.js";
import { t } from "../build.js";
import type { TreeNode } from "../types.js";

function expectConstruction(run: () => unknown, code: "TF_DUPLICATE_KEY" | "TF_INVALID_NODE") {
  assert.throws(run, (err: unknown) => {
    assert.ok(err instanceof ConstructionError);
    assert.ok(err instanceof TwinframeError);
    assert.equal(err.code, code);
    return true;
  });
}

describe("t.element", () => {
  test("splits key from attributes and keeps attribute order", () => {
    const node = t.element("li", { key: "a", class: "row", title: "first" });
    assert.equal(node.key, "a");
    assert.deepEqual([...node.attrs.keys()], ["class", "title"]);
    assert.equal(node.attrs.get("class"), "row");
  });

  test("skips undefined props", () => {
    const node = t.element("div", { title: undefined, id: "x" });
    assert.deepEqual([...node.attrs.keys()], ["id"]);
  });

  test("freezes the node and its children", () => {
    const node = t.element("div", {}, [t.text("a")]);
    assert.ok(Object.isFrozen(node));
    assert.ok(Object.isFrozen(node.children));
  });

  test("rejects duplicate child keys with both indices", () => {
    assert.throws(
      () => t.element("ul", {}, [t.element("li", { key: "x" }), t.element("li", { key: "x" })]),
      /Duplicate key "x" under <ul> \(child indices 0 and 1\)/,
    );
    expectConstruction(
      () => t.element("ul", {}, [t.element("li", { key: "x" }), t.element("li", { key: "x" })]),
      "TF_DUPLICATE_KEY",
    );
  });

  test("allows the same key under different parents", () => {
    const a = t.element("ul", {}, [t.element("li", { key: "x" })]);
    const b = t.element("ol", {}, [t.element("li", { key: "x" })]);
    assert.equal(t.element("div", {}, [a, b]).children.length, 2);
  });

  test("rejects an empty tag", () => {
    expectConstruction(() => t.element(""), "TF_INVALID_NODE");
  });

  test("rejects a child that is not a tree node", () => {
    const bogus: unknown = { kind: "widget" };
    const children: TreeNode<never>[] = [];
    Reflect.set(children, 0, bogus);
    expectConstruction(() => t.element("div", {}, children), "TF_INVALID_NODE");
  });
});

describe("t.keyed", () => {
  test("builds entries in order", () => {
    const node = t.keyed("ul", { class: "list" }, [
      ["a", t.text("A")],
      ["b", t.text("B")],
    ]);
    assert.deepEqual(
      node.entries.map((entry) => entry.key),
      ["a", "b"],
    );
    assert.equal(node.attrs.get("class"), "list");
  });

  test("rejects a key declared twice", () => {
    expectConstruction(
      () =>
        t.keyed("ul", {}, [
          ["x", t.text("1")],
          ["x", t.text("2")],
        ]),
      "TF_DUPLICATE_KEY",
    );
  });
});

describe("t.lazy", () => {
  test("forces once per cycle", () => {
    let calls = 0;
    const node = t.lazy("row", () => {
      calls++;
      return t.text("r");
    });
    const first = node.force(1);
    assert.equal(node.force(1), first);
    assert.equal(calls, 1);
    node.force(2);
    assert.equal(calls, 2);
  });

  test("wraps a throwing producer with the cause attached", () => {
    const boom = new Error("boom");
    const node = t.lazy(7, () => {
      throw boom;
    });
    assert.throws(
      () => node.force(1),
      (err: unknown) => {
        assert.ok(err instanceof ConstructionError);
        assert.equal(err.code, "TF_INVALID_NODE");
        assert.equal(err.message, "lazy node 7 producer threw");
        assert.equal(err.cause, boom);
        return true;
      },
    );
  });
});

describe("t.map and t.on", () => {
  test("map hands content and translation to a visitor", () => {
    const inner = t.element("button", { onclick: t.send(1) });
    const mapped = t.map(inner, (n: number) => `n=${String(n)}`);
    const out = mapped.visit(
      <C>(content: TreeNode<C>, translate: (msg: C) => string): string | undefined => {
        if (content.kind !== "element") return undefined;
        const handler = content.attrs.get("onclick");
        if (handler === undefined || typeof handler === "string") return undefined;
        const msg = handler.decode(null);
        return msg === undefined ? undefined : translate(msg);
      },
    );
    assert.equal(out, "n=1");
  });

  test("send ignores the payload", () => {
    const handler = t.send("go");
    assert.equal(handler.decode({ anything: true }), "go");
  });

  test("empty is a shared frozen value", () => {
    assert.equal(t.empty(), t.empty());
    assert.ok(Object.isFrozen(t.empty()));
  });
});
