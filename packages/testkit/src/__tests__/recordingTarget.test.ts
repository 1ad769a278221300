import { createRecordingTarget } from "../recordingTarget.js";
import { assert, describe, test } from "../nodeTest.js";

function buildList() {
  const target = createRecordingTarget();
  const ul = target.createElement("ul");
  target.setAttr(ul, "class", "list");
  const a = target.createText("A");
  const b = target.createText("B");
  target.append(ul, a);
  target.append(ul, b);
  target.append(target.mountPoint, ul);
  return { target, ul, a, b };
}

describe("createRecordingTarget", () => {
  test("serializes the host tree under the mount point", () => {
    const { target } = buildList();
    assert.equal(target.serialize(), '<ul class="list">"A""B"</ul>');
  });

  test("issues ids from 1 and records ops in call order", () => {
    const { target, ul, a, b } = buildList();
    assert.deepEqual([ul, a, b], [1, 2, 3]);
    assert.deepEqual(
      target.ops.map((entry) => entry.op),
      ["createElement", "setAttr", "createText", "createText", "append", "append", "append"],
    );
    assert.deepEqual(target.ops[1]?.args, [1, "class", "list"]);
  });

  test("move leaves the child at the requested index", () => {
    const { target, ul, a, b } = buildList();
    target.move(ul, b, 0);
    assert.deepEqual(target.childrenOf(ul), [b, a]);
    assert.equal(target.serialize(), '<ul class="list">"B""A"</ul>');
  });

  test("replace swaps a child in place and detaches the old one", () => {
    const { target, ul, a, b } = buildList();
    const c = target.createText("C");
    target.replace(ul, a, c);
    assert.deepEqual(target.childrenOf(ul), [c, b]);
    assert.equal(target.node(a)?.parent, null);
  });

  test("rejects appending an attached node", () => {
    const { target, a } = buildList();
    const other = target.createElement("div");
    assert.throws(() => target.append(other, a), /already attached/);
  });

  test("rejects an out-of-range move", () => {
    const { target, ul, a } = buildList();
    assert.throws(() => target.move(ul, a, 2), /out of range/);
  });

  test("failOn throws on the nth matching call without recording it", () => {
    const { target, ul } = buildList();
    target.clearOps();
    target.failOn({ op: "setAttr", nth: 2 });
    target.setAttr(ul, "id", "first");
    assert.throws(() => target.setAttr(ul, "title", "second"), /injected setAttr failure/);
    assert.equal(target.countOps("setAttr"), 1);
    target.failOn(null);
    target.setAttr(ul, "title", "third");
    assert.equal(target.countOps("setAttr"), 2);
  });

  test("event slots serialize as @event", () => {
    const target = createRecordingTarget();
    const button = target.createElement("button");
    target.setAttr(button, "onclick", { kind: "event" });
    target.append(target.mountPoint, button);
    assert.equal(target.serialize(), "<button onclick=@event></button>");
  });
});
