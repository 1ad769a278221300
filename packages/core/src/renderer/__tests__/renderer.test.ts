import { assert, createRecordingTarget, describe, test } from "@twinframe/testkit";
import type { RecordedOp } from "@twinframe/testkit";
import { ApplyError, ConstructionError, TwinframeError } from "../../errors.js";
import { t } from "../../tree/build.js";
import type { TreeNode } from "../../tree/types.js";
import { createPerfRecorder } from "../../perf/perf.js";
import { createRenderer } from "../createRenderer.js";
import type { CycleReport, RendererConfig, Renderer } from "../types.js";

type State = Readonly<{ title: string; items: readonly string[] }>;

function view(state: State): TreeNode<never> {
  return t.element("main", {}, [
    t.element("h1", {}, [t.text(state.title)]),
    t.keyed(
      "ul",
      {},
      state.items.map((item) => [item, t.element("li", {}, [t.text(item)])] as const),
    ),
  ]);
}

function setup(config?: RendererConfig, render: (state: State) => TreeNode<never> = view) {
  const target = createRecordingTarget();
  const renderer: Renderer<State, never> = createRenderer({
    target,
    mountPoint: target.mountPoint,
    view: render,
    config,
  });
  return { target, renderer };
}

describe("createRenderer", () => {
  test("first render mounts the tree and reports one create", () => {
    const { target, renderer } = setup();
    const report = renderer.render({ title: "Todo", items: ["a"] });

    assert.equal(report.cycle, 1);
    assert.equal(report.patchCount, 1);
    assert.equal(report.patches.create, 1);
    assert.equal(report.applied, 1);
    assert.equal(report.tree.nodes, 6);
    assert.equal(target.serialize(), '<main><h1>"Todo"</h1><ul><li>"a"</li></ul></main>');
  });

  test("later renders patch only what changed", () => {
    const { target, renderer } = setup();
    renderer.render({ title: "Todo", items: ["a", "b"] });
    target.clearOps();
    const report = renderer.render({ title: "Done", items: ["b", "a"] });

    assert.deepEqual(report.patches, {
      create: 0,
      remove: 0,
      replace: 0,
      update_text: 1,
      update_attrs: 0,
      reorder: 1,
    });
    assert.deepEqual(
      target.ops.map((entry) => entry.op),
      ["setText", "move"],
    );
    assert.equal(
      target.serialize(),
      '<main><h1>"Done"</h1><ul><li>"b"</li><li>"a"</li></ul></main>',
    );
  });

  test("current() and memoryStats() follow committed cycles", () => {
    const { renderer } = setup();
    assert.equal(renderer.current(), null);
    renderer.render({ title: "x", items: [] });
    const first = renderer.current();
    renderer.render({ title: "y", items: [] });

    assert.notEqual(renderer.current(), first);
    assert.equal(renderer.current()?.host, first?.host);
    const stats = renderer.memoryStats();
    assert.equal(stats.cycle, 2);
    assert.equal(stats.current, 1);
    assert.equal(stats.inCycle, false);
  });

  test("a construction error keeps the previous tree and leaves the target alone", () => {
    let fail = false;
    const { target, renderer } = setup(undefined, (state) => {
      if (fail) return t.keyed("ul", {}, [["x", t.text("1")], ["x", t.text("2")]]);
      return view(state);
    });
    renderer.render({ title: "ok", items: ["a"] });
    const before = renderer.current();
    target.clearOps();

    fail = true;
    assert.throws(() => renderer.render({ title: "bad", items: [] }), ConstructionError);
    assert.equal(renderer.current(), before);
    assert.deepEqual<readonly RecordedOp[]>(target.ops, []);
    assert.equal(renderer.memoryStats().inCycle, false);

    fail = false;
    const report = renderer.render({ title: "ok", items: ["a", "b"] });
    assert.deepEqual(
      target.ops.map((entry) => entry.op),
      ["createElement", "createText", "append", "append"],
    );
    assert.equal(report.patches.create, 1);
  });

  test("a throwing lazy producer is a construction error", () => {
    const { renderer } = setup(undefined, () =>
      t.lazy<never>("broken", () => {
        throw new Error("no data");
      }),
    );
    assert.throws(
      () => renderer.render({ title: "", items: [] }),
      (err: unknown) => err instanceof ConstructionError && err.code === "TF_INVALID_NODE",
    );
    assert.equal(renderer.current(), null);
  });

  test("an apply failure still commits the new tree", () => {
    const { target, renderer } = setup();
    renderer.render({ title: "a", items: [] });
    target.failOn({ op: "setText" });

    assert.throws(() => renderer.render({ title: "b", items: [] }), ApplyError);
    assert.equal(renderer.memoryStats().cycle, 2);
    assert.equal(renderer.memoryStats().current, 1);
    assert.equal(target.serialize(), '<main><h1>"a"</h1><ul></ul></main>');

    target.failOn(null);
    renderer.render({ title: "c", items: [] });
    assert.equal(target.serialize(), '<main><h1>"c"</h1><ul></ul></main>');
  });

  test("onCycle sees failed applications too", () => {
    const reports: CycleReport[] = [];
    const { target, renderer } = setup({ onCycle: (report) => reports.push(report) });
    renderer.render({ title: "a", items: [] });
    target.failOn({ op: "setText" });
    assert.throws(() => renderer.render({ title: "b", items: [] }), ApplyError);

    assert.deepEqual(
      reports.map((report) => [report.cycle, report.patchCount, report.applied]),
      [
        [1, 1, 1],
        [2, 1, 0],
      ],
    );
  });

  test("render from inside the view is rejected", () => {
    let nested: Renderer<State, never> | null = null;
    const { renderer } = setup(undefined, (state) => {
      nested?.render(state);
      return view(state);
    });
    nested = renderer;
    assert.throws(
      () => renderer.render({ title: "x", items: [] }),
      (err: unknown) => err instanceof TwinframeError && err.code === "TF_REENTRANT_CYCLE",
    );
    assert.equal(renderer.current(), null);
    assert.equal(renderer.memoryStats().inCycle, false);
  });

  test("a cycle over the patch cap is aborted before applying", () => {
    const { target, renderer } = setup({ maxPatchesPerCycle: 1 });
    renderer.render({ title: "a", items: [] });
    const before = renderer.current();
    target.clearOps();

    assert.throws(
      () => renderer.render({ title: "b", items: ["x", "y"] }),
      (err: unknown) => err instanceof TwinframeError && err.code === "TF_PATCH_LIMIT",
    );
    assert.deepEqual(target.ops, []);
    assert.equal(renderer.current(), before);
  });

  test("timings are zero with a disabled perf recorder", () => {
    const target = createRecordingTarget();
    const renderer = createRenderer<State, never>({
      target,
      mountPoint: target.mountPoint,
      view,
      perf: createPerfRecorder(false),
    });
    const report = renderer.render({ title: "a", items: [] });
    assert.deepEqual(report.timings, { view: 0, prepare: 0, diff: 0, apply: 0, commit: 0 });
  });

  test("an enabled perf recorder times every phase", () => {
    let ticks = 0;
    const perf = createPerfRecorder(true, () => ticks++);
    const target = createRecordingTarget();
    const renderer = createRenderer<State, never>({
      target,
      mountPoint: target.mountPoint,
      view,
      perf,
    });
    const report = renderer.render({ title: "a", items: [] });

    // each phase reads the clock at start, end and report
    assert.deepEqual(report.timings, { view: 2, prepare: 2, diff: 2, apply: 2, commit: 2 });
    const phases = perf.snapshot().phases;
    assert.equal(phases.view?.count, 1);
    assert.equal(phases.view?.avg, 1);
    assert.equal(phases.commit?.max, 1);
  });
});
