/**
 * packages/core/src/renderer/createRenderer.ts — Render cycle driver.
 *
 * Why: Composes the tree model, differ, patch applier and frame memory into
 * the cycle the host drives: build the next tree from state, force its lazy
 * nodes, diff it against the previous tree, apply the patches, commit.
 *
 * Cycle failure handling:
 *   - view, prepare or diff throws: the cycle is aborted and the previous tree
 *     stays current; the target has not been touched
 *   - the patch cap is exceeded: same as above, with TF_PATCH_LIMIT
 *   - application throws: the new tree is still committed (its records hold
 *     the hosts assigned so far) and the ApplyError is rethrown
 *
 * The renderer never schedules anything. Messages from dispatchEvent go to
 * onMessage synchronously; whoever owns state decides when to render again.
 */

import { PatchApplier } from "../apply/applier.js";
import { type DiffResult, diffTrees } from "../diff/diff.js";
import { countPatches } from "../diff/patch.js";
import { ApplyError, TwinframeError } from "../errors.js";
import { type FrameCycle, FrameMemory } from "../memory/frameMemory.js";
import type { MountId } from "../memory/mounted.js";
import { type InstrumentationPhase, getPerfRecorder } from "../perf/perf.js";
import { type PrepareStats, prepareTree } from "../tree/prepare.js";
import type { ResolvedNode, TreeNode } from "../tree/types.js";
import { resolveRendererConfig } from "./config.js";
import { type DevWarningContext, warnDevIssue } from "./devWarnings.js";
import type { CycleReport, Renderer, RendererOptions } from "./types.js";

type BuiltCycle<M> = Readonly<{
  tree: TreeNode<M>;
  prepared: PrepareStats;
  result: DiffResult<M>;
}>;

function hasHandler(node: ResolvedNode<unknown>, slot: string): boolean {
  if (node.kind !== "element" && node.kind !== "keyed") return false;
  const value = node.attrs.get(slot);
  return value !== undefined && typeof value !== "string";
}

export function createRenderer<S, M>(opts: RendererOptions<S, M>): Renderer<S, M> {
  const config = resolveRendererConfig(opts.config);
  const { target, mountPoint, view, onMessage } = opts;
  const perf = opts.perf ?? getPerfRecorder();
  const memory = new FrameMemory<M>();
  const applier = new PatchApplier<M>(target);
  const devWarnings: DevWarningContext = {
    devMode: config.devMode,
    warned: new Set<string>(),
    warn: config.warn,
  };

  const timings: Record<InstrumentationPhase, number> = {
    view: 0,
    prepare: 0,
    diff: 0,
    apply: 0,
    commit: 0,
  };
  const timed = <T>(phase: InstrumentationPhase, run: () => T): T => {
    const token = perf.markStart(phase);
    try {
      return run();
    } finally {
      perf.markEnd(phase, token);
      timings[phase] = perf.now() - token;
    }
  };

  function buildCycle(state: S, frame: FrameCycle<M>): BuiltCycle<M> {
    const cycle = frame.cycle;
    try {
      const tree = timed("view", () => view(state));
      const prepared = timed("prepare", () =>
        prepareTree(tree, cycle, {
          onIdentityCollision: (detail) => {
            warnDevIssue(devWarnings, "lazy", detail, detail);
          },
        }),
      );
      const result = timed("diff", () =>
        diffTrees(memory.previousRoot, tree, mountPoint, frame.active, {
          cycle,
          retired: frame.retired,
          checkRegions: config.checkRegions,
        }),
      );
      if (result.patches.length > config.maxPatchesPerCycle) {
        throw new TwinframeError(
          "TF_PATCH_LIMIT",
          `render: cycle ${String(cycle)} produced ${String(result.patches.length)} patches (limit ${String(
            config.maxPatchesPerCycle,
          )})`,
        );
      }
      return { tree, prepared, result };
    } catch (err: unknown) {
      memory.abortCycle();
      throw err;
    }
  }

  function render(state: S): CycleReport {
    if (memory.inCycle) {
      throw new TwinframeError(
        "TF_REENTRANT_CYCLE",
        `render: called while cycle ${String(memory.stats().cycle)} is running`,
      );
    }
    const frame = memory.beginCycle();
    const { tree, prepared, result } = buildCycle(state, frame);
    const patches = result.patches;

    let applied = patches.length;
    let failure: ApplyError | null = null;
    try {
      timed("apply", () => applier.apply(patches, mountPoint));
    } catch (err: unknown) {
      if (!(err instanceof ApplyError)) {
        memory.commit(tree, result.root);
        throw err;
      }
      failure = err;
      applied = err.detail.applied;
    }

    timed("commit", () => {
      memory.commit(tree, result.root);
    });

    const report: CycleReport = Object.freeze({
      cycle: frame.cycle,
      patchCount: patches.length,
      patches: countPatches(patches),
      applied,
      tree: prepared,
      timings: Object.freeze({ ...timings }),
    });
    config.onCycle?.(report);
    if (failure !== null) throw failure;
    return report;
  }

  function dispatchEvent(host: MountId, slot: string, payload?: unknown): M | undefined {
    const record = memory.current.findHost(host);
    if (record === undefined) {
      warnDevIssue(
        devWarnings,
        "events",
        `host:${String(host)}`,
        `event "${slot}" for unknown host ${String(host)}`,
      );
      return undefined;
    }
    if (record.dispatch === null || !hasHandler(record.node, slot)) {
      warnDevIssue(
        devWarnings,
        "events",
        `slot:${String(host)}:${slot}`,
        `host ${String(host)} has no handler for "${slot}"`,
      );
      return undefined;
    }
    const msg = record.dispatch(slot, payload);
    if (msg !== undefined) onMessage?.(msg);
    return msg;
  }

  return {
    render,
    dispatchEvent,
    current: () => memory.previousRoot,
    memoryStats: () => memory.stats(),
  };
}
