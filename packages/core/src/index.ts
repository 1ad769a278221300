/**
 * @twinframe/core
 *
 * Backend-agnostic tree reconciler: tree model, differ, keyed reconciliation,
 * patch application against a render target, and two-region frame memory.
 * This package MUST NOT use Node-specific imports (node:*, Buffer).
 */

// =============================================================================
// Errors
// =============================================================================

export {
  ApplyError,
  ConstructionError,
  TwinframeError,
  describeThrown,
  type ApplyErrorDetail,
  type TargetOp,
  type TwinframeErrorCode,
} from "./errors.js";

// =============================================================================
// Tree model
// =============================================================================

export type {
  AttrValue,
  Attrs,
  ElementNode,
  EmptyNode,
  Handler,
  HostElementNode,
  KeyedEntry,
  KeyedNode,
  LazyIdentity,
  LazyNode,
  MappedNode,
  MappedVisitor,
  ResolvedNode,
  TextNode,
  TreeNode,
} from "./tree/types.js";
export { type NodeProps, isHandler, t } from "./tree/build.js";
export { type PrepareOptions, type PrepareStats, prepareTree } from "./tree/prepare.js";
export {
  type SlotId,
  indexedSlot,
  keyedSlot,
  resolveNode,
  resolvedKey,
  slotIdForChild,
} from "./tree/slots.js";

// =============================================================================
// Diff
// =============================================================================

export { type AttrChange, type AttrDiff, diffAttrs } from "./diff/attrs.js";
export { type DiffOptions, type DiffResult, diffTrees } from "./diff/diff.js";
export {
  type ChildDiffer,
  type KeyedReconcileResult,
  reconcileKeyedChildren,
} from "./diff/keyed.js";
export {
  countPatches,
  type CreatePatch,
  type KeyedMove,
  type Patch,
  type PatchCounts,
  type PatchKind,
  type PatchParent,
  type RemovePatch,
  type ReorderPatch,
  type ReplacePatch,
  type UpdateAttrsPatch,
  type UpdateTextPatch,
} from "./diff/patch.js";

// =============================================================================
// Patch application
// =============================================================================

export { PatchApplier } from "./apply/applier.js";
export { computeLIS } from "./apply/lis.js";
export {
  EVENT_SLOT,
  type EventSlotMarker,
  type RenderTarget,
  type TargetAttrValue,
} from "./apply/target.js";

// =============================================================================
// Frame memory
// =============================================================================

export {
  FrameMemory,
  type FrameCycle,
  type FrameMemoryStats,
  type RegionStats,
} from "./memory/frameMemory.js";
export { FrameRegion } from "./memory/region.js";
export {
  materializes,
  type EventDispatch,
  type MountId,
  type MountedNode,
  type RegionSlot,
  type RegionStamp,
} from "./memory/mounted.js";

// =============================================================================
// Renderer
// =============================================================================

export { createRenderer } from "./renderer/createRenderer.js";
export { resolveRendererConfig } from "./renderer/config.js";
export type {
  CycleReport,
  CycleTimings,
  Renderer,
  RendererConfig,
  RendererOptions,
  ResolvedRendererConfig,
} from "./renderer/types.js";

// =============================================================================
// Perf
// =============================================================================

export {
  PERF_ENABLED,
  PERF_PHASES,
  PerfAggregator,
  createPerfRecorder,
  getPerfRecorder,
  perfMarkEnd,
  perfMarkStart,
  perfReset,
  perfSnapshot,
  type InstrumentationPhase,
  type PerfRecorder,
  type PerfSnapshot,
  type PerfToken,
  type PhaseStats,
} from "./perf/perf.js";
