export { createRng, type Rng } from "./rng.js";
export { describeTree, formatAttrs, formatAttrValue } from "./describeTree.js";
export {
  createRecordingTarget,
  type FailOn,
  type HostElement,
  type HostNode,
  type HostText,
  type RecordedOp,
  type RecordingTarget,
} from "./recordingTarget.js";
export { assert, describe, test } from "./nodeTest.js";
