/**
 * packages/core/src/errors.ts — Deterministic error codes and error classes.
 *
 * Why: Every violation the core can detect is surfaced as a TwinframeError
 * carrying a stable `code`, so callers branch on codes instead of messages.
 * Construction and application failures get their own subclasses because they
 * carry extra context (the failed operation, how far application got).
 */

/**
 * Deterministic error codes for all core violations.
 */
export type TwinframeErrorCode =
  | "TF_DUPLICATE_KEY"
  | "TF_INVALID_NODE"
  | "TF_APPLY_FAILED"
  | "TF_UNKNOWN_MOUNT"
  | "TF_STALE_REGION"
  | "TF_REGION_SEALED"
  | "TF_REENTRANT_CYCLE"
  | "TF_INVALID_STATE"
  | "TF_PATCH_LIMIT"
  | "TF_INVALID_CONFIG";

/**
 * Error class for all deterministic core violations.
 * The `code` property identifies the specific violation.
 */
export class TwinframeError extends Error {
  override readonly name: string = "TwinframeError";
  readonly code: TwinframeErrorCode;

  constructor(code: TwinframeErrorCode, message?: string, options?: ErrorOptions) {
    super(message ?? code, options);
    this.code = code;

    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/** Raised by tree builders and by the pre-diff pass; no partial tree is ever diffed. */
export class ConstructionError extends TwinframeError {
  override readonly name = "ConstructionError";

  constructor(code: "TF_DUPLICATE_KEY" | "TF_INVALID_NODE", detail: string, cause?: unknown) {
    super(code, detail, cause === undefined ? undefined : { cause });
  }
}

/** Render-target operation names, as reported by ApplyError. */
export type TargetOp =
  | "createElement"
  | "createText"
  | "append"
  | "remove"
  | "replace"
  | "setAttr"
  | "removeAttr"
  | "setText"
  | "move";

export type ApplyErrorDetail = Readonly<{
  /** Target operation that failed, or null when a patch referenced an unmounted node. */
  op: TargetOp | null;
  /** Index of the failing patch in the cycle's patch list. */
  patchIndex: number;
  /** Kind of the failing patch. */
  patchKind: string;
  /** Number of patches fully applied before the failure. */
  applied: number;
}>;

/**
 * One aggregated failure for a cycle's patch application. Remaining patches
 * were not applied; the ones before `patchIndex` were.
 */
export class ApplyError extends TwinframeError {
  override readonly name = "ApplyError";
  readonly detail: ApplyErrorDetail;

  constructor(
    code: "TF_APPLY_FAILED" | "TF_UNKNOWN_MOUNT",
    detail: ApplyErrorDetail,
    message: string,
    cause?: unknown,
  ) {
    super(code, message, cause === undefined ? undefined : { cause });
    this.detail = detail;
  }
}

/** Render an unknown thrown value for inclusion in an error message. */
export function describeThrown(v: unknown): string {
  if (v instanceof Error) return `${v.name}: ${v.message}`;
  try {
    return String(v);
  } catch {
    return "[unprintable]";
  }
}
