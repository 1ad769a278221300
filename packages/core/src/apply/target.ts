/**
 * packages/core/src/apply/target.ts — Render target interface.
 *
 * The only seam between the core and a concrete backend. A target owns host
 * nodes and hands out their ids; the core never sees anything else of it.
 * Every operation is synchronous; a throw aborts the cycle's remaining patches.
 */

import type { MountId } from "../memory/mounted.js";

/** Marker set on a host element for an attribute carrying an event handler. */
export type EventSlotMarker = Readonly<{ kind: "event" }>;

export const EVENT_SLOT: EventSlotMarker = Object.freeze({ kind: "event" });

export type TargetAttrValue = string | EventSlotMarker;

export interface RenderTarget {
  createElement(tag: string): MountId;
  createText(content: string): MountId;
  append(parent: MountId, child: MountId): void;
  remove(parent: MountId, child: MountId): void;
  replace(parent: MountId, oldChild: MountId, newChild: MountId): void;
  /** Event-handler attributes arrive as EVENT_SLOT; report their events via dispatchEvent. */
  setAttr(id: MountId, key: string, value: TargetAttrValue): void;
  removeAttr(id: MountId, key: string): void;
  setText(id: MountId, content: string): void;
  /** Leave `child` at `newIndex` of `parent`'s child list. */
  move(parent: MountId, child: MountId, newIndex: number): void;
}
