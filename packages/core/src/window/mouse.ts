/**
 * packages/core/src/window/mouse.ts — Mouse hit rules shared by the window stacks.
 */

import type { Outcome } from "../control/control.js";
import { type InputEvent, type MouseInputEvent, isMouseEvent } from "../events.js";
import { type Rect, containsPoint } from "../geometry.js";

/**
 * Extracts the mouse part of an application event, or undefined for anything else.
 * The stacks are generic over the event type and only see the mouse through this.
 */
export type MouseAdapter<E> = (event: E) => MouseInputEvent | undefined;

/** Adapter for stacks driven directly by `InputEvent`. */
export const inputMouse: MouseAdapter<InputEvent> = (event) =>
  isMouseEvent(event) ? event : undefined;

/**
 * "unchanged" for a press, release, move or scroll inside `area`, else "continue".
 * Drags are not trapped: a drag that started elsewhere may cross a window.
 */
export function mouseTrap(mouse: MouseInputEvent | undefined, area: Rect): Outcome {
  if (mouse === undefined || mouse.action === "drag") return "continue";
  return containsPoint(area, mouse.x, mouse.y) ? "unchanged" : "continue";
}

/** A left-button press inside `area`. */
export function isPrimaryPressIn(mouse: MouseInputEvent | undefined, area: Rect): boolean {
  return (
    mouse !== undefined &&
    mouse.action === "down" &&
    mouse.button === "left" &&
    containsPoint(area, mouse.x, mouse.y)
  );
}
