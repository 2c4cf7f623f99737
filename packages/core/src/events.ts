/**
 * Terminal input events understood by the kernel's helpers.
 *
 * The run loop itself is generic over the application's event type; these shapes are
 * what the default window-stack mouse adapter and the test builders speak. Applications
 * usually wrap them in their own union next to timer and job events.
 */

// =============================================================================
// Input Event Types
// =============================================================================

export type MouseButton = "left" | "right" | "middle";

export type MouseAction =
  | "down"
  | "up"
  | "drag"
  | "moved"
  | "scroll-up"
  | "scroll-down"
  | "scroll-left"
  | "scroll-right";

/** Modifier bits. */
export const MOD_SHIFT = 1 << 0;
export const MOD_CTRL = 1 << 1;
export const MOD_ALT = 1 << 2;

export type InputEvent =
  | Readonly<{
      kind: "key";
      /** Key name ("a", "enter", "f5", …). */
      key: string;
      mods: number;
    }>
  | Readonly<{
      kind: "mouse";
      action: MouseAction;
      /** Present for down/up/drag. */
      button?: MouseButton;
      x: number;
      y: number;
      mods: number;
    }>
  | Readonly<{ kind: "resize"; cols: number; rows: number }>
  | Readonly<{ kind: "paste"; text: string }>
  | Readonly<{ kind: "focus"; gained: boolean }>;

export type MouseInputEvent = Extract<InputEvent, { kind: "mouse" }>;

export function isMouseEvent(ev: InputEvent): ev is MouseInputEvent {
  return ev.kind === "mouse";
}
