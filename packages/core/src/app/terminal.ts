/**
 * Terminal collaborator contract.
 *
 * The run loop never writes escape codes itself. It asks a Terminal for its size, hands
 * it one draw callback per frame and applies cursor/title requests after the frame.
 * `D` is whatever frame or buffer type the terminal backend paints into.
 */

import type { Position, Rect, Size } from "../geometry.js";

/** Paints into `frame`, clipped to `area`. */
export type DrawFn<D> = (frame: D, area: Rect) => void;

export interface Terminal<D> {
  /** Enter raw mode / alternate screen. Called once before the first frame. */
  init(): void;

  /** Restore the terminal. Called once on exit, also after a failure. */
  shutdown(): void;

  size(): Size;

  /** Draw one full frame. */
  render(draw: DrawFn<D>): void;

  /** Forget the previous frame so the next render repaints every cell. */
  clear(): void;

  /** Print `height` lines above the UI area (inline viewports). */
  insertBefore(height: number, draw: DrawFn<D>): void;

  /** Show the hardware cursor at a position, or hide it. */
  setCursor(pos: Position | undefined): void;

  setTitle(title: string): void;
}
