/** Rectangle in terminal cells. */
export type Rect = Readonly<{ x: number; y: number; w: number; h: number }>;

/** Size dimensions (width and height) in terminal cells. */
export type Size = Readonly<{ w: number; h: number }>;

/** A cell position. */
export type Position = Readonly<{ x: number; y: number }>;

export const EMPTY_RECT: Rect = Object.freeze({ x: 0, y: 0, w: 0, h: 0 });

/** Check if a point is inside a rect. Empty rects contain nothing. */
export function containsPoint(rect: Rect, x: number, y: number): boolean {
  return x >= rect.x && x < rect.x + rect.w && y >= rect.y && y < rect.y + rect.h;
}
