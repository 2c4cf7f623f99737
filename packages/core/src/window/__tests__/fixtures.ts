import type { InputEvent } from "../../events.js";
import { EMPTY_RECT, type Rect } from "../../geometry.js";
import { type MouseAdapter, inputMouse } from "../mouse.js";
import type { WindowHandler, WindowState } from "../types.js";
import { WINDOW_CONTINUE } from "../windowControl.js";
import type { WindowStack } from "../windowStack.js";

export type Ctx = { log: string[] };

/** Terminal input next to one application message, as an app would wire it. */
export type AppEvent =
  | Readonly<{ kind: "input"; input: InputEvent }>
  | Readonly<{ kind: "say"; text: string }>;

export const appMouse: MouseAdapter<AppEvent> = (ev) =>
  ev.kind === "input" ? inputMouse(ev.input) : undefined;

export function say(text: string): AppEvent {
  return { kind: "say", text };
}

export class Pane implements WindowState<Ctx> {
  isTop = false;

  constructor(
    readonly name: string,
    public rect: Rect = EMPTY_RECT,
  ) {}

  setTop(top: boolean): void {
    this.isTop = top;
  }

  area(): Rect {
    return this.rect;
  }
}

export class Palette implements WindowState<Ctx> {
  setTop(): void {}

  area(): Rect {
    return EMPTY_RECT;
  }
}

export type TestStack = WindowStack<AppEvent, Ctx, string[]>;

/** Show `pane`; every event is logged as "name:kind" before `handler` answers. */
export function showPane(
  stack: TestStack,
  pane: Pane,
  ctx: Ctx,
  handler: WindowHandler<Pane, AppEvent, Ctx> = () => WINDOW_CONTINUE,
): number {
  return stack.show(
    (_area, frame, state) => {
      frame.push(state.name);
    },
    (ev, state, c) => {
      c.log.push(`${state.name}:${ev.kind === "input" ? ev.input.kind : ev.kind}`);
      return handler(ev, state, c);
    },
    pane,
    ctx,
  );
}

/** Pane names bottom to top. */
export function order(stack: TestStack): string[] {
  const out: string[] = [];
  for (let n = 0; n < stack.len(); n++) {
    out.push(stack.apply(n, Pane, (p) => p.name));
  }
  return out;
}
