/**
 * @tessera/core
 *
 * Runtime kernel for terminal UI applications: the control lattice, the poll-source
 * run loop, timers, background jobs and the window stacks.
 *
 * Test helpers live in "@tessera/core/testing".
 */

// =============================================================================
// Errors and diagnostics
// =============================================================================

export {
  TesseraError,
  type TesseraErrorCode,
  describeThrown,
  isTesseraError,
} from "./errors.js";

export {
  PERF_ENABLED,
  PERF_PHASES,
  type InstrumentationPhase,
  type PerfRecorder,
  type PerfSnapshot,
  type PhaseStats,
  createPerfRecorder,
  perfReset,
  perfSnapshot,
} from "./perf/perf.js";

// =============================================================================
// Geometry and input events
// =============================================================================

export { EMPTY_RECT, type Position, type Rect, type Size, containsPoint } from "./geometry.js";

export {
  MOD_ALT,
  MOD_CTRL,
  MOD_SHIFT,
  type InputEvent,
  type MouseAction,
  type MouseButton,
  type MouseInputEvent,
  isMouseEvent,
} from "./events.js";

// =============================================================================
// Control lattice
// =============================================================================

export {
  CHANGED,
  CONTINUE,
  QUIT,
  UNCHANGED,
  type Control,
  type ControlKind,
  type ControlResult,
  type Outcome,
  compareControl,
  controlEquals,
  controlErr,
  controlEvent,
  controlFromOutcome,
  controlOk,
  controlRank,
  flow,
  isConsumed,
  mergeControl,
  outcomeFromControl,
} from "./control/control.js";

export { type ControlQueue, createControlQueue } from "./control/queue.js";

// =============================================================================
// Poll sources
// =============================================================================

export type { PollSource, Waker } from "./poll/types.js";

export {
  type CancelToken,
  type Liveness,
  type LivenessSetter,
  createCancelToken,
  createLiveness,
} from "./poll/liveness.js";

export {
  type TimeOut,
  type TimerDef,
  type TimerHandle,
  type TimerRegistry,
  type TimerRegistryOptions,
  createTimerRegistry,
} from "./poll/timers.js";

export {
  type JobHandle,
  type JobSpec,
  type WorkerPool,
  type WorkerPoolOptions,
  createWorkerPool,
} from "./poll/workerPool.js";

export type { JobContext, JobFunction } from "./poll/jobWire.js";

export {
  type AbortHandle,
  type AsyncTask,
  type AsyncTaskExt,
  type AsyncTaskRuntime,
  type TaskHandle,
  type TaskSender,
  createAsyncTaskRuntime,
} from "./poll/asyncTasks.js";

export { type EventQueueSource, createEventQueueSource } from "./poll/eventQueue.js";

// =============================================================================
// Run loop
// =============================================================================

export {
  DEFAULT_RUN_CONFIG,
  type ResolvedRunConfig,
  type RunConfig,
  resolveRunConfig,
} from "./app/config.js";

export type { DrawFn, Terminal } from "./app/terminal.js";

export type { AppContext, RunServices } from "./app/context.js";

export {
  type RunHandlers,
  type RunLoop,
  type RunLoopOptions,
  type RunLoopState,
  type TickReport,
  createRunLoop,
} from "./app/runLoop.js";

// =============================================================================
// Window and dialog stacks
// =============================================================================

export {
  WINDOW_CHANGED,
  WINDOW_CONTINUE,
  WINDOW_UNCHANGED,
  type WindowControl,
  type WindowControlKind,
  controlFromWindowControl,
  mergeWindowControl,
  windowClose,
  windowControlFromControl,
  windowControlFromOutcome,
  windowControlRank,
  windowEvent,
} from "./window/windowControl.js";

export type {
  StateKind,
  WindowBorrow,
  WindowHandler,
  WindowRender,
  WindowState,
} from "./window/types.js";

export { type MouseAdapter, inputMouse, isPrimaryPressIn, mouseTrap } from "./window/mouse.js";

export {
  type WindowStack,
  type WindowStackOptions,
  createWindowStack,
} from "./window/windowStack.js";

export {
  type DialogStack,
  type DialogStackOptions,
  createDialogStack,
} from "./window/dialogStack.js";
