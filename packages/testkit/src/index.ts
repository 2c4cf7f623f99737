export { assert, describe, test } from "./nodeTest.js";
export { createManualClock, type ManualClock } from "./clock.js";
export { flushMacrotasks } from "./async.js";
