import { createManualClock } from "../clock.js";
import { assert, describe, test } from "../nodeTest.js";

describe("createManualClock", () => {
  test("starts at the given time and advances by steps", () => {
    const clock = createManualClock(100);
    assert.equal(clock.now(), 100);
    assert.equal(clock.advance(25), 125);
    assert.equal(clock.now(), 125);
  });

  test("set jumps forward but never back", () => {
    const clock = createManualClock();
    clock.set(40);
    assert.equal(clock.now(), 40);
    assert.throws(() => clock.set(39), RangeError);
    assert.throws(() => clock.advance(-1), RangeError);
    assert.equal(clock.now(), 40);
  });
});
