import { describe, it, expect } from "vitest";
import { VirtualClock } from "../src/engine";

describe("VirtualClock", () => {
  it("fires callbacks in time order as time advances", () => {
    const clock = new VirtualClock(100);
    const fired: string[] = [];

    clock.schedule(50, () => fired.push(`b@${clock.now()}`));
    clock.schedule(10, () => fired.push(`a@${clock.now()}`));
    clock.schedule(500, () => fired.push(`c@${clock.now()}`));

    clock.advance(60);
    expect(fired).toEqual(["a@110", "b@150"]);
    expect(clock.now()).toBe(160);
    expect(clock.pendingCount).toBe(1);
  });

  it("fires ties in scheduling order", () => {
    const clock = new VirtualClock();
    const fired: number[] = [];
    clock.schedule(5, () => fired.push(1));
    clock.schedule(5, () => fired.push(2));
    clock.advance(5);
    expect(fired).toEqual([1, 2]);
  });

  it("fires callbacks scheduled during advance when they fall in the window", () => {
    const clock = new VirtualClock();
    const fired: number[] = [];
    clock.schedule(10, () => {
      fired.push(clock.now());
      clock.schedule(10, () => fired.push(clock.now()));
      clock.schedule(100, () => fired.push(clock.now()));
    });

    clock.advance(30);
    expect(fired).toEqual([10, 20]);
    expect(clock.pendingCount).toBe(1);
  });

  it("cancels a pending callback", () => {
    const clock = new VirtualClock();
    let fired = false;
    const cancel = clock.schedule(10, () => {
      fired = true;
    });
    cancel();
    clock.advance(100);
    expect(fired).toBe(false);
  });

  it("runAll jumps to each callback in turn", () => {
    const clock = new VirtualClock();
    const seen: number[] = [];
    const tick = (n: number) => {
      seen.push(clock.now());
      if (n > 0) clock.schedule(1000, () => tick(n - 1));
    };
    clock.schedule(0, () => tick(2));

    clock.runAll();
    expect(seen).toEqual([0, 1000, 2000]);
    expect(clock.now()).toBe(2000);
  });

  it("runAll gives up on a callback loop", () => {
    const clock = new VirtualClock();
    const loop = () => {
      clock.schedule(1, loop);
    };
    clock.schedule(1, loop);
    expect(() => clock.runAll(50)).toThrow("VirtualClock.runAll: still busy after 50 callbacks");
  });
});
