import { describe, expect, it } from "vitest";
import { asLogTime, type ChangeEvent } from "./core.js";
import { changeTimes, lastChange, lastIndexAtOrBefore, transitionsOf, valueAtTime } from "./query.js";

function log(...entries: [number, string][]): ChangeEvent[] {
  return entries.map(([time, value]) => ({ time: asLogTime(time), value }));
}

const CLK = log([0, "x"], [10, "1"], [20, "0"], [30, "1"]);

describe("lastIndexAtOrBefore", () => {
  it("finds the last change at or before t", () => {
    expect(lastIndexAtOrBefore(CLK, 0)).toBe(0);
    expect(lastIndexAtOrBefore(CLK, 9)).toBe(0);
    expect(lastIndexAtOrBefore(CLK, 10)).toBe(1);
    expect(lastIndexAtOrBefore(CLK, 29)).toBe(2);
    expect(lastIndexAtOrBefore(CLK, 1_000)).toBe(3);
  });

  it("returns -1 before the first change and for an empty log", () => {
    expect(lastIndexAtOrBefore(log([5, "1"]), 4)).toBe(-1);
    expect(lastIndexAtOrBefore([], 100)).toBe(-1);
  });

  it("ties resolve to the last appended entry", () => {
    const tied = log([5, "0"], [5, "1"], [5, "z"], [8, "0"]);
    expect(lastIndexAtOrBefore(tied, 5)).toBe(2);
    expect(lastIndexAtOrBefore(tied, 7)).toBe(2);
  });
});

describe("valueAtTime", () => {
  it("holds each value until the next change", () => {
    for (const t of [10, 11, 19]) expect(valueAtTime(CLK, 1, t)).toBe("1");
    for (const t of [20, 25, 29]) expect(valueAtTime(CLK, 1, t)).toBe("0");
  });

  it("holds the last value forever", () => {
    expect(valueAtTime(CLK, 1, 30)).toBe("1");
    expect(valueAtTime(CLK, 1, Number.MAX_SAFE_INTEGER)).toBe("1");
  });

  it("is width-replicated unknown before the first change", () => {
    const bus = log([5, "1010"]);
    expect(valueAtTime(bus, 4, 0)).toBe("xxxx");
    expect(valueAtTime(bus, 4, -3)).toBe("xxxx");
    expect(valueAtTime([], 3, 100)).toBe("xxx");
  });

  it("agrees with a linear scan on every time in range", () => {
    const dense = log([0, "0"], [3, "1"], [3, "0"], [7, "1"], [7, "1"], [12, "z"]);
    for (let t = -1; t <= 15; t++) {
      let expected = "x";
      for (const e of dense) if (e.time <= t) expected = e.value;
      expect(valueAtTime(dense, 1, t)).toBe(expected);
    }
  });
});

describe("transitionsOf", () => {
  it("reports value-altering changes only, starting from unknown", () => {
    const l = log([0, "0"], [5, "0"], [10, "1"], [15, "1"], [20, "0"]);
    expect(transitionsOf(l, 1)).toEqual([
      { time: 0, from: "x", to: "0" },
      { time: 10, from: "0", to: "1" },
      { time: 20, from: "1", to: "0" },
    ]);
  });

  it("a recorded x as first value is not a transition", () => {
    expect(transitionsOf(CLK, 1)).toEqual([
      { time: 10, from: "x", to: "1" },
      { time: 20, from: "1", to: "0" },
      { time: 30, from: "0", to: "1" },
    ]);
  });

  it("filters by inclusive range while tracking the held value", () => {
    expect(transitionsOf(CLK, 1, { from: 20, to: 30 })).toEqual([
      { time: 20, from: "1", to: "0" },
      { time: 30, from: "0", to: "1" },
    ]);
    expect(transitionsOf(CLK, 1, { from: 11, to: 19 })).toEqual([]);
  });
});

describe("changeTimes / lastChange", () => {
  it("distinct ascending times", () => {
    expect(changeTimes(log([0, "0"], [0, "1"], [4, "0"], [9, "1"], [9, "0"]))).toEqual([0, 4, 9]);
  });

  it("last change or undefined", () => {
    expect(lastChange(CLK)).toEqual({ time: 30, value: "1" });
    expect(lastChange([])).toBeUndefined();
  });
});
