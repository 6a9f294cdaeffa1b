import { describe, expect, it } from "vitest";
import { asLogTime } from "./core.js";
import { compareLogTimes, mergeSortedUnique, sortedUnique } from "./utils.js";

const t = (...ns: number[]) => ns.map(asLogTime);

describe("compareLogTimes()", () => {
  it("ordering works", () => {
    expect(compareLogTimes(asLogTime(100), asLogTime(200))).toBeLessThan(0);
    expect(compareLogTimes(asLogTime(200), asLogTime(100))).toBeGreaterThan(0);
    expect(compareLogTimes(asLogTime(100), asLogTime(100))).toBe(0);
  });
});

describe("sortedUnique()", () => {
  it("sorts numerically and drops duplicates", () => {
    expect(sortedUnique(t(100, 9, 20, 9, 100))).toEqual([9, 20, 100]);
  });

  it("does not mutate the input", () => {
    const input = t(3, 1, 2);
    sortedUnique(input);
    expect(input).toEqual([3, 1, 2]);
  });
});

describe("mergeSortedUnique()", () => {
  it("unions several lists", () => {
    expect(mergeSortedUnique([t(0, 10, 20), t(5, 10), []])).toEqual([0, 5, 10, 20]);
    expect(mergeSortedUnique([])).toEqual([]);
  });
});
