import { describe, expect, it } from "vitest";
import { unwrapParse, parseVcd } from "./document.js";
import {
  activityOf,
  countEdges,
  quoteCell,
  signalSeries,
  signalSummary,
  summaryToDelimited,
  tableToDelimited,
  transitionCounts,
} from "./reports.js";

const DOC = unwrapParse(
  parseVcd(
    [
      "$timescale 1ns $end",
      "$scope module tb $end",
      "$var wire 1 ! sclk $end",
      "$var wire 1 \" ss_n $end",
      "$var reg 4 # data $end",
      "$var wire 1 $ idle $end",
      "$upscope $end",
      "$enddefinitions $end",
      "$dumpvars",
      "0!",
      "1\"",
      "$end",
      "#10",
      "1!",
      "0\"",
      "b101 #",
      "#20",
      "0!",
      "#30",
      "1!",
      "1!",
    ].join("\n")
  )
);

describe("tableToDelimited", () => {
  it("header then one line per row", () => {
    const text = tableToDelimited(DOC.project(["!", "#"]), { timeHeader: "Time (1ns)" });
    expect(text).toBe(
      ["Time (1ns),tb.sclk,tb.data", "0,0,xxxx", "10,1,0101", "20,0,0101", "30,1,0101", ""].join("\n")
    );
  });

  it("custom delimiter and column labels", () => {
    const text = tableToDelimited(DOC.project(["\""], { kind: "explicit", times: [5] }), {
      delimiter: ";",
      columnLabel: (s) => s.name.toUpperCase(),
    });
    expect(text).toBe("Time;SS_N\n5;1\n");
  });

  it("quotes cells that need it", () => {
    expect(quoteCell("plain", ",")).toBe("plain");
    expect(quoteCell("a,b", ",")).toBe('"a,b"');
    expect(quoteCell('say "hi"', ",")).toBe('"say ""hi"""');
    expect(quoteCell("two\nlines", ";")).toBe('"two\nlines"');
    expect(quoteCell("a,b", ";")).toBe("a,b");
  });
});

describe("signalSeries", () => {
  it("raw change list, duplicate times kept", () => {
    const series = signalSeries(DOC, "!");
    expect(series.columns.map((c) => c.path)).toEqual(["tb.sclk"]);
    expect(series.rows).toEqual([
      { time: 0, values: ["0"] },
      { time: 10, values: ["1"] },
      { time: 20, values: ["0"] },
      { time: 30, values: ["1"] },
      { time: 30, values: ["1"] },
    ]);
  });
});

describe("signalSummary", () => {
  it("counts changes and reports final values", () => {
    expect(signalSummary(DOC)).toEqual([
      { id: "!", path: "tb.sclk", width: 1, changeCount: 5, finalValue: "1", activity: "High" },
      { id: "\"", path: "tb.ss_n", width: 1, changeCount: 2, finalValue: "0", activity: "Medium" },
      { id: "#", path: "tb.data", width: 4, changeCount: 1, finalValue: "0101", activity: "Low" },
      { id: "$", path: "tb.idle", width: 1, changeCount: 0, finalValue: "x", activity: "Static" },
    ]);
  });

  it("as delimited text", () => {
    const text = summaryToDelimited(signalSummary(DOC).slice(2));
    expect(text).toBe(
      "Signal Name,Width (bits),Total Changes,Final Value,Activity\ntb.data,4,1,0101,Low\ntb.idle,1,0,x,Static\n"
    );
  });

  it("activity thresholds", () => {
    expect([0, 1, 2, 3, 40].map(activityOf)).toEqual(["Static", "Low", "Medium", "High", "High"]);
  });
});

describe("transitionCounts / countEdges", () => {
  it("counts value-altering transitions per path", () => {
    expect(Object.fromEntries(transitionCounts(DOC))).toEqual({
      "tb.sclk": 4,
      "tb.ss_n": 2,
      "tb.data": 1,
      "tb.idle": 0,
    });
    expect([...transitionCounts(DOC, ["#"]).keys()]).toEqual(["tb.data"]);
  });

  it("rising and falling edges", () => {
    expect(countEdges(DOC, "!")).toEqual({ rising: 2, falling: 1 });
    expect(countEdges(DOC, "\"")).toEqual({ rising: 0, falling: 1 });
  });
});
