import { describe, expect, it } from "vitest";
import { encodeValue, formatValue, isKnownValue, unknownValue, valueToBigInt } from "./values.js";

describe("unknownValue", () => {
  it("replicates x to the width", () => {
    expect(unknownValue(1)).toBe("x");
    expect(unknownValue(5)).toBe("xxxxx");
  });

  it("rejects a zero width", () => {
    expect(() => unknownValue(0)).toThrow(/invalid signal width 0/);
  });
});

describe("encodeValue", () => {
  it("zero-extends short values whatever the leading digit", () => {
    expect(encodeValue("1", 4)).toEqual({ value: "0001", overflow: false });
    expect(encodeValue("x", 3)).toEqual({ value: "00x", overflow: false });
    expect(encodeValue("z0", 4)).toEqual({ value: "00z0", overflow: false });
  });

  it("keeps exact-width and over-wide values as written", () => {
    expect(encodeValue("1010", 4)).toEqual({ value: "1010", overflow: false });
    expect(encodeValue("11111", 4)).toEqual({ value: "11111", overflow: true });
  });
});

describe("numeric helpers", () => {
  it("known values convert to bigint", () => {
    expect(isKnownValue("0101")).toBe(true);
    expect(isKnownValue("01x1")).toBe(false);
    expect(valueToBigInt("11111111")).toBe(255n);
    expect(valueToBigInt("1z")).toBeNull();
  });

  it("formatValue by radix", () => {
    expect(formatValue("10100101", "hex")).toBe("0xA5");
    expect(formatValue("000000001", "hex")).toBe("0x001");
    expect(formatValue("10100101", "dec")).toBe("165");
    expect(formatValue("0011", "bin")).toBe("0011");
    expect(formatValue("1x01", "hex")).toBe("1x01");
  });

  it("handles buses wider than 53 bits", () => {
    const wide = "1".repeat(64);
    expect(formatValue(wide, "dec")).toBe("18446744073709551615");
  });
});
