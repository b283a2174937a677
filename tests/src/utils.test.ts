import { describe, expect, it } from "vitest";
import { formatHex32, parseInteger, readFlag, safeErrorMessage } from "../../src/utils";

describe("parseInteger", () => {
  it("falls back when unset, unparsable or below the minimum", () => {
    expect(parseInteger(undefined, 7)).toBe(7);
    expect(parseInteger("abc", 7)).toBe(7);
    expect(parseInteger("0", 7)).toBe(7);
    expect(parseInteger("0", 7, 0)).toBe(0);
    expect(parseInteger("42", 7)).toBe(42);
    expect(parseInteger(" 42 ", 7)).toBe(42);
    expect(parseInteger("12px", 7)).toBe(7);
  });
});

describe("safeErrorMessage", () => {
  it("collapses control characters onto one line", () => {
    expect(safeErrorMessage(new Error("bad\nthing\t here"))).toBe("bad thing  here");
  });

  it("stringifies non-errors", () => {
    expect(safeErrorMessage("plain")).toBe("plain");
    expect(safeErrorMessage(new Error(""))).toBe("Error");
  });
});

describe("formatHex32", () => {
  it("pads to eight digits", () => {
    expect(formatHex32(0xbeef)).toBe("0x0000beef");
    expect(formatHex32(-1)).toBe("0xffffffff");
  });
});

describe("readFlag", () => {
  const args = ["tape.bin", "--max-frames", "500", "--every"];

  it("returns the value following the flag", () => {
    expect(readFlag(args, "--max-frames")).toBe("500");
  });

  it("is undefined for a missing flag or one with no value", () => {
    expect(readFlag(args, "--seed")).toBeUndefined();
    expect(readFlag(args, "--every")).toBeUndefined();
    expect(readFlag(["--output", "--seed", "ff"], "--output")).toBeUndefined();
  });
});
