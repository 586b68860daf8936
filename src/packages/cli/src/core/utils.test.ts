import { durationToMs, formatMode } from "./utils";

describe("durationToMs", () => {
  it("parses units and defaults", () => {
    expect(durationToMs(undefined, 123)).toBe(123);
    expect(durationToMs("  ", 5)).toBe(5);
    expect(durationToMs("250ms", 0)).toBe(250);
    expect(durationToMs("2s", 0)).toBe(2000);
    expect(durationToMs("3m", 0)).toBe(180000);
    expect(durationToMs("1h", 0)).toBe(3600000);
    expect(durationToMs("7", 0)).toBe(7000);
  });

  it("rejects invalid values", () => {
    expect(() => durationToMs("abc", 0)).toThrow("invalid duration 'abc'");
    expect(() => durationToMs("-1s", 0)).toThrow(/invalid duration/);
  });
});

describe("formatting", () => {
  it("formats file modes in octal", () => {
    expect(formatMode(0o640)).toBe("0640");
    expect(formatMode(0o755)).toBe("0755");
  });
});
