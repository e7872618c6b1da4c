import { describe, it, expect } from "vitest";
import { asText, valueText } from "./args";

describe("valueText", () => {
  it("writes date columns from their calendar fields", () => {
    expect(valueText(new Date(2001, 4, 10))).toBe("2001-05-10");
    expect(valueText(new Date(987, 0, 2))).toBe("0987-01-02");
  });

  it("writes timestamps in UTC ISO form", () => {
    expect(valueText(new Date(Date.UTC(2001, 4, 10, 12, 34, 56)))).toBe("2001-05-10T12:34:56.000Z");
  });

  it("uses String() for everything else", () => {
    expect(valueText(42)).toBe("42");
    expect(valueText(true)).toBe("true");
    expect(valueText("abc")).toBe("abc");
  });
});

describe("asText", () => {
  it("keeps null and undefined", () => {
    expect(asText(null)).toBeNull();
    expect(asText(undefined)).toBeNull();
  });

  it("shares the date form with valueText", () => {
    expect(asText(new Date(2001, 4, 10))).toBe("2001-05-10");
  });
});
