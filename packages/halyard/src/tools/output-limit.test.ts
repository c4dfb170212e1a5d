import { describe, expect, it } from "vitest";
import { fitText, truncateText, truncationMarker } from "./output-limit.js";

describe("truncateText", () => {
  it("returns text within the limit unchanged", () => {
    expect(truncateText("hello", 5)).toBe("hello");
  });

  it("cuts longer text and states how much was removed", () => {
    expect(truncateText("abcdefghij", 4)).toBe("abcd\n[... truncated 6 characters ...]");
  });

  it("formats the marker", () => {
    expect(truncationMarker(1200)).toBe("[... truncated 1200 characters ...]");
  });
});

describe("fitText", () => {
  it("keeps the marker within the limit", () => {
    const text = "y".repeat(100);

    const fitted = fitText(text, 60);

    expect(fitted).toBe(`${"y".repeat(25)}\n[... truncated 75 characters ...]`);
    expect(fitted.length).toBeLessThanOrEqual(60);
  });

  it("returns an empty string when the marker does not fit", () => {
    expect(fitText("y".repeat(100), 20)).toBe("");
  });

  it("returns text within the limit unchanged", () => {
    expect(fitText("short", 5)).toBe("short");
  });
});
