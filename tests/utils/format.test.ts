import { describe, expect, test } from "vitest";
import { formatBytes, formatDuration } from "../../src/utils/format";

describe("formatBytes", () => {
  test("formats zero bytes", () => {
    expect(formatBytes(0)).toBe("0 B");
  });

  test("formats each unit", () => {
    expect(formatBytes(512)).toBe("512.00 B");
    expect(formatBytes(1536)).toBe("1.50 KB");
    expect(formatBytes(1.5 * 1024 ** 3)).toBe("1.50 GB");
  });
});

describe("formatDuration", () => {
  test("formats milliseconds", () => {
    expect(formatDuration(500)).toBe("500ms");
  });

  test("formats seconds", () => {
    expect(formatDuration(1500)).toBe("1.5s");
  });

  test("formats minutes", () => {
    expect(formatDuration(90_000)).toBe("1m 30s");
  });

  test("formats hours", () => {
    expect(formatDuration(3_900_000)).toBe("1h 5m");
  });
});
