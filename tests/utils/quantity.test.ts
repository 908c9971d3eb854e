import { describe, expect, test } from "vitest";
import { compareQuantities, parseQuantity } from "../../src/utils/quantity";

describe("parseQuantity", () => {
  test("parses binary suffixes", () => {
    expect(parseQuantity("20Gi")).toBe(20 * 1024 ** 3);
    expect(parseQuantity("512Mi")).toBe(512 * 1024 ** 2);
  });

  test("parses decimal suffixes", () => {
    expect(parseQuantity("500M")).toBe(500_000_000);
    expect(parseQuantity("100m")).toBeCloseTo(0.1);
  });

  test("parses plain numbers and exponents", () => {
    expect(parseQuantity("1024")).toBe(1024);
    expect(parseQuantity("1e3")).toBe(1000);
  });

  test("rejects invalid quantities", () => {
    expect(parseQuantity("twenty")).toBeNull();
    expect(parseQuantity("20GB")).toBeNull();
    expect(parseQuantity("")).toBeNull();
  });
});

describe("compareQuantities", () => {
  test("compares across units", () => {
    expect(compareQuantities("1Gi", "1024Mi")).toBe(0);
    expect(compareQuantities("10Gi", "20Gi")).toBe(-1);
    expect(compareQuantities("1G", "1Mi")).toBe(1);
  });

  test("returns null when a side does not parse", () => {
    expect(compareQuantities("lots", "1Gi")).toBeNull();
  });
});
