import { describe, expect, test } from "vitest";
import {
  formatRunTimestamp,
  isValidResourceName,
  toResourceName,
  workloadName,
} from "../../src/utils/naming";

describe("naming utilities", () => {
  describe("formatRunTimestamp", () => {
    test("uses local date and time", () => {
      expect(formatRunTimestamp(new Date(2024, 0, 1, 9, 30, 5))).toBe("20240101-093005");
    });

    test("pads every field", () => {
      expect(formatRunTimestamp(new Date(2023, 10, 7, 14, 2, 59))).toBe("20231107-140259");
    });
  });

  describe("toResourceName", () => {
    test("folds case and replaces invalid characters", () => {
      expect(toResourceName("My_App Backup")).toBe("my-app-backup");
    });

    test("collapses dashes and trims the ends", () => {
      expect(toResourceName("--a//b--")).toBe("a-b");
    });

    test("keeps dots", () => {
      expect(toResourceName("app.v2")).toBe("app.v2");
    });
  });

  describe("isValidResourceName", () => {
    test("accepts DNS subdomain names", () => {
      expect(isValidResourceName("controller-recovery-claim")).toBe(true);
      expect(isValidResourceName("a")).toBe(true);
    });

    test("rejects invalid names", () => {
      expect(isValidResourceName("Upper")).toBe(false);
      expect(isValidResourceName("-leading")).toBe(false);
      expect(isValidResourceName("trailing-")).toBe(false);
      expect(isValidResourceName("")).toBe(false);
      expect(isValidResourceName("a".repeat(254))).toBe(false);
    });
  });

  describe("workloadName", () => {
    test("prefixes the role", () => {
      expect(workloadName("source", "20240101-093005")).toBe("pvc-src-20240101-093005");
      expect(workloadName("destination", "20240101-093005")).toBe("pvc-dst-20240101-093005");
    });
  });
});
