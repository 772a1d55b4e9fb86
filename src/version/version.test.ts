import { describe, test, expect } from "vitest";
import {
  isReleaseVersion,
  parseVersion,
  createVersion,
  formatVersion,
  bumpVersion,
  compareVersions,
  versionsEqual,
  lineOf,
  isLineChange,
  getHighestVersion,
} from "./version";
import { isReleaseError } from "#/core";

describe("version", () => {
  describe("isReleaseVersion", () => {
    test("accepts plain release versions", () => {
      expect(isReleaseVersion("1.0.0")).toBe(true);
      expect(isReleaseVersion("0.0.1")).toBe(true);
      expect(isReleaseVersion("10.20.30")).toBe(true);
    });

    test("rejects prerelease and build metadata", () => {
      expect(isReleaseVersion("1.0.0-alpha")).toBe(false);
      expect(isReleaseVersion("1.0.0-rc.1")).toBe(false);
      expect(isReleaseVersion("1.0.0+build.123")).toBe(false);
    });

    test("rejects v prefix", () => {
      expect(isReleaseVersion("v1.0.0")).toBe(false);
      expect(isReleaseVersion("V1.0.0")).toBe(false);
    });

    test("rejects invalid strings", () => {
      expect(isReleaseVersion("1.0")).toBe(false);
      expect(isReleaseVersion("banana")).toBe(false);
      expect(isReleaseVersion("")).toBe(false);
      expect(isReleaseVersion("1.0.0.0")).toBe(false);
    });
  });

  describe("parseVersion", () => {
    test("parses components", () => {
      expect(parseVersion("1.4.2")).toEqual({ major: 1, minor: 4, patch: 2 });
    });

    test("trims surrounding whitespace", () => {
      expect(parseVersion(" 2.0.1\n")).toEqual({ major: 2, minor: 0, patch: 1 });
    });

    test("returns frozen objects", () => {
      expect(Object.isFrozen(parseVersion("1.0.0"))).toBe(true);
    });

    test("throws InvalidVersion for malformed input", () => {
      let caught: unknown;
      try {
        parseVersion("1.4");
      } catch (err) {
        caught = err;
      }
      expect(isReleaseError(caught, "InvalidVersion")).toBe(true);
    });
  });

  describe("createVersion", () => {
    test("rejects negative components", () => {
      expect(() => createVersion(1, -1, 0)).toThrow("Invalid version component -1");
    });
  });

  describe("bumpVersion", () => {
    const current = parseVersion("1.3.2");

    test("major resets minor and patch", () => {
      expect(formatVersion(bumpVersion(current, "major"))).toBe("2.0.0");
    });

    test("minor resets patch", () => {
      expect(formatVersion(bumpVersion(current, "minor"))).toBe("1.4.0");
    });

    test("patch increments patch only", () => {
      expect(formatVersion(bumpVersion(current, "patch"))).toBe("1.3.3");
    });

    test("does not modify its input", () => {
      bumpVersion(current, "major");
      expect(formatVersion(current)).toBe("1.3.2");
    });
  });

  describe("compareVersions", () => {
    test("orders by major, then minor, then patch", () => {
      expect(compareVersions(parseVersion("1.0.0"), parseVersion("2.0.0"))).toBe(-1);
      expect(compareVersions(parseVersion("1.10.0"), parseVersion("1.9.9"))).toBe(1);
      expect(compareVersions(parseVersion("1.0.1"), parseVersion("1.0.1"))).toBe(0);
    });
  });

  describe("versionsEqual", () => {
    test("compares component-wise", () => {
      expect(versionsEqual(parseVersion("1.2.3"), createVersion(1, 2, 3))).toBe(true);
      expect(versionsEqual(parseVersion("1.2.3"), createVersion(1, 2, 4))).toBe(false);
    });
  });

  describe("lineOf / isLineChange", () => {
    test("line is major.minor", () => {
      expect(lineOf(parseVersion("1.4.7"))).toBe("1.4");
    });

    test("minor bump changes the line", () => {
      expect(isLineChange(parseVersion("1.3.2"), parseVersion("1.4.0"))).toBe(true);
    });

    test("major bump changes the line", () => {
      expect(isLineChange(parseVersion("1.4.2"), parseVersion("2.0.0"))).toBe(true);
    });

    test("patch bump stays on the line", () => {
      expect(isLineChange(parseVersion("1.4.0"), parseVersion("1.4.1"))).toBe(false);
    });
  });

  describe("getHighestVersion", () => {
    test("returns highest version", () => {
      const versions = ["1.0.0", "1.10.0", "1.2.0"].map(parseVersion);
      expect(getHighestVersion(versions)).toEqual({ major: 1, minor: 10, patch: 0 });
    });

    test("returns null for empty list", () => {
      expect(getHighestVersion([])).toBeNull();
    });
  });
});
