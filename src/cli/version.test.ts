import * as fs from "fs";
import * as os from "os";
import * as path from "path";

import { describe, it, expect, beforeEach, afterEach } from "vitest";

import { findPackageRoot, getCurrentPackageVersion } from "./version.js";

describe("version", () => {
  describe("getCurrentPackageVersion", () => {
    let testRoot: string;
    let testPackageJsonPath: string;

    beforeEach(() => {
      testRoot = fs.mkdtempSync(path.join(os.tmpdir(), "version-test-"));
      testPackageJsonPath = path.join(testRoot, "package.json");
    });

    afterEach(() => {
      fs.rmSync(testRoot, { recursive: true, force: true });
    });

    it("should return version from package.json with name pairtrail", () => {
      fs.writeFileSync(
        testPackageJsonPath,
        JSON.stringify({ name: "pairtrail", version: "2.4.1" }),
      );

      expect(getCurrentPackageVersion({ startDir: testRoot })).toBe("2.4.1");
    });

    it("should find the package root from a nested directory", () => {
      fs.writeFileSync(
        testPackageJsonPath,
        JSON.stringify({ name: "pairtrail", version: "2.4.1" }),
      );
      const nested = path.join(testRoot, "dist", "src", "cli");
      fs.mkdirSync(nested, { recursive: true });

      expect(findPackageRoot({ startDir: nested })).toBe(testRoot);
      expect(getCurrentPackageVersion({ startDir: nested })).toBe("2.4.1");
    });

    it("should return null if package.json has wrong name", () => {
      fs.writeFileSync(
        testPackageJsonPath,
        JSON.stringify({ name: "wrong-package", version: "1.0.0" }),
      );

      expect(getCurrentPackageVersion({ startDir: testRoot })).toBeNull();
    });

    it("should return null if package.json does not exist", () => {
      expect(getCurrentPackageVersion({ startDir: testRoot })).toBeNull();
    });

    it("should return null if package.json is invalid JSON", () => {
      fs.writeFileSync(testPackageJsonPath, "{ not json");

      expect(getCurrentPackageVersion({ startDir: testRoot })).toBeNull();
    });

    it("should return null if package.json has no version", () => {
      fs.writeFileSync(
        testPackageJsonPath,
        JSON.stringify({ name: "pairtrail" }),
      );

      expect(getCurrentPackageVersion({ startDir: testRoot })).toBeNull();
    });
  });
});
