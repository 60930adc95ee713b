/**
 * Tests for configuration loading and resolution
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { mkdirSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { findConfig, loadConfig, resolveConfig } from "./config.js";
import type { BinderyConfig } from "./types.js";
import { withTempDir } from "./test-fixtures.js";

const linuxTarget = {
  arch: "x86_64",
  os: "linux",
  family: "unix",
  env: "gnu",
  pointerWidth: 64,
  endian: "little",
};

describe("Config", () => {
  describe("loadConfig", () => {
    it("should load a valid config", () => {
      withTempDir((dir) => {
        const configPath = join(dir, "bindery.json");
        writeFileSync(
          configPath,
          JSON.stringify({
            packageName: "sdl",
            packageVersion: "0.3.0",
            environments: [{ target: linuxTarget, libraryVersion: "2.30" }],
          })
        );

        const result = loadConfig(configPath);
        expect(result.ok).to.equal(true);
        if (!result.ok) return;
        expect(result.value.packageName).to.equal("sdl");
        expect(result.value.environments?.[0]?.libraryVersion).to.equal("2.30");
      });
    });

    it("should fail when the file is missing", () => {
      withTempDir((dir) => {
        const configPath = join(dir, "bindery.json");
        const result = loadConfig(configPath);
        expect(result).to.deep.equal({
          ok: false,
          error: {
            code: "BND9001",
            severity: "error",
            message: `Config file not found: ${configPath}`,
            hint: "Create a bindery.json with at least a 'packageName'",
          },
        });
      });
    });

    it("should require packageName", () => {
      withTempDir((dir) => {
        const configPath = join(dir, "bindery.json");
        writeFileSync(configPath, JSON.stringify({ packageVersion: "1.0.0" }));
        const result = loadConfig(configPath);
        expect(result).to.deep.equal({
          ok: false,
          error: {
            code: "BND9003",
            severity: "error",
            message: "bindery.json: 'packageName' is required",
            hint: undefined,
          },
        });
      });
    });

    it("should reject an incomplete environment target", () => {
      withTempDir((dir) => {
        const configPath = join(dir, "bindery.json");
        writeFileSync(
          configPath,
          JSON.stringify({
            packageName: "sdl",
            environments: [{ target: { ...linuxTarget, pointerWidth: 16 } }],
          })
        );
        const result = loadConfig(configPath);
        expect(result).to.deep.equal({
          ok: false,
          error: {
            code: "BND9003",
            severity: "error",
            message:
              "bindery.json: environments[0] needs a target with arch, os, family, env, pointerWidth and endian, and a string libraryVersion if any",
            hint: undefined,
          },
        });
      });
    });

    it("should report malformed JSON", () => {
      withTempDir((dir) => {
        const configPath = join(dir, "bindery.json");
        writeFileSync(configPath, "{ not json");
        const result = loadConfig(configPath);
        expect(result.ok).to.equal(false);
        if (result.ok) return;
        expect(result.error.code).to.equal("BND9002");
        expect(
          result.error.message.startsWith("Failed to parse bindery.json: ")
        ).to.equal(
          true
        );
      });
    });
  });

  describe("findConfig", () => {
    it("should walk up to the nearest bindery.json", () => {
      withTempDir((dir) => {
        const nested = join(dir, "a", "b");
        mkdirSync(nested, { recursive: true });
        writeFileSync(join(dir, "bindery.json"), "{}");
        expect(findConfig(nested)).to.equal(join(dir, "bindery.json"));
      });
    });
  });

  describe("resolveConfig", () => {
    it("should fill defaults", () => {
      const config: BinderyConfig = { packageName: "sdl" };
      const result = resolveConfig(config, {}, "/work/project");
      expect(result).to.deep.equal({
        packageName: "sdl",
        packageVersion: undefined,
        projectRoot: "/work/project",
        databasePath: "/work/project/bindery.store.json",
        environments: [],
        force: false,
        verbose: false,
        quiet: false,
      });
    });

    it("should resolve the database relative to the project root", () => {
      const config: BinderyConfig = {
        packageName: "sdl",
        database: "state/items.json",
      };
      const result = resolveConfig(
        config,
        { verbose: true, force: true },
        "/work/project"
      );
      expect(result.databasePath).to.equal("/work/project/state/items.json");
      expect(result.verbose).to.equal(true);
      expect(result.force).to.equal(true);
    });
  });
});
