/**
 * Tests for CLI command dispatch and exit codes
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { existsSync, readFileSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { createDiagnostic, type StoreData } from "@bindery/core";
import { linuxEnv, windowsEnv, withTempDirAsync, writeConfig } from "../test-fixtures.js";
import { exitCodeFor, runCli } from "./dispatcher.js";

const readStore = (dir: string): StoreData =>
  JSON.parse(readFileSync(join(dir, "bindery.store.json"), "utf-8")) as StoreData;

describe("runCli", () => {
  it("should return 2 for an unknown command", async () => {
    expect(await runCli(["frobnicate", "-q"])).to.equal(2);
  });

  it("should return 3 when no config is found", async () => {
    await withTempDirAsync(async (dir) => {
      expect(await runCli(["status", "-q", "-c", "missing.json"], dir)).to.equal(3);
    });
  });

  it("should return 1 for an invalid config", async () => {
    await withTempDirAsync(async (dir) => {
      writeConfig(dir, { packageVersion: "1.0.0" });
      expect(await runCli(["init", "-q"], dir)).to.equal(1);
    });
  });

  it("should initialize a store file", async () => {
    await withTempDirAsync(async (dir) => {
      writeConfig(dir, {
        packageName: "sdl",
        packageVersion: "0.4.0",
        environments: [linuxEnv],
      });

      expect(await runCli(["init", "-q"], dir)).to.equal(0);
      const data = readStore(dir);
      expect(data.packageName).to.equal("sdl");
      expect(data.packageVersion).to.equal("0.4.0");
      expect(data.environments).to.deep.equal([linuxEnv]);
    });
  });

  it("should not initialize over an existing store without --force", async () => {
    await withTempDirAsync(async (dir) => {
      writeConfig(dir, { packageName: "sdl" });
      expect(await runCli(["init", "-q"], dir)).to.equal(0);
      expect(await runCli(["init", "-q"], dir)).to.equal(1);
      expect(await runCli(["init", "-q", "--force"], dir)).to.equal(0);
    });
  });

  it("should return 4 when the store file is missing", async () => {
    await withTempDirAsync(async (dir) => {
      writeConfig(dir, { packageName: "sdl" });
      expect(await runCli(["status", "-q"], dir)).to.equal(4);
    });
  });

  it("should return 4 when the store file is corrupt", async () => {
    await withTempDirAsync(async (dir) => {
      writeConfig(dir, { packageName: "sdl" });
      writeFileSync(join(dir, "bindery.store.json"), "[");
      expect(await runCli(["status", "-q"], dir)).to.equal(4);
    });
  });

  it("should return 4 for a store file with a malformed environment", async () => {
    await withTempDirAsync(async (dir) => {
      writeConfig(dir, { packageName: "sdl" });
      expect(await runCli(["init", "-q"], dir)).to.equal(0);
      const data = readStore(dir);
      writeFileSync(
        join(dir, "bindery.store.json"),
        JSON.stringify({ ...data, environments: [1] })
      );
      expect(await runCli(["status", "-q"], dir)).to.equal(4);
    });
  });

  it("should sync environments added to the config later", async () => {
    await withTempDirAsync(async (dir) => {
      writeConfig(dir, { packageName: "sdl", environments: [linuxEnv] });
      expect(await runCli(["init", "-q"], dir)).to.equal(0);

      writeConfig(dir, {
        packageName: "sdl",
        environments: [linuxEnv, windowsEnv],
      });
      expect(await runCli(["env", "sync", "-q"], dir)).to.equal(0);
      expect(readStore(dir).environments).to.deep.equal([linuxEnv, windowsEnv]);
    });
  });

  it("should clear a collection and save", async () => {
    await withTempDirAsync(async (dir) => {
      writeConfig(dir, { packageName: "sdl", environments: [linuxEnv] });
      expect(await runCli(["init", "-q"], dir)).to.equal(0);
      expect(await runCli(["clear", "environments", "-q"], dir)).to.equal(0);
      expect(readStore(dir).environments).to.deep.equal([]);
    });
  });

  it("should return 1 for a bad clear target without saving", async () => {
    await withTempDirAsync(async (dir) => {
      writeConfig(dir, { packageName: "sdl" });
      expect(await runCli(["init", "-q"], dir)).to.equal(0);
      const before = readFileSync(join(dir, "bindery.store.json"), "utf-8");
      expect(await runCli(["clear", "all", "-q"], dir)).to.equal(1);
      expect(readFileSync(join(dir, "bindery.store.json"), "utf-8")).to.equal(before);
    });
  });

  it("should find the config from a nested directory", async () => {
    await withTempDirAsync(async (dir) => {
      writeConfig(dir, { packageName: "sdl", database: "state/store.json" });
      const nested = join(dir, "src");
      expect(await runCli(["init", "-q"], dir)).to.equal(0);
      expect(existsSync(join(dir, "state", "store.json"))).to.equal(true);
      expect(await runCli(["status", "-q"], nested)).to.equal(0);
    });
  });
});

describe("exitCodeFor", () => {
  it("should map config and store file diagnostics to exit codes", () => {
    const codeOf = (code: "BND9001" | "BND9003" | "BND9006" | "BND9007") =>
      exitCodeFor(createDiagnostic(code, "error", "failed"));
    expect(codeOf("BND9001")).to.equal(3);
    expect(codeOf("BND9003")).to.equal(1);
    expect(codeOf("BND9006")).to.equal(4);
    expect(codeOf("BND9007")).to.equal(4);
  });
});
