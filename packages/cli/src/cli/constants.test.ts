/**
 * Tests for CLI constants
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { existsSync, readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { VERSION } from "./constants.js";

const rootManifest = fileURLToPath(
  new URL("../../../../package.json", import.meta.url)
);

describe("CLI constants", () => {
  it("should read the version from the cli package manifest", () => {
    expect(VERSION).to.equal("0.1.0");
  });

  it("should run the cli from its TypeScript entry point", () => {
    const manifest = JSON.parse(readFileSync(rootManifest, "utf-8")) as {
      bin?: unknown;
      scripts: Record<string, string>;
    };
    expect(manifest.bin).to.be.undefined;
    expect(manifest.scripts["bindery"]).to.equal(
      "tsx packages/cli/src/index.ts"
    );
    expect(
      existsSync(fileURLToPath(new URL("../index.ts", import.meta.url)))
    ).to.equal(true);
  });
});
