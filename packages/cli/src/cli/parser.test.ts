/**
 * Tests for CLI argument parser
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { parseArgs } from "./parser.js";

describe("CLI Parser", () => {
  describe("parseArgs", () => {
    describe("Commands", () => {
      it("should parse status command", () => {
        const result = parseArgs(["status"]);
        expect(result.command).to.equal("status");
      });

      it("should parse env:sync as two-word command", () => {
        const result = parseArgs(["env", "sync"]);
        expect(result.command).to.equal("env:sync");
        expect(result.target).to.be.undefined;
      });

      it("should keep a lone env as its own command", () => {
        const result = parseArgs(["env", "list"]);
        expect(result.command).to.equal("env");
        expect(result.target).to.equal("list");
      });

      it("should parse help command from --help", () => {
        expect(parseArgs(["--help"]).command).to.equal("help");
        expect(parseArgs(["status", "-h"]).command).to.equal("help");
      });

      it("should parse version command from -v", () => {
        expect(parseArgs(["-v"]).command).to.equal("version");
        expect(parseArgs(["--version"]).command).to.equal("version");
      });

      it("should return an empty command for no arguments", () => {
        expect(parseArgs([])).to.deep.equal({
          command: "",
          target: undefined,
          options: {},
        });
      });
    });

    describe("Target", () => {
      it("should parse the clear target", () => {
        const result = parseArgs(["clear", "checks"]);
        expect(result.command).to.equal("clear");
        expect(result.target).to.equal("checks");
      });

      it("should ignore extra positional arguments", () => {
        const result = parseArgs(["clear", "ffi", "surface"]);
        expect(result.target).to.equal("ffi");
      });
    });

    describe("Options", () => {
      it("should parse verbose and quiet flags", () => {
        const result = parseArgs(["status", "-V", "--quiet"]);
        expect(result.options).to.deep.equal({ verbose: true, quiet: true });
      });

      it("should parse the config path", () => {
        const result = parseArgs(["init", "-c", "conf/bindery.json"]);
        expect(result.options.config).to.equal("conf/bindery.json");
      });

      it("should not treat the config value as a target", () => {
        const result = parseArgs(["clear", "--config", "x.json", "native"]);
        expect(result.options.config).to.equal("x.json");
        expect(result.target).to.equal("native");
      });

      it("should parse --force", () => {
        const result = parseArgs(["init", "--force"]);
        expect(result.options.force).to.equal(true);
      });

      it("should default a trailing --config to an empty path", () => {
        const result = parseArgs(["status", "--config"]);
        expect(result.options.config).to.equal("");
      });
    });
  });
});
