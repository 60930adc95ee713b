import { afterEach, beforeEach, describe, it } from "mocha";
import { expect } from "chai";
import { createConsoleLogger } from "./logger.js";

describe("createConsoleLogger", () => {
  const originalLog = console.log;
  const originalError = console.error;
  let stdout: string[] = [];
  let stderr: string[] = [];

  beforeEach(() => {
    stdout = [];
    stderr = [];
    console.log = (message: string) => {
      stdout.push(message);
    };
    console.error = (message: string) => {
      stderr.push(message);
    };
  });

  afterEach(() => {
    console.log = originalLog;
    console.error = originalError;
  });

  it("prints debug lines only when verbose", () => {
    createConsoleLogger().debug("hidden");
    createConsoleLogger({ verbose: true }).debug("shown");
    expect(stdout).to.deep.equal(["shown"]);
  });

  it("suppresses info when quiet but keeps warnings", () => {
    const logger = createConsoleLogger({ quiet: true });
    logger.info("hidden");
    logger.warn("careful");
    logger.error("broken");
    expect(stdout).to.deep.equal([]);
    expect(stderr).to.deep.equal(["Warning: careful", "Error: broken"]);
  });
});
