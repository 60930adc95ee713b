/**
 * Tests for the compatibility ledger
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { CompatibilityLedger } from "./ledger.js";
import { linuxEnv, windowsEnv } from "../test-fixtures.js";

describe("CompatibilityLedger", () => {
  it("should add a new entry per environment", () => {
    const ledger = new CompatibilityLedger();
    expect(ledger.record(linuxEnv, undefined)).to.deep.equal({ kind: "added" });
    expect(ledger.record(windowsEnv, "link error")).to.deep.equal({
      kind: "added",
    });
    expect(ledger.entries()).to.deep.equal([
      { environment: linuxEnv },
      { environment: windowsEnv, error: "link error" },
    ]);
  });

  it("should return unchanged for the same result", () => {
    const ledger = new CompatibilityLedger();
    ledger.record(windowsEnv, "link error");
    expect(ledger.record(windowsEnv, "link error")).to.deep.equal({
      kind: "unchanged",
    });
    expect(ledger.entries()).to.have.length(1);
  });

  it("should report the previous error on change", () => {
    const ledger = new CompatibilityLedger();
    ledger.record(windowsEnv, "link error");
    expect(ledger.record(windowsEnv, "compile error")).to.deep.equal({
      kind: "changed",
      previousError: "link error",
    });
    expect(ledger.record(windowsEnv, undefined)).to.deep.equal({
      kind: "changed",
      previousError: "compile error",
    });
    expect(ledger.record(windowsEnv, "crash")).to.deep.equal({
      kind: "changed",
    });
    expect(ledger.resultFor(windowsEnv)).to.deep.equal({
      environment: windowsEnv,
      error: "crash",
    });
  });

  it("should pass iff at least one entry has no error", () => {
    const ledger = new CompatibilityLedger();
    expect(ledger.anyPassed()).to.equal(false);
    ledger.record(windowsEnv, "link error");
    expect(ledger.anyPassed()).to.equal(false);
    ledger.record(linuxEnv, undefined);
    expect(ledger.anyPassed()).to.equal(true);
    expect(ledger.passedEnvironments()).to.deep.equal([linuxEnv]);
  });

  it("should clear every entry", () => {
    const ledger = new CompatibilityLedger();
    ledger.record(linuxEnv, undefined);
    ledger.clear();
    expect(ledger.isEmpty()).to.equal(true);
    expect(ledger.anyPassed()).to.equal(false);
  });

  it("should round-trip through entries", () => {
    const ledger = new CompatibilityLedger();
    ledger.record(linuxEnv, undefined);
    ledger.record(windowsEnv, "link error");
    const restored = CompatibilityLedger.fromEntries(ledger.toEntries());
    expect(restored.entries()).to.deep.equal(ledger.entries());
  });
});
