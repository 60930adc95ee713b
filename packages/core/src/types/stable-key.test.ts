import { describe, it } from "mocha";
import { expect } from "chai";
import { stableKey } from "./stable-key.js";

describe("stableKey", () => {
  it("ignores object key order", () => {
    expect(stableKey({ a: 1, b: [true, "x"] })).to.equal(
      stableKey({ b: [true, "x"], a: 1 })
    );
  });

  it("treats undefined fields as absent", () => {
    expect(stableKey({ a: 1, b: undefined })).to.equal(stableKey({ a: 1 }));
  });

  it("keeps array order significant", () => {
    expect(stableKey([1, 2])).to.not.equal(stableKey([2, 1]));
  });

  it("renders nested data canonically", () => {
    expect(stableKey({ z: null, a: { c: 2, b: 1 } })).to.equal(
      '{"a":{"b":1,"c":2},"z":null}'
    );
  });
});
