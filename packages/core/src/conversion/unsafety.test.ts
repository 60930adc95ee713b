import { describe, it } from "mocha";
import { expect } from "chai";
import { isUnsafe } from "./unsafety.js";
import {
  borrowType,
  functionSignatureType,
  namedType,
  pointerType,
  unitType,
} from "./type-ops.js";
import { path } from "../test-fixtures.js";

const int = namedType(path("i32"));
const rawPointer = pointerType(int, true);

describe("isUnsafe", () => {
  it("is false for types without raw pointers", () => {
    expect(isUnsafe(unitType)).to.equal(false);
    expect(isUnsafe(int)).to.equal(false);
    expect(isUnsafe(borrowType(namedType(path("pkg::Point")), true))).to.equal(
      false
    );
    expect(
      isUnsafe(namedType(path("pkg::List"), [borrowType(int, false)]))
    ).to.equal(false);
  });

  it("is true for a raw pointer", () => {
    expect(isUnsafe(rawPointer)).to.equal(true);
  });

  it("propagates through borrows", () => {
    expect(isUnsafe(borrowType(rawPointer, false))).to.equal(true);
  });

  it("propagates through type arguments at any depth", () => {
    const nested = namedType(path("pkg::Outer"), [
      namedType(path("pkg::Inner"), [rawPointer]),
    ]);
    expect(isUnsafe(nested)).to.equal(true);
  });

  it("propagates through function signatures", () => {
    expect(isUnsafe(functionSignatureType(rawPointer, []))).to.equal(true);
    expect(isUnsafe(functionSignatureType(unitType, [int, rawPointer]))).to.equal(
      true
    );
    expect(isUnsafe(functionSignatureType(unitType, [int]))).to.equal(false);
  });
});
