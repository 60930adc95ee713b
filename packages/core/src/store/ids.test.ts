import { describe, it } from "mocha";
import { expect } from "chai";
import { findIndexById } from "./ids.js";

describe("findIndexById", () => {
  const items = [{ id: 2 }, { id: 5 }, { id: 9 }, { id: 14 }];

  it("finds every present identifier", () => {
    expect(items.map((item) => findIndexById(items, item.id))).to.deep.equal([
      0, 1, 2, 3,
    ]);
  });

  it("returns undefined for gaps and empty lists", () => {
    expect(findIndexById(items, 6)).to.equal(undefined);
    expect(findIndexById(items, 1)).to.equal(undefined);
    expect(findIndexById(items, 20)).to.equal(undefined);
    expect(findIndexById([], 1)).to.equal(undefined);
  });
});
