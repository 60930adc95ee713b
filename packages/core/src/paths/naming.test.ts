import { describe, it } from "mocha";
import { expect } from "chai";
import { toSnakeCase } from "./naming.js";

describe("toSnakeCase", () => {
  it("splits on case boundaries", () => {
    expect(toSnakeCase("QString")).to.equal("q_string");
    expect(toSnakeCase("XMLHttpRequest")).to.equal("xml_http_request");
    expect(toSnakeCase("fooBar")).to.equal("foo_bar");
  });

  it("keeps digits with the preceding word", () => {
    expect(toSnakeCase("i32")).to.equal("i32");
    expect(toSnakeCase("Vector3D")).to.equal("vector3_d");
  });

  it("normalizes existing separators", () => {
    expect(toSnakeCase("already_snake")).to.equal("already_snake");
    expect(toSnakeCase("kebab-case")).to.equal("kebab_case");
  });
});
