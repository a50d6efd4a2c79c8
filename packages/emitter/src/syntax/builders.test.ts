/**
 * Tests for statement builders
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { block, comment, insertAfter } from "./builders.js";

describe("insertAfter", () => {
  it("should insert at the start without an anchor", () => {
    const tail = comment("tail");
    const result = insertAfter(block([tail]), undefined, comment("head"));
    expect(result.statements).to.deep.equal([comment("head"), tail]);
  });

  it("should insert directly after the anchor", () => {
    const first = comment("first");
    const last = comment("last");
    const result = insertAfter(block([first, last]), first, comment("middle"));
    expect(result.statements).to.deep.equal([first, comment("middle"), last]);
  });

  it("should leave the original block untouched", () => {
    const original = block([comment("only")]);
    insertAfter(original, undefined, comment("new"));
    expect(original.statements).to.have.length(1);
  });
});
