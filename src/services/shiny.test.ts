import { describe, expect, it } from "vitest";
import fc from "fast-check";
import { isShiny, shinyBreakdown } from "./shiny";

const owner = { trainerId: 56078, secretId: 24723 };

describe("isShiny", () => {
  it("computes the eligibility value for an ordinary record", () => {
    // 56078 ^ 24723 = 0xBB9D; 0x3C4D ^ 0x1A2B = 0x2666
    expect(isShiny(0x1a2b3c4d, owner)).toEqual({ shiny: false, value: 0x9dfb });
  });

  it("flags a value below 8", () => {
    expect(isShiny(0x0000bb98, owner)).toEqual({ shiny: true, value: 5 });
  });

  it("treats 7 as eligible and 8 as not", () => {
    const zero = { trainerId: 0, secretId: 0 };
    expect(isShiny(0x00000007, zero).shiny).toBe(true);
    expect(isShiny(0x00000008, zero).shiny).toBe(false);
  });

  it("exposes the intermediate halves", () => {
    expect(shinyBreakdown(0x1a2b3c4d, owner)).toEqual({
      shiny: false,
      value: 0x9dfb,
      ownerXor: 0xbb9d,
      identifierLow: 0x3c4d,
      identifierHigh: 0x1a2b,
      identifierXor: 0x2666,
    });
  });

  it("matches the formula for every identifier and owner", () => {
    fc.assert(
      fc.property(
        fc.integer({ min: 0, max: 0xffffffff }),
        fc.integer({ min: 0, max: 0xffff }),
        fc.integer({ min: 0, max: 0xffff }),
        (id, trainerId, secretId) => {
          const value = (trainerId ^ secretId) ^ ((id & 0xffff) ^ (id >>> 16));
          expect(isShiny(id, { trainerId, secretId })).toEqual({ shiny: value < 8, value });
        },
      ),
    );
  });
});
