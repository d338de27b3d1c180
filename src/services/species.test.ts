import { describe, expect, it } from "vitest";
import {
  getLocations,
  getSpeciesTable,
  isPlausibleSpecies,
  nationalNumber,
  resolveContext,
  speciesName,
} from "./species";

describe("species table", () => {
  it("covers every internal index", () => {
    expect(getSpeciesTable().size).toBe(411);
  });

  it("maps Hoenn internal indices to catalog numbers", () => {
    expect(speciesName(280)).toBe("Torchic");
    expect(nationalNumber(280)).toBe(255);
    expect(nationalNumber(392)).toBe(280);
    expect(nationalNumber(25)).toBe(25);
  });

  it("treats the unused block as implausible", () => {
    expect(isPlausibleSpecies(0)).toBe(false);
    expect(isPlausibleSpecies(251)).toBe(true);
    expect(isPlausibleSpecies(252)).toBe(false);
    expect(isPlausibleSpecies(276)).toBe(false);
    expect(isPlausibleSpecies(277)).toBe(true);
    expect(isPlausibleSpecies(411)).toBe(true);
    expect(isPlausibleSpecies(412)).toBe(false);
    expect(speciesName(260)).toBe("Unknown(260)");
  });
});

describe("locations", () => {
  it("expands repeated priming steps", () => {
    const torchic = getLocations().get("torchic");

    expect(torchic?.strategy).toBe("reset");
    expect(torchic?.window).toBe("party");
    expect(torchic?.priming).toHaveLength(26);
    expect(torchic?.priming[0]).toEqual({ buttons: ["a"], holdFrames: 5, releaseFrames: 20 });
  });

  it("resolves a context and a target filter", () => {
    const { location, context, targetFilter } = resolveContext("Route_102", "ralts");

    expect(location.strategy).toBe("flee");
    expect(context.expected.get(280)).toBe("Ralts");
    expect(context.expected.get(270)).toBe("Lotad");
    expect(context.expected.size).toBe(6);
    expect(targetFilter).toEqual(new Set([280]));
  });

  it("leaves the filter open without a target", () => {
    expect(resolveContext("route_101").targetFilter).toBeNull();
  });

  it("lists valid choices for unknown input", () => {
    expect(() => resolveContext("route_999")).toThrow(/Valid locations: .*route_101/);
    expect(() => resolveContext("route_101", "Pikachu")).toThrow(
      "Invalid target species 'Pikachu' for Route 101. Must be one of: Poochyena, Zigzagoon, Wurmple",
    );
  });
});
