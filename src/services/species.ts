/**
 * Species and hunting-location tables for Pokemon Emerald (US).
 *
 * The internal index is the game's own enumeration (pret/pokeemerald
 * include/constants/species.h); Hoenn species sit at 277..411 in an order
 * that does not follow the National Dex. Indices 252..276 are unused
 * placeholders and never appear on a real record.
 */

import { readFileSync } from "fs";
import { z } from "zod";
import { VALID_BUTTONS, type HuntStrategy, type InputSequence, type SpeciesContext } from "../types";

export const MIN_SPECIES_INDEX = 1;
export const MAX_SPECIES_INDEX = 411;

const speciesFileSchema = z.object({
  species: z.array(
    z.object({
      index: z.number().int().min(MIN_SPECIES_INDEX).max(MAX_SPECIES_INDEX),
      name: z.string().min(1),
      national: z.number().int().min(0),
    }),
  ),
});

const inputStepSchema = z.object({
  buttons: z.array(z.enum(VALID_BUTTONS)),
  hold: z.number().int().min(0),
  release: z.number().int().min(0),
  repeat: z.number().int().min(1).default(1),
});

const locationSchema = z.object({
  name: z.string(),
  kind: z.enum(["starter", "wild"]),
  strategy: z.enum(["reset", "flee"]),
  window: z.enum(["party", "enemy"]),
  species: z.array(z.object({ id: z.number().int().positive(), name: z.string() })).min(1),
  priming: z.array(inputStepSchema),
});

const locationsFileSchema = z.object({
  locations: z.record(z.string(), locationSchema),
});

export type SpeciesEntry = z.infer<typeof speciesFileSchema>["species"][number];

/**
 * A place the hunter knows how to drive: which record window to watch, the
 * strategy that fits it, the species expected there and the inputs that
 * bring the game from the base snapshot to the point of encounter.
 */
export interface LocationConfig {
  key: string;
  name: string;
  kind: "starter" | "wild";
  strategy: HuntStrategy;
  window: "party" | "enemy";
  species: Array<{ id: number; name: string }>;
  priming: InputSequence;
}

const DATA_DIR = new URL("../../data/", import.meta.url);

let speciesTable: Map<number, SpeciesEntry> | null = null;
let locationTable: Map<string, LocationConfig> | null = null;

function readJson(file: string): unknown {
  return JSON.parse(readFileSync(new URL(file, DATA_DIR), "utf8"));
}

export function getSpeciesTable(): ReadonlyMap<number, SpeciesEntry> {
  if (!speciesTable) {
    const parsed = speciesFileSchema.parse(readJson("species.json"));
    speciesTable = new Map(parsed.species.map((entry) => [entry.index, entry]));
  }
  return speciesTable;
}

/**
 * True when `index` is a real species in the internal enumeration.
 */
export function isPlausibleSpecies(index: number): boolean {
  if (index < MIN_SPECIES_INDEX || index > MAX_SPECIES_INDEX) return false;
  const entry = getSpeciesTable().get(index);
  return entry !== undefined && entry.national > 0;
}

export function speciesName(index: number): string {
  const entry = getSpeciesTable().get(index);
  return entry && entry.national > 0 ? entry.name : `Unknown(${index})`;
}

export function nationalNumber(index: number): number {
  return getSpeciesTable().get(index)?.national ?? 0;
}

export function getLocations(): ReadonlyMap<string, LocationConfig> {
  if (!locationTable) {
    const parsed = locationsFileSchema.parse(readJson("locations.json"));
    locationTable = new Map();
    for (const [key, location] of Object.entries(parsed.locations)) {
      locationTable.set(key, {
        key,
        name: location.name,
        kind: location.kind,
        strategy: location.strategy,
        window: location.window,
        species: location.species,
        // Expand "repeat" so the session deals in flat sequences only
        priming: location.priming.flatMap((step) =>
          Array.from({ length: step.repeat }, () => ({
            buttons: [...step.buttons],
            holdFrames: step.hold,
            releaseFrames: step.release,
          })),
        ),
      });
    }
  }
  return locationTable;
}

export interface ResolvedHunt {
  location: LocationConfig;
  context: SpeciesContext;
  /** Catalog ids the caller wants emphasised; null means every species */
  targetFilter: ReadonlySet<number> | null;
}

/**
 * Look up a location and turn an optional target name into a filter.
 *
 * Throws when either the location or the target is unknown, listing the
 * valid choices.
 */
export function resolveContext(locationKey: string, target?: string | null): ResolvedHunt {
  const locations = getLocations();
  const location = locations.get(locationKey.toLowerCase());
  if (!location) {
    throw new Error(
      `Unknown location '${locationKey}'. Valid locations: ${[...locations.keys()].join(", ")}`,
    );
  }

  const context: SpeciesContext = {
    expected: new Map(location.species.map((s) => [s.id, s.name])),
  };

  if (!target) {
    return { location, context, targetFilter: null };
  }

  const wanted = location.species.filter((s) => s.name.toLowerCase() === target.toLowerCase());
  if (wanted.length === 0) {
    throw new Error(
      `Invalid target species '${target}' for ${location.name}. Must be one of: ${location.species
        .map((s) => s.name)
        .join(", ")}`,
    );
  }

  return { location, context, targetFilter: new Set(wanted.map((s) => s.id)) };
}
