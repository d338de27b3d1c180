/**
 * Shiny eligibility for Gen III records.
 *
 * Pure and total: the same formula applies to party, wild and stored records.
 */

import type { OwnerPair } from "../types";

export const SHINY_THRESHOLD = 8;

/** Base odds of an eligible record per encounter */
export const SHINY_ODDS = 8192;

export interface ShinyResult {
  shiny: boolean;
  value: number;
}

export interface ShinyBreakdown extends ShinyResult {
  ownerXor: number;
  identifierLow: number;
  identifierHigh: number;
  identifierXor: number;
}

export function shinyBreakdown(identifier: number, owner: OwnerPair): ShinyBreakdown {
  const ownerXor = (owner.trainerId ^ owner.secretId) & 0xffff;
  const identifierLow = identifier & 0xffff;
  const identifierHigh = (identifier >>> 16) & 0xffff;
  const identifierXor = identifierLow ^ identifierHigh;
  const value = ownerXor ^ identifierXor;

  return {
    shiny: value < SHINY_THRESHOLD,
    value,
    ownerXor,
    identifierLow,
    identifierHigh,
    identifierXor,
  };
}

/**
 * `(tid ^ sid) ^ (low16(id) ^ high16(id))`, eligible below 8.
 */
export function isShiny(identifier: number, owner: OwnerPair): ShinyResult {
  const { shiny, value } = shinyBreakdown(identifier, owner);
  return { shiny, value };
}
