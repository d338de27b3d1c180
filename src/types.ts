/**
 * TypeScript type definitions for the shiny hunter.
 */

// Valid button inputs for the GBA network gamepad (including L/R)
export const VALID_BUTTONS = ["up", "down", "left", "right", "a", "b", "start", "select", "l", "r"] as const;
export type Button = typeof VALID_BUTTONS[number];

export const DIRECTIONS = ["up", "down", "left", "right"] as const;
export type Direction = typeof DIRECTIONS[number];

/**
 * One entry of an input sequence: press the buttons, hold them for
 * `holdFrames`, release, then let `releaseFrames` pass.
 */
export interface InputStep {
  buttons: Button[];
  holdFrames: number;
  releaseFrames: number;
}

export type InputSequence = InputStep[];

/**
 * Public + secret trainer identifiers associated with a record's origin.
 */
export interface OwnerPair {
  /** Public trainer ID (16-bit) */
  trainerId: number;
  /** Secret trainer ID (16-bit) */
  secretId: number;
}

export const STAT_KEYS = ["hp", "attack", "defense", "speed", "spAttack", "spDefense"] as const;
export type StatKey = typeof STAT_KEYS[number];
export type StatTable = Record<StatKey, number>;

export type SubstructureTag = "G" | "A" | "E" | "M";

/**
 * The four decrypted 12-byte substructures in canonical order.
 */
export interface Substructures {
  growth: Uint8Array;
  attacks: Uint8Array;
  condition: Uint8Array;
  misc: Uint8Array;
}

/**
 * 48-byte encrypted payload plus the two values its key is derived from.
 */
export interface EncryptedRecordBlock {
  /** Personality value (32-bit) */
  identifier: number;
  /** Original trainer value: trainerId | secretId << 16 */
  originTrainer: number;
  /** Four encrypted 12-byte substructures in permuted order */
  payload: Uint8Array;
  /** Unencrypted 32-byte record prefix the block was read with */
  header: Uint8Array;
}

/**
 * A record decoded from an encrypted block.
 */
export interface DecodedRecord {
  /** Catalog species number after offset correction */
  species: number;
  /** Species field exactly as decrypted (internal index) */
  rawSpecies: number;
  /** Delta applied by offset correction (0 when none was needed) */
  correction: number;
  /** Whether the species was confirmed against the location's expected set */
  matchedContext: boolean;
  speciesName: string;
  identifier: number;
  /** Origin trainer as recorded in the header */
  originTrainer: number;
  /** Owner value the payload key was derived from */
  keyOwner: number;
  owner: OwnerPair;
  effortValues: StatTable;
  individualValues: StatTable;
  nature: { index: number; name: string };
  heldItem: number;
  experience: number;
  friendship: number;
  moves: number[];
  metLocation: number;
  /** Whether the stored checksum matches the decrypted payload */
  checksumValid: boolean;
  /** Unencrypted first 32 bytes of the record (identifier, trainer, names, checksum) */
  header: Uint8Array;
  substructures: Substructures;
  /** Index into the substructure permutation table used to decode */
  orderingIndex: number;
  /** Label of the decode candidate that produced this record */
  candidate: string;
}

/**
 * Species expected at the current location, keyed by catalog number.
 * Used to confirm a decode and to pick an offset correction.
 */
export interface SpeciesContext {
  expected: ReadonlyMap<number, string>;
}

export type HuntStrategy = "reset" | "flee";

export type SessionState =
  | "Idle"
  | "Priming"
  | "AwaitingEncounter"
  | "RecordDetected"
  | "Evaluated"
  | "Success"
  | "Continuing"
  | "Terminal";

export type TerminalReason = "found" | "max-attempts" | "aborted" | "error-limit";

/**
 * Plain structured data describing one evaluated encounter.
 */
export interface EncounterResult {
  attempt: number;
  identifier: number;
  /** Eligible and decoded; an undecodable record is never shiny */
  shiny: boolean;
  shinyValue: number;
  /** Decoded species, or null when the record could not be decoded */
  species: number | null;
  speciesName: string;
  isTarget: boolean;
  effortValues: StatTable | null;
  natureName: string | null;
}

/**
 * Metadata handed to logging/notification collaborators per successful find.
 */
export interface FindMetadata {
  species: number | null;
  speciesName: string;
  shinyValue: number;
  identifier: number;
  effortValues: StatTable | null;
  individualValues: StatTable | null;
  natureName: string | null;
  attempts: number;
  elapsedMs: number;
  location: string;
  isTarget: boolean;
  foundAt: string;
}

/**
 * Snapshot of the running hunt, served by the status endpoint.
 */
export interface SessionSnapshot {
  location: string;
  strategy: HuntStrategy;
  state: SessionState;
  facing: Direction;
  attempts: number;
  elapsedMs: number;
  attemptsPerSecond: number;
  consecutiveErrors: number;
  lastEncounter: EncounterResult | null;
  terminalReason: TerminalReason | null;
}

/**
 * Response from the /status endpoint.
 */
export interface StatusResponse {
  session: SessionSnapshot | null;
  finds: FindMetadata[];
  serverTime: number;
}

/**
 * Health check response.
 */
export interface HealthResponse {
  status: "ok";
  timestamp: number;
}
