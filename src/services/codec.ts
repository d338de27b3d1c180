/**
 * Encrypted record codec for Gen III Pokemon structures.
 *
 * A record carries its 48-byte payload as four 12-byte substructures
 * (Growth, Attacks, EVs/Condition, Misc) in an order chosen by
 * `personality % 24`, each 32-bit word XORed with `otId ^ personality`.
 *
 * Wild and foreign records do not always follow the owner convention the
 * player's own records do, so `decodeWindow` walks a ranked list of
 * candidate interpretations and keeps the first plausible one.
 */

import { DecodeError } from "../errors";
import {
  STAT_KEYS,
  type DecodedRecord,
  type EncryptedRecordBlock,
  type OwnerPair,
  type SpeciesContext,
  type StatTable,
  type SubstructureTag,
  type Substructures,
} from "../types";
import {
  BOX_RECORD_SIZE,
  CHECKSUM_OFFSET,
  ENCRYPTED_OFFSET,
  ENCRYPTED_SIZE,
  IDENTIFIER_OFFSET,
  ORIGIN_TRAINER_OFFSET,
  RECORD_HEADER_SIZE,
  SECRET_ID_OFFSET,
  SUBSTRUCTURE_SIZE,
  readU16LE,
  readU32LE,
  writeU16LE,
  writeU32LE,
} from "./memory";
import { isPlausibleSpecies, nationalNumber, speciesName } from "./species";

// personality % 24 → placement of G/A/E/M inside the payload
export const SUBSTRUCTURE_ORDERS = [
  "GAEM", "GAME", "GEAM", "GEMA", "GMAE", "GMEA",
  "AGEM", "AGME", "AEGM", "AEMG", "AMGE", "AMEG",
  "EGAM", "EGMA", "EAGM", "EAMG", "EMGA", "EMAG",
  "MGAE", "MGEA", "MAGE", "MAEG", "MEGA", "MEAG",
] as const;

/**
 * Deltas between internal species indices and catalog numbers. The first is
 * the common Hoenn shift; the second was found empirically for one family
 * and is kept as a table entry.
 */
export const SPECIES_CORRECTIONS = [
  { delta: -25, label: "hoenn" },
  { delta: -122, label: "ralts-family" },
] as const;

export const NATURES = [
  "Hardy", "Lonely", "Brave", "Adamant", "Naughty",
  "Bold", "Docile", "Relaxed", "Impish", "Lax",
  "Timid", "Hasty", "Serious", "Jolly", "Naive",
  "Modest", "Mild", "Quiet", "Bashful", "Rash",
  "Calm", "Gentle", "Sassy", "Careful", "Quirky",
] as const;

const TAG_KEYS: Record<SubstructureTag, keyof Substructures> = {
  G: "growth",
  A: "attacks",
  E: "condition",
  M: "misc",
};

export type DecodeResult =
  | { ok: true; record: DecodedRecord }
  | { ok: false; error: DecodeError };

// ─── Owner / ordering helpers ───────────────────────────────────────────────

export function packOwner(owner: OwnerPair): number {
  return ((owner.trainerId & 0xffff) | ((owner.secretId & 0xffff) << 16)) >>> 0;
}

export function unpackOwner(originTrainer: number): OwnerPair {
  return {
    trainerId: originTrainer & 0xffff,
    secretId: (originTrainer >>> 16) & 0xffff,
  };
}

export function orderingIndexFor(identifier: number): number {
  return (identifier >>> 0) % 24;
}

function orderingAt(index: number): string {
  const order = SUBSTRUCTURE_ORDERS[index];
  if (order === undefined) {
    throw new RangeError(`Substructure ordering index out of range: ${index}`);
  }
  return order;
}

function tagsOf(order: string): SubstructureTag[] {
  return order.split("").filter((c): c is SubstructureTag => c === "G" || c === "A" || c === "E" || c === "M");
}

// ─── Block encryption ───────────────────────────────────────────────────────

function xorWords(data: Uint8Array, key: number): Uint8Array {
  const out = new Uint8Array(data.length);
  for (let i = 0; i < data.length; i += 4) {
    writeU32LE(out, i, (readU32LE(data, i) ^ key) >>> 0);
  }
  return out;
}

/**
 * Decrypt a payload and return its substructures in canonical order.
 */
export function decryptBlock(block: EncryptedRecordBlock, orderingIndex: number): Substructures {
  if (block.payload.length !== ENCRYPTED_SIZE) {
    throw new RangeError(`Encrypted payload must be ${ENCRYPTED_SIZE} bytes, got ${block.payload.length}`);
  }

  const plain = xorWords(block.payload, (block.originTrainer ^ block.identifier) >>> 0);
  const subs: Partial<Substructures> = {};
  tagsOf(orderingAt(orderingIndex)).forEach((tag, position) => {
    const start = position * SUBSTRUCTURE_SIZE;
    subs[TAG_KEYS[tag]] = plain.slice(start, start + SUBSTRUCTURE_SIZE);
  });

  const { growth, attacks, condition, misc } = subs;
  if (!growth || !attacks || !condition || !misc) {
    throw new Error(`Ordering ${orderingAt(orderingIndex)} does not cover all substructures`);
  }
  return { growth, attacks, condition, misc };
}

/**
 * Inverse of `decryptBlock`: place substructures per the ordering and XOR.
 * `keyOwner` is the owner value the key is derived from when it differs
 * from the recorded origin trainer.
 */
export function encryptBlock(
  subs: Substructures,
  identifier: number,
  originTrainer: number,
  orderingIndex: number,
  header: Uint8Array,
  keyOwner: number = originTrainer,
): EncryptedRecordBlock {
  const plain = new Uint8Array(ENCRYPTED_SIZE);
  tagsOf(orderingAt(orderingIndex)).forEach((tag, position) => {
    plain.set(subs[TAG_KEYS[tag]], position * SUBSTRUCTURE_SIZE);
  });

  return {
    identifier: identifier >>> 0,
    originTrainer: originTrainer >>> 0,
    payload: xorWords(plain, (keyOwner ^ identifier) >>> 0),
    header: header.slice(),
  };
}

/**
 * 16-bit sum of the 24 little-endian words of the decrypted payload.
 */
export function computeChecksum(subs: Substructures): number {
  let sum = 0;
  for (const part of [subs.growth, subs.attacks, subs.condition, subs.misc]) {
    for (let i = 0; i < part.length; i += 2) {
      sum = (sum + readU16LE(part, i)) & 0xffff;
    }
  }
  return sum;
}

/**
 * Split a raw record (party or box form) into an encrypted block.
 */
export function blockFromRecord(bytes: Uint8Array, dataOffset: number = ENCRYPTED_OFFSET): EncryptedRecordBlock {
  if (bytes.length < dataOffset + ENCRYPTED_SIZE || bytes.length < RECORD_HEADER_SIZE) {
    throw new RangeError(`Record window too short: ${bytes.length} bytes for data offset ${dataOffset}`);
  }
  return {
    identifier: readU32LE(bytes, IDENTIFIER_OFFSET),
    originTrainer: readU32LE(bytes, ORIGIN_TRAINER_OFFSET),
    payload: bytes.slice(dataOffset, dataOffset + ENCRYPTED_SIZE),
    header: bytes.slice(0, RECORD_HEADER_SIZE),
  };
}

// ─── Species correction ─────────────────────────────────────────────────────

export interface SpeciesMatch {
  species: number;
  correction: number;
  name: string;
}

/**
 * Match a raw species index against the location's expected set: through
 * the species table first, then as is, then with each correction delta for
 * indices the table cannot place. A delta is applied at most once; a value
 * already in the set is never corrected again.
 */
export function correctSpecies(raw: number, context: SpeciesContext): SpeciesMatch | null {
  const national = nationalNumber(raw);
  const listed = national > 0 ? context.expected.get(national) : undefined;
  if (listed !== undefined) {
    return { species: national, correction: national - raw, name: listed };
  }

  const direct = context.expected.get(raw);
  if (direct !== undefined) {
    return { species: raw, correction: 0, name: direct };
  }

  for (const { delta } of SPECIES_CORRECTIONS) {
    const name = context.expected.get(raw + delta);
    if (name !== undefined) {
      return { species: raw + delta, correction: delta, name };
    }
  }

  return null;
}

// ─── Field extraction ───────────────────────────────────────────────────────

function readEffortValues(condition: Uint8Array): StatTable {
  return {
    hp: condition[0] ?? 0,
    attack: condition[1] ?? 0,
    defense: condition[2] ?? 0,
    speed: condition[3] ?? 0,
    spAttack: condition[4] ?? 0,
    spDefense: condition[5] ?? 0,
  };
}

function readIndividualValues(misc: Uint8Array): StatTable {
  const packed = readU32LE(misc, 4);
  const ivs: Partial<StatTable> = {};
  STAT_KEYS.forEach((key, i) => {
    ivs[key] = (packed >>> (i * 5)) & 0x1f;
  });
  return {
    hp: ivs.hp ?? 0,
    attack: ivs.attack ?? 0,
    defense: ivs.defense ?? 0,
    speed: ivs.speed ?? 0,
    spAttack: ivs.spAttack ?? 0,
    spDefense: ivs.spDefense ?? 0,
  };
}

function natureOf(identifier: number): { index: number; name: string } {
  const index = (identifier >>> 0) % 25;
  return { index, name: NATURES[index] ?? "Hardy" };
}

// ─── Decoding ───────────────────────────────────────────────────────────────

function decodeWith(
  block: EncryptedRecordBlock,
  keyOwner: number,
  orderingIndex: number,
  context: SpeciesContext | undefined,
  candidate: string,
): DecodeResult {
  if (block.identifier === 0) {
    return {
      ok: false,
      error: new DecodeError("Empty record (identifier is 0)", 0, null),
    };
  }

  const subs = decryptBlock({ ...block, originTrainer: keyOwner }, orderingIndex);
  const rawSpecies = readU16LE(subs.growth, 0);

  if (!isPlausibleSpecies(rawSpecies)) {
    return {
      ok: false,
      error: new DecodeError(
        `Species index ${rawSpecies} outside the valid internal range`,
        block.identifier,
        rawSpecies,
      ),
    };
  }

  const match = context ? correctSpecies(rawSpecies, context) : null;

  const record: DecodedRecord = {
    species: match ? match.species : nationalNumber(rawSpecies),
    rawSpecies,
    correction: match ? match.correction : 0,
    matchedContext: match !== null,
    speciesName: match ? match.name : speciesName(rawSpecies),
    identifier: block.identifier,
    originTrainer: block.originTrainer,
    keyOwner: keyOwner >>> 0,
    owner: unpackOwner(block.originTrainer),
    effortValues: readEffortValues(subs.condition),
    individualValues: readIndividualValues(subs.misc),
    nature: natureOf(block.identifier),
    heldItem: readU16LE(subs.growth, 2),
    experience: readU32LE(subs.growth, 4),
    friendship: subs.growth[9] ?? 0,
    moves: [0, 2, 4, 6].map((offset) => readU16LE(subs.attacks, offset)),
    metLocation: subs.misc[1] ?? 0,
    checksumValid: computeChecksum(subs) === readU16LE(block.header, CHECKSUM_OFFSET),
    header: block.header.slice(),
    substructures: subs,
    orderingIndex,
    candidate,
  };

  return { ok: true, record };
}

/**
 * Decode one block whose owner is known.
 *
 * The key is `packOwner(knownOwner) ^ identifier`; with `knownOwner` null
 * the block's own recorded origin trainer is used. The record keeps the
 * recorded origin trainer either way.
 */
export function decode(
  block: EncryptedRecordBlock,
  knownOwner: OwnerPair | null,
  context?: SpeciesContext,
): DecodeResult {
  return decodeWith(
    block,
    knownOwner ? packOwner(knownOwner) : block.originTrainer,
    orderingIndexFor(block.identifier),
    context,
    knownOwner ? "known-owner" : "recorded",
  );
}

/**
 * Re-encrypt a decoded record exactly as it was read.
 */
export function encode(record: DecodedRecord): EncryptedRecordBlock {
  return encryptBlock(
    record.substructures,
    record.identifier,
    record.originTrainer,
    record.orderingIndex,
    record.header,
    record.keyOwner,
  );
}

/**
 * Canonical 80-byte box form of a record: header + payload encrypted with the
 * header's own origin trainer and identifier ordering, checksum recomputed.
 */
export function toBoxRecord(record: DecodedRecord): Uint8Array {
  const out = new Uint8Array(BOX_RECORD_SIZE);
  out.set(record.header.subarray(0, RECORD_HEADER_SIZE));
  writeU32LE(out, IDENTIFIER_OFFSET, record.identifier);
  writeU16LE(out, CHECKSUM_OFFSET, computeChecksum(record.substructures));

  const headerTrainer = readU32LE(out, ORIGIN_TRAINER_OFFSET);
  const block = encryptBlock(
    record.substructures,
    record.identifier,
    headerTrainer,
    orderingIndexFor(record.identifier),
    out.subarray(0, RECORD_HEADER_SIZE),
  );
  out.set(block.payload, ENCRYPTED_OFFSET);
  return out;
}

// ─── Candidate search ───────────────────────────────────────────────────────

export type OwnerAssumption = "recorded" | "zero" | "trainer-only" | "trainer-xor-secret";

/**
 * One interpretation of a raw record window.
 */
export interface DecodeCandidate {
  readonly label: string;
  readonly owner: OwnerAssumption;
  /** Where the encrypted payload starts, relative to the identifier */
  readonly dataOffset: number;
  /** "identifier" uses personality % 24; a number forces that ordering */
  readonly ordering: "identifier" | number;
}

const OWNER_ASSUMPTIONS: readonly OwnerAssumption[] = ["recorded", "zero", "trainer-only", "trainer-xor-secret"];
const DATA_OFFSETS: readonly number[] = [32, 0, 8, 16, 24, 40, 48];
// Growth block at position 2, 0, 1, 3: first table ordering with G in that slot
const GROWTH_POSITIONS: readonly number[] = [2, 0, 1, 3];

function orderingWithGrowthAt(position: number): number {
  const index = SUBSTRUCTURE_ORDERS.findIndex((order) => order.indexOf("G") === position);
  if (index < 0) {
    throw new Error(`No ordering places growth at position ${position}`);
  }
  return index;
}

/**
 * The ranked candidate list, most likely first.
 */
export function buildCandidates(): readonly DecodeCandidate[] {
  const orderings: Array<"identifier" | number> = ["identifier", ...GROWTH_POSITIONS.map(orderingWithGrowthAt)];
  const candidates: DecodeCandidate[] = [];

  for (const owner of OWNER_ASSUMPTIONS) {
    for (const dataOffset of DATA_OFFSETS) {
      for (const ordering of orderings) {
        candidates.push(
          Object.freeze({
            label: `${owner}@+${dataOffset}/${ordering === "identifier" ? "pv" : `o${ordering}`}`,
            owner,
            dataOffset,
            ordering,
          }),
        );
      }
    }
  }

  return Object.freeze(candidates);
}

const CANDIDATES = buildCandidates();

export function resolveOwner(assumption: OwnerAssumption, window: Uint8Array): number {
  const trainerId = readU16LE(window, ORIGIN_TRAINER_OFFSET);
  const secretId = readU16LE(window, SECRET_ID_OFFSET);
  switch (assumption) {
    case "recorded":
      return readU32LE(window, ORIGIN_TRAINER_OFFSET);
    case "zero":
      return 0;
    case "trainer-only":
      return trainerId;
    case "trainer-xor-secret":
      return (trainerId ^ secretId) & 0xffff;
  }
}

/**
 * Try a single candidate against a raw window.
 */
export function decodeCandidate(
  window: Uint8Array,
  candidate: DecodeCandidate,
  context?: SpeciesContext,
): DecodeResult {
  const block = blockFromRecord(window, candidate.dataOffset);
  const orderingIndex =
    candidate.ordering === "identifier" ? orderingIndexFor(block.identifier) : candidate.ordering;
  return decodeWith(block, resolveOwner(candidate.owner, window), orderingIndex, context, candidate.label);
}

function isAcceptable(record: DecodedRecord, context: SpeciesContext | undefined): boolean {
  if (!context || context.expected.size === 0) return true;
  return record.matchedContext || record.checksumValid;
}

/**
 * Decode a raw record window whose owner convention is unknown.
 *
 * Candidates are tried in rank order; the first whose species is a real
 * internal index, and which either matches the context set or carries a
 * valid checksum, wins. Exhausting the list yields `OutOfRange`.
 */
export function decodeWindow(
  window: Uint8Array,
  context?: SpeciesContext,
  candidates: readonly DecodeCandidate[] = CANDIDATES,
): DecodeResult {
  const identifier = readU32LE(window, IDENTIFIER_OFFSET);
  if (identifier === 0) {
    return { ok: false, error: new DecodeError("Empty record (identifier is 0)", 0, null) };
  }

  let lastRaw: number | null = null;
  for (const candidate of candidates) {
    if (window.length < candidate.dataOffset + ENCRYPTED_SIZE) continue;

    const result = decodeCandidate(window, candidate, context);
    if (result.ok) {
      if (isAcceptable(result.record, context)) return result;
      lastRaw = result.record.rawSpecies;
    } else {
      lastRaw = result.error.lastRawSpecies;
    }
  }

  return {
    ok: false,
    error: new DecodeError(
      `No decode candidate produced a plausible species (tried ${candidates.length})`,
      identifier,
      lastRaw,
    ),
  };
}
