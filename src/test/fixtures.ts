/**
 * Builders for synthetic records used across tests.
 */

import { computeChecksum, encryptBlock, orderingIndexFor } from "../services/codec";
import {
  CHECKSUM_OFFSET,
  ENCRYPTED_OFFSET,
  IDENTIFIER_OFFSET,
  ORIGIN_TRAINER_OFFSET,
  PARTY_RECORD_SIZE,
  RECORD_HEADER_SIZE,
  SUBSTRUCTURE_SIZE,
  writeU16LE,
  writeU32LE,
} from "../services/memory";
import { STAT_KEYS, type StatTable, type Substructures } from "../types";

export interface RecordSpec {
  identifier: number;
  /** Packed owner the header records */
  originTrainer?: number;
  /** Owner the payload is actually encrypted with; defaults to originTrainer */
  encryptWith?: number;
  /** Internal species index */
  species: number;
  evs?: Partial<StatTable>;
  ivs?: Partial<StatTable>;
  heldItem?: number;
  experience?: number;
  moves?: number[];
  /** Store a wrong checksum */
  corruptChecksum?: boolean;
  size?: number;
}

export function buildSubstructures(spec: RecordSpec): Substructures {
  const growth = new Uint8Array(SUBSTRUCTURE_SIZE);
  writeU16LE(growth, 0, spec.species);
  writeU16LE(growth, 2, spec.heldItem ?? 0);
  writeU32LE(growth, 4, spec.experience ?? 135);
  growth[9] = 70;

  const attacks = new Uint8Array(SUBSTRUCTURE_SIZE);
  (spec.moves ?? [33, 45, 0, 0]).forEach((move, i) => writeU16LE(attacks, i * 2, move));

  const condition = new Uint8Array(SUBSTRUCTURE_SIZE);
  STAT_KEYS.forEach((key, i) => {
    condition[i] = spec.evs?.[key] ?? 0;
  });

  const misc = new Uint8Array(SUBSTRUCTURE_SIZE);
  misc[1] = 16;
  let packed = 0;
  STAT_KEYS.forEach((key, i) => {
    packed |= ((spec.ivs?.[key] ?? 0) & 0x1f) << (i * 5);
  });
  writeU32LE(misc, 4, packed >>> 0);

  return { growth, attacks, condition, misc };
}

/**
 * A raw record window (party form by default) laid out as in game memory.
 */
export function buildRecord(spec: RecordSpec): Uint8Array {
  const size = spec.size ?? PARTY_RECORD_SIZE;
  const originTrainer = spec.originTrainer ?? 0;
  const encryptWith = spec.encryptWith ?? originTrainer;
  const subs = buildSubstructures(spec);

  const out = new Uint8Array(size);
  writeU32LE(out, IDENTIFIER_OFFSET, spec.identifier);
  writeU32LE(out, ORIGIN_TRAINER_OFFSET, originTrainer);
  const checksum = computeChecksum(subs);
  writeU16LE(out, CHECKSUM_OFFSET, spec.corruptChecksum ? (checksum + 1) & 0xffff : checksum);

  const block = encryptBlock(
    subs,
    spec.identifier,
    encryptWith,
    orderingIndexFor(spec.identifier),
    out.subarray(0, RECORD_HEADER_SIZE),
  );
  out.set(block.payload, ENCRYPTED_OFFSET);
  return out;
}
