/**
 * PC storage container: the in-memory `struct PokemonStorage` block as dumped
 * from a snapshot.
 *
 * Containers are immutable snapshots. Every operation that changes slots
 * returns a new container; serialization always builds a fresh buffer.
 */

import { MergeError } from "../errors";
import type { DecodedRecord } from "../types";
import { blockFromRecord, decode } from "./codec";
import {
  BANK_COUNT,
  BOX_RECORD_SIZE,
  EWRAM_END,
  EWRAM_START,
  POKEMON_STORAGE_PTR,
  SLOTS_PER_BANK,
  STORAGE_HEADER_SIZE,
  STORAGE_SIZE,
  isAllZero,
  readU32LE,
} from "./memory";
import type { EmulationCapability } from "./emulator";
import { hex, logger } from "../utils/logger";

export const SLOT_COUNT = BANK_COUNT * SLOTS_PER_BANK;

export interface SlotRef {
  bank: number;
  slot: number;
}

/**
 * An occupied slot and the record decoded from it.
 */
export interface StoredRecord extends SlotRef {
  bytes: Uint8Array;
  record: DecodedRecord;
}

export interface PersistedContainer {
  /** Header bytes (current bank + padding), preserved verbatim */
  readonly header: Uint8Array;
  /** Bank-major, `SLOT_COUNT` entries; null marks an empty slot */
  readonly slots: ReadonlyArray<StoredRecord | null>;
  /** Bank names and wallpapers, preserved verbatim */
  readonly trailer: Uint8Array;
}

export function slotIndex(ref: SlotRef): number {
  if (ref.bank < 0 || ref.bank >= BANK_COUNT || ref.slot < 0 || ref.slot >= SLOTS_PER_BANK) {
    throw new RangeError(`Slot out of range: bank ${ref.bank}, slot ${ref.slot}`);
  }
  return ref.bank * SLOTS_PER_BANK + ref.slot;
}

export function slotRef(index: number): SlotRef {
  return { bank: Math.floor(index / SLOTS_PER_BANK), slot: index % SLOTS_PER_BANK };
}

/**
 * Human-facing slot label (banks and slots counted from 1).
 */
export function formatSlot(ref: SlotRef): string {
  return `Box ${ref.bank + 1}, Slot ${ref.slot + 1}`;
}

/**
 * Decode and validate one 80-byte slot. Empty slots yield null.
 */
export function readSlot(bytes: Uint8Array, ref: SlotRef): StoredRecord | null {
  if (isAllZero(bytes)) return null;

  const result = decode(blockFromRecord(bytes), null);
  if (!result.ok) {
    throw new MergeError("CorruptSlot", `${formatSlot(ref)}: ${result.error.message}`, ref.bank, ref.slot);
  }
  if (!result.record.checksumValid) {
    throw new MergeError("CorruptSlot", `${formatSlot(ref)}: checksum mismatch`, ref.bank, ref.slot);
  }

  return { ...ref, bytes: bytes.slice(), record: result.record };
}

export function createContainer(
  header: Uint8Array,
  slots: ReadonlyArray<StoredRecord | null>,
  trailer: Uint8Array,
): PersistedContainer {
  if (slots.length !== SLOT_COUNT) {
    throw new MergeError("InvalidContainer", `Expected ${SLOT_COUNT} slots, got ${slots.length}`);
  }
  return Object.freeze({
    header: header.slice(),
    slots: Object.freeze([...slots]),
    trailer: trailer.slice(),
  });
}

export function parseContainer(bytes: Uint8Array): PersistedContainer {
  if (bytes.length !== STORAGE_SIZE) {
    throw new MergeError(
      "InvalidContainer",
      `Storage block must be ${STORAGE_SIZE} bytes, got ${bytes.length}`,
    );
  }

  const slots: Array<StoredRecord | null> = [];
  for (let index = 0; index < SLOT_COUNT; index++) {
    const start = STORAGE_HEADER_SIZE + index * BOX_RECORD_SIZE;
    slots.push(readSlot(bytes.subarray(start, start + BOX_RECORD_SIZE), slotRef(index)));
  }

  const trailerStart = STORAGE_HEADER_SIZE + SLOT_COUNT * BOX_RECORD_SIZE;
  return createContainer(bytes.subarray(0, STORAGE_HEADER_SIZE), slots, bytes.subarray(trailerStart));
}

export function serializeContainer(container: PersistedContainer): Uint8Array {
  const out = new Uint8Array(STORAGE_SIZE);
  out.set(container.header.subarray(0, STORAGE_HEADER_SIZE));
  container.slots.forEach((stored, index) => {
    if (stored) out.set(stored.bytes, STORAGE_HEADER_SIZE + index * BOX_RECORD_SIZE);
  });
  out.set(container.trailer, STORAGE_HEADER_SIZE + SLOT_COUNT * BOX_RECORD_SIZE);
  return out;
}

export function occupiedSlots(container: PersistedContainer): StoredRecord[] {
  return container.slots.filter((s): s is StoredRecord => s !== null);
}

export function countOccupied(container: PersistedContainer): number {
  return occupiedSlots(container).length;
}

export function emptySlotIndices(container: PersistedContainer): number[] {
  const empty: number[] = [];
  container.slots.forEach((s, i) => {
    if (s === null) empty.push(i);
  });
  return empty;
}

// Large reads are split so each UDP reply stays well under a datagram
const READ_CHUNK_SIZE = 1024;

/**
 * Read the storage block out of the running game. The block lives behind
 * a pointer in IWRAM that must land inside EWRAM.
 */
export async function readStorageBlock(emulator: EmulationCapability): Promise<Uint8Array> {
  const base = readU32LE(await emulator.readBytes(POKEMON_STORAGE_PTR, 4));
  if (base < EWRAM_START || base + STORAGE_SIZE > EWRAM_END + 1) {
    throw new MergeError("InvalidContainer", `Storage pointer ${hex(base)} is outside EWRAM`);
  }
  logger.debug("Reading storage block", { base: hex(base), size: STORAGE_SIZE });

  const out = new Uint8Array(STORAGE_SIZE);
  for (let offset = 0; offset < STORAGE_SIZE; offset += READ_CHUNK_SIZE) {
    const length = Math.min(READ_CHUNK_SIZE, STORAGE_SIZE - offset);
    out.set(await emulator.readBytes(base + offset, length), offset);
  }
  return out;
}
