/**
 * Merge engine: inserts decoded finds into a storage container without ever
 * touching an occupied slot, and proposes/applies a species reorganize.
 */

import { MergeError } from "../errors";
import { STAT_KEYS, type DecodedRecord, type StatTable } from "../types";
import { blockFromRecord, decode, toBoxRecord } from "./codec";
import {
  SLOT_COUNT,
  createContainer,
  formatSlot,
  occupiedSlots,
  slotIndex,
  slotRef,
  type PersistedContainer,
  type SlotRef,
  type StoredRecord,
} from "./container";

export interface Placement extends SlotRef {
  /** Position of the record in the incoming list */
  index: number;
  record: DecodedRecord;
}

export interface Unplaced {
  index: number;
  record: DecodedRecord;
  error: MergeError;
}

export interface MergeOutcome {
  container: PersistedContainer;
  placed: Placement[];
  unplaced: Unplaced[];
}

/**
 * Re-read a freshly built box record so the stored slot carries the same
 * view `parseContainer` would produce.
 */
function storedFrom(bytes: Uint8Array, ref: SlotRef): StoredRecord {
  const result = decode(blockFromRecord(bytes), null);
  if (!result.ok) {
    throw new MergeError("CorruptSlot", `${formatSlot(ref)}: ${result.error.message}`, ref.bank, ref.slot);
  }
  return { ...ref, bytes, record: result.record };
}

/**
 * Place `incoming` into the empty slots of `base`, scanning bank-major and
 * filling in input order. Records left over once every slot is taken are
 * reported as `NoCapacity`.
 */
export function merge(base: PersistedContainer, incoming: readonly DecodedRecord[]): MergeOutcome {
  const slots = [...base.slots];
  const placed: Placement[] = [];
  const unplaced: Unplaced[] = [];
  let cursor = 0;

  incoming.forEach((record, index) => {
    while (cursor < SLOT_COUNT && slots[cursor] !== null) cursor++;

    if (cursor >= SLOT_COUNT) {
      unplaced.push({
        index,
        record,
        error: new MergeError("NoCapacity", `No empty slot left for ${record.speciesName}`),
      });
      return;
    }

    const ref = slotRef(cursor);
    slots[cursor] = storedFrom(toBoxRecord(record), ref);
    placed.push({ ...ref, index, record });
    cursor++;
  });

  return { container: createContainer(base.header, slots, base.trailer), placed, unplaced };
}

// ─── Quality and reorganize ─────────────────────────────────────────────────

function statSum(table: StatTable): number {
  return STAT_KEYS.reduce((sum, key) => sum + table[key], 0);
}

export interface Quality {
  effortTotal: number;
  individualTotal: number;
}

export function quality(record: DecodedRecord): Quality {
  return { effortTotal: statSum(record.effortValues), individualTotal: statSum(record.individualValues) };
}

/**
 * Best first: effort total, then individual total, then earlier slot.
 */
function compareStored(a: StoredRecord, b: StoredRecord): number {
  const qa = quality(a.record);
  const qb = quality(b.record);
  return (
    qb.effortTotal - qa.effortTotal ||
    qb.individualTotal - qa.individualTotal ||
    slotIndex(a) - slotIndex(b)
  );
}

function groupBySpecies(stored: readonly StoredRecord[]): Map<string, StoredRecord[]> {
  const groups = new Map<string, StoredRecord[]>();
  for (const entry of stored) {
    const group = groups.get(entry.record.speciesName);
    if (group) group.push(entry);
    else groups.set(entry.record.speciesName, [entry]);
  }
  return groups;
}

export interface DiscardProposal extends SlotRef {
  speciesName: string;
  quality: Quality;
}

/**
 * Propose the lower-quality duplicates beyond `keepPerSpecies` of each
 * species. Nothing is removed until the proposal is confirmed.
 */
export function selectDiscards(container: PersistedContainer, keepPerSpecies = 3): DiscardProposal[] {
  if (!Number.isInteger(keepPerSpecies) || keepPerSpecies < 1) {
    throw new RangeError(`keepPerSpecies must be a positive integer, got ${keepPerSpecies}`);
  }

  const proposals: DiscardProposal[] = [];
  const groups = groupBySpecies(occupiedSlots(container));
  for (const name of [...groups.keys()].sort()) {
    const ranked = [...(groups.get(name) ?? [])].sort(compareStored);
    for (const entry of ranked.slice(keepPerSpecies)) {
      proposals.push({ bank: entry.bank, slot: entry.slot, speciesName: name, quality: quality(entry.record) });
    }
  }
  return proposals;
}

/**
 * Remove exactly the confirmed slots, then lay the survivors out from the
 * first slot: species alphabetically, best quality first within a species.
 */
export function reorganize(container: PersistedContainer, confirmedDiscards: readonly SlotRef[]): PersistedContainer {
  const discard = new Set<number>();
  for (const ref of confirmedDiscards) {
    const index = slotIndex(ref);
    if (container.slots[index] == null) {
      throw new MergeError("CorruptSlot", `${formatSlot(ref)} is empty and cannot be discarded`, ref.bank, ref.slot);
    }
    discard.add(index);
  }

  const survivors = occupiedSlots(container).filter((entry) => !discard.has(slotIndex(entry)));
  const groups = groupBySpecies(survivors);
  const ordered = [...groups.keys()].sort().flatMap((name) => [...(groups.get(name) ?? [])].sort(compareStored));

  const slots: Array<StoredRecord | null> = Array.from({ length: SLOT_COUNT }, () => null);
  ordered.forEach((entry, index) => {
    slots[index] = { ...slotRef(index), bytes: entry.bytes.slice(), record: entry.record };
  });

  return createContainer(container.header, slots, container.trailer);
}
