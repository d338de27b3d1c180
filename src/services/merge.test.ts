import { describe, expect, it } from "vitest";
import fc from "fast-check";
import { MergeError } from "../errors";
import type { DecodedRecord, StatTable } from "../types";
import { blockFromRecord, decode } from "./codec";
import {
  SLOT_COUNT,
  countOccupied,
  emptySlotIndices,
  parseContainer,
  serializeContainer,
} from "./container";
import { BOX_RECORD_SIZE, STORAGE_HEADER_SIZE, STORAGE_SIZE } from "./memory";
import { merge, reorganize, selectDiscards } from "./merge";
import { buildRecord } from "../test/fixtures";
import { PLAYER_OT } from "../test/hunt-fixtures";

function boxRecord(identifier: number, species: number, evs: Partial<StatTable> = {}, ivs: Partial<StatTable> = {}) {
  return buildRecord({ identifier, originTrainer: PLAYER_OT, species, evs, ivs, size: BOX_RECORD_SIZE });
}

function storage(entries: ReadonlyArray<readonly [number, Uint8Array]>): Uint8Array {
  const bytes = new Uint8Array(STORAGE_SIZE);
  bytes[0] = 2;
  bytes[STORAGE_SIZE - 1] = 0x0b;
  for (const [index, record] of entries) {
    bytes.set(record, STORAGE_HEADER_SIZE + index * BOX_RECORD_SIZE);
  }
  return bytes;
}

function incoming(identifier: number, species: number): DecodedRecord {
  const result = decode(blockFromRecord(buildRecord({ identifier, originTrainer: PLAYER_OT, species })), null);
  if (!result.ok) throw result.error;
  return result.record;
}

describe("parseContainer / serializeContainer", () => {
  it("round-trips into a fresh buffer", () => {
    const bytes = storage([
      [0, boxRecord(101, 280)],
      [31, boxRecord(102, 283)],
    ]);

    const container = parseContainer(bytes);
    const out = serializeContainer(container);

    expect(out).toEqual(bytes);
    expect(out).not.toBe(bytes);
    expect(countOccupied(container)).toBe(2);
    expect(container.slots[31]).toMatchObject({ bank: 1, slot: 1 });
    expect(container.slots[31]?.record.speciesName).toBe("Mudkip");
  });

  it("is not affected by later changes to the input buffer", () => {
    const bytes = storage([[0, boxRecord(101, 280)]]);
    const container = parseContainer(bytes);

    bytes.fill(0);

    expect(countOccupied(container)).toBe(1);
    expect(serializeContainer(container)[0]).toBe(2);
  });

  it("rejects a slot whose checksum does not match", () => {
    const bad = buildRecord({
      identifier: 55,
      originTrainer: PLAYER_OT,
      species: 25,
      corruptChecksum: true,
      size: BOX_RECORD_SIZE,
    });

    let error: unknown = null;
    try {
      parseContainer(storage([[33, bad]]));
    } catch (err) {
      error = err;
    }

    expect(error).toBeInstanceOf(MergeError);
    expect(error).toMatchObject({ kind: "CorruptSlot", bank: 1, slot: 3 });
  });

  it("rejects a block of the wrong size", () => {
    expect(() => parseContainer(new Uint8Array(100))).toThrow(MergeError);
  });
});

describe("merge", () => {
  it("fills the one free slot and reports the rest as unplaced", () => {
    const entries: Array<[number, Uint8Array]> = [];
    for (let i = 0; i < SLOT_COUNT; i++) {
      if (i !== 5) entries.push([i, boxRecord(1000 + i, 280)]);
    }
    const base = parseContainer(storage(entries));

    const outcome = merge(base, [incoming(7, 283), incoming(8, 277)]);

    expect(outcome.placed).toHaveLength(1);
    expect(outcome.placed[0]).toMatchObject({ index: 0, bank: 0, slot: 5 });
    expect(outcome.placed[0]?.record.speciesName).toBe("Mudkip");
    expect(outcome.unplaced).toHaveLength(1);
    expect(outcome.unplaced[0]?.index).toBe(1);
    expect(outcome.unplaced[0]?.error.kind).toBe("NoCapacity");
    expect(emptySlotIndices(outcome.container)).toEqual([]);
  });

  it("stores placed records in box form with a valid checksum", () => {
    const base = parseContainer(storage([]));
    const outcome = merge(base, [incoming(0xcafe, 280)]);

    const reparsed = parseContainer(serializeContainer(outcome.container));

    expect(reparsed.slots[0]?.record.checksumValid).toBe(true);
    expect(reparsed.slots[0]?.record.identifier).toBe(0xcafe);
    expect(reparsed.slots[0]?.bytes).toHaveLength(BOX_RECORD_SIZE);
  });

  it("leaves the base container untouched", () => {
    const base = parseContainer(storage([[0, boxRecord(101, 280)]]));
    const before = serializeContainer(base);

    merge(base, [incoming(9, 283)]);

    expect(serializeContainer(base)).toEqual(before);
  });

  it("never overwrites an occupied slot and places in input order", () => {
    fc.assert(
      fc.property(
        fc.uniqueArray(fc.integer({ min: 0, max: 39 }), { maxLength: 20 }),
        fc.integer({ min: 1, max: 6 }),
        (occupied, count) => {
          const base = parseContainer(storage(occupied.map((i) => [i, boxRecord(5000 + i, 280)] as const)));
          const records = Array.from({ length: count }, (_, i) => incoming(9000 + i, 283));

          const outcome = merge(base, records);

          for (const i of occupied) {
            expect(outcome.container.slots[i]?.bytes).toEqual(base.slots[i]?.bytes);
          }
          const targets = outcome.placed.map((p) => p.bank * 30 + p.slot);
          expect(targets).toEqual(emptySlotIndices(base).slice(0, count));
          expect(outcome.placed.map((p) => p.index)).toEqual(records.map((_, i) => i));
          expect(outcome.placed.map((p) => p.record.identifier)).toEqual(records.map((r) => r.identifier));
        },
      ),
      { numRuns: 40 },
    );
  });
});

describe("selectDiscards / reorganize", () => {
  const bytes = storage([
    [0, boxRecord(201, 280, { hp: 10 })],
    [1, boxRecord(202, 280, { hp: 40 }, { hp: 5 })],
    [2, boxRecord(203, 283)],
    [3, boxRecord(204, 280, { attack: 20 })],
    [30, boxRecord(205, 280, { speed: 40 }, { hp: 9 })],
    [45, boxRecord(206, 1)],
  ]);
  const container = parseContainer(bytes);

  it("proposes the weakest duplicates beyond the keep count", () => {
    const proposals = selectDiscards(container, 3);

    expect(proposals).toEqual([
      {
        bank: 0,
        slot: 0,
        speciesName: "Torchic",
        quality: { effortTotal: 10, individualTotal: 0 },
      },
    ]);
  });

  it("keeps everything when the keep count covers every species", () => {
    expect(selectDiscards(container, 4)).toEqual([]);
  });

  it("removes confirmed slots and packs survivors by species and quality", () => {
    const result = reorganize(container, selectDiscards(container, 3));

    expect(result.slots.slice(0, 6).map((s) => s?.record.identifier ?? null)).toEqual([206, 203, 205, 202, 204, null]);
    expect(countOccupied(result)).toBe(5);
    expect(result.slots[2]).toMatchObject({ bank: 0, slot: 2 });
    expect(serializeContainer(result)[0]).toBe(2);
    expect(countOccupied(container)).toBe(6);
  });

  it("refuses to discard an empty slot", () => {
    expect(() => reorganize(container, [{ bank: 5, slot: 5 }])).toThrow(MergeError);
  });
});
