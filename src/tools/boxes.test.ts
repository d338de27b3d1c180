import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { access, mkdtemp, readFile, readdir, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { MergeError } from "../errors";
import { FileFindRecorder } from "../services/artifacts";
import { parseContainer, readStorageBlock } from "../services/container";
import {
  BOX_RECORD_SIZE,
  PARTY_RECORD_SIZE,
  POKEMON_STORAGE_PTR,
  STORAGE_HEADER_SIZE,
  STORAGE_SIZE,
  u32ToBytes,
} from "../services/memory";
import { FakeEmulator } from "../test/fake-emulator";
import { buildRecord } from "../test/fixtures";
import { PLAYER_OT, SHINY_IDENTIFIER } from "../test/hunt-fixtures";
import type { FindMetadata } from "../types";
import { UsageError, defaultOutput, main, runDump, runMerge, runReorganize } from "./boxes";

function storageWith(records: Uint8Array[]): Uint8Array {
  const bytes = new Uint8Array(STORAGE_SIZE);
  records.forEach((r, i) => bytes.set(r, STORAGE_HEADER_SIZE + i * BOX_RECORD_SIZE));
  return bytes;
}

function metadataFor(speciesName: string, location: string, foundAt: string): FindMetadata {
  return {
    species: null,
    speciesName,
    shinyValue: 1,
    identifier: 1,
    effortValues: null,
    individualValues: null,
    natureName: null,
    attempts: 1,
    elapsedMs: 0,
    location,
    isTarget: true,
    foundAt,
  };
}

describe("box tool", () => {
  let dir: string;
  let basePath: string;
  let baseBytes: Uint8Array;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "shiny-boxes-"));
    basePath = join(dir, "storage.bin");
    baseBytes = storageWith([
      buildRecord({ identifier: 101, originTrainer: PLAYER_OT, species: 280, size: BOX_RECORD_SIZE }),
    ]);
    await writeFile(basePath, baseBytes);
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  async function writeFinds(findsDir: string): Promise<void> {
    const recorder = new FileFindRecorder(findsDir, new FakeEmulator());
    await recorder.record({
      window: buildRecord({
        identifier: 0xdeadbeef,
        originTrainer: PLAYER_OT,
        encryptWith: 0,
        species: 392,
        evs: { spAttack: 1 },
      }),
      metadata: metadataFor("Ralts", "route_102", "2026-10-19T01:00:00.000Z"),
    });
    await recorder.record({
      window: buildRecord({ identifier: 0x1a2b3c4d, originTrainer: PLAYER_OT, species: 280 }),
      metadata: metadataFor("Torchic", "torchic", "2026-10-19T02:00:00.000Z"),
    });
    const bare = new Uint8Array(PARTY_RECORD_SIZE);
    bare.set(u32ToBytes(SHINY_IDENTIFIER));
    await recorder.record({ window: bare, metadata: metadataFor("Unknown", "torchic", "2026-10-19T03:00:00.000Z") });
  }

  it("derives output names next to the base", () => {
    expect(defaultOutput("boxes/storage.bin", "merged")).toBe("boxes/storage.merged.bin");
    expect(defaultOutput("dump", "reorganized")).toBe("dump.reorganized.bin");
  });

  it("merges finds into a new file and archives what was placed", async () => {
    const findsDir = join(dir, "finds");
    const out = join(dir, "merged.bin");
    await writeFinds(findsDir);

    const report = await runMerge(basePath, findsDir, out);

    expect(report.outcome.placed.map((p) => [p.slot, p.record.speciesName])).toEqual([
      [1, "Ralts"],
      [2, "Torchic"],
    ]);
    expect(report.skipped).toEqual(["20261019_030000_unknown_1"]);

    const merged = parseContainer(new Uint8Array(await readFile(out)));
    expect(merged.slots.slice(0, 4).map((s) => s?.record.identifier ?? null)).toEqual([
      101,
      0xdeadbeef,
      0x1a2b3c4d,
      null,
    ]);
    expect(new Uint8Array(await readFile(basePath))).toEqual(baseBytes);
    expect(await readdir(join(findsDir, "archive"))).toHaveLength(6);
    expect((await readdir(findsDir)).filter((f) => f.endsWith(".pk3"))).toEqual(["20261019_030000_unknown_1.pk3"]);
  });

  it("refuses to write over the base file", async () => {
    await expect(runMerge(basePath, join(dir, "finds"), basePath)).rejects.toBeInstanceOf(UsageError);
  });

  it("only writes a reorganize when confirmed", async () => {
    const records = [10, 20, 30, 40].map((hp, i) =>
      buildRecord({ identifier: 300 + i, originTrainer: PLAYER_OT, species: 280, evs: { hp }, size: BOX_RECORD_SIZE }),
    );
    await writeFile(basePath, storageWith(records));
    const out = join(dir, "sorted.bin");

    const dry = await runReorganize(basePath, 3, false, out);
    expect(dry.out).toBeNull();
    expect(dry.proposals.map((p) => p.slot)).toEqual([0]);
    await expect(access(out)).rejects.toThrow();

    const applied = await runReorganize(basePath, 3, true, out);
    expect(applied.out).toBe(out);
    const sorted = parseContainer(new Uint8Array(await readFile(out)));
    expect(sorted.slots.slice(0, 4).map((s) => s?.record.identifier ?? null)).toEqual([303, 302, 301, null]);
  });

  it("dumps the storage block from a snapshot", async () => {
    const emulator = new FakeEmulator();
    const storageAddress = 0x02029808;
    emulator.setBytes(POKEMON_STORAGE_PTR, u32ToBytes(storageAddress));
    emulator.setBytes(storageAddress, baseBytes);
    const out = join(dir, "dump.bin");

    await runDump(emulator, "base.state", out);

    expect(emulator.loads).toEqual(["base.state"]);
    expect(new Uint8Array(await readFile(out))).toEqual(baseBytes);
  });

  it("rejects a storage pointer outside EWRAM", async () => {
    const emulator = new FakeEmulator();
    emulator.setBytes(POKEMON_STORAGE_PTR, u32ToBytes(0x08000000));

    await expect(readStorageBlock(emulator)).rejects.toBeInstanceOf(MergeError);
  });

  it("reports usage errors", async () => {
    await expect(main([])).rejects.toThrow("Missing command");
    await expect(main(["shuffle"])).rejects.toThrow("Unknown command 'shuffle'");
    await expect(main(["merge"])).rejects.toThrow("merge requires --base");
    await expect(main(["reorganize", "--base", basePath, "--keep", "0"])).rejects.toThrow(
      "--keep must be a positive integer",
    );
  });
});
