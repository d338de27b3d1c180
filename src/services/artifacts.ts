/**
 * Find artifacts: the raw record window, its metadata and the emulator
 * snapshot, written side by side into the finds directory.
 *
 * The directory is append-only. Processed finds are moved into `archive/`
 * by the box tool, never deleted.
 */

import { access, mkdir, readFile, readdir, rename } from "fs/promises";
import { join } from "path";
import { z } from "zod";
import { errorMessage } from "../errors";
import type { FindMetadata } from "../types";
import { logger } from "../utils/logger";
import { produceFileAtomic, writeFileAtomic } from "../utils/atomic-write";
import type { EmulationCapability } from "./emulator";

export const RECORD_EXT = ".pk3";
export const METADATA_EXT = ".json";
export const SNAPSHOT_EXT = ".state";
export const ARCHIVE_DIR = "archive";

export interface FindArtifact {
  /** Raw record window as read from memory */
  window: Uint8Array;
  metadata: FindMetadata;
}

export interface RecordedFind {
  name: string;
  recordPath: string;
  metadataPath: string;
  snapshotPath: string;
}

/**
 * Persists a find. The session only depends on this interface.
 */
export interface FindRecorder {
  record(find: FindArtifact): Promise<RecordedFind>;
}

function timestampSlug(iso: string): string {
  // 2026-10-19T08:15:30.123Z -> 20261019_081530
  return iso.replace(/[-:]/g, "").replace("T", "_").slice(0, 15);
}

export function findBaseName(metadata: FindMetadata): string {
  const species = metadata.speciesName.toLowerCase().replace(/[^a-z0-9]+/g, "-").replace(/^-|-$/g, "") || "unknown";
  return `${timestampSlug(metadata.foundAt)}_${species}_${metadata.attempts}`;
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

export class FileFindRecorder implements FindRecorder {
  constructor(
    private readonly dir: string,
    private readonly emulator: EmulationCapability,
  ) {}

  /**
   * Pick a base name no existing artifact uses.
   */
  private async freeName(metadata: FindMetadata): Promise<string> {
    const base = findBaseName(metadata);
    for (let n = 1; ; n++) {
      const name = n === 1 ? base : `${base}-${n}`;
      if (!(await exists(join(this.dir, name + RECORD_EXT)))) return name;
    }
  }

  async record(find: FindArtifact): Promise<RecordedFind> {
    await mkdir(this.dir, { recursive: true });
    const name = await this.freeName(find.metadata);
    const recorded: RecordedFind = {
      name,
      recordPath: join(this.dir, name + RECORD_EXT),
      metadataPath: join(this.dir, name + METADATA_EXT),
      snapshotPath: join(this.dir, name + SNAPSHOT_EXT),
    };

    // Snapshot first: the game state matters most if a later write fails
    await produceFileAtomic(recorded.snapshotPath, (tempPath) => this.emulator.saveSnapshot(tempPath));
    await writeFileAtomic(recorded.recordPath, find.window);
    await writeFileAtomic(recorded.metadataPath, JSON.stringify(find.metadata, null, 2) + "\n");

    logger.info("Saved find", { name, dir: this.dir });
    return recorded;
  }
}

// ─── Reading finds back ─────────────────────────────────────────────────────

const statTableSchema = z.object({
  hp: z.number(),
  attack: z.number(),
  defense: z.number(),
  speed: z.number(),
  spAttack: z.number(),
  spDefense: z.number(),
});

export const findMetadataSchema = z.object({
  species: z.number().nullable(),
  speciesName: z.string(),
  shinyValue: z.number(),
  identifier: z.number(),
  effortValues: statTableSchema.nullable(),
  individualValues: statTableSchema.nullable(),
  natureName: z.string().nullable(),
  attempts: z.number(),
  elapsedMs: z.number(),
  location: z.string(),
  isTarget: z.boolean(),
  foundAt: z.string(),
});

export interface StoredFind {
  name: string;
  bytes: Uint8Array;
  metadata: FindMetadata | null;
  /** Every file belonging to this find */
  files: string[];
}

function parseMetadata(name: string, text: string): FindMetadata | null {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    logger.warn("Ignoring malformed find metadata", { name, error: errorMessage(err) });
    return null;
  }

  const parsed = findMetadataSchema.safeParse(raw);
  if (parsed.success) return parsed.data;
  logger.warn("Ignoring malformed find metadata", { name, error: parsed.error.issues[0]?.message });
  return null;
}

/**
 * Load every find in `dir` (not its archive), oldest first. A find whose
 * metadata cannot be read is still returned, with `metadata` null.
 */
export async function loadFinds(dir: string): Promise<StoredFind[]> {
  let entries: string[];
  try {
    entries = await readdir(dir);
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") return [];
    throw err;
  }

  const names = entries
    .filter((e) => e.endsWith(RECORD_EXT))
    .map((e) => e.slice(0, -RECORD_EXT.length))
    .sort();

  const finds: StoredFind[] = [];
  for (const name of names) {
    const bytes = new Uint8Array(await readFile(join(dir, name + RECORD_EXT)));
    const files = [name + RECORD_EXT];

    let metadata: FindMetadata | null = null;
    if (entries.includes(name + METADATA_EXT)) {
      files.push(name + METADATA_EXT);
      metadata = parseMetadata(name, await readFile(join(dir, name + METADATA_EXT), "utf8"));
    }
    if (entries.includes(name + SNAPSHOT_EXT)) files.push(name + SNAPSHOT_EXT);

    finds.push({ name, bytes, metadata, files });
  }
  return finds;
}

/**
 * Move processed finds into `<dir>/archive`.
 */
export async function archiveFinds(dir: string, finds: readonly StoredFind[]): Promise<void> {
  const archive = join(dir, ARCHIVE_DIR);
  await mkdir(archive, { recursive: true });
  for (const find of finds) {
    for (const file of find.files) {
      await rename(join(dir, file), join(archive, file));
    }
  }
}
