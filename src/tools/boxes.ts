/**
 * Offline PC box tool.
 *
 *   boxes merge --base storage.bin [--finds finds] [--out merged.bin]
 *   boxes reorganize --base storage.bin [--keep 3] [--confirm] [--out file]
 *   boxes dump --snapshot base.state --out storage.bin
 *
 * The base file is never written to; results always go to a new file.
 */

import { readFile } from "fs/promises";
import { resolve } from "path";
import { pathToFileURL } from "url";
import { parseArgs } from "util";

import { errorMessage } from "../errors";
import { archiveFinds, loadFinds, type StoredFind } from "../services/artifacts";
import { decodeWindow } from "../services/codec";
import {
  countOccupied,
  formatSlot,
  parseContainer,
  readStorageBlock,
  serializeContainer,
  type PersistedContainer,
} from "../services/container";
import type { EmulationCapability } from "../services/emulator";
import { RetroArchEmulator } from "../services/emulator";
import { merge, reorganize, selectDiscards, type DiscardProposal, type MergeOutcome } from "../services/merge";
import { resolveContext } from "../services/species";
import type { DecodedRecord, SpeciesContext } from "../types";
import { writeFileAtomic } from "../utils/atomic-write";
import { logger } from "../utils/logger";

const USAGE = `Usage:
  boxes merge --base <storage.bin> [--finds <dir>] [--out <file>]
  boxes reorganize --base <storage.bin> [--keep <n>] [--confirm] [--out <file>]
  boxes dump --snapshot <state> --out <storage.bin>`;

export class UsageError extends Error {
  constructor(message: string) {
    super(`${message}\n\n${USAGE}`);
    this.name = "UsageError";
  }
}

export function defaultOutput(base: string, suffix: string): string {
  return base.endsWith(".bin") ? `${base.slice(0, -4)}.${suffix}.bin` : `${base}.${suffix}.bin`;
}

function ensureDistinct(base: string, out: string): void {
  if (resolve(base) === resolve(out)) {
    throw new UsageError(`--out must differ from --base (${base})`);
  }
}

async function loadContainer(path: string): Promise<PersistedContainer> {
  return parseContainer(new Uint8Array(await readFile(path)));
}

function contextFor(find: StoredFind): SpeciesContext | undefined {
  const location = find.metadata?.location;
  if (!location) return undefined;
  try {
    return resolveContext(location).context;
  } catch (err) {
    logger.warn("Unknown location in find metadata; decoding without context", {
      find: find.name,
      error: errorMessage(err),
    });
    return undefined;
  }
}

// ─── merge ──────────────────────────────────────────────────────────────────

export interface MergeReport {
  outcome: MergeOutcome;
  /** Finds whose record could not be decoded; left in place */
  skipped: string[];
  out: string;
}

export async function runMerge(base: string, findsDir: string, out: string): Promise<MergeReport> {
  ensureDistinct(base, out);
  const container = await loadContainer(base);
  const finds = await loadFinds(findsDir);

  const decodedFinds: StoredFind[] = [];
  const records: DecodedRecord[] = [];
  const skipped: string[] = [];
  for (const find of finds) {
    const result = decodeWindow(find.bytes, contextFor(find));
    if (result.ok) {
      decodedFinds.push(find);
      records.push(result.record);
    } else {
      skipped.push(find.name);
      logger.warn("Skipping undecodable find", { find: find.name, error: result.error.message });
    }
  }

  const outcome = merge(container, records);
  await writeFileAtomic(out, serializeContainer(outcome.container));

  for (const placement of outcome.placed) {
    logger.info(`${placement.record.speciesName} -> ${formatSlot(placement)}`);
  }
  for (const miss of outcome.unplaced) {
    logger.warn(`Not placed: ${miss.record.speciesName}`, { kind: miss.error.kind, error: miss.error.message });
  }

  const placedFinds = outcome.placed.flatMap((p) => decodedFinds[p.index] ?? []);
  await archiveFinds(findsDir, placedFinds);

  logger.info("Merge complete", {
    placed: outcome.placed.length,
    unplaced: outcome.unplaced.length,
    skipped: skipped.length,
    occupied: countOccupied(outcome.container),
    out,
  });
  return { outcome, skipped, out };
}

// ─── reorganize ─────────────────────────────────────────────────────────────

export interface ReorganizeReport {
  proposals: DiscardProposal[];
  /** Set only when the reorganize was confirmed and written */
  out: string | null;
}

export async function runReorganize(
  base: string,
  keepPerSpecies: number,
  confirm: boolean,
  out: string,
): Promise<ReorganizeReport> {
  ensureDistinct(base, out);
  const container = await loadContainer(base);
  const proposals = selectDiscards(container, keepPerSpecies);

  for (const p of proposals) {
    logger.info(`Discard ${p.speciesName} at ${formatSlot(p)}`, { ...p.quality });
  }

  if (!confirm) {
    logger.info(`${proposals.length} record(s) proposed for discard; rerun with --confirm to apply`);
    return { proposals, out: null };
  }

  const reorganized = reorganize(container, proposals);
  await writeFileAtomic(out, serializeContainer(reorganized));
  logger.info("Reorganize complete", {
    discarded: proposals.length,
    kept: countOccupied(reorganized),
    out,
  });
  return { proposals, out };
}

// ─── dump ───────────────────────────────────────────────────────────────────

export async function runDump(emulator: EmulationCapability, snapshot: string, out: string): Promise<void> {
  await emulator.loadSnapshot(snapshot);
  const block = await readStorageBlock(emulator);
  // Parsed before writing; a corrupt block is rejected
  const container = parseContainer(block);
  await writeFileAtomic(out, block);
  logger.info("Storage dumped", { occupied: countOccupied(container), out });
}

// ─── CLI ────────────────────────────────────────────────────────────────────

export async function main(argv: string[]): Promise<void> {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      base: { type: "string" },
      finds: { type: "string", default: "finds" },
      out: { type: "string" },
      keep: { type: "string", default: "3" },
      confirm: { type: "boolean", default: false },
      snapshot: { type: "string" },
    },
  });

  const [command] = positionals;
  switch (command) {
    case "merge": {
      if (!values.base) throw new UsageError("merge requires --base");
      await runMerge(values.base, values.finds ?? "finds", values.out ?? defaultOutput(values.base, "merged"));
      return;
    }
    case "reorganize": {
      if (!values.base) throw new UsageError("reorganize requires --base");
      const keep = parseInt(values.keep ?? "3", 10);
      if (!Number.isInteger(keep) || keep < 1) throw new UsageError(`--keep must be a positive integer`);
      await runReorganize(values.base, keep, values.confirm ?? false, values.out ?? defaultOutput(values.base, "reorganized"));
      return;
    }
    case "dump": {
      if (!values.snapshot || !values.out) throw new UsageError("dump requires --snapshot and --out");
      await runDump(new RetroArchEmulator(), values.snapshot, values.out);
      return;
    }
    default:
      throw new UsageError(command ? `Unknown command '${command}'` : "Missing command");
  }
}

const entry = process.argv[1];
if (entry && import.meta.url === pathToFileURL(entry).href) {
  main(process.argv.slice(2)).catch((err: unknown) => {
    logger.error(errorMessage(err));
    process.exitCode = 1;
  });
}
