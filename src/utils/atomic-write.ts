import { randomUUID } from "crypto";
import { mkdir, rename, unlink, writeFile } from "fs/promises";
import { basename, dirname, join } from "path";
import { errorMessage } from "../errors";
import { logger } from "./logger";

export function tempPathFor(target: string): string {
  return join(dirname(target), `.tmp-${basename(target)}-${randomUUID()}`);
}

/**
 * Best-effort removal of a temp file left behind by a failed write.
 */
export async function safeUnlink(path: string): Promise<void> {
  try {
    await unlink(path);
  } catch (err) {
    logger.debug("Temp file cleanup skipped", { path, error: errorMessage(err) });
  }
}

/**
 * Write through a temp file in the same directory and rename it into place,
 * so a crash never leaves a partial file at `target`.
 */
export async function writeFileAtomic(target: string, data: Uint8Array | string): Promise<void> {
  const tempPath = tempPathFor(target);
  try {
    await mkdir(dirname(target), { recursive: true });
    await writeFile(tempPath, data);
    await rename(tempPath, target);
  } catch (error) {
    await safeUnlink(tempPath);
    throw error;
  }
}

/**
 * Same as `writeFileAtomic` for content produced by a callback that writes
 * the temp path itself.
 */
export async function produceFileAtomic(target: string, produce: (tempPath: string) => Promise<unknown>): Promise<void> {
  const tempPath = tempPathFor(target);
  try {
    await mkdir(dirname(target), { recursive: true });
    await produce(tempPath);
    await rename(tempPath, target);
  } catch (error) {
    await safeUnlink(tempPath);
    throw error;
  }
}
