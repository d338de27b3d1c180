/**
 * Shiny hunter entry point.
 *
 * Validates configuration, then runs one supervised hunt against RetroArch.
 * When STATUS_PORT is set the status API is served alongside.
 */

import { access } from "fs/promises";
import { node } from "@elysiajs/node";

import { createApp } from "./app";
import { ConfigError, loadHuntOptions, loadStatusPort } from "./config";
import { errorMessage } from "./errors";
import { EncounterSession } from "./hunt/session";
import { superviseHunt } from "./hunt/supervisor";
import { FileFindRecorder } from "./services/artifacts";
import { RetroArchEmulator } from "./services/emulator";
import { statusListener } from "./state";
import { logger } from "./utils/logger";

async function main(): Promise<number> {
  const options = loadHuntOptions();
  try {
    await access(options.baseSnapshot);
  } catch {
    throw new ConfigError(`Base snapshot not found: ${options.baseSnapshot}`);
  }

  const { location, targetFilter } = options.hunt;
  logger.info(`Hunting at ${location.name}`, {
    strategy: options.strategy,
    window: location.window,
    species: location.species.map((s) => s.name),
    target: targetFilter ? [...targetFilter] : "any",
    maxAttempts: options.maxAttempts,
  });

  const emulator = new RetroArchEmulator();
  const recorder = new FileFindRecorder(options.findsDir, emulator);
  const controller = new AbortController();
  process.once("SIGINT", () => {
    logger.info("Interrupt received, stopping after the current attempt");
    controller.abort();
  });

  const session = new EncounterSession(options, {
    emulator,
    recorder,
    signal: controller.signal,
    listener: statusListener,
  });

  const port = loadStatusPort();
  const app = port > 0 ? createApp({ adapter: node() }).listen(port) : null;
  if (app) {
    logger.info(`Status API at http://localhost:${port}`, { swagger: `http://localhost:${port}/swagger` });
  }

  const result = await superviseHunt(session, { errorLimit: options.errorLimit });
  logger.info("Hunt summary", {
    reason: result.terminalReason,
    attempts: result.attempts,
    elapsedMs: result.elapsedMs,
  });

  await app?.stop();
  return result.terminalReason === "error-limit" ? 1 : 0;
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    if (err instanceof ConfigError) logger.error(err.message);
    else logger.error("Hunt crashed", { error: errorMessage(err) });
    process.exitCode = 1;
  },
);
