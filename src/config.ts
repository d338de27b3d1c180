/**
 * Runtime configuration.
 *
 * Plain settings are read from the environment once at load time; the hunt
 * options are validated with zod so a bad value fails before any emulator
 * I/O happens.
 */

import "dotenv/config";
import { z } from "zod";
import { DIRECTIONS, type Direction, type HuntStrategy, type OwnerPair } from "./types";
import { resolveContext, type ResolvedHunt } from "./services/species";

// ─── Emulator ───────────────────────────────────────────────────────────────

export interface EmulatorConfig {
  host: string;
  memoryPort: number;
  inputPort: number;
  timeoutMs: number;
  retries: number;
  /** Slot file RetroArch reads on LOAD_STATE and writes on SAVE_STATE */
  statePath: string;
}

export function loadEmulatorConfig(env: NodeJS.ProcessEnv = process.env): EmulatorConfig {
  return {
    host: env.EMULATOR_HOST || "127.0.0.1",
    memoryPort: parseInt(env.EMULATOR_MEMORY_PORT || "55355", 10),
    inputPort: parseInt(env.EMULATOR_INPUT_PORT || "55400", 10),
    timeoutMs: parseInt(env.UDP_TIMEOUT_MS || "2000", 10),
    retries: parseInt(env.UDP_RETRIES || "3", 10),
    statePath: env.RETROARCH_STATE_PATH || "states/hunt.state",
  };
}

// ─── Server ─────────────────────────────────────────────────────────────────

/** Status API port; 0 disables the server */
export function loadStatusPort(env: NodeJS.ProcessEnv = process.env): number {
  return parseInt(env.STATUS_PORT || "0", 10);
}

// ─── Hunt options ───────────────────────────────────────────────────────────

const intFromEnv = (fallback: number | undefined) =>
  z.preprocess((v) => (v === undefined || v === "" ? fallback : Number(v)), z.number().int());

const optionalIntFromEnv = z.preprocess(
  (v) => (v === undefined || v === "" ? null : Number(v)),
  z.number().int().positive().nullable(),
);

export const huntEnvSchema = z.object({
  HUNT_LOCATION: z.string().min(1).default("torchic"),
  HUNT_TARGET: z
    .string()
    .optional()
    .transform((v) => (v ? v : null)),
  HUNT_STRATEGY: z.enum(["reset", "flee"]).optional(),
  HUNT_INITIAL_FACING: z.enum(DIRECTIONS).default("down"),
  HUNT_BASE_SNAPSHOT: z.string().min(1, "HUNT_BASE_SNAPSHOT must point at a save state"),
  TRAINER_ID: intFromEnv(undefined).pipe(z.number().min(0).max(0xffff)),
  SECRET_ID: intFromEnv(undefined).pipe(z.number().min(0).max(0xffff)),
  HUNT_MAX_ATTEMPTS: optionalIntFromEnv,
  HUNT_ERROR_LIMIT: intFromEnv(3).pipe(z.number().min(1)),
  HUNT_MAX_POLLS: intFromEnv(600).pipe(z.number().min(1)),
  FINDS_DIR: z.string().min(1).default("finds"),
});

export interface HuntOptions {
  hunt: ResolvedHunt;
  strategy: HuntStrategy;
  initialFacing: Direction;
  baseSnapshot: string;
  owner: OwnerPair;
  maxAttempts: number | null;
  errorLimit: number;
  maxPollsPerAttempt: number;
  findsDir: string;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/**
 * Validate the hunt section of the environment and resolve the location.
 */
export function loadHuntOptions(env: NodeJS.ProcessEnv = process.env): HuntOptions {
  const parsed = huntEnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new ConfigError(`Invalid hunt configuration:\n  ${issues.join("\n  ")}`);
  }

  const values = parsed.data;
  let hunt: ResolvedHunt;
  try {
    hunt = resolveContext(values.HUNT_LOCATION, values.HUNT_TARGET);
  } catch (err) {
    throw new ConfigError(err instanceof Error ? err.message : String(err));
  }

  const strategy = values.HUNT_STRATEGY ?? hunt.location.strategy;
  if (strategy === "flee" && hunt.location.window === "party") {
    throw new ConfigError(`${hunt.location.name} is a starter location; only the reset strategy applies`);
  }

  return {
    hunt,
    strategy,
    initialFacing: values.HUNT_INITIAL_FACING,
    baseSnapshot: values.HUNT_BASE_SNAPSHOT,
    owner: { trainerId: values.TRAINER_ID, secretId: values.SECRET_ID },
    maxAttempts: values.HUNT_MAX_ATTEMPTS,
    errorLimit: values.HUNT_ERROR_LIMIT,
    maxPollsPerAttempt: values.HUNT_MAX_POLLS,
    findsDir: values.FINDS_DIR,
  };
}
