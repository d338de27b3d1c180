/**
 * Encounter session: drives one hunt from a base snapshot until an eligible
 * record is found or a stop condition is met.
 *
 *   Idle → Priming → AwaitingEncounter → RecordDetected → Evaluated
 *        → Success → Terminal
 *        → Continuing → Priming (reset) | AwaitingEncounter (flee)
 *
 * I/O failures surface as CapabilityError and are handled by the supervisor.
 */

import type { HuntOptions } from "../config";
import { CapabilityError } from "../errors";
import type { FindRecorder } from "../services/artifacts";
import { decodeWindow, type DecodeResult } from "../services/codec";
import type { EmulationCapability } from "../services/emulator";
import {
  ENEMY_PARTY_ADDR,
  PARTY_RECORD_SIZE,
  PARTY_SLOT_1_ADDR,
  RNG_SEED_ADDR,
  readU32LE,
  u32ToBytes,
} from "../services/memory";
import { SHINY_ODDS, isShiny } from "../services/shiny";
import type {
  Direction,
  EncounterResult,
  FindMetadata,
  SessionSnapshot,
  SessionState,
  TerminalReason,
} from "../types";
import { hex, logger } from "../utils/logger";
import { RETREAT_STEPS, opposite, turnInPlace } from "./inputs";
import { mathRandom, type RandomSource } from "./random";

export type SessionOptions = Pick<
  HuntOptions,
  "hunt" | "strategy" | "initialFacing" | "baseSnapshot" | "owner" | "maxAttempts" | "maxPollsPerAttempt"
>;

/**
 * Observers of session progress (status registry, notifications).
 */
export interface SessionListener {
  onUpdate?(snapshot: SessionSnapshot): void;
  onEncounter?(result: EncounterResult): void;
  onFind?(metadata: FindMetadata): void;
}

export interface SessionDeps {
  emulator: EmulationCapability;
  recorder: FindRecorder;
  random?: RandomSource;
  /** Milliseconds; injectable for tests */
  clock?: () => number;
  signal?: AbortSignal;
  listener?: SessionListener;
}

// Frames
const POLL_FRAMES = 10;
const SETTLE_FRAMES = 20;
const RECORD_STABILIZE_FRAMES = 30;

const STATUS_EVERY_ATTEMPTS = 10;
const STATUS_EVERY_MS = 5 * 60 * 1000;

export class EncounterSession {
  private state: SessionState = "Idle";
  private facing: Direction;
  private attempts = 0;
  private consecutiveErrors = 0;
  private lastIdentifier = 0;
  private lastResult: EncounterResult | null = null;
  private terminalReason: TerminalReason | null = null;
  private readonly startedAt: number;
  private lastStatusAt: number;

  private readonly emulator: EmulationCapability;
  private readonly recorder: FindRecorder;
  private readonly random: RandomSource;
  private readonly clock: () => number;
  private readonly signal: AbortSignal | undefined;
  private readonly listener: SessionListener | undefined;
  private readonly windowAddress: number;

  constructor(
    private readonly options: SessionOptions,
    deps: SessionDeps,
  ) {
    this.emulator = deps.emulator;
    this.recorder = deps.recorder;
    this.random = deps.random ?? mathRandom;
    this.clock = deps.clock ?? Date.now;
    this.signal = deps.signal;
    this.listener = deps.listener;
    this.facing = options.initialFacing;
    this.windowAddress = options.hunt.location.window === "party" ? PARTY_SLOT_1_ADDR : ENEMY_PARTY_ADDR;
    this.startedAt = this.clock();
    this.lastStatusAt = this.startedAt;
  }

  get isTerminal(): boolean {
    return this.state === "Terminal";
  }

  get currentState(): SessionState {
    return this.state;
  }

  get currentFacing(): Direction {
    return this.facing;
  }

  get reason(): TerminalReason | null {
    return this.terminalReason;
  }

  get abortSignal(): AbortSignal | undefined {
    return this.signal;
  }

  setConsecutiveErrors(count: number): void {
    this.consecutiveErrors = count;
    this.notify();
  }

  snapshot(): SessionSnapshot {
    const elapsedMs = this.clock() - this.startedAt;
    return {
      location: this.options.hunt.location.key,
      strategy: this.options.strategy,
      state: this.state,
      facing: this.facing,
      attempts: this.attempts,
      elapsedMs,
      attemptsPerSecond: elapsedMs > 0 ? this.attempts / (elapsedMs / 1000) : 0,
      consecutiveErrors: this.consecutiveErrors,
      lastEncounter: this.lastResult,
      terminalReason: this.terminalReason,
    };
  }

  private notify(): void {
    this.listener?.onUpdate?.(this.snapshot());
  }

  private transition(next: SessionState): void {
    logger.debug("Session state", { from: this.state, to: next, attempt: this.attempts });
    this.state = next;
    this.notify();
  }

  terminate(reason: TerminalReason): void {
    if (this.state === "Terminal") return;
    this.terminalReason = reason;
    this.transition("Terminal");
    logger.info("Hunt finished", { reason, attempts: this.attempts, elapsedMs: this.clock() - this.startedAt });
  }

  private async readIdentifier(): Promise<number> {
    return readU32LE(await this.emulator.readBytes(this.windowAddress, 4));
  }

  // ─── Phases ───────────────────────────────────────────────────────────────

  /**
   * Reload the base snapshot, take the identifier baseline and prime.
   * Used to start, for every reset, and to recover after a failure.
   */
  async restart(): Promise<void> {
    await this.emulator.loadSnapshot(this.options.baseSnapshot);
    this.facing = this.options.initialFacing;
    this.lastIdentifier = await this.readIdentifier();
    await this.prime();
    this.transition("AwaitingEncounter");
  }

  /**
   * Inject a fresh RNG seed around the location's priming inputs. The seed
   * is only written inside this phase.
   */
  async prime(): Promise<void> {
    this.transition("Priming");
    const seed = this.random.nextU32();

    await this.emulator.advanceFrames(this.random.intBetween(10, 100));
    await this.emulator.writeBytes(RNG_SEED_ADDR, u32ToBytes(seed));
    await this.emulator.advanceFrames(this.random.intBetween(5, 20));
    await this.emulator.sendInput(this.options.hunt.location.priming);
    await this.emulator.writeBytes(RNG_SEED_ADDR, u32ToBytes(seed));
    await this.emulator.advanceFrames(SETTLE_FRAMES);

    logger.debug("Primed", { seed: hex(seed), inputs: this.options.hunt.location.priming.length });
  }

  /**
   * Poll until a new non-zero identifier shows up in the record window.
   * Wild hunts turn in place on every poll, whichever strategy continues them.
   */
  async awaitEncounter(): Promise<number> {
    if (this.state !== "AwaitingEncounter") this.transition("AwaitingEncounter");

    for (let poll = 0; poll < this.options.maxPollsPerAttempt; poll++) {
      if (this.options.hunt.location.kind === "wild") {
        this.facing = opposite(this.facing);
        await this.emulator.sendInput(turnInPlace(this.facing));
      } else {
        await this.emulator.advanceFrames(POLL_FRAMES);
      }

      const identifier = await this.readIdentifier();
      if (identifier !== 0 && identifier !== this.lastIdentifier) {
        this.lastIdentifier = identifier;
        this.transition("RecordDetected");
        return identifier;
      }
    }

    throw new CapabilityError("awaitEncounter", `no new record after ${this.options.maxPollsPerAttempt} polls`);
  }

  /**
   * Decode the detected record and check eligibility. A record that does
   * not decode is never reported as shiny; its eligibility value is kept.
   */
  async evaluate(): Promise<{ result: EncounterResult; window: Uint8Array; decoded: DecodeResult }> {
    await this.emulator.advanceFrames(RECORD_STABILIZE_FRAMES);
    const window = await this.emulator.readBytes(this.windowAddress, PARTY_RECORD_SIZE);
    const identifier = readU32LE(window, 0);

    const decoded = decodeWindow(window, this.options.hunt.context);
    const { shiny: eligible, value } = isShiny(identifier, this.options.owner);
    const shiny = decoded.ok && eligible;
    const { targetFilter } = this.options.hunt;

    this.attempts++;
    const result: EncounterResult = decoded.ok
      ? {
          attempt: this.attempts,
          identifier,
          shiny,
          shinyValue: value,
          species: decoded.record.species,
          speciesName: decoded.record.speciesName,
          isTarget: targetFilter === null || targetFilter.has(decoded.record.species),
          effortValues: decoded.record.effortValues,
          natureName: decoded.record.nature.name,
        }
      : {
          attempt: this.attempts,
          identifier,
          shiny,
          shinyValue: value,
          species: null,
          speciesName: "Unknown",
          isTarget: false,
          effortValues: null,
          natureName: null,
        };

    this.lastResult = result;
    this.transition("Evaluated");

    logger.info(`Attempt ${this.attempts}: ${result.speciesName}`, {
      identifier: hex(identifier),
      shinyValue: value,
      shiny,
      ...(decoded.ok ? { candidate: decoded.record.candidate, correction: decoded.record.correction } : {}),
    });
    if (!decoded.ok) {
      logger.warn("Record could not be decoded", {
        identifier: hex(identifier),
        lastRawSpecies: decoded.error.lastRawSpecies,
        belowThreshold: eligible,
      });
    }

    this.listener?.onEncounter?.(result);
    return { result, window, decoded };
  }

  /**
   * One cycle from AwaitingEncounter to the next AwaitingEncounter or Terminal.
   */
  async step(): Promise<EncounterResult> {
    await this.awaitEncounter();
    const { result, window, decoded } = await this.evaluate();

    if (result.shiny && decoded.ok) {
      await this.succeed(result, window, decoded.record.individualValues);
      return result;
    }

    this.reportProgress();

    if (this.signal?.aborted) {
      this.terminate("aborted");
      return result;
    }
    if (this.options.maxAttempts !== null && this.attempts >= this.options.maxAttempts) {
      this.terminate("max-attempts");
      return result;
    }

    this.transition("Continuing");
    if (this.options.strategy === "reset") {
      await this.restart();
    } else {
      await this.retreat();
    }
    return result;
  }

  private async succeed(
    result: EncounterResult,
    window: Uint8Array,
    individualValues: FindMetadata["individualValues"],
  ): Promise<void> {
    this.transition("Success");
    const elapsedMs = this.clock() - this.startedAt;
    const metadata: FindMetadata = {
      species: result.species,
      speciesName: result.speciesName,
      shinyValue: result.shinyValue,
      identifier: result.identifier,
      effortValues: result.effortValues,
      individualValues,
      natureName: result.natureName,
      attempts: this.attempts,
      elapsedMs,
      location: this.options.hunt.location.key,
      isTarget: result.isTarget,
      foundAt: new Date(this.clock()).toISOString(),
    };

    logger.info(`SHINY ${result.speciesName} found`, {
      attempts: this.attempts,
      shinyValue: result.shinyValue,
      isTarget: result.isTarget,
      elapsedMs,
    });

    await this.recorder.record({ window, metadata });
    this.listener?.onFind?.(metadata);
    this.terminate("found");
  }

  /**
   * Run from the battle and turn back the way we came.
   */
  async retreat(): Promise<void> {
    for (const { waitFrames, inputs } of RETREAT_STEPS) {
      if (waitFrames > 0) await this.emulator.advanceFrames(waitFrames);
      if (inputs.length > 0) await this.emulator.sendInput(inputs);
    }

    this.facing = opposite(this.facing);
    await this.emulator.sendInput(turnInPlace(this.facing));
    this.lastIdentifier = await this.readIdentifier();
    this.transition("AwaitingEncounter");
  }

  private reportProgress(): void {
    const now = this.clock();
    if (this.attempts % STATUS_EVERY_ATTEMPTS !== 0 && now - this.lastStatusAt < STATUS_EVERY_MS) return;
    this.lastStatusAt = now;

    const { attempts, elapsedMs, attemptsPerSecond } = this.snapshot();
    logger.info("Hunt status", {
      attempts,
      elapsedMs,
      attemptsPerSecond: Number(attemptsPerSecond.toFixed(3)),
      expectedMsAtOdds: attemptsPerSecond > 0 ? Math.round((SHINY_ODDS / attemptsPerSecond) * 1000) : null,
    });
  }
}
