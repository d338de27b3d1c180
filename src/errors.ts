/**
 * Error taxonomy for the hunter.
 *
 * - DecodeError: recoverable, the record is treated as unknown.
 * - CapabilityError: emulator I/O failed; retried up to a bound by the supervisor.
 * - MergeError: aborts a single merge invocation; the base container is untouched.
 */

export class DecodeError extends Error {
  readonly kind = "OutOfRange" as const;

  constructor(
    message: string,
    readonly identifier: number,
    readonly lastRawSpecies: number | null,
  ) {
    super(message);
    this.name = "DecodeError";
  }
}

export type CapabilityOperation =
  | "readBytes"
  | "writeBytes"
  | "advanceFrames"
  | "sendInput"
  | "loadSnapshot"
  | "saveSnapshot"
  | "awaitEncounter";

export class CapabilityError extends Error {
  readonly kind = "CapabilityFailure" as const;

  constructor(
    readonly operation: CapabilityOperation,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(`${operation} failed: ${message}`, options);
    this.name = "CapabilityError";
  }
}

export type MergeErrorKind = "NoCapacity" | "CorruptSlot" | "InvalidContainer";

export class MergeError extends Error {
  constructor(
    readonly kind: MergeErrorKind,
    message: string,
    readonly bank: number | null = null,
    readonly slot: number | null = null,
  ) {
    super(message);
    this.name = "MergeError";
  }
}

export function isCapabilityError(err: unknown): err is CapabilityError {
  return err instanceof CapabilityError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
