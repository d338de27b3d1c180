/**
 * Runs a session to completion, absorbing emulator failures up to a bound.
 *
 * Every capability failure triggers a full restart (reload + re-prime), so
 * a fleeing hunt that loses track of the battle falls back to a reset.
 * Reaching `errorLimit` consecutive failures ends the hunt.
 */

import { errorMessage, isCapabilityError } from "../errors";
import type { SessionSnapshot } from "../types";
import { logger } from "../utils/logger";
import type { EncounterSession } from "./session";

export const DEFAULT_ERROR_LIMIT = 3;

export interface SupervisorOptions {
  errorLimit?: number;
}

export async function superviseHunt(
  session: EncounterSession,
  { errorLimit = DEFAULT_ERROR_LIMIT }: SupervisorOptions = {},
): Promise<SessionSnapshot> {
  let consecutiveErrors = 0;
  let needsRestart = true;

  while (!session.isTerminal) {
    if (session.abortSignal?.aborted && needsRestart) {
      session.terminate("aborted");
      break;
    }

    try {
      if (needsRestart) {
        await session.restart();
        needsRestart = false;
      }
      await session.step();
      if (consecutiveErrors > 0) {
        consecutiveErrors = 0;
        session.setConsecutiveErrors(0);
      }
    } catch (err) {
      if (!isCapabilityError(err)) throw err;

      consecutiveErrors++;
      session.setConsecutiveErrors(consecutiveErrors);
      logger.warn("Emulator operation failed", {
        operation: err.operation,
        error: errorMessage(err),
        consecutiveErrors,
        errorLimit,
      });

      if (consecutiveErrors >= errorLimit) {
        session.terminate("error-limit");
        break;
      }
      needsRestart = true;
    }
  }

  return session.snapshot();
}
