/**
 * Hunt status routes (read-only).
 */

import { Elysia } from "elysia";
import { getFinds, getSessionSnapshot, getStatus } from "../state";
import { SHINY_ODDS } from "../services/shiny";

export const statusRoutes = new Elysia({ name: "status" })
  .get("/status", () => getStatus(), {
    detail: {
      tags: ["Status"],
      summary: "Current hunt status",
      description: "State machine position, attempt count, rate, consecutive errors, last encounter and finds.",
    },
  })

  .get("/status/summary", () => {
    const session = getSessionSnapshot();
    if (!session) {
      return { running: false, attempts: 0, finds: getFinds().length, expectedSecondsAtOdds: null };
    }

    return {
      running: session.state !== "Terminal",
      location: session.location,
      state: session.state,
      attempts: session.attempts,
      elapsedSeconds: Math.floor(session.elapsedMs / 1000),
      finds: getFinds().length,
      expectedSecondsAtOdds:
        session.attemptsPerSecond > 0 ? Math.round(SHINY_ODDS / session.attemptsPerSecond) : null,
    };
  }, {
    detail: {
      tags: ["Status"],
      summary: "Compact hunt summary",
      description: "One-line friendly view: running flag, attempts, finds and the expected time at base odds.",
    },
  });
