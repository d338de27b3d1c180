/**
 * Health check routes.
 */

import { Elysia } from "elysia";
import type { HealthResponse } from "../types";

export const healthRoutes = new Elysia({ name: "health" })
  .get("/health", (): HealthResponse => ({
    status: "ok",
    timestamp: Date.now(),
  }), {
    detail: {
      tags: ["Health"],
      summary: "Health check",
      description: "Returns server health status",
    },
  });
