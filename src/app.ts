/**
 * Shiny hunter status API.
 *
 * Read-only view of the running hunt. The server never drives the
 * emulator; it reports what the session publishes into `state`.
 */

import { Elysia } from "elysia";
import { swagger } from "@elysiajs/swagger";

import { healthRoutes } from "./routes/health";
import { statusRoutes } from "./routes/status";

export type AppConfig = ConstructorParameters<typeof Elysia>[0];

export function createApp(config: AppConfig = {}) {
  return new Elysia(config)
    .use(swagger({
      path: "/swagger",
      documentation: {
        info: {
          title: "Shiny Hunter Status API",
          version: "1.0.0",
          description: `
# Shiny Hunter

Automated shiny hunting against a RetroArch emulator.

## Quick Start
1. \`GET /status\`: current session snapshot and recorded finds
2. \`GET /status/summary\`: compact progress view
3. \`GET /health\`: liveness
          `,
        },
        tags: [
          { name: "Status", description: "Hunt progress and finds" },
          { name: "Health", description: "Health check endpoints" },
        ],
      },
    }))
    .use(healthRoutes)
    .use(statusRoutes);
}
