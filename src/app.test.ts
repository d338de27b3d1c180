import { afterEach, describe, expect, it } from "vitest";
import { createApp } from "./app";
import { addFind, resetStatus, updateSession } from "./state";
import type { FindMetadata, SessionSnapshot, StatusResponse } from "./types";

const app = createApp();

function get(path: string): Promise<Response> {
  return app.handle(new Request(`http://localhost${path}`));
}

const snapshot: SessionSnapshot = {
  location: "route_102",
  strategy: "flee",
  state: "AwaitingEncounter",
  facing: "up",
  attempts: 120,
  elapsedMs: 60000,
  attemptsPerSecond: 2,
  consecutiveErrors: 1,
  lastEncounter: null,
  terminalReason: null,
};

const find: FindMetadata = {
  species: 280,
  speciesName: "Ralts",
  shinyValue: 3,
  identifier: 0x1234,
  effortValues: null,
  individualValues: null,
  natureName: "Timid",
  attempts: 120,
  elapsedMs: 60000,
  location: "route_102",
  isTarget: true,
  foundAt: "2026-10-19T08:15:30.123Z",
};

describe("status API", () => {
  afterEach(() => {
    resetStatus();
  });

  it("reports health", async () => {
    const response = await get("/health");

    expect(response.status).toBe(200);
    const body = await response.json();
    expect(body.status).toBe("ok");
    expect(typeof body.timestamp).toBe("number");
  });

  it("returns an empty status before a hunt starts", async () => {
    const body: StatusResponse = await (await get("/status")).json();

    expect(body.session).toBeNull();
    expect(body.finds).toEqual([]);
  });

  it("returns the published session and finds", async () => {
    updateSession(snapshot);
    addFind(find);

    const body: StatusResponse = await (await get("/status")).json();

    expect(body.session).toEqual(snapshot);
    expect(body.finds).toEqual([find]);
  });

  it("summarises progress with the expected time at base odds", async () => {
    updateSession(snapshot);

    const body = await (await get("/status/summary")).json();

    expect(body).toEqual({
      running: true,
      location: "route_102",
      state: "AwaitingEncounter",
      attempts: 120,
      elapsedSeconds: 60,
      finds: 0,
      expectedSecondsAtOdds: 4096,
    });
  });
});
