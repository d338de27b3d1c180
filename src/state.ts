/**
 * Shared hunt status, read by the HTTP status routes.
 *
 * The running session reports into this module through `statusListener`;
 * nothing here touches the emulator.
 */

import type { SessionListener } from "./hunt/session";
import type { EncounterResult, FindMetadata, SessionSnapshot, StatusResponse } from "./types";

// Most recent finds kept in memory for the status endpoint
const MAX_FINDS = 50;

let currentSession: SessionSnapshot | null = null;
let finds: FindMetadata[] = [];

export function getSessionSnapshot(): SessionSnapshot | null {
  return currentSession;
}

export function getFinds(): FindMetadata[] {
  return [...finds];
}

export function getStatus(now: number = Date.now()): StatusResponse {
  return {
    session: currentSession,
    finds: getFinds(),
    serverTime: now,
  };
}

export function updateSession(snapshot: SessionSnapshot): void {
  currentSession = snapshot;
}

export function recordEncounter(result: EncounterResult): void {
  if (currentSession) {
    currentSession = { ...currentSession, lastEncounter: result };
  }
}

export function addFind(metadata: FindMetadata): void {
  finds = [...finds, metadata].slice(-MAX_FINDS);
}

export function resetStatus(): void {
  currentSession = null;
  finds = [];
}

export const statusListener: SessionListener = {
  onUpdate: updateSession,
  onEncounter: recordEncounter,
  onFind: addFind,
};
