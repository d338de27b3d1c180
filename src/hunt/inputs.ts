/**
 * Fixed input sequences used by the encounter loop.
 */

import type { Button, Direction, InputSequence, InputStep } from "../types";

const OPPOSITE: Record<Direction, Direction> = {
  up: "down",
  down: "up",
  left: "right",
  right: "left",
};

export function opposite(direction: Direction): Direction {
  return OPPOSITE[direction];
}

export function press(buttons: Button | Button[], holdFrames: number, releaseFrames: number): InputStep {
  return { buttons: Array.isArray(buttons) ? buttons : [buttons], holdFrames, releaseFrames };
}

/**
 * A one-frame tap turns the player in place without stepping forward.
 */
export function turnInPlace(direction: Direction): InputSequence {
  return [press(direction, 1, 20)];
}

// Frames
export const BATTLE_INTRO_WAIT = 400;
export const RUN_MENU_WAIT = 320;
export const FLEE_EXIT_WAIT = 250;

/**
 * From the battle intro to the overworld: dismiss the intro text, move the
 * cursor to RUN, confirm and clear the "Got away safely!" box.
 * The numbers are the waits before each group of presses.
 */
export const RETREAT_STEPS: ReadonlyArray<{ waitFrames: number; inputs: InputSequence }> = [
  { waitFrames: BATTLE_INTRO_WAIT, inputs: [press("a", 10, 20)] },
  { waitFrames: RUN_MENU_WAIT, inputs: [press("down", 15, 20), press("right", 15, 20), press("a", 15, 40)] },
  { waitFrames: 0, inputs: [press("a", 10, 40)] },
  { waitFrames: FLEE_EXIT_WAIT, inputs: [] },
];
