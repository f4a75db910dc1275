// src/engine/constants.ts

// Gaps between recorded actions longer than this are clamped when a replay is saved.
export const MAX_ACTION_DELAY_MS = 3000;

// Leaving a level after this many throws counts as a failed attempt.
export const MIN_THROWS_FOR_ATTEMPT = 3;

// Hiscores are displayed with three digits.
export const MAX_HISCORE = 999;

// Level pack limits.
export const MAX_LEVEL_SIZE = 7;
export const MIN_LEVEL_SIZE = 1;
