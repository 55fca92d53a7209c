/**
 * Shared utilities for the firewall pipeline.
 */

export interface Clock {
  /** Unix ms */
  now(): number;
}

export const systemClock: Clock = { now: () => Date.now() };

/** Source of uniform numbers in [0, 1), injectable for sampling decisions. */
export type RandomSource = () => number;

export function secondsToMs(seconds: number): number {
  return Math.round(seconds * 1000);
}

/** Largest delay setTimeout/setInterval honour; anything above fires after 1 ms. */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

