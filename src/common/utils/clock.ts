/**
 * Injection token for the wall clock.
 *
 * Services that compute "today" take an optional `Clock` so tests can
 * pin the date; production falls back to `systemClock`.
 */
export const CLOCK = "CLOCK";

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();
