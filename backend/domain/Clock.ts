// Clock provider for "current date" comparisons.
// Validation reads the clock at validation time; nothing caches "today".

export type ISODateString = string;
export type ISODateTimeString = string;

export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date(),
};

export function fixedClock(at: Date | string): Clock {
  const ms = typeof at === "string" ? Date.parse(at) : at.getTime();
  if (!Number.isFinite(ms)) throw new Error(`Invalid clock instant: ${String(at)}`);
  return { now: () => new Date(ms) };
}

// Calendar date (UTC) of an instant, e.g. "2026-10-18".
export function toISODate(instant: Date): ISODateString {
  return instant.toISOString().slice(0, 10);
}
