/**
 * Date helpers: everything is UTC instants; the clock is injected so tests can pin "now".
 */

export type Clock = { now(): Date };

export const systemClock: Clock = {
  now: () => new Date(),
};

/** A clock that only moves when told to. */
export function fixedClock(start: Date | string): Clock & { set(d: Date | string): void; advance(ms: number): void } {
  let current = toDate(start);
  return {
    now: () => new Date(current.getTime()),
    set: (d) => {
      current = toDate(d);
    },
    advance: (ms) => {
      current = new Date(current.getTime() + ms);
    },
  };
}

export function toDate(d: Date | string | number): Date {
  return d instanceof Date ? d : new Date(d);
}

export function isValidDate(d: Date): boolean {
  return !Number.isNaN(d.getTime());
}

/** ISO UTC (without milliseconds) for logs/debug. */
export function isoUTC(d: Date | string | number): string {
  return toDate(d).toISOString().replace(/\.\d{3}Z$/, "Z");
}

export const DAY_MS = 24 * 60 * 60 * 1000;

export function addDays(d: Date, days: number): Date {
  return new Date(d.getTime() + days * DAY_MS);
}
