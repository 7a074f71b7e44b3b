const DAY_MS = 24 * 60 * 60 * 1000;

export interface EntitlementTerm {
  startDate: Date;
  endDate: Date;
}

export function termFrom(now: Date, durationDays: number): EntitlementTerm {
  return {
    startDate: new Date(now.getTime()),
    endDate: new Date(now.getTime() + durationDays * DAY_MS),
  };
}

/** An open-ended term (no end date) never lapses. */
export function isWithinTerm(endDate: Date | undefined, now: Date): boolean {
  return !endDate || now.getTime() <= endDate.getTime();
}
