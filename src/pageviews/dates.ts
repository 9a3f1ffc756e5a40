import type { Granularity } from "./types.js";

const TIMESTAMP_PATTERN = /^(\d{4})(\d{2})(\d{2})(\d{2})?$/;

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Parses an upstream `YYYYMMDD` or `YYYYMMDDHH` stamp as a UTC instant.
 * Returns null when the digits do not name a real calendar hour.
 */
export function parseApiTimestamp(value: string): Date | null {
  const match = TIMESTAMP_PATTERN.exec(value.trim());
  if (!match) {
    return null;
  }

  const [, yearText, monthText, dayText, hourText] = match;
  const year = Number(yearText);
  const month = Number(monthText);
  const day = Number(dayText);
  const hour = Number(hourText ?? "00");
  const date = new Date(Date.UTC(year, month - 1, day, hour));

  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day ||
    date.getUTCHours() !== hour
  ) {
    return null;
  }

  return date;
}

export function formatApiTimestamp(date: Date): string {
  const y = String(date.getUTCFullYear()).padStart(4, "0");
  const m = String(date.getUTCMonth() + 1).padStart(2, "0");
  const d = String(date.getUTCDate()).padStart(2, "0");
  const h = String(date.getUTCHours()).padStart(2, "0");
  return `${y}${m}${d}${h}`;
}

export function startOfUtcDay(date: Date): Date {
  return new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()));
}

export function daysBefore(date: Date, days: number): Date {
  return new Date(date.getTime() - days * DAY_MS);
}

/**
 * Lists the bucket starts between `start` and `end`, both inclusive.
 * Daily buckets drop the hour, monthly buckets sit on the first of the month.
 */
export function enumerateBuckets(start: Date, end: Date, granularity: Granularity): Date[] {
  const buckets: Date[] = [];
  let cursor = alignToBucket(start, granularity);

  while (cursor.getTime() <= end.getTime()) {
    buckets.push(cursor);
    cursor = nextBucket(cursor, granularity);
  }

  return buckets;
}

export function alignToBucket(date: Date, granularity: Granularity): Date {
  if (granularity === "hourly") {
    return new Date(
      Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate(), date.getUTCHours())
    );
  }

  if (granularity === "daily") {
    return startOfUtcDay(date);
  }

  return new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), 1));
}

function nextBucket(date: Date, granularity: Granularity): Date {
  if (granularity === "hourly") {
    return new Date(date.getTime() + 60 * 60 * 1000);
  }

  if (granularity === "daily") {
    return new Date(date.getTime() + DAY_MS);
  }

  return new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth() + 1, 1));
}
