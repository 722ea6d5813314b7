import { addDaysUtc } from "../ingest/utils";

const DATE_RE = /^\d{4}-\d{2}-\d{2}$/;

export function isIsoDate(value: string): boolean {
  if (!DATE_RE.test(value)) return false;
  const parsed = new Date(`${value}T00:00:00Z`);
  return !Number.isNaN(parsed.getTime()) && parsed.toISOString().slice(0, 10) === value;
}

export function formatDateInTimeZone(now: Date, timeZone: string): string {
  // throws RangeError for an unknown zone
  const parts = new Intl.DateTimeFormat("en-US", {
    timeZone,
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
  }).formatToParts(now);
  const get = (type: Intl.DateTimeFormatPartTypes) => parts.find((part) => part.type === type)?.value ?? "";
  return `${get("year")}-${get("month")}-${get("day")}`;
}

/** The calendar day before `now` in `timeZone`, as YYYY-MM-DD. */
export function resolveReferenceDate(now: Date, timeZone: string): string {
  return addDaysUtc(formatDateInTimeZone(now, timeZone), -1);
}
