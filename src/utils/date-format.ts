const ISO_TIMESTAMP =
  /^((\d{4})-(\d{2})-(\d{2}))(?:[T ]((\d{2}):(\d{2})(?::(\d{2})(?:\.\d+)?)?)(Z|[+-]\d{2}:?\d{2})?)?$/i;

const pad = (value: number): string => String(value).padStart(2, "0");

function normalizeOffset(zone: string | undefined): string {
  if (!zone || zone.toUpperCase() === "Z") {
    return "Z";
  }
  return zone.includes(":") ? zone : `${zone.slice(0, 3)}:${zone.slice(3)}`;
}

// Date.UTC rolls impossible days (Feb 30) into the next month
function isCalendarDate(year: number, month: number, day: number): boolean {
  const candidate = new Date(Date.UTC(year, month - 1, day));
  return (
    candidate.getUTCFullYear() === year &&
    candidate.getUTCMonth() === month - 1 &&
    candidate.getUTCDate() === day
  );
}

/**
 * Parses an ISO-8601 timestamp, treating one without an offset as UTC
 * @returns The instant, or null when the value is not a timestamp
 */
export function parseUtcTimestamp(value: unknown): Date | null {
  if (typeof value !== "string") {
    return null;
  }

  const match = ISO_TIMESTAMP.exec(value.trim());
  if (!match) {
    return null;
  }

  const [, day, year, month, dayOfMonth, time, hours, minutes, seconds, zone] =
    match;
  if (
    !isCalendarDate(Number(year), Number(month), Number(dayOfMonth)) ||
    Number(hours ?? 0) > 23 ||
    Number(minutes ?? 0) > 59 ||
    Number(seconds ?? 0) > 59
  ) {
    return null;
  }

  const date = new Date(
    time ? `${day}T${time}${normalizeOffset(zone)}` : `${day}T00:00:00Z`
  );

  return isNaN(date.getTime()) ? null : date;
}

/**
 * Formats an instant as MM/dd/yyyy HH:mm in UTC
 */
export function formatUtcDate(date: Date): string {
  return (
    `${pad(date.getUTCMonth() + 1)}/${pad(date.getUTCDate())}/${date.getUTCFullYear()} ` +
    `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}`
  );
}
