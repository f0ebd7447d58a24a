const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;
const DAY_MS = 24 * 60 * 60 * 1000;

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Parses a YYYY-MM-DD calendar date as UTC midnight. Rejects rolled-over dates such as 2021-02-30. */
export function parseIsoDate(value: string): Date | undefined {
  const match = ISO_DATE.exec(value.trim());
  if (!match) {
    return undefined;
  }
  const [, y, m, d] = match;
  const date = new Date(Date.UTC(Number(y), Number(m) - 1, Number(d)));
  if (date.getUTCFullYear() !== Number(y) || date.getUTCMonth() !== Number(m) - 1 || date.getUTCDate() !== Number(d)) {
    return undefined;
  }
  return date;
}

export function formatIsoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/** 2024-01-31 -> 20240131 */
export function compactDate(isoDate: string): string {
  return isoDate.replace(/-/g, "");
}

export function addDays(isoDate: string, days: number): string | undefined {
  const date = parseIsoDate(isoDate);
  if (!date) {
    return undefined;
  }
  return formatIsoDate(new Date(date.getTime() + days * DAY_MS));
}

/** Every calendar day from start to end inclusive; empty when start is after end. */
export function eachDay(start: string, end: string): string[] {
  const from = parseIsoDate(start);
  const to = parseIsoDate(end);
  if (!from || !to) {
    return [];
  }
  const days: string[] = [];
  for (let t = from.getTime(); t <= to.getTime(); t += DAY_MS) {
    days.push(formatIsoDate(new Date(t)));
  }
  return days;
}

export function todayIso(): string {
  return formatIsoDate(new Date());
}
