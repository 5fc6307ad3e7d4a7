export type IsoDateTime = {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
};

const ISO_DATE_TIME_RE =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.\d+)?)?)?(?:Z|[+-]\d{2}(?::?\d{2})?)?$/i;

/**
 * Reads the wall-clock fields of an ISO-8601 timestamp as written. The offset
 * is accepted but not applied: `2024-03-05T09:00:00-08:00` stays 09:00.
 */
export function parseIsoDateTime(value: string): IsoDateTime | null {
  const m = ISO_DATE_TIME_RE.exec(value.trim());
  if (!m) {
    return null;
  }
  const dt: IsoDateTime = {
    year: Number(m[1]),
    month: Number(m[2]),
    day: Number(m[3]),
    hour: Number(m[4] ?? 0),
    minute: Number(m[5] ?? 0),
    second: Number(m[6] ?? 0),
  };
  if (dt.month < 1 || dt.month > 12 || dt.day < 1 || dt.day > 31) {
    return null;
  }
  if (dt.hour > 23 || dt.minute > 59 || dt.second > 59) {
    return null;
  }
  return dt;
}

function pad2(n: number): string {
  return String(n).padStart(2, "0");
}

/** YYYY-MM-DD */
export function formatDate(dt: IsoDateTime): string {
  return `${String(dt.year).padStart(4, "0")}-${pad2(dt.month)}-${pad2(dt.day)}`;
}

/** HH:MM */
export function formatTime(dt: IsoDateTime): string {
  return `${pad2(dt.hour)}:${pad2(dt.minute)}`;
}

/** HH:MM:SS */
export function formatClock(dt: IsoDateTime): string {
  return `${formatTime(dt)}:${pad2(dt.second)}`;
}

/** YYYY-MM-DD HH:MM */
export function formatDateTime(dt: IsoDateTime): string {
  return `${formatDate(dt)} ${formatTime(dt)}`;
}
