import { join } from "node:path";
import { formatDate, parseIsoDateTime, type IsoDateTime } from "./dates.ts";

const MAX_TITLE_LENGTH = 80;

export function sanitizeFilename(name: string): string {
  let cleaned = name.replace(/[<>:"/\\|?*]/g, "");
  cleaned = cleaned.replace(/\s+/g, " ").trim();
  if (cleaned.length > MAX_TITLE_LENGTH) {
    const cut = cleaned.slice(0, MAX_TITLE_LENGTH);
    const lastSpace = cut.lastIndexOf(" ");
    cleaned = lastSpace === -1 ? cut : cut.slice(0, lastSpace);
  }
  return cleaned || "Untitled";
}

/**
 * `<root>/YYYY/YYYY-MM/YYYY-MM-DD - Title.md`. An unparseable date files the
 * note under `now`.
 */
export function datedNotePath(input: {
  root: string;
  title: string;
  createdAt: string | undefined;
  now?: () => Date;
}): string {
  const dt = parseIsoDateTime(input.createdAt ?? "") ?? fromDate((input.now ?? (() => new Date()))());
  const year = String(dt.year).padStart(4, "0");
  const month = `${year}-${String(dt.month).padStart(2, "0")}`;
  return join(input.root, year, month, `${formatDate(dt)} - ${sanitizeFilename(input.title)}.md`);
}

function fromDate(d: Date): IsoDateTime {
  return {
    year: d.getFullYear(),
    month: d.getMonth() + 1,
    day: d.getDate(),
    hour: d.getHours(),
    minute: d.getMinutes(),
    second: d.getSeconds(),
  };
}
