import { asArray, getString, isRecord } from "../lib/object-type-guards.ts";

type UnknownRecord = Record<string, unknown>;

function record(value: unknown): UnknownRecord {
  return isRecord(value) ? value : {};
}

export function getTitle(doc: UnknownRecord): string {
  return getString(doc.title) || "Untitled";
}

/**
 * Attendee names from the document's people list, falling back to the
 * calendar invite (minus the user themself) when that list is empty.
 */
export function getAttendees(doc: UnknownRecord): string[] {
  const attendees: string[] = [];
  for (const att of asArray(record(doc.people).attendees)) {
    const a = record(att);
    const name = getString(a.name) || getString(a.email) || "";
    if (name) {
      attendees.push(name);
    }
  }

  if (attendees.length === 0) {
    for (const att of asArray(record(doc.google_calendar_event).attendees)) {
      const a = record(att);
      const name = getString(a.displayName) || getString(a.email) || "";
      if (name && !a.self) {
        attendees.push(name);
      }
    }
  }
  return attendees;
}

export function getMeetingTime(doc: UnknownRecord): { start: string; end: string } {
  const cal = record(doc.google_calendar_event);
  return {
    start: getString(record(cal.start).dateTime) ?? "",
    end: getString(record(cal.end).dateTime) ?? "",
  };
}

export function getNotes(doc: UnknownRecord): string {
  return (getString(doc.notes_markdown) ?? "").trim() || (getString(doc.notes_plain) ?? "").trim();
}

/** Most recently created panel titled "Summary", or null. */
export function pickSummaryPanel(docPanels: unknown): UnknownRecord | null {
  if (!isRecord(docPanels)) {
    return null;
  }
  const createdAt = (p: UnknownRecord) => getString(p.created_at) ?? "";
  const summaries = Object.values(docPanels)
    .filter(isRecord)
    .filter((p) => p.title === "Summary")
    .sort((a, b) => {
      const ka = createdAt(a);
      const kb = createdAt(b);
      return ka === kb ? 0 : ka < kb ? 1 : -1;
    });
  return summaries[0] ?? null;
}
