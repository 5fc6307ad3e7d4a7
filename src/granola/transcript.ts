import { formatClock, parseIsoDateTime } from "../lib/dates.ts";
import { getString, isRecord } from "../lib/object-type-guards.ts";

/** One line per spoken segment, `**[HH:MM:SS]** text` when the start time parses. */
export function formatTranscript(entries: unknown[]): string {
  const lines: string[] = [];
  for (const entry of entries) {
    if (!isRecord(entry)) {
      continue;
    }
    const text = (getString(entry.text) ?? "").trim();
    if (!text) {
      continue;
    }
    const dt = parseIsoDateTime(getString(entry.start_timestamp) ?? "");
    lines.push(dt ? `**[${formatClock(dt)}]** ${text}` : text);
  }
  return lines.join("\n\n");
}
