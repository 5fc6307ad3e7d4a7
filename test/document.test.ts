import { describe, expect, test } from "vitest";
import {
  getAttendees,
  getMeetingTime,
  getNotes,
  pickSummaryPanel,
} from "../src/granola/document.ts";
import { formatTranscript } from "../src/granola/transcript.ts";

describe("getAttendees", () => {
  test("prefers the people list", () => {
    const doc = {
      people: { attendees: [{ name: "Ann" }, { email: "bob@example.com" }, {}] },
      google_calendar_event: { attendees: [{ displayName: "Ignored" }] },
    };
    expect(getAttendees(doc)).toEqual(["Ann", "bob@example.com"]);
  });

  test("falls back to calendar attendees, skipping self", () => {
    const doc = {
      people: null,
      google_calendar_event: {
        attendees: [
          { displayName: "Me", self: true },
          { displayName: "Cara" },
          { email: "dan@example.com" },
        ],
      },
    };
    expect(getAttendees(doc)).toEqual(["Cara", "dan@example.com"]);
  });
});

describe("document fields", () => {
  test("meeting time comes from the calendar event", () => {
    expect(
      getMeetingTime({
        google_calendar_event: { start: { dateTime: "s" }, end: { dateTime: "e" } },
      }),
    ).toEqual({ start: "s", end: "e" });
    expect(getMeetingTime({})).toEqual({ start: "", end: "" });
  });

  test("notes fall back from markdown to plain text", () => {
    expect(getNotes({ notes_markdown: " md ", notes_plain: "plain" })).toBe("md");
    expect(getNotes({ notes_markdown: null, notes_plain: " plain " })).toBe("plain");
    expect(getNotes({})).toBe("");
  });

  test("picks the most recent Summary panel", () => {
    const panels = {
      p1: { title: "Summary", created_at: "2024-04-01T10:00:00Z", id: "old" },
      p2: { title: "Action items", created_at: "2024-05-01T10:00:00Z", id: "other" },
      p3: { title: "Summary", created_at: "2024-04-02T10:00:00Z", id: "new" },
      p4: "junk",
    };
    expect(pickSummaryPanel(panels)?.id).toBe("new");
    expect(pickSummaryPanel({ p2: panels.p2 })).toBeNull();
    expect(pickSummaryPanel(undefined)).toBeNull();
  });
});

describe("formatTranscript", () => {
  test("timestamps entries that have a parseable start time", () => {
    const entries = [
      { text: " hello ", start_timestamp: "2024-03-05T14:30:05.123Z" },
      { text: "  " },
      { text: "no time" },
      { text: "bad", start_timestamp: "nope" },
      "junk",
    ];
    expect(formatTranscript(entries)).toBe("**[14:30:05]** hello\n\nno time\n\nbad");
  });

  test("empty input gives empty text", () => {
    expect(formatTranscript([])).toBe("");
  });
});
