import { join } from "node:path";
import { describe, expect, test } from "vitest";
import { formatDateTime, parseIsoDateTime } from "../src/lib/dates.ts";
import { datedNotePath, sanitizeFilename } from "../src/lib/filename.ts";

describe("sanitizeFilename", () => {
  test("drops reserved characters and collapses whitespace", () => {
    expect(sanitizeFilename('Q3: "Plan" / review?')).toBe("Q3 Plan review");
  });

  test("cuts long titles at a word boundary", () => {
    expect(sanitizeFilename("word ".repeat(30))).toBe("word ".repeat(16).trim());
  });

  test("falls back to Untitled", () => {
    expect(sanitizeFilename("")).toBe("Untitled");
    expect(sanitizeFilename("???")).toBe("Untitled");
  });
});

describe("parseIsoDateTime", () => {
  test("keeps the wall clock as written", () => {
    const dt = parseIsoDateTime("2024-03-05T09:07:00-08:00");
    expect(dt && formatDateTime(dt)).toBe("2024-03-05 09:07");
  });

  test("accepts bare dates and rejects nonsense", () => {
    expect(parseIsoDateTime("2024-03-05")).toEqual({
      year: 2024,
      month: 3,
      day: 5,
      hour: 0,
      minute: 0,
      second: 0,
    });
    expect(parseIsoDateTime("2024-13-01")).toBeNull();
    expect(parseIsoDateTime("March 5")).toBeNull();
  });
});

describe("datedNotePath", () => {
  test("files notes by year and month", () => {
    expect(
      datedNotePath({ root: "/out", title: "Sync", createdAt: "2024-03-05T14:30:00Z" }),
    ).toBe(join("/out", "2024", "2024-03", "2024-03-05 - Sync.md"));
  });

  test("uses the current date when created_at is unusable", () => {
    expect(
      datedNotePath({
        root: "/out",
        title: "Sync",
        createdAt: "unknown",
        now: () => new Date(2023, 0, 9),
      }),
    ).toBe(join("/out", "2023", "2023-01", "2023-01-09 - Sync.md"));
  });
});
