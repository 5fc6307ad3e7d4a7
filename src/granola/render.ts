import { formatDateTime, formatTime, parseIsoDateTime } from "../lib/dates.ts";
import { getString } from "../lib/object-type-guards.ts";
import { getAttendees, getMeetingTime, getNotes, getTitle } from "./document.ts";
import { htmlToMarkdown } from "./html-to-md.ts";

export type SharedNote = {
  doc_id: string;
  title: string;
  created_at: string;
  creator: string;
  attendees: string[];
  summary_html: string;
  source_url: string;
};

function dateLine(created: string): string {
  const dt = parseIsoDateTime(created);
  return `**Date:** ${dt ? formatDateTime(dt) : created}`;
}

function section(heading: string, body: string): string[] {
  return ["---\n", `## ${heading}\n`, `${body}\n`];
}

export function buildMarkdown(
  doc: Record<string, unknown>,
  summaryText: string,
  transcriptText: string,
): string {
  const sections: string[] = [`# ${getTitle(doc)}\n`];

  const meta: string[] = [];
  const created = getString(doc.created_at) ?? "";
  if (created) {
    meta.push(dateLine(created));
  }

  const { start, end } = getMeetingTime(doc);
  const st = parseIsoDateTime(start);
  const et = parseIsoDateTime(end);
  if (st && et) {
    meta.push(`**Time:** ${formatTime(st)} - ${formatTime(et)}`);
  }

  const docType = doc.type === undefined ? "meeting" : (getString(doc.type) ?? "");
  if (docType) {
    meta.push(`**Type:** ${docType}`);
  }

  const attendees = getAttendees(doc);
  if (attendees.length > 0) {
    meta.push(`**Attendees:** ${attendees.join(", ")}`);
  }
  if (meta.length > 0) {
    sections.push(`${meta.join("\n")}\n`);
  }

  if (summaryText.trim()) {
    sections.push(...section("Summary", summaryText.trim()));
  }
  const notes = getNotes(doc);
  if (notes) {
    sections.push(...section("Notes", notes));
  }
  if (transcriptText.trim()) {
    sections.push(...section("Transcript", transcriptText));
  }

  return sections.join("\n");
}

export function buildSharedMarkdown(note: SharedNote): string {
  const sections: string[] = [`# ${note.title}\n`];

  const meta: string[] = [];
  if (note.created_at) {
    meta.push(dateLine(note.created_at));
  }
  if (note.creator) {
    meta.push(`**Creator:** ${note.creator}`);
  }
  if (note.attendees.length > 0) {
    meta.push(`**Attendees:** ${note.attendees.join(", ")}`);
  }
  meta.push(`**Source:** ${note.source_url}`);
  sections.push(`${meta.join("\n")}\n`);

  const summary = note.summary_html ? htmlToMarkdown(note.summary_html) : "";
  if (summary) {
    sections.push(...section("Summary", summary));
  }
  return sections.join("\n");
}
