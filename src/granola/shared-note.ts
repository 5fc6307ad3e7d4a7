import { join } from "node:path";
import { datedNotePath } from "../lib/filename.ts";
import { pathExists, writeTextFile } from "../lib/fs.ts";
import type { FetchLike } from "../lib/http.ts";
import { asArray, getString, isRecord } from "../lib/object-type-guards.ts";
import { getUserAgent } from "../lib/version.ts";
import { buildSharedMarkdown, type SharedNote } from "./render.ts";
import { locateDocument } from "./rsc-payload.ts";

type UnknownRecord = Record<string, unknown>;

function record(value: unknown): UnknownRecord {
  return isRecord(value) ? value : {};
}

function personFullName(value: unknown): string | undefined {
  return getString(record(record(record(record(value).details).person).name).fullName) || undefined;
}

/** Short links (`/t/...`) redirect to `/d/<id>`; the id is read from the final URL. */
export function parseSharedDocId(finalUrl: string): string {
  const m = /\/d\/([0-9a-f-]+)/.exec(finalUrl);
  if (!m?.[1]) {
    throw new Error(`Could not extract document ID from URL: ${finalUrl}`);
  }
  return m[1];
}

export function sharedNoteFromPanel(input: {
  panel: UnknownRecord;
  html: string;
  docId: string;
  sourceUrl: string;
}): SharedNote {
  const document = record(input.panel.document);
  const metadata = record(input.panel.documentMetadata);

  const attendees: string[] = [];
  for (const att of asArray(metadata.attendees)) {
    const name = personFullName(att) || getString(record(att).email) || "";
    if (name) {
      attendees.push(name);
    }
  }

  const creator = record(metadata.creator);
  return {
    doc_id: input.docId,
    title: getString(document.title) || getString(metadata.title) || "Untitled",
    created_at: getString(document.created_at) || getString(metadata.created_at) || "",
    creator: personFullName(creator) || getString(creator.name) || getString(creator.email) || "",
    attendees,
    summary_html: input.html,
    source_url: input.sourceUrl,
  };
}

export async function fetchSharedNote(
  url: string,
  options?: { fetchImpl?: FetchLike },
): Promise<SharedNote> {
  const fetchImpl = options?.fetchImpl ?? fetch;
  const response = await fetchImpl(url, {
    headers: { "User-Agent": getUserAgent() },
    redirect: "follow",
  });
  if (!response.ok) {
    throw new Error(`Failed to fetch shared note (HTTP ${response.status})`);
  }
  const docId = parseSharedDocId(response.url || url);
  const page = await response.text();
  const { panel, html } = locateDocument(page);
  return sharedNoteFromPanel({ panel, html, docId, sourceUrl: url });
}

export async function saveSharedNote(input: {
  url: string;
  outputDir: string;
  overwrite?: boolean;
  fetchImpl?: FetchLike;
  now?: () => Date;
}): Promise<{ path: string; saved: boolean; note: SharedNote }> {
  const note = await fetchSharedNote(input.url, { fetchImpl: input.fetchImpl });
  const path = datedNotePath({
    root: join(input.outputDir, "shared"),
    title: note.title,
    createdAt: note.created_at,
    now: input.now,
  });
  if (!input.overwrite && (await pathExists(path))) {
    return { path, saved: false, note };
  }
  await writeTextFile(path, buildSharedMarkdown(note));
  return { path, saved: true, note };
}
