import { datedNotePath } from "../lib/filename.ts";
import { pathExists, writeTextFile } from "../lib/fs.ts";
import { GranolaHttpError, sleep } from "../lib/http.ts";
import { asArray, getString, isRecord } from "../lib/object-type-guards.ts";
import type { CacheState } from "./cache.ts";
import { getNotes, getTitle, pickSummaryPanel } from "./document.ts";
import { renderProseMirror } from "./prosemirror.ts";
import { buildMarkdown } from "./render.ts";
import { formatTranscript } from "./transcript.ts";

// Keeps transcript fetches under the API's 5 requests/second limit.
const FETCH_PAUSE_MS = 250;
const PROGRESS_EVERY = 50;

export type TranscriptFetcher = (documentId: string) => Promise<unknown[]>;

export type ExportStats = {
  exported: number;
  skipped: number;
  withTranscript: number;
  fetched: number;
  fetchErrors: number;
};

export type ExportOptions = {
  state: CacheState;
  outputDir: string;
  overwrite?: boolean;
  /** When set, documents without a cached transcript get one from the API. */
  fetchTranscript?: TranscriptFetcher;
  pauseMs?: number;
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
  log?: (line: string) => void;
};

export function summaryFromPanels(docPanels: unknown): string {
  const panel = pickSummaryPanel(docPanels);
  return panel ? renderProseMirror(panel.content) : "";
}

export async function exportDocuments(options: ExportOptions): Promise<ExportStats> {
  const log = options.log ?? ((line: string) => console.log(line));
  const pause = options.sleep ?? sleep;
  const stats: ExportStats = {
    exported: 0,
    skipped: 0,
    withTranscript: 0,
    fetched: 0,
    fetchErrors: 0,
  };

  const entries = Object.entries(options.state.documents);
  for (const [idx, [docId, value]] of entries.entries()) {
    if (!isRecord(value) || value.deleted_at) {
      stats.skipped++;
      continue;
    }
    const doc = value;

    const title = getTitle(doc);
    // Existing files are checked before any rendering or API work.
    const path = datedNotePath({
      root: options.outputDir,
      title,
      createdAt: getString(doc.created_at),
      now: options.now,
    });
    if (!options.overwrite && (await pathExists(path))) {
      stats.skipped++;
      continue;
    }

    const summaryText = summaryFromPanels(options.state.documentPanels[docId]);

    let transcriptEntries = asArray(options.state.transcripts[docId]);
    if (transcriptEntries.length === 0 && options.fetchTranscript) {
      try {
        transcriptEntries = await options.fetchTranscript(docId);
        if (transcriptEntries.length > 0) {
          stats.fetched++;
        }
        await pause(options.pauseMs ?? FETCH_PAUSE_MS);
      } catch (err: unknown) {
        // 404: the document simply has no transcript.
        if (!(err instanceof GranolaHttpError && err.status === 404)) {
          stats.fetchErrors++;
          log(
            err instanceof GranolaHttpError
              ? `  API error (${err.status}) for '${title}', skipping transcript`
              : `  Error fetching transcript for '${title}': ${err instanceof Error ? err.message : String(err)}`,
          );
        }
      }
    }
    const transcriptText = formatTranscript(transcriptEntries);

    if (!summaryText.trim() && !getNotes(doc) && !transcriptText) {
      stats.skipped++;
      continue;
    }

    await writeTextFile(path, buildMarkdown(doc, summaryText, transcriptText));
    stats.exported++;
    if (transcriptText) {
      stats.withTranscript++;
    }

    if (options.fetchTranscript && (idx + 1) % PROGRESS_EVERY === 0) {
      log(`  Progress: ${idx + 1}/${entries.length} documents processed...`);
    }
  }
  return stats;
}
