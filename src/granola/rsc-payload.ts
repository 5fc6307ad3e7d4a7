import { isRecord } from "../lib/object-type-guards.ts";

/** Key of the server component props that carry a shared note's metadata. */
export const DOCUMENT_PANEL_KEY = "documentPanel";

export class DocumentNotFoundError extends Error {
  constructor(message = "Could not find document data in shared note page") {
    super(message);
    this.name = "DocumentNotFoundError";
  }
}

// Each streamed chunk is a `self.__next_f.push([<id>,"<escaped string>"])` call.
const PAYLOAD_CHUNK_RE = /self\.__next_f\.push\(\[\d+,"((?:[^"\\]|\\.)*)"\]/gs;
const JS_ESCAPE_RE = /\\u[0-9a-fA-F]{4}|\\[ntr\\"/]/g;
const SIMPLE_ESCAPES: Readonly<Record<string, string>> = {
  "\\n": "\n",
  "\\t": "\t",
  "\\r": "\r",
  "\\\\": "\\",
  '\\"': '"',
  "\\/": "/",
};
const HTML_LEADING_TAGS = ["<h", "<ul", "<p"] as const;
const HTML_SNIFF_LENGTH = 20;

/** Raw (still escaped) string bodies of every streamed chunk, in page order. */
export function extractPayloadFragments(page: string): string[] {
  return Array.from(page.matchAll(PAYLOAD_CHUNK_RE), (m) => m[1] ?? "");
}

/**
 * Decodes the escapes the stream uses. Characters outside a recognized escape,
 * including non-ASCII text already present, are left as they are.
 */
export function decodeJsString(value: string): string {
  return value.replace(JS_ESCAPE_RE, (esc) => {
    if (esc.startsWith("\\u")) {
      return String.fromCharCode(Number.parseInt(esc.slice(2), 16));
    }
    return SIMPLE_ESCAPES[esc] ?? esc;
  });
}

/** First object, depth first, that has `key` among its own keys. */
export function findInRsc(value: unknown, key: string): Record<string, unknown> | null {
  if (Array.isArray(value)) {
    for (const item of value) {
      const found = findInRsc(item, key);
      if (found) {
        return found;
      }
    }
    return null;
  }
  if (!isRecord(value)) {
    return null;
  }
  if (Object.hasOwn(value, key)) {
    return value;
  }
  for (const child of Object.values(value)) {
    const found = findInRsc(child, key);
    if (found) {
      return found;
    }
  }
  return null;
}

/**
 * Parses the first decoded fragment that mentions `key` and holds an object
 * with it. Fragments look like `5:[...]`, so parsing starts at the first `[`;
 * fragments that fail to parse are skipped.
 */
export function findPanelData(fragments: string[], key: string): Record<string, unknown> | null {
  for (const fragment of fragments) {
    if (!fragment.includes(key)) {
      continue;
    }
    const jsonStart = fragment.indexOf("[");
    // Bare top-level objects never match; panel rows are always arrays.
    if (jsonStart === -1) {
      continue;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(fragment.slice(jsonStart));
    } catch {
      continue;
    }

    const found = findInRsc(parsed, key);
    if (found) {
      return found;
    }
  }
  return null;
}

export function isHtmlFragment(fragment: string): boolean {
  const trimmed = fragment.trim();
  if (!trimmed.startsWith("<")) {
    return false;
  }
  const head = trimmed.slice(0, HTML_SNIFF_LENGTH);
  return HTML_LEADING_TAGS.some((tag) => head.includes(tag));
}

/**
 * The summary HTML is streamed as its own chunk and only referenced from the
 * panel props by a `$<id>` pointer, so it is picked by shape: the first
 * fragment that looks like HTML. Returns "" when there is none.
 */
export function findHtmlFragment(fragments: string[]): string {
  return fragments.find(isHtmlFragment)?.trim() ?? "";
}

export function locateDocument(
  page: string,
  key: string = DOCUMENT_PANEL_KEY,
): { panel: Record<string, unknown>; html: string } {
  const fragments = extractPayloadFragments(page).map(decodeJsString);
  const panel = findPanelData(fragments, key);
  if (!panel) {
    throw new DocumentNotFoundError();
  }
  return { panel, html: findHtmlFragment(fragments) };
}
