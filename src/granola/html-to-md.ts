import { Tokenizer } from "htmlparser2";

export type TagEvent =
  | { kind: "open"; tag: string; attrs: Record<string, string> }
  | { kind: "close"; tag: string }
  | { kind: "data"; text: string };

type StackEntry = { tag: string; href?: string };

/** Open tags, innermost last. Closing searches from the top instead of assuming LIFO order. */
export class TagStack {
  private entries: StackEntry[] = [];

  get depth(): number {
    return this.entries.length;
  }

  push(entry: StackEntry): void {
    this.entries.push(entry);
  }

  count(predicate: (tag: string) => boolean): number {
    return this.entries.filter((e) => predicate(e.tag)).length;
  }

  /** Removes and returns the nearest entry for `tag`, or null when none is open. */
  remove(tag: string): StackEntry | null {
    for (let i = this.entries.length - 1; i >= 0; i--) {
      if (this.entries[i]?.tag === tag) {
        return this.entries.splice(i, 1)[0] ?? null;
      }
    }
    return null;
  }

  tags(): string[] {
    return this.entries.map((e) => e.tag);
  }
}

const HEADING_RE = /^h([1-6])$/;
const LIST_TAGS = new Set(["ul", "ol"]);

/**
 * Turns a stream of open/close/data events into Markdown. Each instance holds
 * the state for one fragment.
 */
export class HtmlTagMachine {
  private parts: string[] = [];
  readonly stack = new TagStack();

  open(tag: string, attrs: Record<string, string> = {}): void {
    const name = tag.toLowerCase();
    const heading = HEADING_RE.exec(name);
    if (heading) {
      this.stack.push({ tag: name });
      this.parts.push(`\n${"#".repeat(Number(heading[1]))} `);
      return;
    }

    switch (name) {
      case "li": {
        this.stack.push({ tag: name });
        // The enclosing list counts, so a top-level item has depth 0.
        const depth = Math.max(this.stack.count((t) => LIST_TAGS.has(t)) - 1, 0);
        this.parts.push(`${"  ".repeat(depth)}- `);
        return;
      }
      case "a":
        this.stack.push({ tag: name, href: attrs.href ?? "" });
        this.parts.push("[");
        return;
      case "br":
        this.stack.push({ tag: name });
        this.parts.push("\n");
        return;
      default:
        this.stack.push({ tag: name });
        this.parts.push(OPEN_MARKERS.get(name) ?? "");
    }
  }

  close(tag: string): void {
    const name = tag.toLowerCase();
    if (name === "a") {
      const anchor = this.stack.remove("a");
      this.parts.push(anchor ? `](${anchor.href ?? ""})` : "]");
      return;
    }

    this.parts.push(HEADING_RE.test(name) ? "\n\n" : (CLOSE_MARKERS.get(name) ?? ""));
    this.stack.remove(name);
  }

  data(text: string): void {
    this.parts.push(text);
  }

  feed(event: TagEvent): void {
    if (event.kind === "open") {
      this.open(event.tag, event.attrs);
    } else if (event.kind === "close") {
      this.close(event.tag);
    } else {
      this.data(event.text);
    }
  }

  toMarkdown(): string {
    return collapseBlankLines(this.parts.join("")).trim();
  }
}

const OPEN_MARKERS = new Map<string, string>([
  ["strong", "**"],
  ["b", "**"],
  ["em", "*"],
  ["i", "*"],
  ["code", "`"],
  ["blockquote", "> "],
]);

const CLOSE_MARKERS = new Map<string, string>([
  ["li", "\n"],
  ["p", "\n\n"],
  ["ul", "\n"],
  ["ol", "\n"],
  ["strong", "**"],
  ["b", "**"],
  ["em", "*"],
  ["i", "*"],
  ["code", "`"],
  ["blockquote", "\n"],
]);

export function collapseBlankLines(text: string): string {
  return text.replace(/\n{3,}/g, "\n\n");
}

/**
 * Tag events in source order, as written: stray or crossed closes are reported
 * rather than repaired, and a self-closing tag is an open followed by a close.
 * Text and attribute values arrive with entities decoded.
 */
export function tagEvents(html: string): TagEvent[] {
  const events: TagEvent[] = [];
  let tag = "";
  let attrs: Record<string, string> = {};
  let attrName = "";
  let attrValue = "";

  const tokenizer = new Tokenizer(
    { decodeEntities: true },
    {
      ontext(start, end) {
        events.push({ kind: "data", text: html.slice(start, end) });
      },
      ontextentity(codepoint) {
        events.push({ kind: "data", text: String.fromCodePoint(codepoint) });
      },
      onopentagname(start, end) {
        tag = html.slice(start, end).toLowerCase();
        attrs = {};
      },
      onattribname(start, end) {
        attrName = html.slice(start, end).toLowerCase();
        attrValue = "";
      },
      onattribdata(start, end) {
        attrValue += html.slice(start, end);
      },
      onattribentity(codepoint) {
        attrValue += String.fromCodePoint(codepoint);
      },
      onattribend() {
        attrs[attrName] = attrValue;
      },
      onopentagend() {
        events.push({ kind: "open", tag, attrs });
      },
      onselfclosingtag() {
        events.push({ kind: "open", tag, attrs });
        events.push({ kind: "close", tag });
      },
      onclosetag(start, end) {
        events.push({ kind: "close", tag: html.slice(start, end).toLowerCase() });
      },
      // Comments, doctypes and CDATA carry no text for the summary.
      oncdata() {},
      oncomment() {},
      ondeclaration() {},
      onprocessinginstruction() {},
      onend() {},
    },
  );
  tokenizer.write(html);
  tokenizer.end();
  return events;
}

export function htmlToMarkdown(html: string): string {
  const machine = new HtmlTagMachine();
  for (const event of tagEvents(html)) {
    machine.feed(event);
  }
  return machine.toMarkdown();
}
