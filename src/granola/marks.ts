import { getString, isRecord } from "../lib/object-type-guards.ts";

export type MarkKind = "bold" | "italic" | "code" | "link";

const WRAPPERS: Record<MarkKind, (text: string, mark: Record<string, unknown>) => string> = {
  bold: (text) => `**${text}**`,
  italic: (text) => `*${text}*`,
  code: (text) => `\`${text}\``,
  link: (text, mark) => {
    const attrs = isRecord(mark.attrs) ? mark.attrs : {};
    return `[${text}](${getString(attrs.href) ?? ""})`;
  },
};

function isMarkKind(value: string): value is MarkKind {
  return Object.hasOwn(WRAPPERS, value);
}

/**
 * Wraps `text` once per mark, in list order, each wrapper around the result
 * of the previous one: `[bold, link]` gives `[**x**](href)`, `[link, bold]`
 * gives `**[x](href)**`. Unknown marks are skipped.
 */
export function applyMarks(text: string, marks: unknown): string {
  if (!Array.isArray(marks)) {
    return text;
  }
  let out = text;
  for (const mark of marks) {
    if (!isRecord(mark)) {
      continue;
    }
    const kind = getString(mark.type) ?? "";
    if (isMarkKind(kind)) {
      out = WRAPPERS[kind](out, mark);
    }
  }
  return out;
}
