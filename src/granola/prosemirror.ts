import { asArray, getNumber, getString, isRecord } from "../lib/object-type-guards.ts";
import { applyMarks } from "./marks.ts";

export type AstNodeKind =
  | "text"
  | "paragraph"
  | "heading"
  | "bulletList"
  | "orderedList"
  | "listItem"
  | "blockquote"
  | "codeBlock"
  | "hardBreak"
  | "horizontalRule"
  | "doc";

type BlockRule = (content: string, node: Record<string, unknown>) => string;

// `text` is handled before children are rendered; every other kind wraps the
// concatenated children. Kinds not listed here pass their children through.
const BLOCK_RULES: Record<Exclude<AstNodeKind, "text">, BlockRule> = {
  heading: (content, node) => `\n${"#".repeat(headingLevel(node))} ${content}\n\n`,
  paragraph: (content) => `${content}\n\n`,
  // Ordered lists are not numbered; both list kinds rely on their items' "- ".
  bulletList: (content) => content,
  orderedList: (content) => content,
  listItem: renderListItem,
  blockquote: (content) =>
    `${content
      .trim()
      .split("\n")
      .map((line) => `> ${line}`)
      .join("\n")}\n\n`,
  codeBlock: (content, node) => `\n\`\`\`${attr(node, "language") ?? ""}\n${content}\n\`\`\`\n\n`,
  hardBreak: () => "\n",
  horizontalRule: () => "\n---\n\n",
  doc: (content) => content,
};

function isBlockKind(kind: string): kind is Exclude<AstNodeKind, "text"> {
  return kind !== "text" && Object.hasOwn(BLOCK_RULES, kind);
}

function attr(node: Record<string, unknown>, key: string): string | undefined {
  const attrs = isRecord(node.attrs) ? node.attrs : {};
  return getString(attrs[key]);
}

function headingLevel(node: Record<string, unknown>): number {
  const attrs = isRecord(node.attrs) ? node.attrs : {};
  const level = getNumber(attrs.level);
  // Explicit levels are kept; 0 and below print no hashes.
  return level !== undefined && Number.isInteger(level) ? Math.max(level, 0) : 1;
}

// Nested lists get one indent level no matter how deep they sit: each
// listItem indents everything after its own first line by two spaces.
function renderListItem(content: string): string {
  const [first = "", ...rest] = content.trim().split("\n");
  let out = `- ${first}\n`;
  for (const line of rest) {
    if (line.trim()) {
      out += `  ${line}\n`;
    }
  }
  return out;
}

/**
 * Renders a ProseMirror-style node to Markdown. Anything that is not an
 * object renders as "".
 */
export function renderProseMirror(node: unknown): string {
  if (!isRecord(node)) {
    return "";
  }

  const kind = getString(node.type) ?? "";
  if (kind === "text") {
    return applyMarks(getString(node.text) ?? "", node.marks);
  }

  const content = asArray(node.content).map(renderProseMirror).join("");
  return isBlockKind(kind) ? BLOCK_RULES[kind](content, node) : content;
}
