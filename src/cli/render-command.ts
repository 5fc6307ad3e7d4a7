import type { Command } from "commander";
import type { CliContext } from "./context.ts";
import { htmlToMarkdown } from "../granola/html-to-md.ts";
import { renderProseMirror } from "../granola/prosemirror.ts";
import { locateDocument } from "../granola/rsc-payload.ts";
import { printJson } from "../lib/compact-json.ts";

export function registerRenderCommand(input: { program: Command; ctx: CliContext }): void {
  const render = input.program
    .command("render")
    .description("Run a converter on a local file (or stdin) and print the result");

  render
    .command("html")
    .description("Convert an HTML fragment to Markdown")
    .argument("[file]", "HTML file (default: stdin)")
    .action(async (...args) => {
      const [file] = args as [string | undefined];
      try {
        console.log(htmlToMarkdown(await input.ctx.readInput(file)));
      } catch (err: unknown) {
        console.error(input.ctx.errorMessage(err));
        process.exitCode = 1;
      }
    });

  render
    .command("doc")
    .description("Convert a ProseMirror JSON document (e.g. a panel's content) to Markdown")
    .argument("[file]", "JSON file (default: stdin)")
    .action(async (...args) => {
      const [file] = args as [string | undefined];
      try {
        const raw = await input.ctx.readInput(file);
        let node: unknown;
        try {
          node = JSON.parse(raw);
        } catch {
          throw new Error(`Input is not valid JSON${file ? `: ${file}` : ""}`);
        }
        console.log(renderProseMirror(node).trim());
      } catch (err: unknown) {
        console.error(input.ctx.errorMessage(err));
        process.exitCode = 1;
      }
    });

  render
    .command("page")
    .description("Locate the document panel and summary HTML in a saved shared-note page")
    .argument("[file]", "Saved page HTML (default: stdin)")
    .option("--markdown", "Print the summary as Markdown instead of the extracted JSON")
    .action(async (...args) => {
      const [file, options] = args as [string | undefined, { markdown?: boolean }];
      try {
        const { panel, html } = locateDocument(await input.ctx.readInput(file));
        if (options.markdown) {
          console.log(htmlToMarkdown(html));
          return;
        }
        printJson({ panel, summary_html: html });
      } catch (err: unknown) {
        console.error(input.ctx.errorMessage(err));
        process.exitCode = 1;
      }
    });
}
