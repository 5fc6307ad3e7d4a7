import type { Command } from "commander";
import type { CliContext } from "./context.ts";
import { printJson } from "../lib/compact-json.ts";
import { buildSharedMarkdown } from "../granola/render.ts";
import { fetchSharedNote, saveSharedNote } from "../granola/shared-note.ts";

type SharedCommandOptions = {
  output?: string;
  overwrite?: boolean;
  stdout?: boolean;
  json?: boolean;
};

export function registerSharedCommand(input: { program: Command; ctx: CliContext }): void {
  input.program
    .command("shared")
    .description("Download publicly shared Granola notes as Markdown")
    .argument("<urls...>", "Shared note URL(s), e.g. https://notes.granola.ai/d/<id>")
    .option("-o, --output <dir>", "Output directory; notes go under <dir>/shared/")
    .option("--overwrite", "Overwrite existing files (default: skip)")
    .option("--stdout", "Print the Markdown instead of writing files")
    .option("--json", "Print the extracted note fields as JSON instead of writing files")
    .action(async (...args) => {
      const [urls, options] = args as [string[], SharedCommandOptions];
      for (const url of urls) {
        try {
          if (options.stdout || options.json) {
            const note = await fetchSharedNote(url, { fetchImpl: input.ctx.fetchImpl });
            if (options.json) {
              printJson(note);
            } else {
              console.log(buildSharedMarkdown(note));
            }
            continue;
          }

          console.log(`Fetching shared note from ${url} ...`);
          const result = await saveSharedNote({
            url,
            outputDir: input.ctx.resolveOutputDir(options.output),
            overwrite: Boolean(options.overwrite),
            fetchImpl: input.ctx.fetchImpl,
          });
          console.log(
            result.saved ? `Saved: ${result.path}` : `Skipped (already exists): ${result.path}`,
          );
        } catch (err: unknown) {
          console.error(`Error fetching ${url}: ${input.ctx.errorMessage(err)}`);
          process.exitCode = 1;
        }
      }
    });
}
