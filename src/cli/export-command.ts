import type { Command } from "commander";
import type { CliContext } from "./context.ts";
import { exportDocuments, type TranscriptFetcher } from "../granola/export.ts";

type ExportCommandOptions = {
  output?: string;
  cache?: string;
  fetchTranscripts?: boolean;
  overwrite?: boolean;
};

async function createTranscriptFetcher(ctx: CliContext): Promise<TranscriptFetcher> {
  let tokens = await ctx.ensureValidToken(await ctx.loadTokens());
  const client = ctx.createApiClient(tokens.access_token);
  console.log("Authenticated. Will fetch missing transcripts from API.");

  return async (documentId) => {
    // Long exports can outlive a token, so validity is rechecked per request.
    tokens = await ctx.ensureValidToken(tokens);
    client.setAccessToken(tokens.access_token);
    return client.fetchTranscript(documentId);
  };
}

export function registerExportCommand(input: { program: Command; ctx: CliContext }): void {
  input.program
    .command("export")
    .description("Export every meeting in the local Granola cache to Markdown")
    .option("-o, --output <dir>", "Output directory (default: ./granola-backup, or GRANOLA_OUTPUT_DIR)")
    .option("--cache <path>", "Cache file (default: the desktop app's cache-v3.json)")
    .option("--fetch-transcripts", "Fetch transcripts missing from the cache from the Granola API")
    .option("--overwrite", "Overwrite existing files (default: skip)")
    .action(async (...args) => {
      const [options] = args as [ExportCommandOptions];
      try {
        const cachePath = input.ctx.resolveCachePath(options.cache);
        const outputDir = input.ctx.resolveOutputDir(options.output);
        console.log(`Loading cache from ${cachePath} ...`);
        const state = await input.ctx.loadCache(cachePath);

        const fetchTranscript = options.fetchTranscripts
          ? await createTranscriptFetcher(input.ctx)
          : undefined;

        const stats = await exportDocuments({
          state,
          outputDir,
          overwrite: Boolean(options.overwrite),
          fetchTranscript,
        });

        console.log(
          `\nDone! Exported ${stats.exported} documents (${stats.withTranscript} with transcripts), skipped ${stats.skipped}.`,
        );
        if (fetchTranscript) {
          console.log(
            `Fetched ${stats.fetched} transcripts from API (${stats.fetchErrors} errors).`,
          );
        }
        console.log(`Output: ${outputDir}`);
      } catch (err: unknown) {
        console.error(input.ctx.errorMessage(err));
        process.exitCode = 1;
      }
    });
}
