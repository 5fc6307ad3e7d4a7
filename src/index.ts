import { Command } from "commander";
import { registerAuthCommand } from "./cli/auth-command.ts";
import { createCliContext } from "./cli/context.ts";
import { registerExportCommand } from "./cli/export-command.ts";
import { registerRenderCommand } from "./cli/render-command.ts";
import { registerSharedCommand } from "./cli/shared-command.ts";
import { getPackageVersion } from "./lib/version.ts";

function createProgram(): Command {
  const program = new Command();
  program
    .name("granola-md")
    .description("Export Granola meetings and shared notes to local Markdown files")
    .version(getPackageVersion());

  const ctx = createCliContext();
  registerExportCommand({ program, ctx });
  registerSharedCommand({ program, ctx });
  registerRenderCommand({ program, ctx });
  registerAuthCommand({ program, ctx });
  return program;
}

const program = createProgram();
await program.parseAsync(process.argv);
if (!process.argv.slice(2).length) {
  program.outputHelp();
}
