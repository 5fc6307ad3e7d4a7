import type { Command } from "commander";
import type { CliContext } from "./context.ts";
import type { WorkosTokens } from "../auth/schema.ts";
import { clientIdFromAccessToken, needsRefresh, tokenExpiresAt } from "../auth/store.ts";
import { printJson } from "../lib/compact-json.ts";
import { redactToken } from "../lib/redact.ts";

function describeTokens(ctx: CliContext, tokens: WorkosTokens): Record<string, unknown> {
  let clientId: string | undefined;
  try {
    clientId = clientIdFromAccessToken(tokens.access_token);
  } catch {
    clientId = undefined;
  }
  return {
    auth_path: ctx.authPath(),
    client_id: clientId,
    access_token: redactToken(tokens.access_token),
    refresh_token: redactToken(tokens.refresh_token),
    expires_at: new Date(tokenExpiresAt(tokens)).toISOString(),
    needs_refresh: needsRefresh(tokens),
  };
}

export function registerAuthCommand(input: { program: Command; ctx: CliContext }): void {
  const auth = input.program
    .command("auth")
    .description("Inspect the Granola desktop app's API tokens");

  auth
    .command("status")
    .description("Show token expiry and redacted token values")
    .action(async () => {
      try {
        printJson(describeTokens(input.ctx, await input.ctx.loadTokens()));
      } catch (err: unknown) {
        console.error(input.ctx.errorMessage(err));
        process.exitCode = 1;
      }
    });

  auth
    .command("refresh")
    .description("Refresh the access token now and save the rotated tokens")
    .action(async () => {
      try {
        const tokens = await input.ctx.refreshTokens(await input.ctx.loadTokens());
        console.log(`Token refreshed; expires at ${new Date(tokenExpiresAt(tokens)).toISOString()}.`);
      } catch (err: unknown) {
        console.error(input.ctx.errorMessage(err));
        process.exitCode = 1;
      }
    });
}
