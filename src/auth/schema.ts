import { z } from "zod";

/** Desktop app's auth file; `workos_tokens` is itself a JSON string. */
export const AuthFileSchema = z
  .object({
    workos_tokens: z.string().min(1),
  })
  .passthrough();

export const WorkosTokensSchema = z
  .object({
    access_token: z.string().min(1),
    refresh_token: z.string().min(1),
    expires_in: z.number(),
    obtained_at: z.number(),
  })
  .passthrough();

export type WorkosTokens = z.infer<typeof WorkosTokensSchema>;

export const RefreshResponseSchema = z.object({
  access_token: z.string().min(1),
  refresh_token: z.string().min(1),
  expires_in: z.number().optional(),
});

export const AccessTokenClaimsSchema = z
  .object({
    iss: z.string().min(1),
  })
  .passthrough();
