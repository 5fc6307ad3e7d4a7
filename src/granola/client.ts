import { GranolaHttpError, readJsonBody, sleep, type FetchLike } from "../lib/http.ts";
import { getUserAgent } from "../lib/version.ts";

const MAX_RATE_LIMIT_RETRIES = 3;

export class GranolaApiClient {
  private accessToken: string;
  private baseUrl: string;
  private fetchImpl: FetchLike;
  private sleep: (ms: number) => Promise<void>;

  constructor(
    accessToken: string,
    options: { baseUrl: string; fetchImpl?: FetchLike; sleep?: (ms: number) => Promise<void> },
  ) {
    this.accessToken = accessToken;
    this.baseUrl = options.baseUrl.replace(/\/$/, "");
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.sleep = options.sleep ?? sleep;
  }

  setAccessToken(accessToken: string): void {
    this.accessToken = accessToken;
  }

  async post(endpoint: string, body: Record<string, unknown>, attempt = 0): Promise<unknown> {
    const response = await this.fetchImpl(`${this.baseUrl}${endpoint}`, {
      method: "POST",
      headers: {
        Authorization: `Bearer ${this.accessToken}`,
        "Content-Type": "application/json",
        "User-Agent": getUserAgent(),
      },
      body: JSON.stringify(body),
    });

    if (response.status === 429 && attempt < MAX_RATE_LIMIT_RETRIES) {
      const retryAfter = Number(response.headers.get("Retry-After") ?? "5");
      const delayMs = Math.min(Math.max(Number.isFinite(retryAfter) ? retryAfter : 5, 1) * 1000, 30000);
      await this.sleep(delayMs);
      return this.post(endpoint, body, attempt + 1);
    }

    if (!response.ok) {
      throw new GranolaHttpError(response.status, `Granola HTTP ${response.status} calling ${endpoint}`);
    }
    return readJsonBody(response);
  }

  /** Transcript entries for a document; an empty list when the API returns something else. */
  async fetchTranscript(documentId: string): Promise<unknown[]> {
    const data = await this.post("/v1/get-document-transcript", { document_id: documentId });
    return Array.isArray(data) ? data : [];
  }
}
