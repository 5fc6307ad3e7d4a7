import { gunzipSync } from "node:zlib";

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export class GranolaHttpError extends Error {
  readonly status: number;

  constructor(status: number, message: string) {
    super(message);
    this.name = "GranolaHttpError";
    this.status = status;
  }
}

/**
 * Parses a JSON response body. Some endpoints send gzip bytes without a
 * Content-Encoding header, so the magic number is checked here.
 */
export async function readJsonBody(response: Response): Promise<unknown> {
  let bytes: Buffer = Buffer.from(await response.arrayBuffer());
  if (bytes.length >= 2 && bytes[0] === 0x1f && bytes[1] === 0x8b) {
    bytes = gunzipSync(bytes);
  }
  return JSON.parse(bytes.toString("utf8")) as unknown;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
