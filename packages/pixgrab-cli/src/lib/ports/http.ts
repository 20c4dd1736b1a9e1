/**
 * Abstraction for outbound HTTP GET requests.
 * Allows testing the pipeline without network access.
 */
export interface HttpRequestOptions {
  /** Connect/read deadline; reset every time a body chunk arrives */
  timeoutMs: number;
  headers?: Record<string, string>;
}

export interface HttpResponse {
  status: number;
  statusText: string;
  /** Case-insensitive header lookup */
  header(name: string): string | undefined;
  /** Response body, streamed chunk by chunk */
  body: AsyncIterable<Uint8Array>;
  /** Abandon the body and release the connection */
  cancel(): void;
}

export interface HttpClient {
  /** Issue a GET request; rejects only on transport-level failures */
  get(url: string, options: HttpRequestOptions): Promise<HttpResponse>;
}

/**
 * Raised by an HttpClient when the idle deadline passes before headers or
 * between body chunks.
 */
export class HttpTimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(timeoutMs: number, options?: { cause?: unknown }) {
    super(`Timed out after ${timeoutMs}ms`, options);
    this.name = "HttpTimeoutError";
    this.timeoutMs = timeoutMs;
  }
}
