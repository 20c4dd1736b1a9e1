import type { HttpClient, HttpRequestOptions, HttpResponse } from "../lib/ports/http.js";

/**
 * In-process stand-in for the network, shared by the test suites.
 */

export interface FakeReply {
  status?: number;
  statusText?: string;
  headers?: Record<string, string>;
  /** Body chunks; a single buffer is sent as one chunk */
  body?: Uint8Array | Uint8Array[];
  /** Reject the request itself (DNS, refused, timeout) */
  error?: Error;
}

export interface FakeHttpClient extends HttpClient {
  /** Every request, in order */
  readonly requests: Array<{ url: string; options: HttpRequestOptions }>;
  /** Number of body bytes handed out, per URL */
  readonly bytesServed: Map<string, number>;
  /** URLs whose response was cancelled by the caller */
  readonly cancelled: string[];
}

/**
 * Create a fake client from a URL → reply table.
 * An array of replies is played in order; the last one repeats.
 * Unknown URLs fail like an unresolvable host.
 */
export function createFakeHttpClient(
  routes: Record<string, FakeReply | FakeReply[]>
): FakeHttpClient {
  const requests: FakeHttpClient["requests"] = [];
  const bytesServed = new Map<string, number>();
  const cancelled: string[] = [];
  const callCounts = new Map<string, number>();

  function nextReply(url: string): FakeReply | undefined {
    const route = routes[url];
    if (route === undefined) return undefined;
    if (!Array.isArray(route)) return route;

    const index = callCounts.get(url) ?? 0;
    callCounts.set(url, index + 1);
    return route[Math.min(index, route.length - 1)];
  }

  return {
    requests,
    bytesServed,
    cancelled,
    async get(url, options): Promise<HttpResponse> {
      requests.push({ url, options });

      const reply = nextReply(url);
      if (!reply) {
        throw systemError("ENOTFOUND", `getaddrinfo ENOTFOUND ${new URL(url).hostname}`);
      }
      if (reply.error) {
        throw reply.error;
      }

      const headers = new Map(
        Object.entries(reply.headers ?? {}).map(([k, v]) => [k.toLowerCase(), v])
      );
      const chunks = reply.body === undefined ? [] : Array.isArray(reply.body) ? reply.body : [reply.body];

      async function* body(): AsyncGenerator<Uint8Array> {
        for (const chunk of chunks) {
          bytesServed.set(url, (bytesServed.get(url) ?? 0) + chunk.byteLength);
          yield chunk;
        }
      }

      return {
        status: reply.status ?? 200,
        statusText: reply.statusText ?? "OK",
        header: (name) => headers.get(name.toLowerCase()),
        body: body(),
        cancel: () => {
          cancelled.push(url);
        },
      };
    },
  };
}

/**
 * An error shaped like Node's system errors, with an errno-style code.
 */
export function systemError(code: string, message: string): Error {
  return Object.assign(new Error(message), { code });
}

/**
 * Deterministic pseudo-image bytes; different seeds give different content.
 */
export function imageBytes(size: number, seed = 1): Buffer {
  const bytes = Buffer.alloc(size);
  for (let i = 0; i < size; i++) {
    bytes[i] = (i * 31 + seed * 17) % 256;
  }
  return bytes;
}

/**
 * Shorthand for a successful image reply.
 */
export function imageReply(bytes: Uint8Array, contentType = "image/png"): FakeReply {
  return {
    headers: {
      "content-type": contentType,
      "content-length": String(bytes.byteLength),
    },
    body: bytes,
  };
}
