import fetch, { type RequestInit, type Response } from "node-fetch";
import {
  HttpTimeoutError,
  type HttpClient,
  type HttpRequestOptions,
  type HttpResponse,
} from "../ports/http.js";

/** Redirect hops followed before node-fetch gives up */
const MAX_REDIRECTS = 10;

/** The slice of node-fetch's `fetch` the client calls */
export type FetchImpl = (url: string, init: RequestInit) => Promise<Response>;

/**
 * Create an HTTP client backed by node-fetch.
 *
 * The timeout is an idle deadline: it covers connecting and waiting for
 * headers, then restarts on every body chunk. When it fires the request is
 * aborted and the error is reported as a timeout.
 */
export function createNodeFetchHttpClient(fetchImpl: FetchImpl = fetch): HttpClient {
  return {
    async get(url: string, options: HttpRequestOptions): Promise<HttpResponse> {
      const controller = new AbortController();
      let timer: NodeJS.Timeout | undefined;
      let timedOut = false;
      let finished = false;

      const disarm = () => {
        if (timer) clearTimeout(timer);
        timer = undefined;
      };
      const arm = () => {
        disarm();
        timer = setTimeout(() => {
          timedOut = true;
          controller.abort();
        }, options.timeoutMs);
      };
      const rethrow = (error: unknown): never => {
        if (timedOut) {
          throw new HttpTimeoutError(options.timeoutMs, { cause: error });
        }
        throw error;
      };

      arm();
      let response: Response;
      try {
        response = await fetchImpl(url, {
          method: "GET",
          headers: options.headers,
          redirect: "follow",
          follow: MAX_REDIRECTS,
          signal: controller.signal,
        });
      } catch (error) {
        disarm();
        return rethrow(error);
      }
      arm();

      const stream = response.body;

      async function* readBody(): AsyncGenerator<Uint8Array> {
        if (!stream) {
          finished = true;
          disarm();
          return;
        }
        try {
          for await (const chunk of stream) {
            arm();
            yield typeof chunk === "string" ? Buffer.from(chunk) : chunk;
          }
          finished = true;
        } catch (error) {
          rethrow(error);
        } finally {
          disarm();
          // Consumer stopped early (size limit): drop the connection
          if (!finished) controller.abort();
        }
      }

      return {
        status: response.status,
        statusText: response.statusText,
        header: (name) => response.headers.get(name) ?? undefined,
        body: readBody(),
        cancel() {
          disarm();
          if (!finished) {
            finished = true;
            controller.abort();
          }
        },
      };
    },
  };
}
