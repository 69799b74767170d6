import ky, { HTTPError } from "ky";

/**
 * Default User-Agent for HTTP requests.
 * Mimics a standard Chrome browser on macOS.
 */
export const USER_AGENT =
  "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36";

/**
 * Status codes worth retrying at the transport level.
 */
export const RETRY_STATUS_CODES = [408, 413, 429, 500, 502, 503, 504];

export interface TransportOptions {
  /** Timeout for existence checks (HEAD) */
  probeTimeoutMs: number;
  /** Timeout for full-body transfers (playlists and segments) */
  transferTimeoutMs: number;
  /** Extra attempts after the first one */
  retryAttempts: number;
  userAgent?: string | undefined;
  /** Extra headers sent with every request (e.g. Referer, Cookie) */
  headers?: Record<string, string> | undefined;
}

/**
 * A response as seen by the pipeline. Non-2xx responses are returned, not
 * thrown; callers decide what counts as a failure.
 */
export interface TransportResponse<TBody> {
  status: number;
  ok: boolean;
  /** Final URL after redirects */
  url: string;
  headers: Headers;
  body: TBody;
}

/**
 * Byte-fetch capability consumed by the resolver and the segment fetcher.
 * Passed in as a value so tests can supply an in-memory implementation.
 */
export interface Transport {
  /** Fetches a whole body into memory. */
  fetch(url: string): Promise<TransportResponse<Uint8Array>>;
  /** Fetches a body as a stream, for large transfers. */
  stream(url: string): Promise<TransportResponse<ReadableStream<Uint8Array> | null>>;
  /** Quick existence check with the shorter probe timeout. */
  probe(url: string): Promise<TransportResponse<null>>;
}

/**
 * Creates a ky-backed transport with default headers, per-request timeouts
 * and retries.
 *
 * ky's own timeout covers each attempt up to the response headers; once the
 * final response is in, a second deadline of the same length covers reading
 * its body. Retryable
 * statuses are thrown inside ky so its retry loop sees them; once retries
 * run out the last response is handed back like any other non-2xx.
 */
export function createTransport(options: TransportOptions): Transport {
  const client = ky.create({
    headers: {
      "User-Agent": options.userAgent ?? USER_AGENT,
      Accept: "*/*",
      "Accept-Language": "en-US,en;q=0.5",
      ...options.headers,
    },
    timeout: options.transferTimeoutMs,
    retry: {
      limit: options.retryAttempts,
      statusCodes: RETRY_STATUS_CODES,
    },
  });

  const get = async (url: string): Promise<Response> => {
    const controller = new AbortController();
    const response = await settle(client.get(url, { signal: controller.signal }));
    const deadline = AbortSignal.timeout(options.transferTimeoutMs);
    deadline.addEventListener("abort", () => controller.abort(deadline.reason), { once: true });
    return response;
  };

  return {
    async fetch(url) {
      const response = await get(url);
      let body = new Uint8Array();
      if (response.ok) {
        body = new Uint8Array(await response.arrayBuffer());
      } else {
        await discardBody(response);
      }
      return {
        status: response.status,
        ok: response.ok,
        url: response.url,
        headers: response.headers,
        body,
      };
    },

    async stream(url) {
      const response = await get(url);
      if (!response.ok) await discardBody(response);
      return {
        status: response.status,
        ok: response.ok,
        url: response.url,
        headers: response.headers,
        body: response.ok ? response.body : null,
      };
    },

    async probe(url) {
      const response = await settle(
        client.head(url, {
          timeout: options.probeTimeoutMs,
          retry: 0,
        })
      );
      return {
        status: response.status,
        ok: response.ok,
        url: response.url,
        headers: response.headers,
        body: null,
      };
    },
  };
}

/**
 * Turns ky's HTTPError back into the response it carries.
 */
async function settle(request: Promise<Response>): Promise<Response> {
  try {
    return await request;
  } catch (error) {
    if (error instanceof HTTPError) {
      return error.response;
    }
    throw error;
  }
}

async function discardBody(response: Response): Promise<void> {
  if (response.body && !response.body.locked) {
    await response.body.cancel();
  }
}
