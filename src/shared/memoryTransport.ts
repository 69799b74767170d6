/**
 * In-memory transport for tests. Not part of the built library.
 * Serves canned responses keyed by exact URL; unknown URLs answer 404.
 */
import type { Transport, TransportResponse } from "./http.js";

export interface MemoryRoute {
  status?: number | undefined;
  body?: string | Uint8Array | undefined;
  headers?: Record<string, string> | undefined;
  /** Rejects the request instead of answering (network failure, timeout) */
  error?: Error | undefined;
  /** Errors the body stream after the first chunk has been delivered */
  streamError?: Error | undefined;
}

export interface RecordedRequest {
  method: "GET" | "HEAD";
  url: string;
}

export class MemoryTransport implements Transport {
  readonly requests: RecordedRequest[] = [];
  private readonly routes = new Map<string, MemoryRoute>();

  constructor(routes: Record<string, MemoryRoute | string> = {}) {
    for (const [url, route] of Object.entries(routes)) {
      this.route(url, route);
    }
  }

  /**
   * Registers (or replaces) the response for a URL.
   */
  route(url: string, route: MemoryRoute | string): this {
    this.routes.set(url, typeof route === "string" ? { body: route } : route);
    return this;
  }

  /**
   * URLs requested with GET, in request order.
   */
  get fetchedUrls(): string[] {
    return this.requests.filter((r) => r.method === "GET").map((r) => r.url);
  }

  async fetch(url: string): Promise<TransportResponse<Uint8Array>> {
    const route = this.lookup("GET", url);
    return this.respond(url, route, toBytes(route.body));
  }

  async stream(url: string): Promise<TransportResponse<ReadableStream<Uint8Array> | null>> {
    const route = this.lookup("GET", url);
    const bytes = toBytes(route.body);
    const streamError = route.streamError;
    let delivered = false;
    const body = new ReadableStream<Uint8Array>({
      pull(controller) {
        if (!delivered && bytes.length > 0) {
          delivered = true;
          controller.enqueue(bytes);
          return;
        }
        if (streamError) {
          controller.error(streamError);
        } else {
          controller.close();
        }
      },
    });
    return this.respond(url, route, body);
  }

  async probe(url: string): Promise<TransportResponse<null>> {
    const route = this.lookup("HEAD", url);
    return this.respond(url, route, null);
  }

  private lookup(method: RecordedRequest["method"], url: string): MemoryRoute {
    this.requests.push({ method, url });
    const route = this.routes.get(url) ?? { status: 404, body: "" };
    if (route.error) {
      throw route.error;
    }
    return route;
  }

  private respond<TBody>(url: string, route: MemoryRoute, body: TBody): TransportResponse<TBody> {
    const status = route.status ?? 200;
    return {
      status,
      ok: status >= 200 && status < 300,
      url,
      headers: new Headers(route.headers ?? {}),
      body,
    };
  }
}

function toBytes(body: string | Uint8Array | undefined): Uint8Array {
  if (body === undefined) return new Uint8Array(0);
  return typeof body === "string" ? new TextEncoder().encode(body) : body;
}
