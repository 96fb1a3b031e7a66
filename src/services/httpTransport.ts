import { GATEWAY } from "../utils/constants";

export interface HttpResponse {
  url: string;
  status: number;
  body: string;
}

export interface HttpTransport {
  get(url: string): Promise<HttpResponse>;
  /** Start a new session for subsequent requests; in-flight ones finish. */
  reset(): void;
  /**
   * Abort what is in flight on the current session. Requests from before the
   * last reset run to completion or to their timeouts.
   */
  close(): void;
}

export interface FetchResponseLike {
  status: number;
  text(): Promise<string>;
}

/** The slice of `fetch` the transport and probes rely on. */
export type FetchLike = (
  url: string,
  init: { method?: string; signal: AbortSignal },
) => Promise<FetchResponseLike>;

export interface FetchTransportOptions {
  fetchImpl?: FetchLike;
  requestTimeoutMs?: number;
  resourceTimeoutMs?: number;
}

export class TransportTimeoutError extends Error {
  constructor(url: string, phase: "request" | "resource", timeoutMs: number) {
    super(`${phase === "request" ? "No response" : "Download incomplete"} after ${timeoutMs}ms: ${describeUrl(url)}`);
    this.name = "TransportTimeoutError";
  }
}

/** Origin and path only; query strings carry the provider key. */
export function describeUrl(url: string): string {
  const queryStart = url.indexOf("?");
  return queryStart === -1 ? url : url.slice(0, queryStart);
}

export class FetchTransport implements HttpTransport {
  private session = new AbortController();
  private readonly fetchImpl: FetchLike;
  private readonly requestTimeoutMs: number;
  private readonly resourceTimeoutMs: number;

  constructor(options: FetchTransportOptions = {}) {
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.requestTimeoutMs = options.requestTimeoutMs ?? GATEWAY.REQUEST_TIMEOUT_MS;
    this.resourceTimeoutMs = options.resourceTimeoutMs ?? GATEWAY.RESOURCE_TIMEOUT_MS;
  }

  async get(url: string): Promise<HttpResponse> {
    const session = this.session.signal;
    const controller = new AbortController();
    const abortWith = (reason: Error) => {
      if (!controller.signal.aborted) controller.abort(reason);
    };
    const onSessionClosed = () => abortWith(new Error("Transport closed"));
    session.addEventListener("abort", onSessionClosed, { once: true });

    const requestTimer = setTimeout(
      () => abortWith(new TransportTimeoutError(url, "request", this.requestTimeoutMs)),
      this.requestTimeoutMs,
    );
    const resourceTimer = setTimeout(
      () => abortWith(new TransportTimeoutError(url, "resource", this.resourceTimeoutMs)),
      this.resourceTimeoutMs,
    );
    try {
      const response = await this.fetchImpl(url, { signal: controller.signal });
      clearTimeout(requestTimer);
      const body = await response.text();
      return { url, status: response.status, body };
    } finally {
      clearTimeout(requestTimer);
      clearTimeout(resourceTimer);
      session.removeEventListener("abort", onSessionClosed);
    }
  }

  reset(): void {
    this.session = new AbortController();
  }

  close(): void {
    this.session.abort();
    this.session = new AbortController();
  }
}
