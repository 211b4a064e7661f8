import { TransientNetworkError, errorMessage } from "../errors";

export interface PortalResponse {
  status: number;
  finalUrl: string;
  html: string;
}

export interface PortalClient {
  /** Fetches the public search page for one GSTIN; throws TransientNetworkError on retryable failures. */
  fetchTaxpayerPage(gstin: string, headers: Record<string, string>): Promise<PortalResponse>;
}

export type FetchLike = typeof fetch;

export interface GstPortalClientOptions {
  baseUrl: string;
  timeoutMs: number;
  fetchImpl?: FetchLike;
}

export function searchUrl(baseUrl: string, gstin: string): string {
  const url = new URL("/services/searchtp", baseUrl);
  url.searchParams.set("gstin", gstin);
  return url.toString();
}

function isAbortError(error: unknown): boolean {
  return error instanceof Error && (error.name === "AbortError" || error.name === "TimeoutError");
}

/**
 * HTTP session against the GST portal. Cookies set by the portal are kept
 * for the lifetime of the instance and replayed on later requests.
 */
export class GstPortalClient implements PortalClient {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;
  private readonly cookies = new Map<string, string>();

  constructor(options: GstPortalClientOptions) {
    this.baseUrl = options.baseUrl;
    this.timeoutMs = options.timeoutMs;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  cookieHeader(): string {
    return Array.from(this.cookies.entries())
      .map(([name, value]) => `${name}=${value}`)
      .join("; ");
  }

  async fetchTaxpayerPage(gstin: string, headers: Record<string, string>): Promise<PortalResponse> {
    const url = searchUrl(this.baseUrl, gstin);
    const ctrl = new AbortController();
    const timer = setTimeout(() => ctrl.abort(), this.timeoutMs);

    const requestHeaders: Record<string, string> = { ...headers };
    const cookie = this.cookieHeader();
    if (cookie) requestHeaders.Cookie = cookie;

    try {
      let res: Response;
      try {
        res = await this.fetchImpl(url, {
          method: "GET",
          redirect: "follow",
          headers: requestHeaders,
          signal: ctrl.signal
        });
      } catch (error) {
        if (isAbortError(error)) {
          throw new TransientNetworkError("timeout", `Request timed out after ${this.timeoutMs} ms for ${url}`);
        }
        throw new TransientNetworkError("transport", `Request failed for ${url}: ${errorMessage(error)}`);
      }

      this.storeCookies(res.headers);

      if (!res.ok) {
        await res.body?.cancel();
        throw new TransientNetworkError("transport", `Portal responded ${res.status} for ${url}`, res.status);
      }

      let html: string;
      try {
        html = await res.text();
      } catch (error) {
        if (isAbortError(error)) {
          throw new TransientNetworkError("timeout", `Response body timed out after ${this.timeoutMs} ms for ${url}`);
        }
        throw new TransientNetworkError("transport", `Response body failed for ${url}: ${errorMessage(error)}`);
      }

      return { status: res.status, finalUrl: res.url || url, html };
    } finally {
      clearTimeout(timer);
    }
  }

  private storeCookies(headers: Headers): void {
    for (const entry of headers.getSetCookie()) {
      const pair = entry.split(";")[0];
      const index = pair.indexOf("=");
      if (index <= 0) continue;
      this.cookies.set(pair.slice(0, index).trim(), pair.slice(index + 1).trim());
    }
  }
}
