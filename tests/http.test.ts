import { describe, expect, it, vi } from "vitest";
import path from "path";
import { TransientNetworkError } from "../src/errors";
import { DEFAULT_USER_AGENT, FileIdentitySource, HeaderProvider } from "../src/http/headers";
import { FetchLike, GstPortalClient, searchUrl } from "../src/http/portalClient";
import { RandomThrottle } from "../src/http/throttle";
import { Logger, silentLogger } from "../src/logging/logger";
import { TaxpayerPipeline } from "../src/scrape/pipeline";

function recordingLogger() {
  const warn = vi.fn();
  const logger: Logger = { ...silentLogger, warn };
  return { logger, warn };
}

describe("header provider", () => {
  it("uses the default agent when rotation is off", () => {
    const next = vi.fn(() => "rotated-agent");
    const provider = new HeaderProvider({ rotate: false, source: { next }, logger: silentLogger });

    const headers = provider.headers();

    expect(headers["User-Agent"]).toBe(DEFAULT_USER_AGENT);
    expect(headers["Accept-Language"]).toBe("en-US,en;q=0.9");
    expect(headers.Connection).toBe("keep-alive");
    expect(next).not.toHaveBeenCalled();
  });

  it("takes the agent from the identity source when rotation is on", () => {
    const provider = new HeaderProvider({ rotate: true, source: { next: () => "rotated-agent" }, logger: silentLogger });
    expect(provider.headers()["User-Agent"]).toBe("rotated-agent");
  });

  it("falls back to the default agent and warns when the source fails", () => {
    const { logger, warn } = recordingLogger();
    const source = new FileIdentitySource(path.join(process.cwd(), "fixtures", "missing-agents.json"));
    const provider = new HeaderProvider({ rotate: true, source, logger });

    expect(provider.headers()["User-Agent"]).toBe(DEFAULT_USER_AGENT);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn.mock.calls[0][0]).toBe("User agent rotation failed, using default agent");
  });

  it("picks agents from the bundled pool", () => {
    expect(new FileIdentitySource(undefined, () => 0.99).next()).toBe(
      "Mozilla/5.0 (X11; Ubuntu; Linux x86_64; rv:121.0) Gecko/20100101 Firefox/121.0"
    );
    expect(new FileIdentitySource(undefined, () => 0).next()).toBe(DEFAULT_USER_AGENT);
  });
});

describe("random throttle", () => {
  it("sleeps a uniformly drawn duration inside the window", async () => {
    const sleep = vi.fn(async (_ms: number) => undefined);
    const throttle = new RandomThrottle({ logger: silentLogger, random: () => 0.5, sleep });

    const waited = await throttle.delay({ minSeconds: 2, maxSeconds: 4 });

    expect(waited).toBe(3000);
    expect(sleep).toHaveBeenCalledWith(3000);
  });

  it("orders an inverted window and skips a zero window", async () => {
    const sleep = vi.fn(async (_ms: number) => undefined);
    const throttle = new RandomThrottle({ logger: silentLogger, random: () => 0, sleep });

    expect(await throttle.delay({ minSeconds: 4, maxSeconds: 2 })).toBe(2000);
    expect(await throttle.delay({ minSeconds: 0, maxSeconds: 0 })).toBe(0);
    expect(sleep).toHaveBeenCalledTimes(1);
  });
});

type FetchInput = Parameters<FetchLike>[0];
type FetchInit = Parameters<FetchLike>[1];

function failingBody(): ReadableStream<Uint8Array> {
  return new ReadableStream<Uint8Array>({
    start(controller) {
      controller.error(new TypeError("terminated"));
    }
  });
}

function abortError(): Error {
  const error = new Error("The operation was aborted");
  error.name = "AbortError";
  return error;
}

describe("portal client", () => {
  it("builds the search url", () => {
    expect(searchUrl("https://portal.test", "27AAPFU0939F1ZV")).toBe(
      "https://portal.test/services/searchtp?gstin=27AAPFU0939F1ZV"
    );
  });

  it("returns the page body and sends the given headers", async () => {
    const fetchImpl = vi.fn(async (_input: FetchInput, _init?: FetchInit) => new Response("<html>ok</html>", { status: 200 }));
    const client = new GstPortalClient({ baseUrl: "https://portal.test", timeoutMs: 1000, fetchImpl });

    const response = await client.fetchTaxpayerPage("27AAPFU0939F1ZV", { "User-Agent": "test-agent" });

    expect(response.status).toBe(200);
    expect(response.html).toBe("<html>ok</html>");
    expect(fetchImpl).toHaveBeenCalledTimes(1);
    const [input, init] = fetchImpl.mock.calls[0];
    expect(input).toBe("https://portal.test/services/searchtp?gstin=27AAPFU0939F1ZV");
    expect(init?.headers).toEqual({ "User-Agent": "test-agent" });
    expect(init?.method).toBe("GET");
  });

  it("reports a non-2xx answer as a transport failure with its status", async () => {
    const fetchImpl = vi.fn(async (_input: FetchInput, _init?: FetchInit) => new Response("busy", { status: 503 }));
    const client = new GstPortalClient({ baseUrl: "https://portal.test", timeoutMs: 1000, fetchImpl });

    const error = await client.fetchTaxpayerPage("27AAPFU0939F1ZV", {}).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(TransientNetworkError);
    if (error instanceof TransientNetworkError) {
      expect(error.reason).toBe("transport");
      expect(error.status).toBe(503);
    }
  });

  it("reports a connection failure as a transport failure", async () => {
    const fetchImpl = vi.fn(async (_input: FetchInput, _init?: FetchInit): Promise<Response> => {
      throw new TypeError("fetch failed");
    });
    const client = new GstPortalClient({ baseUrl: "https://portal.test", timeoutMs: 1000, fetchImpl });

    const error = await client.fetchTaxpayerPage("27AAPFU0939F1ZV", {}).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(TransientNetworkError);
    if (error instanceof TransientNetworkError) {
      expect(error.reason).toBe("transport");
      expect(error.status).toBeNull();
      expect(error.message).toBe(
        "Request failed for https://portal.test/services/searchtp?gstin=27AAPFU0939F1ZV: fetch failed"
      );
    }
  });

  it("aborts a request that outlives the timeout", async () => {
    const fetchImpl = vi.fn(
      (_input: FetchInput, init?: FetchInit) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener("abort", () => reject(abortError()));
        })
    );
    const client = new GstPortalClient({ baseUrl: "https://portal.test", timeoutMs: 10, fetchImpl });

    const error = await client.fetchTaxpayerPage("27AAPFU0939F1ZV", {}).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(TransientNetworkError);
    if (error instanceof TransientNetworkError) {
      expect(error.reason).toBe("timeout");
    }
  });

  it("cancels the body of a non-2xx answer", async () => {
    let cancelled = false;
    const body = new ReadableStream<Uint8Array>({
      cancel: () => {
        cancelled = true;
      }
    });
    const fetchImpl = vi.fn(async (_input: FetchInput, _init?: FetchInit) => new Response(body, { status: 502 }));
    const client = new GstPortalClient({ baseUrl: "https://portal.test", timeoutMs: 1000, fetchImpl });

    const error = await client.fetchTaxpayerPage("27AAPFU0939F1ZV", {}).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(TransientNetworkError);
    expect(cancelled).toBe(true);
  });

  it("reports a body that fails mid-read as a transport failure", async () => {
    const fetchImpl = vi.fn(async (_input: FetchInput, _init?: FetchInit) => new Response(failingBody(), { status: 200 }));
    const client = new GstPortalClient({ baseUrl: "https://portal.test", timeoutMs: 1000, fetchImpl });

    const error = await client.fetchTaxpayerPage("27AAPFU0939F1ZV", {}).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(TransientNetworkError);
    if (error instanceof TransientNetworkError) {
      expect(error.reason).toBe("transport");
      expect(error.message).toBe(
        "Response body failed for https://portal.test/services/searchtp?gstin=27AAPFU0939F1ZV: terminated"
      );
    }
  });

  it("lets the pipeline retry a body that fails mid-read", async () => {
    let calls = 0;
    const fetchImpl = vi.fn(async (_input: FetchInput, _init?: FetchInit) => {
      calls += 1;
      return calls === 1
        ? new Response(failingBody(), { status: 200 })
        : new Response('<div id="lgnm">HERON LOGISTICS LLP</div>', { status: 200 });
    });
    const client = new GstPortalClient({ baseUrl: "https://portal.test", timeoutMs: 1000, fetchImpl });
    const pipeline = new TaxpayerPipeline({
      client,
      headers: { headers: () => ({}) },
      throttle: { delay: async () => 0 },
      logger: silentLogger,
      maxRetries: 3,
      retryDelay: { minSeconds: 0, maxSeconds: 0 }
    });

    const outcome = await pipeline.lookup("27AAPFU0939F1ZV");

    expect(outcome.ok).toBe(true);
    expect(outcome.attempts).toBe(2);
    if (outcome.ok) {
      expect(outcome.record.legal_name).toBe("HERON LOGISTICS LLP");
    }
  });
});
