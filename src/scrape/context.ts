import { Settings } from "../config/settings";
import { DemoTaxpayerSource } from "../demo/demoSource";
import { FileIdentitySource, HeaderProvider, IdentitySource } from "../http/headers";
import { GstPortalClient, PortalClient } from "../http/portalClient";
import { RandomThrottle, Throttle } from "../http/throttle";
import { Logger } from "../logging/logger";
import { FetchOutcome } from "../types/fetchOutcome";
import { TaxpayerLookup, TaxpayerPipeline } from "./pipeline";

/**
 * Everything one scraper run shares: settings, logger, the portal session,
 * the header provider and the throttle. Build one per process or per test.
 */
export interface ScraperContext {
  settings: Settings;
  logger: Logger;
  client: PortalClient;
  headers: HeaderProvider;
  throttle: Throttle;
  /** Portal pipeline, or the demo table when demo mode is on; lookups run one at a time. */
  source: TaxpayerLookup;
  demo: DemoTaxpayerSource | null;
}

/**
 * Queues lookups so only one runs at a time. Callers that share a portal
 * session, such as concurrent web requests, go through one of these.
 */
export class SerialLookup implements TaxpayerLookup {
  private tail: Promise<void> = Promise.resolve();

  constructor(private readonly inner: TaxpayerLookup) {}

  lookup(gstin: string): Promise<FetchOutcome> {
    const run = this.tail.then(() => this.inner.lookup(gstin));
    this.tail = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }
}

export interface ContextOverrides {
  client?: PortalClient;
  throttle?: Throttle;
  identity?: IdentitySource;
  demo?: DemoTaxpayerSource;
}

export async function createScraperContext(
  settings: Settings,
  logger: Logger,
  overrides: ContextOverrides = {}
): Promise<ScraperContext> {
  const client =
    overrides.client ?? new GstPortalClient({ baseUrl: settings.baseUrl, timeoutMs: settings.timeoutMs });
  const throttle = overrides.throttle ?? new RandomThrottle({ logger });
  const headers = new HeaderProvider({
    rotate: settings.rotateUserAgents,
    source: overrides.identity ?? new FileIdentitySource(),
    logger
  });

  const demo = settings.demoMode ? overrides.demo ?? (await DemoTaxpayerSource.load(logger)) : null;
  const source = new SerialLookup(
    demo ??
      new TaxpayerPipeline({
        client,
        headers,
        throttle,
        logger,
        maxRetries: settings.maxRetries,
        retryDelay: settings.retryDelay
      })
  );

  logger.info("GST Scraper initialized", { demo_mode: settings.demoMode, base_url: settings.baseUrl });
  return { settings, logger, client, headers, throttle, source, demo };
}
