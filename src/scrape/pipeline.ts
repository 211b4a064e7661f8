import { GstinValidationError, TransientNetworkError, errorMessage } from "../errors";
import { extractTaxpayerRecord } from "../extract/taxpayerPage";
import { normalizeGstin, validateGstin } from "../gstin/validate";
import { PortalClient } from "../http/portalClient";
import { Throttle } from "../http/throttle";
import { Logger } from "../logging/logger";
import { DelayWindow } from "../types/delayWindow";
import { FetchFailure, FetchOutcome } from "../types/fetchOutcome";
import { nowUtcIsoSeconds } from "../utils/time";

export interface TaxpayerLookup {
  lookup(gstin: string): Promise<FetchOutcome>;
}

export interface HeaderSource {
  headers(): Record<string, string>;
}

export interface PipelineOptions {
  client: PortalClient;
  headers: HeaderSource;
  throttle: Throttle;
  logger: Logger;
  /** Total attempts allowed per identifier, the first request included. */
  maxRetries: number;
  retryDelay: DelayWindow;
  now?: () => string;
}

export function validationFailure(input: string): FetchFailure {
  return {
    ok: false,
    gstin: input,
    attempts: 0,
    kind: "validation",
    message: new GstinValidationError(input).message
  };
}

/**
 * Validates, requests and parses one identifier. Timeouts and transport
 * failures are retried with a short randomized pause; anything else ends
 * the attempt at once.
 */
export class TaxpayerPipeline implements TaxpayerLookup {
  private readonly options: PipelineOptions;
  private readonly now: () => string;

  constructor(options: PipelineOptions) {
    this.options = options;
    this.now = options.now ?? nowUtcIsoSeconds;
  }

  async lookup(input: string): Promise<FetchOutcome> {
    const { client, headers, throttle, logger, maxRetries, retryDelay } = this.options;

    if (!validateGstin(input)) {
      logger.error(`Invalid GSTIN format: ${input}`);
      return validationFailure(input);
    }

    const gstin = normalizeGstin(input);
    logger.info(`Searching for GSTIN: ${gstin}`);

    let lastTransient: TransientNetworkError | null = null;
    for (let attempt = 1; attempt <= maxRetries; attempt += 1) {
      try {
        const response = await client.fetchTaxpayerPage(gstin, headers.headers());
        const record = extractTaxpayerRecord(response.html, { gstin, scrapedAt: this.now(), logger });
        logger.success(`Successfully scraped data for ${gstin}`, {
          attempts: attempt,
          status: response.status,
          url: response.finalUrl
        });
        return { ok: true, gstin, attempts: attempt, record };
      } catch (error) {
        if (!(error instanceof TransientNetworkError)) {
          logger.error(`Unexpected error for ${gstin}`, {
            attempt,
            error: errorMessage(error),
            stack: error instanceof Error ? error.stack : undefined
          });
          return { ok: false, gstin, attempts: attempt, kind: "unexpected", message: errorMessage(error) };
        }

        lastTransient = error;
        logger.warn(`Attempt ${attempt}/${maxRetries} failed for ${gstin}`, {
          reason: error.reason,
          status: error.status,
          error: error.message
        });
        if (attempt < maxRetries) {
          await throttle.delay(retryDelay);
        }
      }
    }

    const message = `Request failed for ${gstin} after ${maxRetries} attempts: ${lastTransient?.message ?? "no response"}`;
    logger.error(message);
    return {
      ok: false,
      gstin,
      attempts: maxRetries,
      kind: "exhausted_retries",
      message,
      last_cause: lastTransient?.reason
    };
  }
}
