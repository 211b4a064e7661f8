import { Throttle } from "../http/throttle";
import { Logger } from "../logging/logger";
import { DelayWindow } from "../types/delayWindow";
import { BatchResult } from "../types/fetchOutcome";
import { TaxpayerLookup } from "./pipeline";

export interface BatchOptions {
  source: TaxpayerLookup;
  throttle: Throttle;
  /** Pause drawn between consecutive identifiers; never applied after the last one. */
  requestDelay: DelayWindow;
  logger: Logger;
}

export async function runBatch(identifiers: readonly string[], options: BatchOptions): Promise<BatchResult> {
  const { source, throttle, requestDelay, logger } = options;
  const result: BatchResult = { outcomes: [], records: [], succeeded: 0, failed: 0 };

  for (let i = 0; i < identifiers.length; i += 1) {
    const gstin = identifiers[i];
    logger.info(`Processing ${i + 1}/${identifiers.length}: ${gstin}`);

    const outcome = await source.lookup(gstin);
    result.outcomes.push(outcome);
    if (outcome.ok) {
      result.records.push(outcome.record);
      result.succeeded += 1;
    } else {
      result.failed += 1;
      logger.warn(`No record for ${gstin}`, { kind: outcome.kind, message: outcome.message });
    }

    if (i < identifiers.length - 1) {
      await throttle.delay(requestDelay);
    }
  }

  logger.info(`Completed scraping ${result.succeeded} out of ${identifiers.length} GSTINs`, {
    succeeded: result.succeeded,
    failed: result.failed
  });
  return result;
}
