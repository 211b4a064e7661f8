import { z } from "zod";
import { assetPath } from "../config/assets";
import { describeGstin, normalizeGstin, validateGstin } from "../gstin/validate";
import { Logger } from "../logging/logger";
import { TaxpayerLookup, validationFailure } from "../scrape/pipeline";
import { FetchOutcome } from "../types/fetchOutcome";
import { RECORD_SCHEMA_VERSION, TaxpayerRecord, UNKNOWN } from "../types/taxpayerRecord";
import { readJson } from "../utils/fs";
import { nowUtcIsoSeconds } from "../utils/time";
import { DemoEntry, DemoEntrySchema } from "../validation/recordSchema";

/** Holder type encoded in the fourth PAN character. */
const PAN_HOLDER_TYPES: Record<string, string> = {
  A: "Association of Persons (AOP)",
  B: "Body of Individuals (BOI)",
  C: "Private Limited Company",
  F: "Partnership",
  G: "Government Department",
  H: "Hindu Undivided Family",
  J: "Artificial Juridical Person",
  L: "Local Authority",
  P: "Proprietorship",
  T: "Trust"
};

export function demoTablePath(): string {
  return assetPath("demo-taxpayers.json");
}

export interface DemoSourceOptions {
  entries: DemoEntry[];
  logger: Logger;
  now?: () => string;
}

/**
 * Serves records from a static table instead of the portal. Valid
 * identifiers missing from the table get a synthesized record.
 */
export class DemoTaxpayerSource implements TaxpayerLookup {
  private readonly entries = new Map<string, DemoEntry>();
  private readonly logger: Logger;
  private readonly now: () => string;

  constructor(options: DemoSourceOptions) {
    for (const entry of options.entries) {
      this.entries.set(normalizeGstin(entry.gstin), entry);
    }
    this.logger = options.logger;
    this.now = options.now ?? nowUtcIsoSeconds;
  }

  static async load(logger: Logger, tablePath: string = demoTablePath()): Promise<DemoTaxpayerSource> {
    const raw = await readJson<unknown>(tablePath);
    const entries = z.array(DemoEntrySchema).parse(raw);
    return new DemoTaxpayerSource({ entries, logger });
  }

  async lookup(input: string): Promise<FetchOutcome> {
    if (!validateGstin(input)) {
      this.logger.error(`Invalid GSTIN format: ${input}`);
      return validationFailure(input);
    }

    const gstin = normalizeGstin(input);
    const entry = this.entries.get(gstin);
    const record = entry ? this.stamp(entry) : this.synthesize(gstin);
    this.logger.info(`Demo record served for ${gstin}`, { synthesized: !entry });
    return { ok: true, gstin, attempts: 0, record };
  }

  /** Every table entry, freshly stamped, in table order. */
  sampleRecords(): TaxpayerRecord[] {
    this.logger.info("Generating sample GST data for demonstration");
    return Array.from(this.entries.values()).map((entry) => this.stamp(entry));
  }

  private stamp(entry: DemoEntry): TaxpayerRecord {
    return {
      ...entry,
      gstin: normalizeGstin(entry.gstin),
      filing_history: entry.filing_history.map((row) => ({ ...row })),
      goods: entry.goods.map((row) => ({ ...row })),
      services: entry.services.map((row) => ({ ...row })),
      source: "demo",
      scraped_at: this.now(),
      schema_version: RECORD_SCHEMA_VERSION
    };
  }

  private synthesize(gstin: string): TaxpayerRecord {
    const parts = describeGstin(gstin);
    return {
      gstin,
      legal_name: `DEMO TAXPAYER ${parts.pan}`,
      trade_name: UNKNOWN,
      registration_date: "01/07/2017",
      cancellation_date: UNKNOWN,
      constitution_of_business: PAN_HOLDER_TYPES[parts.pan[3]] ?? UNKNOWN,
      taxpayer_type: "Regular",
      status: "Active",
      state_jurisdiction: parts.state_name ?? UNKNOWN,
      centre_jurisdiction: UNKNOWN,
      principal_address: UNKNOWN,
      nature_of_business: UNKNOWN,
      core_business_activity: UNKNOWN,
      aadhaar_authenticated: UNKNOWN,
      ekyc_verified: UNKNOWN,
      einvoice_status: UNKNOWN,
      filing_history: [],
      goods: [],
      services: [],
      source: "demo",
      scraped_at: this.now(),
      schema_version: RECORD_SCHEMA_VERSION
    };
  }
}
