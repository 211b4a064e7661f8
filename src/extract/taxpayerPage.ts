import * as cheerio from "cheerio";
import { Logger, silentLogger } from "../logging/logger";
import { RECORD_SCHEMA_VERSION, ScalarField, TaxpayerRecord } from "../types/taxpayerRecord";
import { FILING_HISTORY, GOODS, SCALAR_DESCRIPTORS, SERVICES } from "./descriptors";
import { extractField } from "./fieldExtractor";

export interface PageContext {
  gstin: string;
  scrapedAt: string;
  logger?: Logger;
}

/**
 * Builds a full record from the portal's search result page. Fields the
 * page does not carry come back as the unknown sentinel or an empty list.
 */
export function extractTaxpayerRecord(html: string, context: PageContext): TaxpayerRecord {
  const $ = cheerio.load(html);
  const logger = context.logger ?? silentLogger;
  const field = (key: ScalarField): string => extractField($, SCALAR_DESCRIPTORS[key], logger);

  return {
    gstin: context.gstin,
    legal_name: field("legal_name"),
    trade_name: field("trade_name"),
    registration_date: field("registration_date"),
    cancellation_date: field("cancellation_date"),
    constitution_of_business: field("constitution_of_business"),
    taxpayer_type: field("taxpayer_type"),
    status: field("status"),
    state_jurisdiction: field("state_jurisdiction"),
    centre_jurisdiction: field("centre_jurisdiction"),
    principal_address: field("principal_address"),
    nature_of_business: field("nature_of_business"),
    core_business_activity: field("core_business_activity"),
    aadhaar_authenticated: field("aadhaar_authenticated"),
    ekyc_verified: field("ekyc_verified"),
    einvoice_status: field("einvoice_status"),
    filing_history: extractField($, FILING_HISTORY, logger),
    goods: extractField($, GOODS, logger),
    services: extractField($, SERVICES, logger),
    source: "portal",
    scraped_at: context.scrapedAt,
    schema_version: RECORD_SCHEMA_VERSION
  };
}
