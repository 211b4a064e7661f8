import { z } from "zod";
import { RECORD_SCHEMA_VERSION, UNKNOWN } from "../types/taxpayerRecord";

const text = z.string().default(UNKNOWN);

export const FilingEntrySchema = z.object({
  financial_year: text,
  period: text,
  status: text
});

export const GoodsEntrySchema = z.object({
  hsn_code: text,
  description: text
});

export const ServiceEntrySchema = z.object({
  sac_code: text,
  description: text
});

export const TaxpayerRecordSchema = z.object({
  gstin: z.string().length(15),
  legal_name: text,
  trade_name: text,
  registration_date: text,
  cancellation_date: text,
  constitution_of_business: text,
  taxpayer_type: text,
  status: text,
  state_jurisdiction: text,
  centre_jurisdiction: text,
  principal_address: text,
  nature_of_business: text,
  core_business_activity: text,
  aadhaar_authenticated: text,
  ekyc_verified: text,
  einvoice_status: text,
  filing_history: z.array(FilingEntrySchema).default([]),
  goods: z.array(GoodsEntrySchema).default([]),
  services: z.array(ServiceEntrySchema).default([]),
  source: z.enum(["portal", "demo"]),
  scraped_at: z.string().min(1),
  schema_version: z.literal(RECORD_SCHEMA_VERSION)
});

/** Demo table entries omit what is stamped at lookup time. */
export const DemoEntrySchema = TaxpayerRecordSchema.omit({
  source: true,
  scraped_at: true,
  schema_version: true
});

export type DemoEntry = z.infer<typeof DemoEntrySchema>;
