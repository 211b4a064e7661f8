export const UNKNOWN = "N/A";
export const RECORD_SCHEMA_VERSION = "1.0";

export interface FilingEntry {
  financial_year: string;
  period: string;
  status: string;
}

export interface GoodsEntry {
  hsn_code: string;
  description: string;
}

export interface ServiceEntry {
  sac_code: string;
  description: string;
}

export type RecordSource = "portal" | "demo";

export interface TaxpayerScalars {
  legal_name: string;
  trade_name: string;
  registration_date: string;
  cancellation_date: string;
  constitution_of_business: string;
  taxpayer_type: string;
  status: string;
  state_jurisdiction: string;
  centre_jurisdiction: string;
  principal_address: string;
  nature_of_business: string;
  core_business_activity: string;
  aadhaar_authenticated: string;
  ekyc_verified: string;
  einvoice_status: string;
}

export type ScalarField = keyof TaxpayerScalars;

export interface TaxpayerSections {
  filing_history: FilingEntry[];
  goods: GoodsEntry[];
  services: ServiceEntry[];
}

export type SectionField = keyof TaxpayerSections;

export interface TaxpayerRecord extends TaxpayerScalars, TaxpayerSections {
  gstin: string;
  source: RecordSource;
  scraped_at: string;
  schema_version: typeof RECORD_SCHEMA_VERSION;
}

/** Column order shared by the CSV writer and the HTML result page. */
export const RECORD_COLUMNS: readonly (keyof TaxpayerRecord)[] = [
  "gstin",
  "legal_name",
  "trade_name",
  "registration_date",
  "cancellation_date",
  "constitution_of_business",
  "taxpayer_type",
  "status",
  "state_jurisdiction",
  "centre_jurisdiction",
  "principal_address",
  "nature_of_business",
  "core_business_activity",
  "aadhaar_authenticated",
  "ekyc_verified",
  "einvoice_status",
  "filing_history",
  "goods",
  "services",
  "source",
  "scraped_at",
  "schema_version"
];
