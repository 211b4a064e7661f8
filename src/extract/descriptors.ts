import {
  FilingEntry,
  GoodsEntry,
  ScalarField,
  SectionField,
  ServiceEntry
} from "../types/taxpayerRecord";

export interface ScalarFieldDescriptor {
  kind: "scalar";
  key: ScalarField;
  /** Element ids or class names that carry the value directly. */
  anchors: readonly string[];
  /** Label phrases, most specific first. */
  labels: readonly string[];
}

export interface SectionDescriptor<Row> {
  kind: "section";
  key: SectionField;
  /** Phrases that mark the heading or label placed before the section's table. */
  markers: readonly string[];
  /** Header synonyms for each logical column, in the order toRow receives the values. */
  columns: readonly (readonly string[])[];
  toRow(values: string[]): Row;
}

function scalar(key: ScalarField, anchors: string[], labels: string[]): ScalarFieldDescriptor {
  return { kind: "scalar", key, anchors, labels };
}

export const SCALAR_DESCRIPTORS: Record<ScalarField, ScalarFieldDescriptor> = {
  legal_name: scalar("legal_name", ["lgnm", "legal-name"], ["Legal Name of Business", "Legal Name"]),
  trade_name: scalar("trade_name", ["tradeNam", "trade-name"], ["Trade Name"]),
  registration_date: scalar(
    "registration_date",
    ["rgdt", "registration-date"],
    ["Effective Date of Registration", "Date of Registration", "Registration Date"]
  ),
  cancellation_date: scalar(
    "cancellation_date",
    ["cxdt", "cancellation-date"],
    ["Effective Date of Cancellation", "Date of Cancellation", "Cancellation Date"]
  ),
  constitution_of_business: scalar(
    "constitution_of_business",
    ["ctb", "constitution"],
    ["Constitution of Business"]
  ),
  taxpayer_type: scalar("taxpayer_type", ["dty", "taxpayer-type"], ["Taxpayer Type", "Type of Taxpayer"]),
  status: scalar("status", ["sts", "gstin-status"], ["GSTIN / UIN Status", "GSTIN/UIN Status", "GSTIN Status"]),
  state_jurisdiction: scalar("state_jurisdiction", ["stj", "state-jurisdiction"], ["State Jurisdiction"]),
  centre_jurisdiction: scalar(
    "centre_jurisdiction",
    ["ctj", "centre-jurisdiction"],
    ["Centre Jurisdiction", "Center Jurisdiction"]
  ),
  principal_address: scalar(
    "principal_address",
    ["pradr", "principal-address"],
    ["Principal Place of Business", "Address of Principal Place of Business"]
  ),
  nature_of_business: scalar(
    "nature_of_business",
    ["nba", "nature-of-business"],
    ["Nature of Business Activities", "Nature of Business Activity"]
  ),
  core_business_activity: scalar(
    "core_business_activity",
    ["ntcrbs", "core-business"],
    ["Nature Of Core Business Activity", "Core Business Activity"]
  ),
  aadhaar_authenticated: scalar(
    "aadhaar_authenticated",
    ["adhrVFlag", "aadhaar-authenticated"],
    ["Whether Aadhaar Authenticated?", "Aadhaar Authenticated"]
  ),
  ekyc_verified: scalar(
    "ekyc_verified",
    ["ekycVFlag", "ekyc-verified"],
    ["Whether e-KYC Verified?", "e-KYC Verified"]
  ),
  einvoice_status: scalar(
    "einvoice_status",
    ["einvoiceStatus", "einvoice-status"],
    ["e-Invoice Status", "E-Invoicing Status", "e-Invoice"]
  )
};

export const FILING_HISTORY: SectionDescriptor<FilingEntry> = {
  kind: "section",
  key: "filing_history",
  markers: ["Filing History", "Return Filing Status", "Filing Status", "Return Filing"],
  columns: [["Financial Year", "FY"], ["Tax Period", "Return Period", "Period"], ["Status"]],
  toRow: ([financial_year, period, status]) => ({ financial_year, period, status })
};

export const GOODS: SectionDescriptor<GoodsEntry> = {
  kind: "section",
  key: "goods",
  markers: ["Goods Dealt In", "Dealing In Goods", "HSN Code", "HSN"],
  columns: [["HSN Code", "HSN"], ["Description"]],
  toRow: ([hsn_code, description]) => ({ hsn_code, description })
};

export const SERVICES: SectionDescriptor<ServiceEntry> = {
  kind: "section",
  key: "services",
  markers: ["Services Dealt In", "Dealing In Services", "SAC Code", "SAC"],
  columns: [["SAC Code", "SAC"], ["Description"]],
  toRow: ([sac_code, description]) => ({ sac_code, description })
};
