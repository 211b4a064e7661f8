import { describe, expect, it } from "vitest";
import { readFileSync } from "fs";
import path from "path";
import * as cheerio from "cheerio";
import { GOODS, SCALAR_DESCRIPTORS, SERVICES, SectionDescriptor } from "../src/extract/descriptors";
import { extractField, extractScalar, extractSection } from "../src/extract/fieldExtractor";
import { extractTaxpayerRecord } from "../src/extract/taxpayerPage";
import { GoodsEntry } from "../src/types/taxpayerRecord";

const fixturesDir = path.join(process.cwd(), "fixtures");

function loadFixture(name: string): string {
  return readFileSync(path.join(fixturesDir, name), "utf8");
}

describe("taxpayer page extraction", () => {
  it("reads label based layouts and section tables", () => {
    const record = extractTaxpayerRecord(loadFixture("taxpayer_labels.html"), {
      gstin: "29AABCK1234M1ZP",
      scrapedAt: "2024-04-12T10:00:00Z"
    });

    expect(record.gstin).toBe("29AABCK1234M1ZP");
    expect(record.legal_name).toBe("KESTREL AGRO FOODS PRIVATE LIMITED");
    expect(record.trade_name).toBe("KESTREL FOODS");
    expect(record.registration_date).toBe("15/03/2019");
    expect(record.cancellation_date).toBe("N/A");
    expect(record.constitution_of_business).toBe("Private Limited Company");
    expect(record.taxpayer_type).toBe("Regular");
    expect(record.status).toBe("Active");
    expect(record.state_jurisdiction).toBe("State - Karnataka, Zone - Bengaluru North");
    expect(record.centre_jurisdiction).toBe("Range-II, Division-North, Bengaluru");
    expect(record.principal_address).toBe("14, Industrial Area, Peenya, Bengaluru, Karnataka, 560058");
    expect(record.nature_of_business).toBe("Factory / Manufacturing, Warehouse / Depot");
    expect(record.aadhaar_authenticated).toBe("Yes");
    expect(record.core_business_activity).toBe("N/A");
    expect(record.ekyc_verified).toBe("N/A");
    expect(record.einvoice_status).toBe("N/A");

    expect(record.goods).toEqual([
      { hsn_code: "1904", description: "Prepared foods obtained by swelling or roasting of cereals" },
      { hsn_code: "2106", description: "Food preparations not elsewhere specified" }
    ]);
    expect(record.filing_history).toEqual([
      { financial_year: "2023-2024", period: "March", status: "Filed" },
      { financial_year: "2023-2024", period: "February", status: "Filed" }
    ]);
    expect(record.services).toEqual([]);

    expect(record.source).toBe("portal");
    expect(record.scraped_at).toBe("2024-04-12T10:00:00Z");
    expect(record.schema_version).toBe("1.0");
  });

  it("prefers anchored elements and falls back to labels when an anchor is empty", () => {
    const record = extractTaxpayerRecord(loadFixture("taxpayer_anchors.html"), {
      gstin: "24AAAFO1234B1Z5",
      scrapedAt: "2024-04-12T10:00:00Z"
    });

    expect(record.legal_name).toBe("ORIOLE TEXTILES LLP");
    expect(record.trade_name).toBe("ORIOLE");
    expect(record.registration_date).toBe("01/07/2017");
    expect(record.taxpayer_type).toBe("Composition");
    expect(record.status).toBe("Cancelled");
    expect(record.state_jurisdiction).toBe("Gujarat");
    expect(record.principal_address).toBe("N/A");
    expect(record.filing_history).toEqual([]);
    expect(record.goods).toEqual([]);
    expect(record.services).toEqual([]);
  });

  it("returns the unknown sentinel for every field of an unrelated page", () => {
    const record = extractTaxpayerRecord("<html><body><p>Enter the characters shown</p></body></html>", {
      gstin: "27AAPFU0939F1ZV",
      scrapedAt: "2024-04-12T10:00:00Z"
    });

    expect(record.legal_name).toBe("N/A");
    expect(record.status).toBe("N/A");
    expect(record.einvoice_status).toBe("N/A");
    expect(record.goods).toEqual([]);
  });

  it("does not throw on empty or broken markup", () => {
    expect(() => extractTaxpayerRecord("", { gstin: "27AAPFU0939F1ZV", scrapedAt: "x" })).not.toThrow();
    const record = extractTaxpayerRecord("<div><table><tr><td>Legal Name<td>BROKEN MARKUP LTD", {
      gstin: "27AAPFU0939F1ZV",
      scrapedAt: "x"
    });
    expect(record.legal_name).toBe("BROKEN MARKUP LTD");
  });
});

describe("field lookups", () => {
  it("uses the anchor before any label", () => {
    const $ = cheerio.load('<p>Trade Name: FROM LABEL</p><span id="tradeNam">FROM ANCHOR</span>');
    expect(extractField($, SCALAR_DESCRIPTORS.trade_name)).toBe("FROM ANCHOR");
  });

  it("matches labels case-insensitively but not inside other words", () => {
    const $ = cheerio.load("<p>legal name: lowercase label ltd</p>");
    expect(extractScalar($, SCALAR_DESCRIPTORS.legal_name)).toBe("lowercase label ltd");

    const services = cheerio.load(
      "<p>Transaction summary</p><table><tr><th>Code</th><th>Description</th></tr><tr><td>1</td><td>x</td></tr></table>"
    );
    expect(extractField(services, SERVICES)).toEqual([]);
  });

  it("reads a section table from the next row when the header sits in the first row", () => {
    const $ = cheerio.load(
      "<h3>Dealing In Goods</h3><table><tr><td>HSN</td><td>Description</td></tr><tr><td>0401</td><td>Milk and cream</td></tr></table>"
    );
    expect(extractSection($, GOODS)).toEqual([{ hsn_code: "0401", description: "Milk and cream" }]);
  });

  it("fills missing cells with the unknown sentinel", () => {
    const $ = cheerio.load(
      "<h3>Goods Dealt In</h3><table><tr><th>HSN Code</th><th>Description</th></tr><tr><td>7308</td></tr></table>"
    );
    expect(extractSection($, GOODS)).toEqual([{ hsn_code: "7308", description: "N/A" }]);
  });

  it("does not reach past the next heading for a section table", () => {
    const $ = cheerio.load(
      "<h3>Goods Dealt In</h3><p>None declared</p><h3>Services Dealt In</h3>" +
        "<table><tr><th>SAC Code</th><th>Description</th></tr><tr><td>9983</td><td>Consulting</td></tr></table>"
    );
    expect(extractSection($, GOODS)).toEqual([]);
  });

  it("turns a failing row builder into an empty section", () => {
    const failing: SectionDescriptor<GoodsEntry> = {
      ...GOODS,
      toRow: () => {
        throw new Error("row builder failed");
      }
    };
    const $ = cheerio.load(
      "<h3>Goods Dealt In</h3><table><tr><th>HSN Code</th><th>Description</th></tr><tr><td>1</td><td>x</td></tr></table>"
    );
    expect(extractSection($, failing)).toEqual([]);
  });
});
