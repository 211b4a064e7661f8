import path from "path";
import { promises as fs } from "fs";
import { z } from "zod";
import { assetPath } from "../config/assets";
import { OutputFormat, Settings } from "../config/settings";
import { Logger } from "../logging/logger";
import { WrittenOutputs, writeOutputs } from "../output/writeOutputs";
import { runBatch } from "../scrape/batch";
import { ContextOverrides, createScraperContext } from "../scrape/context";
import { TaxpayerRecord } from "../types/taxpayerRecord";
import { readJson } from "../utils/fs";

const NO_DELAY = { minSeconds: 0, maxSeconds: 0 };

export interface ScrapeOptions {
  gstins: string[];
  filePath?: string;
  demo?: boolean;
  format?: OutputFormat;
  outDir?: string;
}

export interface ScrapeSummary {
  records: TaxpayerRecord[];
  succeeded: number;
  failed: number;
  outputs: WrittenOutputs;
}

/** Reads one identifier per line; blank lines and lines starting with # are ignored. */
export async function readIdentifierFile(filePath: string): Promise<string[]> {
  const content = await fs.readFile(filePath, "utf8");
  return content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith("#"));
}

export async function loadSampleIdentifiers(): Promise<string[]> {
  const raw = await readJson<unknown>(assetPath("sample-gstins.json"));
  return z.array(z.string()).parse(raw);
}

export async function runScrape(
  options: ScrapeOptions,
  baseSettings: Settings,
  logger: Logger,
  overrides: ContextOverrides = {}
): Promise<ScrapeSummary> {
  const settings: Settings = {
    ...baseSettings,
    demoMode: options.demo ?? baseSettings.demoMode,
    outputFormat: options.format ?? baseSettings.outputFormat,
    outputDir: options.outDir ? path.resolve(options.outDir) : baseSettings.outputDir
  };

  logger.info("GST Scraper Started");
  const context = await createScraperContext(settings, logger, overrides);

  const explicit = [...options.gstins];
  if (options.filePath) {
    explicit.push(...(await readIdentifierFile(options.filePath)));
  }

  let records: TaxpayerRecord[];
  let succeeded: number;
  let failed: number;

  if (context.demo && explicit.length === 0) {
    logger.info("Running in DEMO mode - generating sample data");
    records = context.demo.sampleRecords();
    succeeded = records.length;
    failed = 0;
  } else {
    const identifiers = explicit.length ? explicit : await loadSampleIdentifiers();
    const result = await runBatch(identifiers, {
      source: context.source,
      throttle: context.throttle,
      requestDelay: context.demo ? NO_DELAY : settings.requestDelay,
      logger
    });
    records = result.records;
    succeeded = result.succeeded;
    failed = result.failed;
  }

  const outputs = await writeOutputs(records, {
    outDir: settings.outputDir,
    format: settings.outputFormat,
    logger
  });

  if (records.length) {
    logger.success(`Scraping completed! Saved ${records.length} records`, { ...outputs });
  } else {
    logger.error("No data scraped");
  }
  logger.info("GST Scraper Finished", { succeeded, failed });

  return { records, succeeded, failed, outputs };
}
