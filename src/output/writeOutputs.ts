import { promises as fs } from "fs";
import { OutputFormat } from "../config/settings";
import { outputPath } from "../io/paths";
import { Logger } from "../logging/logger";
import { TaxpayerRecord } from "../types/taxpayerRecord";
import { ensureDir } from "../utils/fs";
import { toCsv } from "./csv";
import { toJson } from "./json";

export interface WrittenOutputs {
  csv: string | null;
  json: string | null;
}

export interface WriteOutputsOptions {
  outDir: string;
  format: OutputFormat;
  logger: Logger;
  date?: Date;
}

export async function writeOutputs(
  records: readonly TaxpayerRecord[],
  options: WriteOutputsOptions
): Promise<WrittenOutputs> {
  const written: WrittenOutputs = { csv: null, json: null };
  if (!records.length) {
    options.logger.warn("No data to save");
    return written;
  }

  await ensureDir(options.outDir);
  const date = options.date ?? new Date();

  if (options.format === "csv" || options.format === "both") {
    const csvPath = outputPath(options.outDir, "csv", date);
    await fs.writeFile(csvPath, toCsv(records), "utf8");
    options.logger.info(`Data saved to ${csvPath}`);
    written.csv = csvPath;
  }

  if (options.format === "json" || options.format === "both") {
    const jsonPath = outputPath(options.outDir, "json", date);
    await fs.writeFile(jsonPath, await toJson(records), "utf8");
    options.logger.info(`Data saved to ${jsonPath}`);
    written.json = jsonPath;
  }

  return written;
}
