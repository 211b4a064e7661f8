#!/usr/bin/env node
import path from "path";
import { readFileSync } from "fs";
import dotenv from "dotenv";
import { Command, InvalidArgumentError } from "commander";
import { z } from "zod";
import { loadSettings, OutputFormatSchema, Settings } from "../config/settings";
import { createLogger, Logger } from "../logging/logger";
import { runScrape } from "../commands/scrape";
import { runServe } from "../commands/serve";
import { runCheck } from "../commands/check";

function readArgValue(argv: string[], flag: string): string | undefined {
  const prefix = `${flag}=`;
  const inlineArg = argv.find((arg) => arg.startsWith(prefix));
  if (inlineArg) return inlineArg.slice(prefix.length);
  const index = argv.indexOf(flag);
  if (index >= 0) {
    return argv[index + 1];
  }
  return undefined;
}

function resolveEnvPath(argv: string[], fallback: string): string {
  const cliValue = readArgValue(argv, "--env-file");
  if (cliValue) return cliValue;
  return process.env.GST_SCRAPER_ENV_FILE ?? process.env.DOTENV_CONFIG_PATH ?? fallback;
}

function packageVersion(): string {
  const pkgPath = path.resolve(__dirname, "..", "..", "package.json");
  const pkg = z.object({ version: z.string() }).safeParse(JSON.parse(readFileSync(pkgPath, "utf8")));
  return pkg.success ? pkg.data.version : "0.0.0";
}

function parsePort(value: string): number {
  const port = Number.parseInt(value, 10);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new InvalidArgumentError("Port must be an integer between 0 and 65535.");
  }
  return port;
}

function parseFormat(value: string) {
  const parsed = OutputFormatSchema.safeParse(value);
  if (!parsed.success) {
    throw new InvalidArgumentError("Format must be one of: csv, json, both.");
  }
  return parsed.data;
}

function bootstrap(): { settings: Settings; logger: Logger } {
  const settings = loadSettings();
  const logger = createLogger({
    level: settings.logLevel,
    fileDir: settings.logToFile ? settings.logDir : undefined,
    retentionDays: settings.logRetentionDays
  });
  return { settings, logger };
}

const defaultEnvPath = path.resolve(process.cwd(), ".env");
const envPath = resolveEnvPath(process.argv.slice(2), defaultEnvPath);
dotenv.config({ path: envPath });

const program = new Command();

program
  .name("gst-scraper")
  .description("GSTIN taxpayer lookup: batch scraper and web form")
  .version(packageVersion());

program.option(
  "--env-file <path>",
  "Path to .env file (overrides GST_SCRAPER_ENV_FILE/DOTENV_CONFIG_PATH)",
  envPath
);

program
  .command("scrape")
  .description("Look up GSTINs one at a time and write the records to CSV and/or JSON")
  .argument("[gstins...]", "GSTINs to look up (defaults to the bundled sample list)")
  .option("--file <path>", "File with one GSTIN per line")
  .option("--demo", "Serve records from the demo table instead of the portal")
  .option("--format <format>", "Output format: csv, json or both", parseFormat)
  .option("--out <dir>", "Output directory")
  .action(async (gstins: string[], opts) => {
    const { settings, logger } = bootstrap();
    const summary = await runScrape(
      {
        gstins,
        filePath: opts.file,
        demo: opts.demo ? true : undefined,
        format: opts.format,
        outDir: opts.out
      },
      settings,
      logger
    );
    if (summary.records.length === 0) {
      process.exitCode = 1;
    }
  });

program
  .command("serve")
  .description("Start the web form and JSON API")
  .option("--port <n>", "Port to listen on", parsePort)
  .option("--host <host>", "Interface to bind")
  .action(async (opts) => {
    const { settings, logger } = bootstrap();
    await runServe({ port: opts.port, host: opts.host }, settings, logger);
  });

program
  .command("check")
  .description("Validate GSTIN structure and check character without any network call")
  .argument("<gstins...>", "GSTINs to check")
  .action((gstins: string[]) => {
    const results = runCheck(gstins);
    if (results.some((result) => !result.valid)) {
      process.exitCode = 1;
    }
  });

program.parseAsync().catch((error) => {
  console.error(error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
