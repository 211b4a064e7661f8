import cors from "cors";
import express, { Request, Response } from "express";
import { z } from "zod";
import { errorMessage } from "../errors";
import { Logger } from "../logging/logger";
import { writeOutputs } from "../output/writeOutputs";
import { TaxpayerLookup } from "../scrape/pipeline";
import { renderIndex, renderResult } from "./views";

const ScrapeBodySchema = z.object({ gstin: z.unknown().optional() });

export interface AppOptions {
  source: TaxpayerLookup;
  logger: Logger;
  demoMode: boolean;
  outputDir: string;
}

function readGstin(body: unknown): string {
  const parsed = ScrapeBodySchema.safeParse(body);
  if (!parsed.success || typeof parsed.data.gstin !== "string") return "";
  return parsed.data.gstin.trim();
}

function redirectWithFlash(res: Response, message: string): void {
  res.redirect(303, `/?flash=${encodeURIComponent(message)}`);
}

export function createApp(options: AppOptions): express.Express {
  const { source, logger } = options;
  const app = express();
  app.use(cors());
  app.use(express.urlencoded({ extended: false }));
  app.use(express.json());

  app.get("/", (req: Request, res: Response) => {
    const flash = typeof req.query.flash === "string" ? req.query.flash : null;
    res.type("html").send(renderIndex(flash, options.demoMode));
  });

  app.post("/scrape", async (req: Request, res: Response) => {
    try {
      const gstin = readGstin(req.body);
      if (!gstin) {
        redirectWithFlash(res, "Please provide a GSTIN");
        return;
      }

      logger.info(`Received scraping request for GSTIN: ${gstin}`);
      const outcome = await source.lookup(gstin);
      if (!outcome.ok) {
        redirectWithFlash(res, "Failed to scrape GSTIN. Please try again.");
        return;
      }

      const outputs = await writeOutputs([outcome.record], {
        outDir: options.outputDir,
        format: "both",
        logger
      });
      logger.success(`Successfully scraped GSTIN: ${outcome.gstin}`);
      res.type("html").send(renderResult(outcome.record, outputs));
    } catch (error) {
      logger.error("Error during scraping", { error: errorMessage(error) });
      redirectWithFlash(res, "An error occurred during scraping. Please try again.");
    }
  });

  app.post("/api/scrape", async (req: Request, res: Response) => {
    try {
      const gstin = readGstin(req.body);
      if (!gstin) {
        res.status(400).json({ success: false, error: "GSTIN is required" });
        return;
      }

      logger.info(`API scraping request for GSTIN: ${gstin}`);
      const outcome = await source.lookup(gstin);
      if (outcome.ok) {
        res.json({ success: true, data: outcome.record });
        return;
      }
      if (outcome.kind === "validation") {
        res.status(400).json({ success: false, error: outcome.message });
        return;
      }
      res.status(500).json({ success: false, error: "Failed to scrape GSTIN" });
    } catch (error) {
      logger.error("API error", { error: errorMessage(error) });
      res.status(500).json({ success: false, error: "Internal server error" });
    }
  });

  app.get("/health", (_req: Request, res: Response) => {
    res.json({ status: "healthy", demo_mode: options.demoMode });
  });

  return app;
}
