import path from "path";
import { fileTimestamp } from "../utils/time";

export type OutputExtension = "csv" | "json";

export function outputBaseName(stamp: string): string {
  return `gst_data_${stamp}`;
}

export function outputPath(outDir: string, ext: OutputExtension, date: Date = new Date()): string {
  return path.join(outDir, `${outputBaseName(fileTimestamp(date))}.${ext}`);
}
