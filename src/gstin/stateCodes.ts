import { readFileSync } from "fs";
import { z } from "zod";
import { assetPath } from "../config/assets";

const StateCodesSchema = z.record(z.string().regex(/^\d{2}$/), z.string().min(1));

let cache: Record<string, string> | null = null;

function loadStateCodes(): Record<string, string> {
  if (!cache) {
    const raw: unknown = JSON.parse(readFileSync(assetPath("state-codes.json"), "utf8"));
    cache = StateCodesSchema.parse(raw);
  }
  return cache;
}

export function stateNameForCode(code: string): string | null {
  return loadStateCodes()[code] ?? null;
}
