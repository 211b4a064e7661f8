import { GstinValidationError } from "../errors";
import { stateNameForCode } from "./stateCodes";

export const GSTIN_LENGTH = 15;

/**
 * 2-digit state code, 10-character PAN (5 letters, 4 digits, 1 letter),
 * entity code (1-9 or A-Z), the literal "Z", and a check character.
 */
export const GSTIN_PATTERN = /^[0-9]{2}[A-Z]{5}[0-9]{4}[A-Z][1-9A-Z]Z[0-9A-Z]$/;

const CHECKSUM_ALPHABET = "0123456789ABCDEFGHIJKLMNOPQRSTUVWXYZ";

export function normalizeGstin(value: string): string {
  return value.trim().toUpperCase();
}

/** Upper-cases only; callers trim input at the edges. */
export function validateGstin(value: unknown): boolean {
  if (typeof value !== "string") return false;
  const gstin = value.toUpperCase();
  if (gstin.length !== GSTIN_LENGTH) return false;
  return GSTIN_PATTERN.test(gstin);
}

/** Mod-36 check character computed over the first 14 characters. */
export function gstinChecksum(gstin: string): string | null {
  const body = normalizeGstin(gstin).slice(0, GSTIN_LENGTH - 1);
  if (body.length !== GSTIN_LENGTH - 1) return null;

  let total = 0;
  for (let i = 0; i < body.length; i += 1) {
    const code = CHECKSUM_ALPHABET.indexOf(body[i]);
    if (code < 0) return null;
    const product = code * (i % 2 === 0 ? 1 : 2);
    total += Math.floor(product / 36) + (product % 36);
  }
  return CHECKSUM_ALPHABET[(36 - (total % 36)) % 36];
}

export function hasValidChecksum(gstin: string): boolean {
  if (!validateGstin(gstin)) return false;
  const normalized = normalizeGstin(gstin);
  return gstinChecksum(normalized) === normalized[GSTIN_LENGTH - 1];
}

export interface GstinParts {
  gstin: string;
  state_code: string;
  state_name: string | null;
  pan: string;
  entity_code: string;
  check_character: string;
  checksum_valid: boolean;
}

export function describeGstin(value: string): GstinParts {
  if (!validateGstin(value)) {
    throw new GstinValidationError(value);
  }
  const gstin = normalizeGstin(value);
  const stateCode = gstin.slice(0, 2);
  return {
    gstin,
    state_code: stateCode,
    state_name: stateNameForCode(stateCode),
    pan: gstin.slice(2, 12),
    entity_code: gstin[12],
    check_character: gstin[14],
    checksum_valid: hasValidChecksum(gstin)
  };
}
