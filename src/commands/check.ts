import { describeGstin, validateGstin } from "../gstin/validate";

export interface CheckResult {
  input: string;
  valid: boolean;
  checksum_valid: boolean;
  state_code: string | null;
  state_name: string | null;
  pan: string | null;
}

export function checkGstin(input: string): CheckResult {
  if (!validateGstin(input)) {
    return { input, valid: false, checksum_valid: false, state_code: null, state_name: null, pan: null };
  }
  const parts = describeGstin(input);
  return {
    input,
    valid: true,
    checksum_valid: parts.checksum_valid,
    state_code: parts.state_code,
    state_name: parts.state_name,
    pan: parts.pan
  };
}

export function runCheck(inputs: string[]): CheckResult[] {
  const results = inputs.map(checkGstin);
  for (const result of results) {
    console.log(JSON.stringify(result));
  }
  return results;
}
