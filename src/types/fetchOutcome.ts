import { TaxpayerRecord } from "./taxpayerRecord";

export type TransientCause = "timeout" | "transport";

export type FailureKind = "validation" | "exhausted_retries" | "unexpected";

export interface FetchSuccess {
  ok: true;
  gstin: string;
  attempts: number;
  record: TaxpayerRecord;
}

export interface FetchFailure {
  ok: false;
  gstin: string;
  attempts: number;
  kind: FailureKind;
  message: string;
  /** Set when the last attempt failed with a retryable network error. */
  last_cause?: TransientCause;
}

export type FetchOutcome = FetchSuccess | FetchFailure;

export interface BatchResult {
  outcomes: FetchOutcome[];
  records: TaxpayerRecord[];
  succeeded: number;
  failed: number;
}
