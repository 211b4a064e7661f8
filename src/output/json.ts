import { TaxpayerRecord } from "../types/taxpayerRecord";
import { assertValidBatch } from "../validation/jsonSchema";

export async function toJson(records: readonly TaxpayerRecord[]): Promise<string> {
  await assertValidBatch(records);
  return JSON.stringify(records, null, 2);
}
