import { stringify } from "csv-stringify/sync";
import { RECORD_COLUMNS, TaxpayerRecord } from "../types/taxpayerRecord";

function cellValue(value: TaxpayerRecord[keyof TaxpayerRecord]): string {
  return typeof value === "string" ? value : JSON.stringify(value);
}

/** One header line plus one line per record; list fields are written as their JSON text. */
export function toCsv(records: readonly TaxpayerRecord[]): string {
  const rows = records.map((record) => RECORD_COLUMNS.map((column) => cellValue(record[column])));
  return stringify(rows, {
    header: true,
    columns: [...RECORD_COLUMNS],
    quoted: true,
    quoted_empty: true
  });
}
