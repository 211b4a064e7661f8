import { promises as fs } from "fs";
import Ajv, { ErrorObject, ValidateFunction } from "ajv";
import addFormats from "ajv-formats";
import { assetPath } from "../config/assets";

const ajv = new Ajv({ allErrors: true, strict: false });
addFormats(ajv);

let batchValidator: Promise<ValidateFunction> | null = null;

export function batchSchemaPath(): string {
  return assetPath("schemas", "taxpayer-batch.schema.json");
}

async function compileSchema(schemaPath: string): Promise<ValidateFunction> {
  const content = await fs.readFile(schemaPath, "utf8");
  if (!content.trim()) {
    throw new Error(`Schema file is empty: ${schemaPath}`);
  }
  const schema: unknown = JSON.parse(content);
  if (typeof schema !== "object" || schema === null) {
    throw new Error(`Schema file does not hold an object: ${schemaPath}`);
  }
  return ajv.compile(schema);
}

export function formatSchemaErrors(errors: ErrorObject[] | null | undefined): string {
  return (errors ?? []).map((error) => `${error.instancePath || "<root>"} ${error.message ?? "invalid"}`).join("; ");
}

/** Checks an array of records against the batch file contract before it is written. */
export async function assertValidBatch(records: unknown, label = "Taxpayer batch"): Promise<void> {
  if (!batchValidator) {
    batchValidator = compileSchema(batchSchemaPath()).catch((error: unknown) => {
      batchValidator = null;
      throw error;
    });
  }
  const validator = await batchValidator;
  if (validator(records)) return;
  throw new Error(`${label} failed schema validation: ${formatSchemaErrors(validator.errors)}`);
}
