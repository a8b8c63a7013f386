import { promises as fs } from "fs";
import path from "path";
import Ajv, { ErrorObject, ValidateFunction } from "ajv";
import addFormats from "ajv-formats";
import { contractsSchemasDir } from "../io/paths";

export type ContractName = "parse_report";

const ajv = new Ajv({ allErrors: true, strict: false });
addFormats(ajv);

const validatorCache = new Map<ContractName, ValidateFunction>();

function contractSchemaPath(name: ContractName): string {
  return path.join(contractsSchemasDir(), `${name}.schema.json`);
}

async function loadContractSchema(name: ContractName): Promise<object> {
  const schemaPath = contractSchemaPath(name);
  const content = await fs.readFile(schemaPath, "utf8");
  if (!content.trim()) {
    throw new Error(`Schema file is empty: ${schemaPath}`);
  }
  return JSON.parse(content) as object;
}

export async function getContractValidator(name: ContractName): Promise<ValidateFunction> {
  const cached = validatorCache.get(name);
  if (cached) return cached;
  const validator = ajv.compile(await loadContractSchema(name));
  validatorCache.set(name, validator);
  return validator;
}

function describeError(error: ErrorObject): string {
  return `${error.instancePath || "<root>"} ${error.message ?? "is invalid"}`;
}

export function assertValidSchema(
  validator: ValidateFunction,
  data: unknown,
  label: string
): void {
  if (validator(data)) return;
  const errors = (validator.errors ?? []).map(describeError).join("; ");
  throw new Error(`${label} failed schema validation: ${errors}`);
}
