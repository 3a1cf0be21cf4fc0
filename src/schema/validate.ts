import Ajv from "ajv";
import configSchema from "./config-schema.json";
import type { FileConfig, ValidationResult } from "../types";

const ajv = new Ajv({ allErrors: true });
const validateSchema = ajv.compile<FileConfig>(configSchema);

function describeErrors(): string[] {
  const errors = (validateSchema.errors || []).map((err) => {
    const path = err.instancePath || "/";
    if (err.keyword === "enum") {
      return `${path}: must be one of ${JSON.stringify(err.params?.allowedValues)}`;
    }
    if (err.keyword === "additionalProperties") {
      return `${path}: unknown field '${err.params?.additionalProperty}'`;
    }
    return `${path}: ${err.message}`;
  });

  return [...new Set(errors)];
}

function validateFileConfig(data: unknown): ValidationResult<FileConfig> {
  if (validateSchema(data)) {
    return { valid: true, value: data, errors: [] };
  }
  return { valid: false, errors: describeErrors() };
}

export { validateFileConfig };
