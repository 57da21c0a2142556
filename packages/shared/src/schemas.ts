/**
 * JSON Schema Validation
 *
 * Ajv validators for the written page output and for process requests.
 */

import fs from 'fs';
import path from 'path';
import Ajv2020 from 'ajv/dist/2020';
import type { ValidateFunction } from 'ajv';
import addFormats from 'ajv-formats';
import { logger } from './logger';

// Initialize Ajv with 2020-12 draft support
const ajv = new Ajv2020({
  strict: false, // Allow additional keywords from JSON Schema draft
  allErrors: true,
  verbose: true,
});
addFormats(ajv);

export const SCHEMA_FILES = {
  processingResult: 'processing_result.schema.json',
  processRequest: 'process_request.schema.json',
} as const;

type SchemaName = keyof typeof SCHEMA_FILES;

const loadedSchemas = new Map<SchemaName, object>();
const validators = new Map<SchemaName, ValidateFunction>();

function loadSchema(schemaName: string): object {
  // Try multiple paths for schema resolution
  const possiblePaths = [
    // Relative to shared package in development
    path.join(__dirname, '../../../docs/contracts', schemaName),
    // Relative to shared package dist
    path.join(__dirname, '../../../../docs/contracts', schemaName),
    // Relative to project root (for Docker containers)
    path.join(process.cwd(), 'docs/contracts', schemaName),
  ];

  for (const schemaPath of possiblePaths) {
    if (fs.existsSync(schemaPath)) {
      return JSON.parse(fs.readFileSync(schemaPath, 'utf-8'));
    }
  }

  // Return a permissive schema if file not found (for container environments)
  logger.warn(`Schema file not found: ${schemaName}, using permissive validation`);
  return { type: 'object' };
}

function getSchema(name: SchemaName): object {
  let schema = loadedSchemas.get(name);
  if (!schema) {
    schema = loadSchema(SCHEMA_FILES[name]);
    loadedSchemas.set(name, schema);
  }
  return schema;
}

function getValidator(name: SchemaName): ValidateFunction {
  let validate = validators.get(name);
  if (!validate) {
    validate = ajv.compile(getSchema(name));
    validators.set(name, validate);
  }
  return validate;
}

export interface ValidationResult {
  valid: boolean;
  errors?: string[];
}

function runValidation(name: SchemaName, label: string, data: unknown): ValidationResult {
  const validate = getValidator(name);
  const valid = validate(data);

  if (!valid) {
    const errors = validate.errors?.map((e) => `${e.instancePath || '/'}: ${e.message}`);
    logger.warn(`${label} validation failed`, { errors });
    return { valid: false, errors };
  }

  return { valid: true };
}

/**
 * Validate a written page document against processing_result.schema.json
 */
export function validateProcessingResult(data: unknown): ValidationResult {
  return runValidation('processingResult', 'ProcessingResult', data);
}

/**
 * Validate a POST /process or /jobs body against process_request.schema.json
 */
export function validateProcessRequest(data: unknown): ValidationResult {
  return runValidation('processRequest', 'ProcessRequest', data);
}

export const schemas = {
  get processingResult() {
    return getSchema('processingResult');
  },
  get processRequest() {
    return getSchema('processRequest');
  },
};
