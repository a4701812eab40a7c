/**
 * JSON Schema Validation
 *
 * Ajv (draft 2020-12) validation for persisted extraction records and for
 * structured model responses.
 */

import fs from 'fs';
import path from 'path';
import Ajv2020 from 'ajv/dist/2020';
import type { Schema, ValidateFunction } from 'ajv';
import addFormats from 'ajv-formats';
import { logger } from './logger';

const ajv = new Ajv2020({
  strict: false,
  allErrors: true,
});
addFormats(ajv);

export interface ValidationResult {
  valid: boolean;
  errors?: string[];
}

function loadSchema(schemaName: string): Schema {
  const possiblePaths = [
    // packages/shared/src -> repo root
    path.join(__dirname, '../../../docs/contracts', schemaName),
    // compiled dist/packages/shared/src -> repo root
    path.join(__dirname, '../../../../docs/contracts', schemaName),
    path.join(process.cwd(), 'docs/contracts', schemaName),
  ];

  for (const schemaPath of possiblePaths) {
    if (fs.existsSync(schemaPath)) {
      return JSON.parse(fs.readFileSync(schemaPath, 'utf-8'));
    }
  }

  logger.warn(`Schema file not found: ${schemaName}, using permissive validation`);
  return { type: 'object' };
}

export function compileSchema<T>(schema: Schema): ValidateFunction<T> {
  return ajv.compile<T>(schema);
}

export function formatSchemaErrors(validate: ValidateFunction): string[] {
  return (validate.errors ?? []).map((e) => `${e.instancePath || '/'}: ${e.message ?? 'invalid'}`);
}

let extractionRecordValidator: ValidateFunction | null = null;

function getExtractionRecordValidator(): ValidateFunction {
  if (!extractionRecordValidator) {
    extractionRecordValidator = ajv.compile(loadSchema('extraction_record.schema.json'));
  }
  return extractionRecordValidator;
}

/**
 * Validate an ExtractionRecord against extraction_record.schema.json
 */
export function validateExtractionRecord(data: unknown): ValidationResult {
  const validate = getExtractionRecordValidator();

  if (!validate(data)) {
    const errors = formatSchemaErrors(validate);
    logger.warn('ExtractionRecord validation failed', { errors });
    return { valid: false, errors };
  }

  return { valid: true };
}
