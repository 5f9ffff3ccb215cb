/**
 * JSON Schema Validation
 *
 * Schema validation using Ajv for transaction records.
 */

import fs from 'fs';
import path from 'path';
import Ajv2020 from 'ajv/dist/2020';
import type { ValidateFunction } from 'ajv';
import { logger } from './logger';

// Initialize Ajv with 2020-12 draft support
const ajv = new Ajv2020({
  strict: false,
  allErrors: true,
});

// Compiled lazily on first use
let transactionRecordsValidator: ValidateFunction | null = null;

function loadSchema(schemaName: string): object {
  const possiblePaths = [
    // Relative to shared package sources
    path.join(__dirname, '../../../docs/contracts', schemaName),
    // Relative to compiled shared package in dist/
    path.join(__dirname, '../../../../docs/contracts', schemaName),
    // Relative to the working directory
    path.join(process.cwd(), 'docs/contracts', schemaName),
  ];

  for (const schemaPath of possiblePaths) {
    if (fs.existsSync(schemaPath)) {
      const content = fs.readFileSync(schemaPath, 'utf-8');
      return JSON.parse(content);
    }
  }

  // Permissive schema if the contract is not shipped alongside the code
  logger.warn(`Schema file not found: ${schemaName}, using permissive validation`);
  return { type: 'array' };
}

function getTransactionRecordsValidator(): ValidateFunction {
  if (!transactionRecordsValidator) {
    transactionRecordsValidator = ajv.compile(loadSchema('transaction_records.schema.json'));
  }
  return transactionRecordsValidator;
}

export interface ValidationResult {
  valid: boolean;
  errors?: string[];
}

/**
 * Validate extracted records against transaction_records.schema.json
 */
export function validateTransactionRecords(data: unknown): ValidationResult {
  const validate = getTransactionRecordsValidator();
  const valid = validate(data);

  if (!valid) {
    const errors = validate.errors?.map((e) => `${e.instancePath || '/'}: ${e.message}`);
    logger.warn('Transaction record validation failed', { errors });
    return { valid: false, errors };
  }

  return { valid: true };
}
