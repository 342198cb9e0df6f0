/**
 * JSON Schema Validation
 *
 * Row contracts for the extracted tables (docs/contracts/<table>.schema.json),
 * validated with Ajv.
 */

import fs from 'fs';
import path from 'path';
import Ajv2020 from 'ajv/dist/2020';
import addFormats from 'ajv-formats';
import type { SchemaObject, ValidateFunction } from 'ajv';
import type { ExtractResult, Table, TableName } from './types';
import { logger } from './logger';

// Initialize Ajv with 2020-12 draft support
const ajv = new Ajv2020({
  strict: false,
  allErrors: true,
});
addFormats(ajv);

// Compiled validators, loaded on first use
const validators = new Map<TableName, ValidateFunction>();

function loadSchema(schemaName: string): SchemaObject {
  const possiblePaths = [
    // Relative to shared package sources
    path.join(__dirname, '../../../docs/contracts', schemaName),
    // Relative to the compiled output
    path.join(__dirname, '../../../../docs/contracts', schemaName),
    // Relative to working directory
    path.join(process.cwd(), 'docs/contracts', schemaName),
  ];

  const schemaPath = possiblePaths.find((candidate) => fs.existsSync(candidate));
  if (!schemaPath) {
    throw new Error(`Schema file not found: ${schemaName}`);
  }

  const content: unknown = JSON.parse(fs.readFileSync(schemaPath, 'utf-8'));
  if (typeof content !== 'object' || content === null || Array.isArray(content)) {
    throw new Error(`Schema file is not a JSON object: ${schemaPath}`);
  }
  return content;
}

function getValidator(tableName: TableName): ValidateFunction {
  let validate = validators.get(tableName);
  if (!validate) {
    validate = ajv.compile(loadSchema(`${tableName}.schema.json`));
    validators.set(tableName, validate);
  }
  return validate;
}

export interface ValidationResult {
  valid: boolean;
  errors?: string[];
}

/**
 * Validate every row of a table against its contract.
 * Error paths are prefixed with the row index, e.g. `/3/flurnummer`.
 */
export function validateTable(table: Table): ValidationResult {
  const validate = getValidator(table.name);
  const errors: string[] = [];

  table.rows.forEach((row, index) => {
    if (!validate(row)) {
      for (const e of validate.errors ?? []) {
        errors.push(`/${index}${e.instancePath}: ${e.message ?? 'invalid'}`);
      }
    }
  });

  if (errors.length > 0) {
    logger.warn('Table validation failed', { table: table.name, errors });
    return { valid: false, errors };
  }

  return { valid: true };
}

/**
 * Validate all tables of an extraction result.
 * Error paths are prefixed with the table name.
 */
export function validateExtractResult(result: ExtractResult): ValidationResult {
  const errors: string[] = [];

  for (const table of result.tables.values()) {
    const tableResult = validateTable(table);
    for (const error of tableResult.errors ?? []) {
      errors.push(`${table.name}${error}`);
    }
  }

  return errors.length > 0 ? { valid: false, errors } : { valid: true };
}

/**
 * Raw contract of a table
 */
export function getTableSchema(tableName: TableName): SchemaObject {
  return loadSchema(`${tableName}.schema.json`);
}
