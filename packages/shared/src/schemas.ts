/**
 * JSON Schema Validation
 *
 * Schema validation using Ajv for responses from the vision model.
 */

import fs from 'fs';
import path from 'path';
import Ajv2020 from 'ajv/dist/2020';
import type { SchemaObject, ValidateFunction } from 'ajv';
import { logger } from './logger';
import type { PageInterpretation } from './types';

// Initialize Ajv with 2020-12 draft support
const ajv = new Ajv2020({
  strict: false, // Allow additional keywords from JSON Schema draft
  allErrors: true,
});

// Compiled lazily on first use
let pageInterpretationValidator: ValidateFunction<PageInterpretation> | null = null;

function loadSchema(schemaName: string): SchemaObject {
  // Try multiple paths for schema resolution
  const possiblePaths = [
    // Relative to the package's src/ or dist/
    path.join(__dirname, '../../../docs/contracts', schemaName),
    // Relative to working directory
    path.join(process.cwd(), 'docs/contracts', schemaName),
  ];

  for (const schemaPath of possiblePaths) {
    if (fs.existsSync(schemaPath)) {
      const content = fs.readFileSync(schemaPath, 'utf-8');
      return JSON.parse(content);
    }
  }

  throw new Error(`Schema file not found: ${schemaName}`);
}

function getPageInterpretationValidator(): ValidateFunction<PageInterpretation> {
  if (!pageInterpretationValidator) {
    pageInterpretationValidator = ajv.compile<PageInterpretation>(
      loadSchema('page_interpretation.schema.json')
    );
  }
  return pageInterpretationValidator;
}

export type ValidationResult<T> =
  | { valid: true; value: T }
  | { valid: false; errors: string[] };

/**
 * Validate a parsed vision response against page_interpretation.schema.json
 */
export function validatePageInterpretation(data: unknown): ValidationResult<PageInterpretation> {
  const validate = getPageInterpretationValidator();

  if (validate(data)) {
    return { valid: true, value: data };
  }

  const errors = (validate.errors ?? []).map((e) => `${e.instancePath || '/'}: ${e.message}`);
  logger.debug('Page interpretation validation failed', { errors });
  return { valid: false, errors };
}
