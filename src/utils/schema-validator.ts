import Ajv, { ErrorObject, ValidateFunction } from 'ajv';
import ingestRequestSchema from '../schemas/ingest_request.schema.json';
import queryRequestSchema from '../schemas/query_request.schema.json';
import extractionOutputSchema from '../schemas/extraction_output.schema.json';
import { ValidationError, ValidationIssue } from '../errors';
import { logger } from './logger';
import { IngestRequestBody, QueryRequestBody, RawExtractionOutput } from '../types/api';

// Create and configure Ajv instance
const ajv = new Ajv({
  allErrors: true,
  removeAdditional: 'all',
  useDefaults: true,
});

// Compile validators once at startup
const validateIngest: ValidateFunction<IngestRequestBody> = ajv.compile<IngestRequestBody>(ingestRequestSchema);
const validateQuery: ValidateFunction<QueryRequestBody> = ajv.compile<QueryRequestBody>(queryRequestSchema);
const validateExtraction: ValidateFunction<RawExtractionOutput> =
  ajv.compile<RawExtractionOutput>(extractionOutputSchema);

/**
 * Format AJV errors into a more readable structure
 */
function formatValidationErrors(errors: ErrorObject[]): ValidationIssue[] {
  return errors.map((error) => ({
    path: error.instancePath || '/',
    message: error.message || 'Unknown validation error',
  }));
}

function check<T>(validate: ValidateFunction<T>, schema: string, label: string, data: unknown): T {
  if (validate(data)) {
    return data;
  }

  const errors = formatValidationErrors(validate.errors || []);

  logger.warn(
    {
      schema,
      errors,
    },
    'Schema validation failed'
  );

  throw new ValidationError(`Invalid ${label}`, errors);
}

/**
 * Validate an ingest request body
 * @returns The validated body, with defaults applied
 * @throws ValidationError with one issue per violated constraint
 */
export function validateIngestRequest(data: unknown): IngestRequestBody {
  return check(validateIngest, 'ingest_request', 'ingest request', data);
}

/**
 * Validate a query request body; fills in top_k and include_relations
 */
export function validateQueryRequest(data: unknown): QueryRequestBody {
  return check(validateQuery, 'query_request', 'query request', data);
}

/**
 * Validate the JSON object returned by the extraction model
 */
export function validateExtractionOutput(data: unknown): RawExtractionOutput {
  return check(validateExtraction, 'extraction_output', 'extraction output', data);
}
