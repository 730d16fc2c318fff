/**
 * Ajv validation instance with schema validators
 * Config files, statement snapshots and run records are checked against
 * the JSON schemas under schemas/.
 */

import Ajv2020, { type ValidateFunction } from 'ajv/dist/2020';
import addFormats from 'ajv-formats';
import { loadSchema } from './schema_loader';
import type { RawAnalysisConfig } from '@/core/config';
import type { RawStatements } from '@/types/metrics';
import type { RunRecord } from '@/types/run';

// Create Ajv instance with Draft 2020-12 support
const ajv = new Ajv2020({
  allErrors: true,
  strict: true,
  strictTypes: true,
  strictTuples: true,
  allowUnionTypes: true,
});

// Add format validators (date, date-time, ...)
addFormats(ajv);

// Lazy-loaded validators
let analysisConfigValidator: ValidateFunction<RawAnalysisConfig> | null = null;
let snapshotValidator: ValidateFunction<RawStatements> | null = null;
let runValidator: ValidateFunction<RunRecord> | null = null;

export function getAnalysisConfigValidator(): ValidateFunction<RawAnalysisConfig> {
  if (!analysisConfigValidator) {
    analysisConfigValidator = ajv.compile<RawAnalysisConfig>(loadSchema('analysis_config.v1'));
  }
  return analysisConfigValidator;
}

export function getSnapshotValidator(): ValidateFunction<RawStatements> {
  if (!snapshotValidator) {
    snapshotValidator = ajv.compile<RawStatements>(loadSchema('statement_snapshot.v1'));
  }
  return snapshotValidator;
}

export function getRunValidator(): ValidateFunction<RunRecord> {
  if (!runValidator) {
    runValidator = ajv.compile<RunRecord>(loadSchema('run.v1'));
  }
  return runValidator;
}

export interface ValidationResult<T> {
  valid: boolean;
  data: T | null;
  errors: string[] | null;
}

function check<T>(validate: ValidateFunction<T>, data: unknown): ValidationResult<T> {
  if (validate(data)) {
    return { valid: true, data, errors: null };
  }

  const errors = validate.errors?.map(
    (e) => `${e.instancePath || 'root'}: ${e.message}`
  ) ?? ['Unknown validation error'];

  return { valid: false, data: null, errors };
}

export function validateAnalysisConfig(data: unknown): ValidationResult<RawAnalysisConfig> {
  return check(getAnalysisConfigValidator(), data);
}

export function validateStatementSnapshot(data: unknown): ValidationResult<RawStatements> {
  return check(getSnapshotValidator(), data);
}

export function validateRun(data: unknown): ValidationResult<RunRecord> {
  return check(getRunValidator(), data);
}
