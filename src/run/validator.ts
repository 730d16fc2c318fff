/**
 * Run Validator
 * Validates run records against the schema
 */

import { validateRun, type ValidationResult } from '@/validation/ajv_instance';
import { createChildLogger } from '@/utils/logger';
import type { RunRecord } from '@/types/run';

const logger = createChildLogger('run_validator');

export function validateRunRecord(data: unknown): ValidationResult<RunRecord> {
  const result = validateRun(data);

  if (!result.valid) {
    logger.error({ errors: result.errors }, 'Run validation failed');
  } else {
    logger.debug('Run validation passed');
  }

  return result;
}

export function isValidRun(data: unknown): data is RunRecord {
  return validateRun(data).valid;
}

export function validateAndThrow(data: unknown): RunRecord {
  const result = validateRun(data);

  if (!result.valid || !result.data) {
    throw new Error(
      `Run validation failed: ${result.errors?.join('; ') ?? 'Unknown error'}`
    );
  }

  return result.data;
}

export interface ConsistencyCheck {
  passed: boolean;
  issues: string[];
}

export function checkRunConsistency(run: RunRecord): ConsistencyCheck {
  const issues: string[] = [];

  // Sector order lists every company exactly once, in company order
  const grouped = run.sector_order.flatMap((entry) => entry.symbols);
  const listed = run.companies.map((c) => c.symbol);
  if (grouped.join(',') !== listed.join(',')) {
    issues.push('Sector order does not match company order');
  }

  for (const entry of run.sector_order) {
    for (const symbol of entry.symbols) {
      const company = run.companies.find((c) => c.symbol === symbol);
      if (company && company.sector !== entry.sector) {
        issues.push(`${symbol} listed under ${entry.sector} but belongs to ${company.sector}`);
      }
    }
  }

  if (run.summary.analyzed !== run.companies.length) {
    issues.push(
      `Analyzed count (${run.summary.analyzed}) doesn't match company count (${run.companies.length})`
    );
  }

  if (run.summary.failed !== run.errors.length) {
    issues.push(
      `Failed count (${run.summary.failed}) doesn't match error count (${run.errors.length})`
    );
  }

  const expectedStatus = run.companies.length > 0 ? 'ok' : 'no_usable_records';
  if (run.status !== expectedStatus) {
    issues.push(`Status ${run.status} with ${run.companies.length} companies`);
  }

  return {
    passed: issues.length === 0,
    issues,
  };
}
