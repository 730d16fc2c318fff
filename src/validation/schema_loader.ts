/**
 * Schema loading utility
 */

import { readFileSync } from 'fs';
import { join } from 'path';
import type { AnySchemaObject } from 'ajv';

export type SchemaName = 'analysis_config.v1' | 'statement_snapshot.v1' | 'run.v1';

const schemaCache = new Map<SchemaName, AnySchemaObject>();

export function getSchemaDir(): string {
  return process.env.SCHEMA_DIR?.trim() || join(process.cwd(), 'schemas');
}

export function loadSchema(schemaName: SchemaName): AnySchemaObject {
  const cached = schemaCache.get(schemaName);
  if (cached) {
    return cached;
  }

  const schemaPath = join(getSchemaDir(), `${schemaName}.schema.json`);
  const schema: AnySchemaObject = JSON.parse(readFileSync(schemaPath, 'utf-8'));

  schemaCache.set(schemaName, schema);
  return schema;
}
