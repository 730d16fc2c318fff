/**
 * Run Writer
 * Saves run records to disk
 */

import { writeFileSync, mkdirSync, existsSync } from 'fs';
import { join } from 'path';
import { createChildLogger } from '@/utils/logger';
import { contentHash } from '@/core/seed';
import type { RunRecord } from '@/types/run';

const logger = createChildLogger('run_writer');

export interface WriteResult {
  runId: string;
  filePath: string;
  contentHash: string;
}

export function getRunsDirectory(projectRoot: string = process.cwd()): string {
  return join(projectRoot, 'data', 'runs');
}

export function writeRunRecord(run: RunRecord, runsDir: string = getRunsDirectory()): WriteResult {
  if (!existsSync(runsDir)) {
    mkdirSync(runsDir, { recursive: true });
  }

  const filePath = join(runsDir, `${run.run_id}.json`);
  const hash = contentHash(run);

  writeFileSync(filePath, JSON.stringify(run, null, 2), 'utf-8');

  logger.info({ runId: run.run_id, filePath }, 'Run record written');

  return {
    runId: run.run_id,
    filePath,
    contentHash: hash,
  };
}
