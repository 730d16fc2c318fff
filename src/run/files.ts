import { existsSync, readdirSync, readFileSync, statSync } from 'fs';
import { join } from 'path';
import { createChildLogger } from '@/utils/logger';
import type { RunRecord } from '@/types/run';
import { isValidRun } from './validator';
import { getRunsDirectory } from './writer';

const logger = createChildLogger('run_files');

export interface RunFileInfo {
  filePath: string;
  run: RunRecord;
  mtimeMs: number;
}

function readRunFile(filePath: string): RunRecord | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(filePath, 'utf-8'));
  } catch (error) {
    logger.debug({ filePath, error: String(error) }, 'Skipping unreadable run file');
    return null;
  }
  if (!isValidRun(parsed)) {
    logger.debug({ filePath }, 'Skipping run file that fails the run schema');
    return null;
  }
  return parsed;
}

export function loadRunFiles(limit: number = 20, runsDir: string = getRunsDirectory()): RunFileInfo[] {
  if (!existsSync(runsDir)) {
    return [];
  }

  const parsed: RunFileInfo[] = [];
  for (const file of readdirSync(runsDir).filter((f) => f.endsWith('.json'))) {
    const filePath = join(runsDir, file);
    const run = readRunFile(filePath);
    if (run) {
      parsed.push({ filePath, run, mtimeMs: statSync(filePath).mtimeMs });
    }
  }

  return parsed
    .sort((a, b) => {
      if (b.mtimeMs !== a.mtimeMs) {
        return b.mtimeMs - a.mtimeMs;
      }

      const aDate = Date.parse(a.run.generated_at);
      const bDate = Date.parse(b.run.generated_at);
      if (!Number.isNaN(aDate) && !Number.isNaN(bDate) && bDate !== aDate) {
        return bDate - aDate;
      }

      return b.filePath.localeCompare(a.filePath);
    })
    .slice(0, limit);
}

export function getLatestRunFile(runsDir?: string): RunFileInfo | null {
  const [latest] = loadRunFiles(1, runsDir);
  return latest ?? null;
}
