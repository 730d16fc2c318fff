/**
 * Time utilities for run ids and dates
 */

import { format } from 'date-fns';

export function formatDate(date: Date): string {
  return format(date, 'yyyy-MM-dd');
}

export function getRunId(date: Date, hash: string): string {
  return `${formatDate(date)}__${hash.substring(0, 8)}`;
}
