/**
 * コマンドオプションの検証
 */

import { InvalidInputError } from '@archdocs/types';
import type { OutputFormat } from './output.js';

/**
 * --format の値
 */
export function parseFormat(value: string | undefined): OutputFormat {
  if (value === undefined || value === 'text') {
    return 'text';
  }
  if (value === 'json') {
    return 'json';
  }
  throw new InvalidInputError('format', `format must be 'text' or 'json' (got '${value}')`);
}

/**
 * --limit の値（正の整数）
 */
export function parseLimit(value: string | undefined, fallback: number | undefined): number | undefined {
  if (value === undefined) {
    return fallback;
  }
  if (!/^\d+$/.test(value) || Number(value) < 1) {
    throw new InvalidInputError('limit', `limit must be a positive integer (got '${value}')`);
  }
  return Number(value);
}
