import { readFileSync } from 'fs';
import path from 'path';

// Data directory at repository root (CommonJS), overridable with DATA_DIR
export const BASE_DATA_DIR = process.env.DATA_DIR || path.join(__dirname, '../../../data');

/**
 * Loads and parses JSON data from a file. Callers validate the shape.
 * @param fn - Filename relative to the data directory
 * @returns Parsed JSON value
 * @throws Error if file cannot be read or parsed
 */
export function load(fn: string): unknown {
  const data = readFileSync(path.join(BASE_DATA_DIR, fn), 'utf8');
  return JSON.parse(data);
}

