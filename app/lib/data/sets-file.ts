import * as fs from 'fs';
import type { SetRecord } from '../types';
import { normalizeSetRecord } from '../utils/normalizer';

/** Parse a JSON array of set records, skipping (and reporting) invalid entries. */
export function readSetsFile(filePath: string): SetRecord[] {
  if (!fs.existsSync(filePath)) {
    throw new Error(`sets file not found at ${filePath}.`);
  }
  const parsed: unknown = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  if (!Array.isArray(parsed)) {
    throw new Error(`${filePath} must contain a JSON array of sets.`);
  }

  const records: SetRecord[] = [];
  parsed.forEach((entry: unknown, index) => {
    try {
      records.push(normalizeSetRecord(entry));
    } catch (err) {
      console.warn(`  ✗ Skipping entry ${index}: ${err instanceof Error ? err.message : String(err)}`);
    }
  });
  return records;
}
