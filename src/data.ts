import { readFile } from 'node:fs/promises';
import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import { RivetError, describeError } from './errors.js';
import type { DataRow } from './variables.js';

const RecordsSchema = z.array(z.record(z.string(), z.string()));

/**
 * Reads a CSV dataset whose first record names the columns. Rows come back
 * in file order; blank lines are skipped.
 */
export async function loadCsvData(filePath: string): Promise<DataRow[]> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf8');
  } catch (error) {
    throw new RivetError('DATASET_LOAD', `Failed to read CSV file: ${filePath} (${describeError(error)})`, { cause: error });
  }

  let records: Record<string, string>[];
  try {
    records = RecordsSchema.parse(
      parse(content, {
        columns: true,
        skip_empty_lines: true,
      })
    );
  } catch (error) {
    throw new RivetError('DATASET_LOAD', `Failed to parse CSV file: ${filePath} (${describeError(error)})`, { cause: error });
  }

  return records.filter(row => Object.keys(row).length > 0);
}
