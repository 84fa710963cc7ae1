/**
 * Seed List Reader
 * Loads the URLs to audit from a text file (one per line) or a CSV file (first column)
 */

import * as Papa from 'papaparse';
import { readFile } from 'fs/promises';
import * as path from 'path';

const BOM = '\uFEFF';

export function parseSeedList(content: string, filename: string): string[] {
  const text = content.startsWith(BOM) ? content.slice(BOM.length) : content;

  if (path.extname(filename).toLowerCase() === '.txt') {
    return text
      .split(/\r?\n/)
      .map((line) => line.trim())
      .filter((line) => line.length > 0);
  }

  const { data } = Papa.parse<string[]>(text, { delimiter: ',', skipEmptyLines: true });
  return data
    .map((row) => (row.length > 0 ? row[0].trim() : ''))
    .filter((url) => url.length > 0);
}

export async function readSeedList(filename: string): Promise<string[]> {
  const content = await readFile(filename, 'utf-8');
  return parseSeedList(content, filename);
}
