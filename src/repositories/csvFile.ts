import { mkdir, readFile, writeFile } from 'fs/promises';
import { dirname } from 'path';
import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';

/**
 * Write records as a CSV file with a header row, creating the directory if needed
 * Numbers are written as-is; undefined and null cells are left empty
 */
export async function writeCsv(
  filePath: string,
  columns: readonly string[],
  records: Array<Record<string, string | number | undefined>>
): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true });
  const content = stringify(records, { header: true, columns: [...columns] });
  await writeFile(filePath, content, 'utf8');
}

/**
 * Read a CSV file with a header row into one object per line
 * @returns null when the file does not exist
 */
export async function readCsv(filePath: string): Promise<unknown[] | null> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf8');
  } catch (error) {
    if (isMissingFile(error)) return null;
    throw error;
  }

  const records: unknown[] = parse(content, {
    columns: true,
    skip_empty_lines: true,
    trim: true,
  });
  return records;
}

function isMissingFile(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === 'ENOENT'
  );
}
