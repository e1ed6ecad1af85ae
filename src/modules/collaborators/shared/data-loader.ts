import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';

/**
 * Reads and parses a JSON data file.
 *
 * @param relativePath - Path relative to process.cwd() (e.g., 'data/products.json')
 * @throws Error when the file is missing or is not valid JSON
 */
export function loadJsonDataFile(relativePath: string): unknown {
  const dataPath = resolve(process.cwd(), relativePath);

  try {
    return JSON.parse(readFileSync(dataPath, 'utf8')) as unknown;
  } catch (error: unknown) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new Error(`Unable to load data file ${relativePath}: ${reason}`);
  }
}
