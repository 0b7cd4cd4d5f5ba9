/**
 * Shared reader helpers.
 */

import * as fs from 'fs';

/**
 * Reads and parses a JSON file. Returns null if the file is missing or malformed.
 */
export async function readJsonStore(filePath: string): Promise<unknown> {
  try {
    const content = await fs.promises.readFile(filePath, 'utf-8');
    const parsed: unknown = JSON.parse(content);
    return parsed;
  } catch {
    return null;
  }
}
