/**
 * JSON file helpers for the small settings stores
 */

import { promises as fs } from 'fs';
import { basename, dirname, join } from 'path';
import { randomUUID } from 'crypto';
import { isErrnoException } from './errors.js';

/**
 * Reads and parses a JSON file. Resolves to undefined when the file does not exist.
 */
export async function readJsonFile(filePath: string): Promise<unknown> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return undefined;
    }
    throw error;
  }
  const parsed: unknown = JSON.parse(content);
  return parsed;
}

/**
 * Writes pretty-printed JSON through a temporary file and a rename
 */
export async function writeJsonFile(filePath: string, data: unknown): Promise<void> {
  const directory = dirname(filePath);
  const tempPath = join(directory, `.${basename(filePath)}.${randomUUID()}.tmp`);

  await fs.mkdir(directory, { recursive: true });
  try {
    await fs.writeFile(tempPath, JSON.stringify(data, null, 2), 'utf-8');
    await fs.rename(tempPath, filePath);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    throw error;
  }
}
