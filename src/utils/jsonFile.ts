import { promises as fs } from 'fs';
import path from 'path';
import { StoreError, toError } from './errors';

// fs errors are not always `instanceof Error` (Jest runs tests in a separate realm).
export function isMissingFile(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

/**
 * Reads and parses a JSON document. Resolves `undefined` when the file
 * does not exist or is blank.
 */
export async function readJsonFile(filePath: string): Promise<unknown> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    if (isMissingFile(error)) return undefined;
    throw new StoreError(`Could not read ${filePath}: ${toError(error).message}`, filePath);
  }

  if (raw.trim() === '') return undefined;

  try {
    return JSON.parse(raw);
  } catch (error) {
    throw new StoreError(`${filePath} is not valid JSON: ${toError(error).message}`, filePath);
  }
}

/** Rewrites the whole document through a temporary file in the same directory. */
export async function writeJsonFile(filePath: string, value: unknown): Promise<void> {
  const tempPath = `${filePath}.${process.pid}.tmp`;
  try {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(tempPath, `${JSON.stringify(value, null, 2)}\n`, 'utf8');
    await fs.rename(tempPath, filePath);
  } catch (error) {
    throw new StoreError(`Could not write ${filePath}: ${toError(error).message}`, filePath);
  }
}
