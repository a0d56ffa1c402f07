import { readFile } from 'node:fs/promises';
import { ConfigurationError } from '@gleaner/shared/src/utils/errors.js';

function errorCode(error: unknown): string | undefined {
  if (!(error instanceof Error) || !('code' in error)) {
    return undefined;
  }
  return typeof error.code === 'string' ? error.code : undefined;
}

/**
 * Reads and parses a JSON file. Every failure becomes a ConfigurationError
 * whose message names the file by `label` (e.g. "Input file").
 */
export async function readJsonFile(filePath: string, label: string): Promise<unknown> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf-8');
  } catch (error) {
    if (errorCode(error) === 'ENOENT') {
      throw new ConfigurationError(`${label} not found: ${filePath}`);
    }
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Failed to read ${label.toLowerCase()} ${filePath}: ${reason}`);
  }

  try {
    return JSON.parse(content) as unknown;
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Invalid JSON in ${filePath}: ${reason}`);
  }
}
