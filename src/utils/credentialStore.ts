import * as fs from 'fs';
import * as path from 'path';
import { FileSystemError, errorMessage } from './errorHandler';

/**
 * Read the API key from its plaintext file. Returns null when the file is
 * missing or blank.
 */
export function readApiKey(filePath: string): string | null {
  if (!fs.existsSync(filePath)) return null;

  const key = fs.readFileSync(filePath, 'utf-8').trim();
  return key.length > 0 ? key : null;
}

export function saveApiKey(filePath: string, apiKey: string): void {
  try {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, `${apiKey.trim()}\n`, { encoding: 'utf-8', mode: 0o600 });
  } catch (error) {
    throw new FileSystemError(`Could not save API key to ${filePath}: ${errorMessage(error)}`);
  }
}
