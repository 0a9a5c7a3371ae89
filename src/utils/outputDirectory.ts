import * as fs from 'fs';
import * as path from 'path';
import { format } from 'date-fns';
import { FileSystemError, errorMessage } from './errorHandler';

/**
 * Keep letters, digits, spaces and underscores, then drop trailing
 * whitespace. "Apple!" -> "Apple", "Blue Berry " -> "Blue Berry".
 */
export const sanitizeProfileName = (name: string): string =>
  name.replace(/[^\p{L}\p{N} _]/gu, '').trimEnd();

export const outputDirectoryName = (handle: string, profileName: string, date: Date = new Date()): string =>
  `${handle}_${sanitizeProfileName(profileName)}_${format(date, 'yyyyMMdd_HHmmss')}`;

/**
 * Create the per-run output directory under `root` and return its path.
 */
export function createOutputDirectory(
  root: string,
  handle: string,
  profileName: string,
  date: Date = new Date()
): string {
  const dir = path.join(root, outputDirectoryName(handle, profileName, date));

  try {
    fs.mkdirSync(dir, { recursive: true });
  } catch (error) {
    throw new FileSystemError(`Failed to create output directory ${dir}: ${errorMessage(error)}`);
  }

  return dir;
}

/** Total size in bytes of the regular files directly inside `dir`. */
export function directorySize(dir: string): number {
  return fs
    .readdirSync(dir, { withFileTypes: true })
    .filter(entry => entry.isFile())
    .reduce((sum, entry) => sum + fs.statSync(path.join(dir, entry.name)).size, 0);
}

export function formatSize(bytes: number): string {
  const mb = bytes / (1024 * 1024);
  if (mb > 1) return `${mb.toFixed(1)} MB`;
  return `${(bytes / 1024).toFixed(1)} KB`;
}
