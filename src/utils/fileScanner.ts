/**
 * Recursive scan of a local tree into slash-separated relative paths
 *
 * Exclusions use gitignore syntax, the same as .gitignore files.
 */

import { promises as fs } from 'fs';
import path from 'path';
import ignore, { type Ignore } from 'ignore';
import { hashFile, ERROR_HASH } from './hashUtils.js';
import { mcpLogger } from './mcpLogger.js';
import { errorMessage } from '../errors/forgeErrors.js';

export interface ScanOptions {
  /** gitignore-style patterns, relative to the scanned root */
  exclude?: readonly string[];
  /** Only keep files whose name ends with one of these extensions */
  extensions?: readonly string[];
}

function buildIgnore(patterns: readonly string[] | undefined): Ignore | null {
  if (!patterns || patterns.length === 0) {
    return null;
  }
  return ignore().add([...patterns]);
}

async function scanDirectory(
  baseDir: string,
  relativePath: string,
  files: string[],
  ig: Ignore | null,
  extensions: readonly string[] | undefined
): Promise<void> {
  const dirPath = relativePath ? path.join(baseDir, relativePath) : baseDir;
  const entries = await fs.readdir(dirPath, { withFileTypes: true });

  for (const entry of entries) {
    const entryRelPath = relativePath ? `${relativePath}/${entry.name}` : entry.name;

    if (entry.isDirectory()) {
      if (ig?.ignores(entryRelPath + '/')) {
        mcpLogger.debug('scan', `[SCAN] Skipping directory (excluded): ${entryRelPath}`);
        continue;
      }
      await scanDirectory(baseDir, entryRelPath, files, ig, extensions);
    } else if (entry.isFile()) {
      if (ig?.ignores(entryRelPath)) {
        continue;
      }
      if (extensions && !extensions.some(ext => entry.name.endsWith(ext))) {
        continue;
      }
      files.push(entryRelPath);
    }
  }
}

/**
 * List regular files under `root`, sorted
 */
export async function scanTree(root: string, options: ScanOptions = {}): Promise<string[]> {
  const files: string[] = [];
  await scanDirectory(root, '', files, buildIgnore(options.exclude), options.extensions);
  return files.sort();
}

/**
 * Hash every file under `root`
 *
 * Unreadable files map to the "error" sentinel, which never matches a remote
 * digest.
 */
export async function hashTree(root: string, options: ScanOptions = {}): Promise<Map<string, string>> {
  const hashes = new Map<string, string>();
  for (const rel of await scanTree(root, options)) {
    try {
      hashes.set(rel, await hashFile(path.join(root, rel)));
    } catch (error: unknown) {
      mcpLogger.warning('scan', `[SCAN] Cannot hash ${rel}: ${errorMessage(error)}`);
      hashes.set(rel, ERROR_HASH);
    }
  }
  return hashes;
}

/**
 * Whether a directory exists
 */
export async function directoryExists(dirPath: string): Promise<boolean> {
  try {
    return (await fs.stat(dirPath)).isDirectory();
  } catch {
    return false;
  }
}
