/**
 * Compares source files against the version ledger and records changes
 *
 * Used by the build (configured modules) and by the standalone version
 * updater (every *.py under the source directory).
 */

import { promises as fs } from 'fs';
import { computeSha256, hashesEqual, ERROR_HASH } from '../../utils/hashUtils.js';
import { log } from '../../utils/logger.js';
import { errorMessage } from '../../errors/forgeErrors.js';
import { failed, type ItemOutcome } from '../outcomes.js';
import { incrementVersion, type BumpPolicy } from './versionBump.js';
import {
  ERROR_VERSION,
  UNKNOWN_VERSION,
  VersionLedger,
  extractDeclaredVersion,
  rewriteDeclaredVersion
} from './VersionLedger.js';

export type LedgerChangeKind = 'new' | 'unchanged' | 'changed' | 'bumped' | 'error';

export interface LedgerChange {
  path: string;
  kind: LedgerChangeKind;
  version: string;
  hash: string;
  previousVersion?: string;
  previousHash?: string;
}

export interface LedgerPassModule {
  /** Ledger key */
  path: string;
  /** File to read */
  sourcePath: string;
}

export interface LedgerPassOptions {
  policy?: BumpPolicy;
  dryRun: boolean;
  /** Version recorded for new files without a declaration */
  fallbackVersion?: string;
  /** Record unreadable files as "error"/"error" instead of skipping them */
  recordUnreadable?: boolean;
  /** Ledger keys that count as present when reporting missing entries */
  presentPaths?: readonly string[];
}

export interface LedgerPassResult {
  changes: LedgerChange[];
  /** Ledger entries with no corresponding file, never removed */
  missing: string[];
  failures: ItemOutcome[];
}

/**
 * Run one pass over `modules`, mutating `ledger` in memory
 *
 * Bumped files are rewritten on disk unless dry-run. When a rewrite fails the
 * entry keeps its old hash and version.
 */
export async function runLedgerPass(
  ledger: VersionLedger,
  modules: readonly LedgerPassModule[],
  options: LedgerPassOptions
): Promise<LedgerPassResult> {
  const changes: LedgerChange[] = [];
  const failures: ItemOutcome[] = [];
  const fallback = options.fallbackVersion ?? UNKNOWN_VERSION;
  const recordUnreadable = options.recordUnreadable ?? true;

  for (const module of modules) {
    let content: Buffer;
    try {
      content = await fs.readFile(module.sourcePath);
    } catch (error: unknown) {
      log.warn(`[LEDGER] Cannot read ${module.sourcePath}: ${errorMessage(error)}`);
      failures.push(failed(module.path, `unreadable: ${errorMessage(error)}`));
      if (recordUnreadable) {
        ledger.recordModule(module.path, ERROR_VERSION, ERROR_HASH);
        changes.push({ path: module.path, kind: 'error', version: ERROR_VERSION, hash: ERROR_HASH });
      }
      continue;
    }

    const hash = computeSha256(content);
    const text = content.toString('utf-8');
    const entry = ledger.getEntry(module.path);

    if (!entry) {
      const version = extractDeclaredVersion(text, fallback);
      ledger.recordModule(module.path, version, hash);
      changes.push({ path: module.path, kind: 'new', version, hash });
      continue;
    }

    if (hashesEqual(entry.hash, hash)) {
      changes.push({ path: module.path, kind: 'unchanged', version: entry.version, hash });
      continue;
    }

    const previous = { previousVersion: entry.version, previousHash: entry.hash };

    if (!options.policy) {
      const version = extractDeclaredVersion(text, entry.version);
      ledger.recordModule(module.path, version, hash);
      changes.push({ path: module.path, kind: 'changed', version, hash, ...previous });
      continue;
    }

    const bumped = incrementVersion(entry.version, options.policy);
    const rewritten = bumped === entry.version ? null : rewriteDeclaredVersion(text, bumped);
    if (rewritten === null) {
      // Nothing to rewrite: track the new content under whatever the file declares now
      const version = extractDeclaredVersion(text, entry.version);
      ledger.recordModule(module.path, version, hash);
      changes.push({ path: module.path, kind: 'changed', version, hash, ...previous });
      continue;
    }

    const rewrittenBytes = Buffer.from(rewritten, 'utf-8');
    if (!options.dryRun) {
      try {
        await fs.writeFile(module.sourcePath, rewrittenBytes);
      } catch (error: unknown) {
        log.error(`[LEDGER] Cannot write bumped version to ${module.sourcePath}: ${errorMessage(error)}`);
        failures.push(failed(module.path, `version rewrite failed: ${errorMessage(error)}`));
        continue;
      }
    }

    const bumpedHash = computeSha256(rewrittenBytes);
    ledger.recordModule(module.path, bumped, bumpedHash);
    changes.push({ path: module.path, kind: 'bumped', version: bumped, hash: bumpedHash, ...previous });
    log.info(`[LEDGER] ${module.path}: ${entry.version} -> ${bumped}`);
  }

  const present = new Set([...modules.map(module => module.path), ...(options.presentPaths ?? [])]);
  const missing = ledger.trackedPaths().filter(tracked => !present.has(tracked)).sort();

  return { changes, missing, failures };
}

/**
 * Count changes by kind, skipping unchanged entries
 */
export function summarizeChanges(changes: readonly LedgerChange[]): Record<Exclude<LedgerChangeKind, 'unchanged'>, string[]> {
  const summary: Record<Exclude<LedgerChangeKind, 'unchanged'>, string[]> = {
    new: [],
    changed: [],
    bumped: [],
    error: []
  };
  for (const change of changes) {
    if (change.kind !== 'unchanged') {
      summary[change.kind].push(change.path);
    }
  }
  return summary;
}
