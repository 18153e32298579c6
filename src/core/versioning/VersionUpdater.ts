/**
 * Standalone version pass over every *.py file of the source tree
 *
 * Unlike the build, which only considers configured modules, this records
 * every Python file. New files without a declaration start at 0.1.0.
 */

import path from 'path';
import { scanTree, directoryExists } from '../../utils/fileScanner.js';
import { ConfigurationError } from '../../errors/forgeErrors.js';
import { log } from '../../utils/logger.js';
import type { ItemOutcome } from '../outcomes.js';
import type { BumpPolicy } from './versionBump.js';
import { runLedgerPass, summarizeChanges } from './ledgerPass.js';
import { MANIFEST_FILENAME, VersionLedger } from './VersionLedger.js';

export const DEFAULT_UPDATE_POLICY: BumpPolicy = 'minor';
export const INITIAL_VERSION = '0.1.0';

export interface VersionUpdateOptions {
  srcDir: string;
  /** Defaults to `<srcDir>/version.json` */
  manifestPath?: string;
  policy?: BumpPolicy;
  dryRun?: boolean;
}

export interface VersionUpdateReport {
  dryRun: boolean;
  policy: BumpPolicy;
  manifestPath: string;
  totalFiles: number;
  new: string[];
  bumped: Array<{ path: string; from: string; to: string }>;
  /** Changed files recorded without a version rewrite */
  hashOnly: string[];
  missing: string[];
  failures: ItemOutcome[];
  saved: boolean;
}

export async function updateVersions(options: VersionUpdateOptions): Promise<VersionUpdateReport> {
  const policy = options.policy ?? DEFAULT_UPDATE_POLICY;
  const dryRun = options.dryRun ?? false;
  const manifestPath = options.manifestPath ?? path.join(options.srcDir, MANIFEST_FILENAME);

  if (!(await directoryExists(options.srcDir))) {
    throw new ConfigurationError(`Source directory not found: ${options.srcDir}`, { srcDir: options.srcDir });
  }

  const ledger = await VersionLedger.load(manifestPath, path.basename(options.srcDir));
  const files = await scanTree(options.srcDir, { extensions: ['.py'] });

  const pass = await runLedgerPass(
    ledger,
    files.map(rel => ({ path: rel, sourcePath: path.join(options.srcDir, rel) })),
    { policy, dryRun, fallbackVersion: INITIAL_VERSION, recordUnreadable: false }
  );

  let saved = false;
  if (!dryRun) {
    ledger.touch('generated_at');
    saved = await ledger.saveIfModified();
  }

  const summary = summarizeChanges(pass.changes);
  const bumped = pass.changes
    .filter(change => change.kind === 'bumped')
    .map(change => ({ path: change.path, from: change.previousVersion ?? '', to: change.version }));

  log.info(`[VERSION] ${files.length} files: ${summary.new.length} new, ${bumped.length} bumped, ${pass.missing.length} missing`);

  return {
    dryRun,
    policy,
    manifestPath,
    totalFiles: files.length,
    new: summary.new,
    bumped,
    hashOnly: summary.changed,
    missing: pass.missing,
    failures: pass.failures,
    saved
  };
}
