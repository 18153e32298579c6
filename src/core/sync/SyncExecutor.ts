/**
 * SyncExecutor - Applies a computed diff to the device
 *
 * Phases run in a fixed order and only the transfer phase decides success:
 * 1. remove obsolete files (failures recorded, never blocking)
 * 2. create the parent directories of every file to send (warnings only)
 * 3. copy new and updated files (any failure fails the run)
 * 4. soft-reset when requested and every copy landed (warning only)
 *
 * Dry-run produces the same plan with every step marked planned and never
 * touches the agent.
 */

import path from 'path';
import { log } from '../../utils/logger.js';
import { errorMessage } from '../../errors/forgeErrors.js';
import { countFailures, failed, planned, skipped, succeeded, type ItemOutcome } from '../outcomes.js';
import type { DiffResult } from './SyncDiff.js';
import type { TransferAgent } from './TransferAgent.js';
import type { PasswordTransfer } from './WebReplTransfer.js';

export interface ApplyOptions {
  device: string;
  diff: DiffResult;
  localRoot: string;
  autoReset: boolean;
  dryRun: boolean;
}

export interface FullPushOptions {
  transfer: PasswordTransfer;
  localRoot: string;
  files: readonly string[];
  dryRun: boolean;
}

/**
 * Result of one sync run
 */
export interface SyncResult {
  target: string;
  dryRun: boolean;
  removed: ItemOutcome[];
  directories: ItemOutcome[];
  transferred: ItemOutcome[];
  reset: ItemOutcome | null;
  warnings: string[];
  failedTransfers: number;
  success: boolean;
}

/**
 * Parent directories of the given slash paths, each once, parents first
 */
export function requiredDirectories(filePaths: Iterable<string>): string[] {
  const directories = new Set<string>();
  for (const filePath of filePaths) {
    const segments = filePath.split('/').filter(segment => segment !== '' && segment !== '.');
    for (let depth = 1; depth < segments.length; depth++) {
      directories.add(segments.slice(0, depth).join('/'));
    }
  }
  return [...directories];
}

function localPathOf(localRoot: string, relPath: string): string {
  return path.join(localRoot, ...relPath.split('/'));
}

/**
 * SyncExecutor class for applying sync operations
 */
export class SyncExecutor {
  constructor(private readonly agent: TransferAgent) {}

  async apply(options: ApplyOptions): Promise<SyncResult> {
    const { device, diff, localRoot, autoReset, dryRun } = options;
    const toSend = [...diff.newFiles, ...diff.updatedFiles].sort();
    const warnings: string[] = [];

    log.info(`[EXECUTOR] ${dryRun ? '[DRY RUN] ' : ''}Applying to ${device}: +${diff.newFiles.length} ~${diff.updatedFiles.length} -${diff.obsoleteFiles.length}`);

    // 1. Remove obsolete files
    const removed: ItemOutcome[] = [];
    for (const remotePath of diff.obsoleteFiles) {
      if (dryRun) {
        removed.push(planned(remotePath));
        continue;
      }
      try {
        await this.agent.removeFile(device, remotePath);
        removed.push(succeeded(remotePath));
      } catch (error: unknown) {
        log.warn(`[EXECUTOR] Remove failed for ${remotePath}: ${errorMessage(error)}`);
        removed.push(failed(remotePath, errorMessage(error)));
        warnings.push(`Remove failed for ${remotePath}`);
      }
    }

    // 2. Remote directories
    const directories: ItemOutcome[] = [];
    for (const directory of requiredDirectories(toSend)) {
      if (dryRun) {
        directories.push(planned(directory));
        continue;
      }
      try {
        await this.agent.makeDirectory(device, directory);
        directories.push(succeeded(directory));
      } catch (error: unknown) {
        log.warn(`[EXECUTOR] mkdir failed for ${directory}: ${errorMessage(error)}`);
        directories.push(failed(directory, errorMessage(error)));
        warnings.push(`Directory creation failed for ${directory}`);
      }
    }

    // 3. Transfers
    const transferred: ItemOutcome[] = [];
    for (const relPath of toSend) {
      const localPath = localPathOf(localRoot, relPath);
      if (dryRun) {
        transferred.push(planned(relPath, { from: localPath, to: `/${relPath}` }));
        continue;
      }
      try {
        await this.agent.copyFile(device, localPath, relPath);
        transferred.push(succeeded(relPath));
      } catch (error: unknown) {
        log.error(`[EXECUTOR] Copy failed for ${relPath}: ${errorMessage(error)}`);
        transferred.push(failed(relPath, errorMessage(error)));
      }
    }

    const failedTransfers = countFailures(transferred);

    // 4. Soft reset; a partially updated device is left running as it is
    let reset: ItemOutcome | null = null;
    if (autoReset) {
      if (dryRun) {
        reset = planned(device);
      } else if (failedTransfers > 0) {
        log.warn(`[EXECUTOR] Skipping soft reset: ${failedTransfers} transfers failed`);
        reset = skipped(device, 'transfer failures');
      } else {
        try {
          await this.agent.softReset(device);
          reset = succeeded(device);
        } catch (error: unknown) {
          log.warn(`[EXECUTOR] Soft reset failed: ${errorMessage(error)}`);
          reset = failed(device, errorMessage(error));
          warnings.push('Soft reset failed');
        }
      }
    }

    log.info(`[EXECUTOR] Done: ${transferred.length - failedTransfers}/${transferred.length} transferred, ${warnings.length} warnings`);

    return {
      target: device,
      dryRun,
      removed,
      directories,
      transferred,
      reset,
      warnings,
      failedTransfers,
      success: failedTransfers === 0
    };
  }

  /**
   * Push every file over a channel that cannot list or hash
   *
   * No removals and no directory creation.
   */
  static async applyFullPush(options: FullPushOptions): Promise<SyncResult> {
    const { transfer, localRoot, files, dryRun } = options;
    const transferred: ItemOutcome[] = [];

    log.info(`[EXECUTOR] ${dryRun ? '[DRY RUN] ' : ''}Full push of ${files.length} files to ${transfer.target}`);

    for (const relPath of [...files].sort()) {
      const localPath = localPathOf(localRoot, relPath);
      if (dryRun) {
        transferred.push(planned(relPath, { from: localPath, to: `${transfer.target}/${relPath}` }));
        continue;
      }
      try {
        await transfer.push(localPath, relPath);
        transferred.push(succeeded(relPath));
      } catch (error: unknown) {
        log.error(`[EXECUTOR] Push failed for ${relPath}: ${errorMessage(error)}`);
        transferred.push(failed(relPath, errorMessage(error)));
      }
    }

    const failedTransfers = countFailures(transferred);
    return {
      target: transfer.target,
      dryRun,
      removed: [],
      directories: [],
      transferred,
      reset: null,
      warnings: [],
      failedTransfers,
      success: failedTransfers === 0
    };
  }
}
