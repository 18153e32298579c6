/**
 * SyncDiff - Computes differences between the output tree and the device
 *
 * Partitions paths into new, updated and obsolete by content hash. Protected
 * device files are never obsolete, whether or not they exist locally.
 *
 * Key responsibilities:
 * - Compare local and remote hash maps
 * - Keep protected configuration files off the delete list
 * - Produce the full-replace variants used by clean deploys
 */

import { log } from '../../utils/logger.js';
import { hashesEqual } from '../../utils/hashUtils.js';

/** Device-side configuration written by the operator, never deleted */
export const DEFAULT_PROTECTED_FILES: readonly string[] = ['webrepl_cfg.py'];

export type HashMap = ReadonlyMap<string, string>;

/**
 * Complete diff result
 *
 * The three path lists are sorted and pairwise disjoint.
 */
export interface DiffResult {
  newFiles: string[];
  updatedFiles: string[];
  obsoleteFiles: string[];

  /** Remote paths kept only because they are protected */
  protectedKept: string[];
  /** Configured removals that were not applied, with the reason */
  skippedRemovals: Array<{ path: string; reason: string }>;

  totalOperations: number;
  hasChanges: boolean;
  hasDestructiveChanges: boolean;
}

function finalize(
  newFiles: Iterable<string>,
  updatedFiles: Iterable<string>,
  obsoleteFiles: Iterable<string>,
  protectedKept: Iterable<string>,
  skippedRemovals: Array<{ path: string; reason: string }> = []
): DiffResult {
  const result: DiffResult = {
    newFiles: [...newFiles].sort(),
    updatedFiles: [...updatedFiles].sort(),
    obsoleteFiles: [...obsoleteFiles].sort(),
    protectedKept: [...protectedKept].sort(),
    skippedRemovals,
    totalOperations: 0,
    hasChanges: false,
    hasDestructiveChanges: false
  };
  result.totalOperations = result.newFiles.length + result.updatedFiles.length + result.obsoleteFiles.length;
  result.hasChanges = result.totalOperations > 0;
  result.hasDestructiveChanges = result.obsoleteFiles.length > 0;
  return result;
}

/**
 * SyncDiff class for computing file differences
 */
export class SyncDiff {
  /**
   * Compute diff between local and remote hash maps
   *
   * An empty remote map (nothing on the device, or the probe failed) makes
   * every local file new.
   */
  static compute(local: HashMap, remote: HashMap, protectedFiles: Iterable<string> = DEFAULT_PROTECTED_FILES): DiffResult {
    const protectedSet = new Set(protectedFiles);
    log.debug(`[DIFF] Computing diff: ${local.size} local files, ${remote.size} remote files`);

    const newFiles: string[] = [];
    const updatedFiles: string[] = [];
    const obsoleteFiles: string[] = [];
    const protectedKept: string[] = [];

    for (const [filePath, localHash] of local) {
      const remoteHash = remote.get(filePath);
      if (remoteHash === undefined) {
        newFiles.push(filePath);
      } else if (!hashesEqual(localHash, remoteHash)) {
        updatedFiles.push(filePath);
        log.debug(`[DIFF] UPDATE: ${filePath} (${remoteHash.slice(0, 8) || '?'} -> ${localHash.slice(0, 8)})`);
      }
    }

    for (const filePath of remote.keys()) {
      if (local.has(filePath)) {
        continue;
      }
      if (protectedSet.has(filePath)) {
        protectedKept.push(filePath);
      } else {
        obsoleteFiles.push(filePath);
      }
    }

    const result = finalize(newFiles, updatedFiles, obsoleteFiles, protectedKept);
    log.info(`[DIFF] Result: +${result.newFiles.length} ~${result.updatedFiles.length} -${result.obsoleteFiles.length} (${result.totalOperations} total operations)`);
    return result;
  }

  /**
   * Full-replace diff: every non-protected remote file is removed and every
   * local file is sent
   */
  static computeClean(local: HashMap, remote: HashMap, protectedFiles: Iterable<string> = DEFAULT_PROTECTED_FILES): DiffResult {
    const protectedSet = new Set(protectedFiles);
    const remotePaths = [...remote.keys()];
    const result = finalize(
      local.keys(),
      [],
      remotePaths.filter(filePath => !protectedSet.has(filePath)),
      remotePaths.filter(filePath => protectedSet.has(filePath))
    );
    log.info(`[DIFF] Clean deploy: -${result.obsoleteFiles.length} +${result.newFiles.length}`);
    return result;
  }

  /**
   * Add configured paths to the obsolete set
   *
   * Protected paths and paths absent from the device are skipped with a
   * reason. A path that is also being sent stays on the send list only.
   */
  static withExtraRemovals(
    diff: DiffResult,
    paths: Iterable<string>,
    remote: HashMap,
    protectedFiles: Iterable<string> = DEFAULT_PROTECTED_FILES
  ): DiffResult {
    const protectedSet = new Set(protectedFiles);
    const sending = new Set([...diff.newFiles, ...diff.updatedFiles]);
    const obsolete = new Set(diff.obsoleteFiles);
    const skippedRemovals = [...diff.skippedRemovals];

    for (const raw of paths) {
      const filePath = raw.replace(/^\/+/, '');
      if (protectedSet.has(filePath)) {
        skippedRemovals.push({ path: filePath, reason: 'protected' });
      } else if (!remote.has(filePath)) {
        skippedRemovals.push({ path: filePath, reason: 'not on device' });
      } else if (sending.has(filePath)) {
        skippedRemovals.push({ path: filePath, reason: 'replaced by deploy' });
      } else {
        obsolete.add(filePath);
      }
    }

    return finalize(diff.newFiles, diff.updatedFiles, obsolete, diff.protectedKept, skippedRemovals);
  }

  /**
   * Create a summary string for display
   */
  static formatSummary(diff: DiffResult): string {
    if (!diff.hasChanges) {
      return 'No changes detected';
    }

    const parts: string[] = [];

    if (diff.newFiles.length > 0) {
      parts.push(`+${diff.newFiles.length} new`);
    }
    if (diff.updatedFiles.length > 0) {
      parts.push(`~${diff.updatedFiles.length} updated`);
    }
    if (diff.obsoleteFiles.length > 0) {
      parts.push(`-${diff.obsoleteFiles.length} obsolete`);
    }

    return parts.join(', ') + ` (${diff.totalOperations} total)`;
  }
}
