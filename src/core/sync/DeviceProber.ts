/**
 * Reads the device's current file set and content hashes
 *
 * Best-effort: a failed listing degrades to an empty map (every local file
 * then diffs as new) and a failed per-file hash records "" (unknown), which
 * never matches a local digest.
 */

import { errorMessage } from '../../errors/forgeErrors.js';
import { mcpLogger } from '../../utils/mcpLogger.js';
import type { TransferAgent } from './TransferAgent.js';

export interface ProbeResult {
  files: Map<string, string>;
  /** True when the listing itself failed */
  degraded: boolean;
  warnings: string[];
}

export async function probeDevice(agent: TransferAgent, device: string): Promise<ProbeResult> {
  const files = new Map<string, string>();
  const warnings: string[] = [];

  let listing: string[];
  try {
    listing = await agent.listFiles(device);
  } catch (error: unknown) {
    const warning = `Device listing unavailable, treating every file as new: ${errorMessage(error)}`;
    mcpLogger.warning('probe', `[PROBE] ${warning}`);
    return { files, degraded: true, warnings: [warning] };
  }

  for (const remotePath of listing) {
    try {
      files.set(remotePath, await agent.hashFile(device, remotePath));
    } catch (error: unknown) {
      const warning = `Hash unavailable for ${remotePath}: ${errorMessage(error)}`;
      mcpLogger.warning('probe', `[PROBE] ${warning}`);
      warnings.push(warning);
      files.set(remotePath, '');
    }
  }

  mcpLogger.debug('probe', `[PROBE] ${device}: ${files.size} files, ${warnings.length} warnings`);
  return { files, degraded: false, warnings };
}
