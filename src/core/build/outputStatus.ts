/**
 * Status and clean operations over the source and output trees
 */

import { promises as fs } from 'fs';
import path from 'path';
import type { ForgeSettings } from '../../config/buildConfig.js';
import { directoryExists, scanTree } from '../../utils/fileScanner.js';
import { log } from '../../utils/logger.js';
import { MANIFEST_FILENAME, VersionLedger } from '../versioning/VersionLedger.js';

export interface TreeStatus {
  path: string;
  exists: boolean;
  files: number;
}

export interface ForgeStatus {
  source: TreeStatus & { pythonFiles: number };
  submodules: Array<TreeStatus & { pythonFiles: number }>;
  output: TreeStatus & {
    mpyFiles: number;
    otherFiles: number;
    manifest: { compiledAt: string | null; architecture: string; modules: number } | null;
  };
}

async function pythonTree(root: string): Promise<TreeStatus & { pythonFiles: number }> {
  if (!(await directoryExists(root))) {
    return { path: root, exists: false, files: 0, pythonFiles: 0 };
  }
  const files = await scanTree(root);
  return {
    path: root,
    exists: true,
    files: files.length,
    pythonFiles: files.filter(file => file.endsWith('.py')).length
  };
}

export async function collectStatus(settings: ForgeSettings): Promise<ForgeStatus> {
  const source = await pythonTree(settings.srcDir);
  const submodules: ForgeStatus['submodules'] = [];
  for (const submodule of settings.submodules) {
    submodules.push(await pythonTree(path.join(submodule, 'src')));
  }

  const outputDir = settings.outputDir;
  if (!(await directoryExists(outputDir))) {
    return {
      source,
      submodules,
      output: { path: outputDir, exists: false, files: 0, mpyFiles: 0, otherFiles: 0, manifest: null }
    };
  }

  const files = (await scanTree(outputDir)).filter(file => file !== MANIFEST_FILENAME);
  const mpyFiles = files.filter(file => file.endsWith('.mpy')).length;

  const ledger = await VersionLedger.load(path.join(outputDir, MANIFEST_FILENAME));
  const data = ledger.getData();
  const manifest = ledger.existedOnDisk()
    ? {
        compiledAt: data.compiled_at ?? null,
        architecture: data.architecture,
        modules: ledger.trackedPaths().length
      }
    : null;

  return {
    source,
    submodules,
    output: {
      path: outputDir,
      exists: true,
      files: files.length,
      mpyFiles,
      otherFiles: files.length - mpyFiles,
      manifest
    }
  };
}

/**
 * Remove the output tree
 */
export async function cleanOutput(settings: ForgeSettings, dryRun = false): Promise<{ path: string; existed: boolean; removed: boolean }> {
  const outputDir = settings.outputDir;
  const existed = await directoryExists(outputDir);
  if (existed && !dryRun) {
    await fs.rm(outputDir, { recursive: true, force: true });
    log.info(`[CLEAN] Removed ${outputDir}`);
  }
  return { path: outputDir, existed, removed: existed && !dryRun };
}
