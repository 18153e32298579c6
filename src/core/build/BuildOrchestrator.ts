/**
 * BuildOrchestrator - Turns configured modules into the output artifact tree
 *
 * Phases, in order:
 * 1. compiler availability check (skipped in dry-run)
 * 2. source ledger pass: hash, record, optionally bump and rewrite versions
 * 3. clear and recreate the output tree
 * 4. copy-only modules, verbatim
 * 5. compiled modules, artifact moved into the output tree
 * 6. output manifest from what is actually present in the output tree
 *
 * Copy and compile are best-effort batches: a module that cannot be resolved
 * or compiled gets a failed outcome and the batch continues.
 */

import { promises as fs } from 'fs';
import path from 'path';
import type { ForgeSettings } from '../../config/buildConfig.js';
import { ConfigurationError, SourceNotFoundError, errnoCode, errorMessage } from '../../errors/forgeErrors.js';
import { hashFile, ERROR_HASH } from '../../utils/hashUtils.js';
import { scanTree } from '../../utils/fileScanner.js';
import { log } from '../../utils/logger.js';
import { countFailures, failed, planned, skipped, succeeded, type ItemOutcome } from '../outcomes.js';
import type { BumpPolicy } from '../versioning/versionBump.js';
import { runLedgerPass, summarizeChanges, type LedgerPassModule } from '../versioning/ledgerPass.js';
import {
  ERROR_VERSION,
  MANIFEST_FILENAME,
  UNKNOWN_VERSION,
  VersionLedger,
  createEmptyOutputManifest,
  type VersionManifest
} from '../versioning/VersionLedger.js';
import type { Compiler } from './Compiler.js';
import { resolveSource, sourceRoots, type ExistsCheck, type ResolvedSource } from './SourceResolver.js';

/** Estimated compiled size as a fraction of the source, for dry-run reports */
export const DRY_RUN_SIZE_FACTOR = 0.7;

const SOURCE_EXTENSION = '.py';

export type ModuleKind = 'compiled' | 'copy-only';

export interface BuildOptions {
  dryRun?: boolean;
  bump?: BumpPolicy;
}

export interface BuildReport {
  dryRun: boolean;
  architecture: string;
  optimization: string;
  outputDir: string;
  ledger: {
    path: string;
    saved: boolean;
    new: string[];
    changed: string[];
    bumped: string[];
    error: string[];
    missing: string[];
    failures: ItemOutcome[];
  };
  copied: ItemOutcome[];
  compiled: ItemOutcome[];
  outputManifest: {
    path: string;
    written: boolean;
    files: number;
  };
  failures: number;
  success: boolean;
}

/**
 * Output-tree relative path for a module
 */
export function placementFor(relPath: string, kind: ModuleKind, preserveDirs: boolean, artifactExtension: string): string {
  const posix = relPath.split(path.sep).join('/');
  if (kind === 'copy-only') {
    return preserveDirs ? posix : path.posix.basename(posix);
  }
  const parsed = path.posix.parse(posix);
  const artifact = `${parsed.name}${artifactExtension}`;
  return preserveDirs && parsed.dir ? `${parsed.dir}/${artifact}` : artifact;
}

function dedupe(paths: readonly string[]): string[] {
  return [...new Set(paths)];
}

function displayPath(from: string, to: string): string {
  const relative = path.relative(from, to);
  return relative === '' ? '.' : relative.split(path.sep).join('/');
}

function isInside(parent: string, child: string): boolean {
  const relative = path.relative(parent, child);
  return relative === '' || (!relative.startsWith('..') && !path.isAbsolute(relative));
}

/**
 * Failed outcome when an earlier module already occupies `placement`
 */
function placementClash(rel: string, placement: string, placements: ReadonlyMap<string, string>): ItemOutcome | null {
  const owner = placements.get(placement);
  if (owner === undefined) {
    return null;
  }
  log.error(`[BUILD] ${rel} would overwrite ${owner} at ${placement}`);
  return failed(rel, `output path ${placement} already taken by ${owner}`, { placement, owner });
}

async function moveFile(from: string, to: string): Promise<void> {
  try {
    await fs.rename(from, to);
  } catch (error: unknown) {
    if (errnoCode(error) !== 'EXDEV') {
      throw error;
    }
    await fs.copyFile(from, to);
    await fs.unlink(from);
  }
}

export class BuildOrchestrator {
  private readonly roots: string[];

  constructor(
    private readonly settings: ForgeSettings,
    private readonly compiler: Compiler,
    private readonly exists?: ExistsCheck
  ) {
    this.roots = sourceRoots(settings.srcDir, settings.submodules);
  }

  async build(options: BuildOptions = {}): Promise<BuildReport> {
    const dryRun = options.dryRun ?? false;
    const { settings } = this;
    const compiledModules = dedupe(settings.modules);
    const copyOnlyModules = dedupe(settings.copyOnly);

    // The output tree is wiped on every build
    if (isInside(settings.outputDir, settings.srcDir)) {
      throw new ConfigurationError('Output directory must not contain the source directory', {
        outputDir: settings.outputDir,
        srcDir: settings.srcDir
      });
    }

    if (!dryRun && compiledModules.length > 0) {
      await this.compiler.checkAvailable();
    }

    log.info(`[BUILD] ${dryRun ? '[DRY RUN] ' : ''}${compiledModules.length} modules, ${copyOnlyModules.length} copy-only -> ${settings.outputDir}`);

    // Resolution
    const resolved = new Map<string, ResolvedSource>();
    const notFound = new Map<string, ItemOutcome>();
    for (const rel of dedupe([...compiledModules, ...copyOnlyModules])) {
      const hit = resolveSource(rel, this.roots, this.exists);
      if (hit) {
        resolved.set(rel, hit);
      } else {
        const error = new SourceNotFoundError(rel, this.roots);
        log.warn(`[BUILD] ${error.message} - skipping`);
        notFound.set(rel, failed(rel, error.message, error.data));
      }
    }

    // Source ledger
    const sourceDisplay = displayPath(path.dirname(settings.configPath), settings.srcDir);
    const ledgerPath = path.join(settings.srcDir, MANIFEST_FILENAME);
    const ledger = await VersionLedger.load(ledgerPath, sourceDisplay);
    const passModules: LedgerPassModule[] = [...resolved].map(([rel, hit]) => ({ path: rel, sourcePath: hit.path }));
    const pass = await runLedgerPass(ledger, passModules, {
      policy: options.bump,
      dryRun,
      presentPaths: [...notFound.keys()]
    });

    let ledgerSaved = false;
    if (!dryRun && (ledger.isModified() || !ledger.existedOnDisk())) {
      ledger.touch('generated_at');
      ledgerSaved = await ledger.saveIfModified();
    }

    // Output tree
    if (!dryRun) {
      await fs.rm(settings.outputDir, { recursive: true, force: true });
      await fs.mkdir(settings.outputDir, { recursive: true });
    }

    // Output-relative path -> configured module
    const placements = new Map<string, string>();

    const copied: ItemOutcome[] = [];
    for (const rel of copyOnlyModules) {
      if (compiledModules.includes(rel)) {
        copied.push(skipped(rel, 'also listed as a compiled module'));
        continue;
      }
      copied.push(await this.copyModule(rel, resolved.get(rel), notFound.get(rel), placements, dryRun));
    }

    const compiled: ItemOutcome[] = [];
    for (const rel of compiledModules) {
      compiled.push(await this.compileModule(rel, resolved.get(rel), notFound.get(rel), placements, dryRun));
    }

    // Output manifest
    const outputManifestPath = path.join(settings.outputDir, MANIFEST_FILENAME);
    let outputFiles = placements.size;
    if (!dryRun) {
      const manifest = await this.buildOutputManifest(ledger, placements, sourceDisplay);
      await VersionLedger.save(outputManifestPath, manifest);
      outputFiles = Object.keys(manifest.modules).length;
    }

    const summary = summarizeChanges(pass.changes);
    const failures = countFailures(copied) + countFailures(compiled) + pass.failures.length;

    const report: BuildReport = {
      dryRun,
      architecture: settings.architecture,
      optimization: settings.optimization,
      outputDir: settings.outputDir,
      ledger: {
        path: ledgerPath,
        saved: ledgerSaved,
        ...summary,
        missing: pass.missing,
        failures: pass.failures
      },
      copied,
      compiled,
      outputManifest: {
        path: outputManifestPath,
        written: !dryRun,
        files: outputFiles
      },
      failures,
      success: failures === 0
    };

    log.info(`[BUILD] ${dryRun ? 'Dry run' : 'Build'} finished: ${failures} failures`);
    return report;
  }

  private async copyModule(
    rel: string,
    source: ResolvedSource | undefined,
    notFound: ItemOutcome | undefined,
    placements: Map<string, string>,
    dryRun: boolean
  ): Promise<ItemOutcome> {
    if (!source) {
      return notFound ?? failed(rel, `Module not found: ${rel}`);
    }

    const placement = placementFor(rel, 'copy-only', this.settings.preserveDirs, this.compiler.artifactExtension);
    const clash = placementClash(rel, placement, placements);
    if (clash) {
      return clash;
    }
    const destination = path.join(this.settings.outputDir, placement);

    if (dryRun) {
      placements.set(placement, rel);
      return planned(rel, { destination });
    }

    try {
      await fs.mkdir(path.dirname(destination), { recursive: true });
      await fs.copyFile(source.path, destination);
      const { size } = await fs.stat(destination);
      placements.set(placement, rel);
      return succeeded(rel, { destination, size });
    } catch (error: unknown) {
      log.error(`[BUILD] Copy failed for ${rel}: ${errorMessage(error)}`);
      return failed(rel, `copy failed: ${errorMessage(error)}`);
    }
  }

  private async compileModule(
    rel: string,
    source: ResolvedSource | undefined,
    notFound: ItemOutcome | undefined,
    placements: Map<string, string>,
    dryRun: boolean
  ): Promise<ItemOutcome> {
    if (!source) {
      return notFound ?? failed(rel, `Module not found: ${rel}`);
    }

    const placement = placementFor(rel, 'compiled', this.settings.preserveDirs, this.compiler.artifactExtension);
    const clash = placementClash(rel, placement, placements);
    if (clash) {
      return clash;
    }
    const destination = path.join(this.settings.outputDir, placement);

    try {
      const { size: sourceSize } = await fs.stat(source.path);

      if (dryRun) {
        placements.set(placement, rel);
        return planned(rel, {
          destination,
          sourceSize,
          estimatedSize: Math.floor(sourceSize * DRY_RUN_SIZE_FACTOR)
        });
      }

      const artifact = await this.compiler.compile(source.path);
      await fs.mkdir(path.dirname(destination), { recursive: true });
      await moveFile(artifact, destination);
      const { size: compiledSize } = await fs.stat(destination);
      placements.set(placement, rel);
      log.debug(`[BUILD] ${rel}: ${sourceSize} -> ${compiledSize} bytes`);
      return succeeded(rel, { destination, sourceSize, compiledSize });
    } catch (error: unknown) {
      log.error(`[BUILD] Compile failed for ${rel}: ${errorMessage(error)}`);
      return failed(rel, errorMessage(error));
    }
  }

  /**
   * Hash every file in the output tree and look its version up in the
   * source ledger
   */
  private async buildOutputManifest(
    ledger: VersionLedger,
    placements: Map<string, string>,
    sourceDisplay: string
  ): Promise<VersionManifest> {
    const { settings } = this;
    const manifest = createEmptyOutputManifest(sourceDisplay, settings.architecture, settings.optimization, settings.description);
    const extension = this.compiler.artifactExtension;

    const files = (await scanTree(settings.outputDir)).filter(rel => rel !== MANIFEST_FILENAME);
    for (const rel of files) {
      let hash: string;
      try {
        hash = await hashFile(path.join(settings.outputDir, rel));
      } catch (error: unknown) {
        log.warn(`[BUILD] Cannot hash output file ${rel}: ${errorMessage(error)}`);
        manifest.modules[rel] = ERROR_VERSION;
        manifest['SHA-256'][rel] = ERROR_HASH;
        continue;
      }

      const sourceName = rel.endsWith(extension) ? rel.slice(0, -extension.length) + SOURCE_EXTENSION : rel;
      const placedFrom = placements.get(rel);
      const entry = ledger.getEntry(sourceName) ?? (placedFrom !== undefined ? ledger.getEntry(placedFrom) : undefined);

      manifest.modules[rel] = entry?.version ?? UNKNOWN_VERSION;
      manifest['SHA-256'][rel] = hash;
    }

    return manifest;
  }
}
