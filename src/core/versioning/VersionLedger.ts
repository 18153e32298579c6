/**
 * VersionLedger - Persisted module version / content hash manifest
 *
 * One ledger lives in the source tree (`src/version.json`) and one in each
 * build output tree (`mpy_<arch>/version.json`). The same file is read on the
 * device to report what firmware modules are installed.
 *
 * Key responsibilities:
 * - Load a manifest (missing file = fresh empty manifest)
 * - Keep `modules` and `SHA-256` mappings in lockstep
 * - Upsert module entries and track whether anything changed
 * - Save with a write-to-temp + rename commit
 */

import { promises as fs } from 'fs';
import path from 'path';
import { mcpLogger } from '../../utils/mcpLogger.js';
import { UNKNOWN_HASH } from '../../utils/hashUtils.js';
import { ManifestIOError, errnoCode, errorMessage } from '../../errors/forgeErrors.js';

/** Version recorded for a module without a `__version__` declaration */
export const UNKNOWN_VERSION = 'unknown';

/** Version and hash recorded for a module whose file could not be read */
export const ERROR_VERSION = 'error';

export const MANIFEST_FILENAME = 'version.json';

/**
 * Manifest structure stored as version.json
 */
export interface VersionManifest {
  generated_at?: string;
  compiled_at?: string;
  description: string;
  source_directory: string;
  format: string;
  architecture: string;
  optimization?: string;
  modules: Record<string, string>;
  'SHA-256': Record<string, string>;
}

/**
 * A module's recorded state
 */
export interface LedgerEntry {
  path: string;
  version: string;
  hash: string;
}

const DEFAULT_DESCRIPTION = 'MicroPython modules version information';

// __version__ = "1.2.3" | __version__ = const("1.2.3")
const VERSION_DECLARATION = /(__version__\s*=\s*(?:const\s*\(\s*)?["'])([^"']+)(["'](?:\s*\))?)/;

/**
 * Read the declared `__version__` of a module's source text
 *
 * First declaration wins. Absence yields `fallback`, never an error.
 */
export function extractDeclaredVersion(sourceText: string, fallback: string = UNKNOWN_VERSION): string {
  const match = VERSION_DECLARATION.exec(sourceText);
  return match ? match[2] : fallback;
}

/**
 * Replace the value of every `__version__` declaration, keeping its quoting
 * and `const()` wrapper
 *
 * @returns rewritten text, or null when the text declares no version
 */
export function rewriteDeclaredVersion(sourceText: string, newVersion: string): string | null {
  const pattern = new RegExp(VERSION_DECLARATION.source, 'g');
  if (!pattern.test(sourceText)) {
    return null;
  }
  pattern.lastIndex = 0;
  return sourceText.replace(pattern, (_match, prefix: string, _old: string, suffix: string) => `${prefix}${newVersion}${suffix}`);
}

/**
 * Create an empty source-side manifest
 */
export function createEmptySourceManifest(sourceDirectory: string, description: string = DEFAULT_DESCRIPTION): VersionManifest {
  return {
    generated_at: new Date().toISOString(),
    description,
    source_directory: sourceDirectory,
    format: 'py',
    architecture: 'source',
    modules: {},
    'SHA-256': {}
  };
}

/**
 * Create an empty output-side manifest
 */
export function createEmptyOutputManifest(
  sourceDirectory: string,
  architecture: string,
  optimization: string,
  description: string = DEFAULT_DESCRIPTION
): VersionManifest {
  return {
    compiled_at: new Date().toISOString(),
    description,
    source_directory: sourceDirectory,
    format: 'mpy',
    architecture,
    optimization,
    modules: {},
    'SHA-256': {}
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringMap(value: unknown): Record<string, string> {
  const result: Record<string, string> = {};
  if (!isRecord(value)) {
    return result;
  }
  for (const [key, entry] of Object.entries(value)) {
    result[key] = typeof entry === 'string' ? entry : String(entry);
  }
  return result;
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

/**
 * Coerce parsed JSON into a VersionManifest with lockstep mappings
 *
 * A path present in only one mapping gets the "unknown" sentinel in the other.
 */
export function normalizeManifest(raw: unknown, sourceDirectory: string): VersionManifest {
  if (!isRecord(raw)) {
    throw new Error('manifest root is not an object');
  }

  const modules = stringMap(raw.modules);
  const hashes = stringMap(raw['SHA-256']);

  for (const key of Object.keys(modules)) {
    if (!(key in hashes)) {
      hashes[key] = UNKNOWN_HASH;
    }
  }
  for (const key of Object.keys(hashes)) {
    if (!(key in modules)) {
      modules[key] = UNKNOWN_VERSION;
    }
  }

  const manifest: VersionManifest = {
    description: optionalString(raw.description) ?? DEFAULT_DESCRIPTION,
    source_directory: optionalString(raw.source_directory) ?? sourceDirectory,
    format: optionalString(raw.format) ?? 'py',
    architecture: optionalString(raw.architecture) ?? 'source',
    modules,
    'SHA-256': hashes
  };

  const generatedAt = optionalString(raw.generated_at);
  const compiledAt = optionalString(raw.compiled_at);
  const optimization = optionalString(raw.optimization);
  if (generatedAt !== undefined) manifest.generated_at = generatedAt;
  if (compiledAt !== undefined) manifest.compiled_at = compiledAt;
  if (optimization !== undefined) manifest.optimization = optimization;

  return manifest;
}

/**
 * VersionLedger class wrapping one manifest file
 */
export class VersionLedger {
  private modified = false;

  private constructor(
    private readonly manifestPath: string,
    private data: VersionManifest,
    private readonly existed: boolean
  ) {}

  /**
   * Load a ledger from disk
   *
   * A missing file yields a fresh, empty source manifest. Unreadable or
   * malformed files throw ManifestIOError.
   */
  static async load(manifestPath: string, sourceDirectory: string = path.dirname(manifestPath)): Promise<VersionLedger> {
    let content: string;
    try {
      content = await fs.readFile(manifestPath, 'utf-8');
    } catch (error: unknown) {
      if (errnoCode(error) === 'ENOENT') {
        mcpLogger.debug('ledger', `[LEDGER] No manifest at ${manifestPath} - starting empty`);
        return new VersionLedger(manifestPath, createEmptySourceManifest(sourceDirectory), false);
      }
      mcpLogger.error('ledger', `[LEDGER] Failed to read manifest: ${errorMessage(error)}`);
      throw new ManifestIOError('read', manifestPath, errorMessage(error));
    }

    try {
      const manifest = normalizeManifest(JSON.parse(content), sourceDirectory);
      mcpLogger.debug('ledger', `[LEDGER] Loaded ${manifestPath}, ${Object.keys(manifest.modules).length} modules tracked`);
      return new VersionLedger(manifestPath, manifest, true);
    } catch (error: unknown) {
      throw new ManifestIOError('read', manifestPath, errorMessage(error));
    }
  }

  /**
   * Wrap an in-memory manifest that will be written to `manifestPath`
   */
  static fromManifest(manifestPath: string, manifest: VersionManifest): VersionLedger {
    const ledger = new VersionLedger(manifestPath, manifest, false);
    ledger.modified = true;
    return ledger;
  }

  /**
   * Write a manifest, replacing any existing file
   *
   * The JSON is written to a sibling temp file first and renamed into place,
   * so an interrupted run leaves either the old or the new manifest.
   */
  static async save(manifestPath: string, manifest: VersionManifest): Promise<void> {
    const tempPath = `${manifestPath}.${process.pid}.tmp`;
    try {
      await fs.mkdir(path.dirname(manifestPath), { recursive: true });
      await fs.writeFile(tempPath, JSON.stringify(manifest, null, 2) + '\n', 'utf-8');
      await fs.rename(tempPath, manifestPath);
      mcpLogger.info('ledger', `[LEDGER] Saved ${manifestPath}, ${Object.keys(manifest.modules).length} modules tracked`);
    } catch (error: unknown) {
      await fs.rm(tempPath, { force: true });
      mcpLogger.error('ledger', `[LEDGER] Failed to save manifest: ${errorMessage(error)}`);
      throw new ManifestIOError('write', manifestPath, errorMessage(error));
    }
  }

  getPath(): string {
    return this.manifestPath;
  }

  /** Whether the ledger was read from an existing file */
  existedOnDisk(): boolean {
    return this.existed;
  }

  /** Whether any entry changed since load */
  isModified(): boolean {
    return this.modified;
  }

  getData(): VersionManifest {
    return this.data;
  }

  getEntry(modulePath: string): LedgerEntry | undefined {
    const hash = this.data['SHA-256'][modulePath];
    if (hash === undefined) {
      return undefined;
    }
    return {
      path: modulePath,
      version: this.data.modules[modulePath] ?? UNKNOWN_VERSION,
      hash
    };
  }

  trackedPaths(): string[] {
    return Object.keys(this.data['SHA-256']);
  }

  /**
   * Upsert a module's version and hash together
   */
  recordModule(modulePath: string, version: string, hash: string): void {
    const current = this.getEntry(modulePath);
    if (current && current.version === version && current.hash === hash) {
      return;
    }
    this.data.modules[modulePath] = version;
    this.data['SHA-256'][modulePath] = hash;
    this.modified = true;
  }

  /**
   * Refresh the generation timestamp, marking the ledger modified
   */
  touch(field: 'generated_at' | 'compiled_at'): void {
    this.data[field] = new Date().toISOString();
    this.modified = true;
  }

  /**
   * Persist if modified
   *
   * @returns true when the file was written
   */
  async saveIfModified(): Promise<boolean> {
    if (!this.modified) {
      return false;
    }
    await VersionLedger.save(this.manifestPath, this.data);
    this.modified = false;
    return true;
  }
}
