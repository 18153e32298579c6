import { promises as fs } from 'fs';
import path from 'path';
import { ConfigurationError, errnoCode, errorMessage } from '../errors/forgeErrors.js';
import { DEFAULT_ARCHITECTURE, DEFAULT_COMPILER_TEMPLATE, parseArchitecture, parseOptimization } from '../core/build/Compiler.js';
import { log } from '../utils/logger.js';

/**
 * Deploy section of the build configuration, merged with environment overrides
 */
export interface DeploySettings {
  readonly host: string;
  readonly port: number;
  readonly password: string;
  /** Serial port of the target, null when it should be auto-detected */
  readonly device: string | null;
  readonly autoReset: boolean;
  readonly cleanDeploy: boolean;
  readonly customClean: readonly string[];
  readonly useWebrepl: boolean;
  /** gitignore-style patterns excluded from the local scan */
  readonly exclude: readonly string[];
  readonly webreplCli: string;
}

/**
 * Immutable settings for one server process
 *
 * Built once at start-up by loadSettings() and passed by reference into every
 * component.
 */
export interface ForgeSettings {
  readonly configPath: string;
  readonly srcDir: string;
  readonly outputDir: string;
  readonly preserveDirs: boolean;
  readonly modules: readonly string[];
  readonly copyOnly: readonly string[];
  readonly submodules: readonly string[];
  readonly command: string;
  readonly architecture: string;
  readonly optimization: string;
  readonly description: string;
  readonly deploy: DeploySettings;
}

/**
 * Run options, usually from the command line
 */
export interface SettingsOptions {
  configPath?: string;
  srcDir?: string;
  outputDir?: string;
  preserveDirs?: boolean;
  /** Base for relative paths (default: process.cwd()) */
  cwd?: string;
}

export type SettingsEnv = Readonly<Record<string, string | undefined>>;

export const DEFAULT_SRC_DIR = 'src';
export const DEFAULT_OUTPUT_DIR = 'mpy_xtensa';
export const DEFAULT_WEBREPL_HOST = 'micropython.local';
export const DEFAULT_WEBREPL_PORT = 8266;
export const DEFAULT_WEBREPL_CLI = 'tools/webrepl_cli.py';
export const CONFIG_CANDIDATES = ['prepare.json', 'src/prepare.json'];

const DEFAULT_DESCRIPTION = 'MicroPython modules version information';

// ============================================================================
// Field validation
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function describe(value: unknown): string {
  return Array.isArray(value) ? 'array' : value === null ? 'null' : typeof value;
}

function invalid(field: string, expected: string, value: unknown): ConfigurationError {
  return new ConfigurationError(`Invalid config field "${field}": expected ${expected}, got ${describe(value)}`, {
    field,
    expected,
    value
  });
}

function stringList(raw: Record<string, unknown>, key: string, field: string): string[] {
  const value = raw[key];
  if (value === undefined || value === null) {
    return [];
  }
  if (!Array.isArray(value)) {
    throw invalid(field, 'array of strings', value);
  }
  return value.map((entry, index) => {
    if (typeof entry !== 'string' || entry.trim() === '') {
      throw invalid(`${field}[${index}]`, 'non-empty string', entry);
    }
    return entry;
  });
}

function optionalString(raw: Record<string, unknown>, key: string, field: string): string | undefined {
  const value = raw[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'string') {
    throw invalid(field, 'string', value);
  }
  return value;
}

function optionalBoolean(raw: Record<string, unknown>, key: string, field: string): boolean | undefined {
  const value = raw[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'boolean') {
    throw invalid(field, 'boolean', value);
  }
  return value;
}

function parsePort(value: unknown, field: string): number {
  const port = typeof value === 'string' && /^\d+$/.test(value.trim()) ? parseInt(value, 10) : value;
  if (typeof port !== 'number' || !Number.isInteger(port) || port < 1 || port > 65535) {
    throw invalid(field, 'port number 1-65535', value);
  }
  return port;
}

function nonEmpty(value: string | undefined): string | undefined {
  return value === undefined || value === '' ? undefined : value;
}

// ============================================================================
// Loading
// ============================================================================

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null) {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

/**
 * Read the first configuration file that exists
 *
 * An explicit path is tried first, then prepare.json and src/prepare.json.
 * Malformed JSON stops the search.
 */
export async function readConfigFile(configPath: string | undefined, cwd: string): Promise<{ path: string; raw: unknown }> {
  const candidates = [...(configPath ? [configPath] : []), ...CONFIG_CANDIDATES].map(candidate =>
    path.resolve(cwd, candidate)
  );

  for (const candidate of candidates) {
    let content: string;
    try {
      content = await fs.readFile(candidate, 'utf-8');
    } catch (error: unknown) {
      if (errnoCode(error) === 'ENOENT') {
        continue;
      }
      throw new ConfigurationError(`Cannot read config ${candidate}: ${errorMessage(error)}`, { path: candidate });
    }

    try {
      return { path: candidate, raw: JSON.parse(content) };
    } catch (error: unknown) {
      throw new ConfigurationError(`Malformed JSON in ${candidate}: ${errorMessage(error)}`, { path: candidate });
    }
  }

  throw new ConfigurationError('No build configuration found', { searched: candidates });
}

/**
 * Validate parsed configuration JSON and merge run options and environment
 *
 * Values from the configuration file take precedence over the environment.
 */
export function buildSettings(raw: unknown, configPath: string, options: SettingsOptions = {}, env: SettingsEnv = {}): ForgeSettings {
  if (!isRecord(raw)) {
    throw invalid('(root)', 'object', raw);
  }
  const cwd = options.cwd ?? process.cwd();

  const modules = stringList(raw, 'modules', 'modules');
  const copyOnly = stringList(raw, 'copy_only', 'copy_only');
  const submodules = stringList(raw, 'submodules', 'submodules');
  const command = optionalString(raw, 'command', 'command') ?? DEFAULT_COMPILER_TEMPLATE;
  if (command.trim() === '') {
    throw invalid('command', 'non-empty compiler invocation', command);
  }

  const deployRaw = raw.deploy ?? {};
  if (!isRecord(deployRaw)) {
    throw invalid('deploy', 'object', deployRaw);
  }

  const architecture = parseArchitecture(command) ?? DEFAULT_ARCHITECTURE;

  let outputDir = options.outputDir ?? DEFAULT_OUTPUT_DIR;
  if (options.outputDir === undefined && architecture !== DEFAULT_ARCHITECTURE) {
    outputDir = `mpy_${architecture}`;
  }

  const portValue = deployRaw.port ?? nonEmpty(env.WEBREPL_PORT);
  const deploy: DeploySettings = {
    host: optionalString(deployRaw, 'host', 'deploy.host') ?? nonEmpty(env.WEBREPL_HOST) ?? DEFAULT_WEBREPL_HOST,
    port: portValue === undefined ? DEFAULT_WEBREPL_PORT : parsePort(portValue, 'deploy.port'),
    password: optionalString(deployRaw, 'password', 'deploy.password') ?? env.WEBREPL_PASSWORD ?? '',
    device: nonEmpty(optionalString(deployRaw, 'device', 'deploy.device')) ?? nonEmpty(env.MPREMOTE_DEVICE) ?? null,
    autoReset: optionalBoolean(deployRaw, 'auto_reset', 'deploy.auto_reset') ?? true,
    cleanDeploy: optionalBoolean(deployRaw, 'clean_deploy', 'deploy.clean_deploy') ?? false,
    customClean: stringList(deployRaw, 'custom_clean', 'deploy.custom_clean'),
    useWebrepl: optionalBoolean(deployRaw, 'use_webrepl', 'deploy.use_webrepl') ?? false,
    exclude: stringList(deployRaw, 'exclude', 'deploy.exclude'),
    webreplCli: path.resolve(cwd, optionalString(deployRaw, 'webrepl_cli', 'deploy.webrepl_cli') ?? DEFAULT_WEBREPL_CLI)
  };

  return deepFreeze<ForgeSettings>({
    configPath,
    srcDir: path.resolve(cwd, options.srcDir ?? DEFAULT_SRC_DIR),
    outputDir: path.resolve(cwd, outputDir),
    preserveDirs: options.preserveDirs ?? false,
    modules,
    copyOnly,
    submodules: submodules.map(sub => path.resolve(cwd, sub)),
    command,
    architecture,
    optimization: parseOptimization(command),
    description: optionalString(raw, 'description', 'description') ?? DEFAULT_DESCRIPTION,
    deploy
  });
}

/**
 * Load and validate the build configuration
 *
 * @throws ConfigurationError when no configuration exists or a field is invalid
 */
export async function loadSettings(options: SettingsOptions = {}, env: SettingsEnv = process.env): Promise<ForgeSettings> {
  const cwd = options.cwd ?? process.cwd();
  const { path: configPath, raw } = await readConfigFile(options.configPath, cwd);
  const settings = buildSettings(raw, configPath, { ...options, cwd }, env);
  log.info(`[CONFIG] Loaded ${configPath}: ${settings.modules.length} modules, ${settings.copyOnly.length} copy-only`);
  return settings;
}
