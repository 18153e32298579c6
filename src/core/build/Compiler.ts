/**
 * Compiler collaborator
 *
 * The build never talks to mpy-cross directly: it goes through this narrow
 * interface so tests can substitute a fake that writes artifacts in-process.
 */

import { promises as fs } from 'fs';
import path from 'path';
import { runCommand, splitTemplate, CommandError, type CommandRunner } from '../../utils/processRunner.js';
import { CompilerInvocationError, errorMessage } from '../../errors/forgeErrors.js';
import { log } from '../../utils/logger.js';

export const DEFAULT_COMPILER_TEMPLATE = 'mpy-cross -march=xtensa -O2';
export const DEFAULT_ARCHITECTURE = 'xtensa';
export const DEFAULT_OPTIMIZATION = 'O2';

export interface Compiler {
  /** Extension of produced artifacts, with the leading dot */
  readonly artifactExtension: string;

  /**
   * Confirm the compiler can be run
   * @throws CompilerInvocationError with reason 'unavailable'
   */
  checkAvailable(): Promise<string>;

  /**
   * Compile one source file
   *
   * @returns path of the artifact written next to the source
   * @throws CompilerInvocationError with reason 'exit' or 'no-artifact'
   */
  compile(sourcePath: string): Promise<string>;
}

/**
 * Extract the `-march=<arch>` value of a compiler invocation template
 */
export function parseArchitecture(template: string): string | null {
  const match = /-march=([A-Za-z0-9_]+)/.exec(template);
  return match ? match[1] : null;
}

/**
 * Extract the `-O<n>` optimisation level, as "O<n>"
 */
export function parseOptimization(template: string): string {
  const match = /(?:^|\s)-O(\d)(?=\s|$)/.exec(template);
  return match ? `O${match[1]}` : DEFAULT_OPTIMIZATION;
}

/**
 * Path of the artifact a compiler leaves next to its source: `<dir>/<stem><ext>`
 */
export function adjacentArtifactPath(sourcePath: string, extension: string): string {
  const parsed = path.parse(sourcePath);
  return path.join(parsed.dir, `${parsed.name}${extension}`);
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    const stats = await fs.stat(filePath);
    return stats.isFile();
  } catch {
    return false;
  }
}

/**
 * mpy-cross invoked through the configured template, e.g.
 * `mpy-cross -march=xtensa -O2 <source>`
 */
export class MpyCrossCompiler implements Compiler {
  readonly artifactExtension = '.mpy';
  private readonly command: string;
  private readonly baseArgs: string[];

  constructor(template: string = DEFAULT_COMPILER_TEMPLATE, private readonly runner: CommandRunner = runCommand) {
    const { command, args } = splitTemplate(template);
    if (!command) {
      throw new CompilerInvocationError('Compiler command template is empty', 'unavailable', { template });
    }
    this.command = command;
    this.baseArgs = args;
  }

  async checkAvailable(): Promise<string> {
    try {
      const { stdout } = await this.runner(this.command, ['--version']);
      const version = stdout.trim();
      log.info(`[COMPILER] Found ${this.command}: ${version}`);
      return version;
    } catch (error: unknown) {
      throw new CompilerInvocationError(
        `Compiler not available: ${errorMessage(error)}`,
        'unavailable',
        { command: this.command }
      );
    }
  }

  async compile(sourcePath: string): Promise<string> {
    const args = [...this.baseArgs, sourcePath];
    try {
      await this.runner(this.command, args);
    } catch (error: unknown) {
      const stderr = error instanceof CommandError ? error.stderr.trim() : '';
      throw new CompilerInvocationError(
        `Compilation failed for ${sourcePath}: ${errorMessage(error)}`,
        error instanceof CommandError && error.reason === 'not-found' ? 'unavailable' : 'exit',
        { command: [this.command, ...args].join(' '), stderr }
      );
    }

    const artifact = adjacentArtifactPath(sourcePath, this.artifactExtension);
    if (!(await fileExists(artifact))) {
      throw new CompilerInvocationError(
        `Compiler produced no artifact for ${sourcePath}`,
        'no-artifact',
        { expected: artifact }
      );
    }
    return artifact;
  }
}
