/**
 * External command execution for the compiler and transfer agents
 *
 * SECURITY: Uses spawn() with array arguments, never a shell. Module paths and
 * device passwords pass through as literal arguments.
 */

import { spawn } from 'child_process';

export interface CommandResult {
  stdout: string;
  stderr: string;
}

/**
 * Runs a command to completion. Injected into collaborators so tests can
 * replace the process layer with canned output.
 */
export type CommandRunner = (command: string, args: string[], options?: { cwd?: string }) => Promise<CommandResult>;

/**
 * Command failed to start (binary missing) or exited non-zero
 */
export class CommandError extends Error {
  constructor(
    public readonly command: string,
    public readonly reason: 'not-found' | 'exit',
    message: string,
    public readonly exitCode: number | null = null,
    public readonly stderr: string = ''
  ) {
    super(message);
    this.name = 'CommandError';
  }
}

/**
 * Execute a command securely using spawn with array arguments
 *
 * @returns Promise resolving to captured stdout/stderr
 * @throws CommandError with reason 'not-found' when the binary is missing,
 *         'exit' when it exits non-zero
 */
export const runCommand: CommandRunner = (command, args, options = {}) => {
  return new Promise((resolve, reject) => {
    const child = spawn(command, args, {
      cwd: options.cwd,
      stdio: ['ignore', 'pipe', 'pipe']
    });

    let stdout = '';
    let stderr = '';

    child.stdout.on('data', (data: Buffer) => {
      stdout += data.toString();
    });

    child.stderr.on('data', (data: Buffer) => {
      stderr += data.toString();
    });

    child.on('close', (code: number | null) => {
      if (code === 0) {
        resolve({ stdout, stderr });
      } else {
        const detail = stderr.trim() || stdout.trim() || `exit code ${code}`;
        reject(new CommandError(command, 'exit', `${command} failed: ${detail}`, code, stderr));
      }
    });

    child.on('error', (error: NodeJS.ErrnoException) => {
      if (error.code === 'ENOENT') {
        reject(new CommandError(command, 'not-found', `${command} not found on PATH`));
      } else {
        reject(new CommandError(command, 'exit', `Failed to spawn ${command}: ${error.message}`));
      }
    });
  });
};

/**
 * Split an invocation template like "mpy-cross -march=xtensa -O2" into
 * command and arguments
 */
export function splitTemplate(template: string): { command: string; args: string[] } {
  const [command = '', ...args] = template.trim().split(/\s+/).filter(part => part.length > 0);
  return { command, args };
}
