/**
 * TransferAgent backed by the `mpremote` command-line tool
 *
 * Every call is `mpremote connect <device> ...`; remote paths are passed
 * with the `:` prefix mpremote uses for device-side paths.
 */

import { runCommand, CommandError, type CommandRunner } from '../../utils/processRunner.js';
import { ProbeError, TransferError, errorMessage } from '../../errors/forgeErrors.js';
import { mcpLogger } from '../../utils/mcpLogger.js';
import type { DeviceInfo, TransferAgent } from './TransferAgent.js';

const MPREMOTE = 'mpremote';

function remote(remotePath: string): string {
  return `:/${remotePath.replace(/^\/+/, '')}`;
}

function joinRemote(dir: string, name: string): string {
  return dir ? `${dir}/${name}` : name;
}

/**
 * Parse `mpremote connect list` output into devices
 *
 * Keeps serial ports (/dev/tty*, COM*) and any line naming Espressif.
 */
export function parseDeviceList(output: string): DeviceInfo[] {
  const devices: DeviceInfo[] = [];
  for (const raw of output.split('\n')) {
    const line = raw.trim();
    if (!line || line.startsWith('ls :')) {
      continue;
    }
    const [port = ''] = line.split(/\s+/);
    if (port.startsWith('/dev/tty') || port.startsWith('COM') || line.includes('Espressif')) {
      devices.push({ port, description: line });
    }
  }
  return devices;
}

/**
 * Parse `mpremote fs ls :<dir>` output
 *
 * Lines look like `        139 boot.py` or `          0 lib/`; the header
 * line `ls :/` is skipped.
 */
export function parseListing(output: string): Array<{ name: string; isDirectory: boolean }> {
  const entries: Array<{ name: string; isDirectory: boolean }> = [];
  for (const raw of output.split('\n')) {
    const line = raw.trim();
    if (!line || line.startsWith('ls :')) {
      continue;
    }
    const parts = line.split(/\s+/);
    const last = parts[parts.length - 1];
    if (parts.length < 2 || !last) {
      continue;
    }
    const isDirectory = last.endsWith('/');
    const name = isDirectory ? last.slice(0, -1) : last;
    if (name && name !== '.' && name !== '..') {
      entries.push({ name, isDirectory });
    }
  }
  return entries;
}

/**
 * First 64-hex token of `fs sha256sum` output, lowercased
 */
export function parseHash(output: string): string {
  const match = /\b[a-fA-F0-9]{64}\b/.exec(output);
  return match ? match[0].toLowerCase() : '';
}

function isAlreadyExists(error: unknown): boolean {
  const text = error instanceof CommandError ? `${error.message} ${error.stderr}` : errorMessage(error);
  return /EEXIST|exists/i.test(text);
}

function commandReason(error: unknown): string {
  if (error instanceof CommandError && error.reason === 'not-found') {
    return 'mpremote not found (pip install mpremote)';
  }
  return errorMessage(error);
}

export class MpremoteAgent implements TransferAgent {
  constructor(private readonly runner: CommandRunner = runCommand) {}

  private async run(args: string[]): Promise<string> {
    const { stdout } = await this.runner(MPREMOTE, args);
    return stdout;
  }

  async listDevices(): Promise<DeviceInfo[]> {
    try {
      return parseDeviceList(await this.run(['connect', 'list']));
    } catch (error: unknown) {
      throw new ProbeError(`Device enumeration failed: ${commandReason(error)}`, {
        notFound: error instanceof CommandError && error.reason === 'not-found'
      });
    }
  }

  async listFiles(device: string): Promise<string[]> {
    const files: string[] = [];
    const pending: string[] = [''];

    while (pending.length > 0) {
      const dir = pending.shift() ?? '';
      let output: string;
      try {
        output = await this.run(['connect', device, 'fs', 'ls', remote(dir)]);
      } catch (error: unknown) {
        throw new ProbeError(`Cannot list ${remote(dir)} on ${device}: ${commandReason(error)}`, {
          device,
          directory: dir,
          notFound: error instanceof CommandError && error.reason === 'not-found'
        });
      }

      for (const entry of parseListing(output)) {
        const entryPath = joinRemote(dir, entry.name);
        if (entry.isDirectory) {
          pending.push(entryPath);
        } else {
          files.push(entryPath);
        }
      }
    }

    mcpLogger.debug('mpremote', `[MPREMOTE] ${device}: ${files.length} files listed`);
    return files.sort();
  }

  async hashFile(device: string, remotePath: string): Promise<string> {
    try {
      return parseHash(await this.run(['connect', device, 'fs', 'sha256sum', remote(remotePath)]));
    } catch (error: unknown) {
      throw new ProbeError(`Cannot hash ${remotePath} on ${device}: ${commandReason(error)}`, { device, path: remotePath });
    }
  }

  async removeFile(device: string, remotePath: string): Promise<void> {
    try {
      await this.run(['connect', device, 'fs', 'rm', remote(remotePath)]);
    } catch (error: unknown) {
      throw new TransferError('remove', remotePath, commandReason(error));
    }
  }

  async makeDirectory(device: string, remotePath: string): Promise<void> {
    try {
      await this.run(['connect', device, 'fs', 'mkdir', remote(remotePath)]);
    } catch (error: unknown) {
      if (isAlreadyExists(error)) {
        return;
      }
      throw new TransferError('create directory', remotePath, commandReason(error));
    }
  }

  async copyFile(device: string, localPath: string, remotePath: string): Promise<void> {
    try {
      await this.run(['connect', device, 'fs', 'cp', localPath, remote(remotePath)]);
    } catch (error: unknown) {
      throw new TransferError('copy', remotePath, commandReason(error));
    }
  }

  async softReset(device: string): Promise<void> {
    try {
      await this.run(['connect', device, 'soft-reset']);
    } catch (error: unknown) {
      throw new TransferError('soft-reset', device, commandReason(error));
    }
  }
}
