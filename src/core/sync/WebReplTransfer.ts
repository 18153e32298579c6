/**
 * Password-authenticated fallback channel through webrepl_cli.py
 *
 * The channel can only push files: no listing, no hashing. Deploys over it
 * always transfer the whole local tree.
 */

import { runCommand, CommandError, type CommandRunner } from '../../utils/processRunner.js';
import { ConfigurationError, TransferError, errorMessage } from '../../errors/forgeErrors.js';
import type { DeploySettings } from '../../config/buildConfig.js';

export interface PasswordTransfer {
  /** host:port description for reports */
  readonly target: string;

  /** Check that the endpoint accepts the password */
  ping(): Promise<void>;

  push(localPath: string, remotePath: string): Promise<void>;
}

const PYTHON = 'python3';

export class WebReplCliTransfer implements PasswordTransfer {
  readonly target: string;

  constructor(
    private readonly deploy: Pick<DeploySettings, 'host' | 'port' | 'password' | 'webreplCli'>,
    private readonly runner: CommandRunner = runCommand
  ) {
    this.target = `${deploy.host}:${deploy.port}`;
  }

  private requirePassword(): string {
    if (!this.deploy.password) {
      throw new ConfigurationError('WebREPL password is not set (deploy.password or WEBREPL_PASSWORD)', {
        field: 'deploy.password'
      });
    }
    return this.deploy.password;
  }

  private reason(error: unknown): string {
    if (error instanceof CommandError && error.reason === 'not-found') {
      return `${PYTHON} not found`;
    }
    return errorMessage(error);
  }

  async ping(): Promise<void> {
    const password = this.requirePassword();
    try {
      await this.runner(PYTHON, [this.deploy.webreplCli, '-p', password, this.deploy.host]);
    } catch (error: unknown) {
      throw new TransferError('connect', this.target, this.reason(error));
    }
  }

  async push(localPath: string, remotePath: string): Promise<void> {
    const password = this.requirePassword();
    const destination = `${this.deploy.host}:/${remotePath.replace(/^\/+/, '')}`;
    try {
      await this.runner(PYTHON, [this.deploy.webreplCli, '-p', password, localPath, destination]);
    } catch (error: unknown) {
      throw new TransferError('push', remotePath, this.reason(error));
    }
  }
}
