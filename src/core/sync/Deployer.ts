/**
 * Deploys the output tree to a device
 *
 * mpremote mode: select device, hash local tree, probe, diff, apply.
 * WebREPL mode: ping, then push every file.
 */

import type { ForgeSettings } from '../../config/buildConfig.js';
import { ConfigurationError, errorMessage } from '../../errors/forgeErrors.js';
import { directoryExists, hashTree } from '../../utils/fileScanner.js';
import { log } from '../../utils/logger.js';
import { probeDevice } from './DeviceProber.js';
import { DEFAULT_PROTECTED_FILES, SyncDiff, type DiffResult } from './SyncDiff.js';
import { SyncExecutor, type SyncResult } from './SyncExecutor.js';
import type { DeviceInfo, TransferAgent } from './TransferAgent.js';
import type { PasswordTransfer } from './WebReplTransfer.js';

export interface DeployOptions {
  dryRun?: boolean;
  /** Serial port overriding configuration */
  device?: string;
  /** Force the WebREPL fallback */
  webrepl?: boolean;
}

export interface DeployReport {
  mode: 'mpremote' | 'webrepl';
  dryRun: boolean;
  target: string | null;
  localFiles: number;
  diff: DiffResult | null;
  summary: string;
  probe: { degraded: boolean; warnings: string[] } | null;
  sync: SyncResult | null;
  /** Candidates when device selection failed */
  candidates?: DeviceInfo[];
  error?: string;
  success: boolean;
}

export type DeviceSelection =
  | { device: string; source: 'option' | 'config' | 'auto' }
  | { device: null; reason: string; candidates: DeviceInfo[] };

export class Deployer {
  constructor(
    private readonly settings: ForgeSettings,
    private readonly agent: TransferAgent,
    private readonly passwordTransfer: PasswordTransfer
  ) {}

  /**
   * Pick the target: explicit option, then configuration (which already
   * carries MPREMOTE_DEVICE), then the single auto-detected device
   */
  async selectDevice(explicit?: string): Promise<DeviceSelection> {
    if (explicit) {
      return { device: explicit, source: 'option' };
    }
    if (this.settings.deploy.device) {
      return { device: this.settings.deploy.device, source: 'config' };
    }

    let candidates: DeviceInfo[];
    try {
      candidates = await this.agent.listDevices();
    } catch (error: unknown) {
      return { device: null, reason: `Device detection failed: ${errorMessage(error)}`, candidates: [] };
    }

    if (candidates.length === 1) {
      log.info(`[DEPLOY] Device found: ${candidates[0].port}`);
      return { device: candidates[0].port, source: 'auto' };
    }
    if (candidates.length === 0) {
      return { device: null, reason: 'No MicroPython device found', candidates };
    }
    return {
      device: null,
      reason: `${candidates.length} devices found, specify one with the device option`,
      candidates
    };
  }

  private async localHashes(): Promise<Map<string, string>> {
    const { outputDir, deploy } = this.settings;
    if (!(await directoryExists(outputDir))) {
      throw new ConfigurationError(`Output directory not found: ${outputDir} (run mpy_build first)`, { outputDir });
    }
    const hashes = await hashTree(outputDir, { exclude: deploy.exclude });
    if (hashes.size === 0) {
      throw new ConfigurationError(`Output directory is empty: ${outputDir}`, { outputDir });
    }
    return hashes;
  }

  async deploy(options: DeployOptions = {}): Promise<DeployReport> {
    const dryRun = options.dryRun ?? false;
    const { deploy, outputDir } = this.settings;

    if (options.webrepl ?? deploy.useWebrepl) {
      return this.deployWebRepl(dryRun);
    }

    const selection = await this.selectDevice(options.device);
    if (selection.device === null) {
      log.warn(`[DEPLOY] ${selection.reason}`);
      return {
        mode: 'mpremote',
        dryRun,
        target: null,
        localFiles: 0,
        diff: null,
        summary: selection.reason,
        probe: null,
        sync: null,
        candidates: selection.candidates,
        error: selection.reason,
        success: false
      };
    }
    const device = selection.device;

    const local = await this.localHashes();
    const probe = await probeDevice(this.agent, device);

    let diff = deploy.cleanDeploy
      ? SyncDiff.computeClean(local, probe.files, DEFAULT_PROTECTED_FILES)
      : SyncDiff.compute(local, probe.files, DEFAULT_PROTECTED_FILES);
    if (deploy.customClean.length > 0) {
      diff = SyncDiff.withExtraRemovals(diff, deploy.customClean, probe.files, DEFAULT_PROTECTED_FILES);
    }
    const summary = SyncDiff.formatSummary(diff);

    let sync: SyncResult | null = null;
    if (diff.hasChanges) {
      sync = await new SyncExecutor(this.agent).apply({
        device,
        diff,
        localRoot: outputDir,
        autoReset: deploy.autoReset,
        dryRun
      });
    } else {
      log.info(`[DEPLOY] ${device}: no changes`);
    }

    return {
      mode: 'mpremote',
      dryRun,
      target: device,
      localFiles: local.size,
      diff,
      summary,
      probe: { degraded: probe.degraded, warnings: probe.warnings },
      sync,
      success: sync?.success ?? true
    };
  }

  private async deployWebRepl(dryRun: boolean): Promise<DeployReport> {
    const local = await this.localHashes();
    const target = this.passwordTransfer.target;

    if (dryRun && !this.settings.deploy.password) {
      throw new ConfigurationError('WebREPL password is not set (deploy.password or WEBREPL_PASSWORD)', {
        field: 'deploy.password'
      });
    }

    if (!dryRun) {
      try {
        await this.passwordTransfer.ping();
      } catch (error: unknown) {
        if (error instanceof ConfigurationError) {
          throw error;
        }
        const reason = `WebREPL connection failed: ${errorMessage(error)}`;
        log.error(`[DEPLOY] ${reason}`);
        return {
          mode: 'webrepl',
          dryRun,
          target,
          localFiles: local.size,
          diff: null,
          summary: reason,
          probe: null,
          sync: null,
          error: reason,
          success: false
        };
      }
    }

    const sync = await SyncExecutor.applyFullPush({
      transfer: this.passwordTransfer,
      localRoot: this.settings.outputDir,
      files: [...local.keys()],
      dryRun
    });

    return {
      mode: 'webrepl',
      dryRun,
      target,
      localFiles: local.size,
      diff: null,
      summary: `${sync.transferred.length - sync.failedTransfers}/${sync.transferred.length} files pushed to ${target}`,
      probe: null,
      sync,
      success: sync.success
    };
  }
}
