import { BaseTool } from './base.js';
import { BuildOrchestrator, type BuildReport } from '../core/build/BuildOrchestrator.js';
import { Deployer, type DeployReport } from '../core/sync/Deployer.js';
import { log } from '../utils/logger.js';
import type { ToolParams } from '../utils/validation.js';

interface DeployResponse {
  success: boolean;
  build?: BuildReport;
  deploy: DeployReport | null;
  error?: string;
}

export class DeployTool extends BaseTool {
  public name = 'mpy_deploy';

  public description = `Deploy the output tree to a MicroPython device.

mpremote mode (default): hashes every local file, reads the device's files and SHA-256 sums, then removes obsolete files, creates missing directories, copies new and changed files, and soft-resets the device when every copy succeeded. webrepl_cfg.py on the device is never removed.
WebREPL mode: pushes every file over the password-protected WebREPL channel (no hashing available).

Device: the device parameter, then deploy.device / MPREMOTE_DEVICE, then the single auto-detected device.`;

  public inputSchema = {
    type: 'object' as const,
    additionalProperties: false,
    properties: {
      dryRun: {
        type: 'boolean',
        default: false,
        description: 'Compute and report the diff without touching the device'
      },
      device: {
        type: 'string',
        description: 'Serial port of the device, e.g. /dev/ttyUSB0 or COM3'
      },
      webrepl: {
        type: 'boolean',
        description: 'Use the WebREPL fallback instead of mpremote'
      },
      build: {
        type: 'boolean',
        default: false,
        description: 'Run mpy_build first; the deploy is skipped when the build reports failures'
      }
    }
  };

  public annotations = {
    title: 'Deploy to device',
    readOnlyHint: false,
    destructiveHint: true,
    idempotentHint: true,
    openWorldHint: true
  };

  async execute(params: ToolParams): Promise<DeployResponse> {
    const dryRun = this.validate.optionalBoolean(params, 'dryRun') ?? false;
    const device = this.validate.optionalString(params, 'device');
    const webrepl = this.validate.optionalBoolean(params, 'webrepl');
    const build = this.validate.optionalBoolean(params, 'build') ?? false;
    const { settings, compiler, agent, passwordTransfer } = this.context;

    let buildReport: BuildReport | undefined;
    if (build) {
      buildReport = await new BuildOrchestrator(settings, compiler).build({ dryRun });
      if (!buildReport.success) {
        log.warn(`[DEPLOY] Build reported ${buildReport.failures} failures, deploy skipped`);
        return {
          success: false,
          build: buildReport,
          deploy: null,
          error: `Build reported ${buildReport.failures} failures; deploy skipped`
        };
      }
    }

    const report = await new Deployer(settings, agent, passwordTransfer).deploy({ dryRun, device, webrepl });
    return buildReport
      ? { success: report.success, build: buildReport, deploy: report }
      : { success: report.success, deploy: report };
  }
}
