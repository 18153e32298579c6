import { BaseTool } from './base.js';
import type { DeviceInfo } from '../core/sync/TransferAgent.js';

export class DevicesTool extends BaseTool {
  public name = 'mpy_devices';

  public description = 'List MicroPython devices connected over USB serial (mpremote connect list).';

  public inputSchema = {
    type: 'object' as const,
    additionalProperties: false,
    properties: {}
  };

  public annotations = {
    title: 'List devices',
    readOnlyHint: true,
    destructiveHint: false,
    idempotentHint: true,
    openWorldHint: true
  };

  async execute(): Promise<{ devices: DeviceInfo[]; configured: string | null }> {
    const devices = await this.context.agent.listDevices();
    return { devices, configured: this.context.settings.deploy.device };
  }
}
