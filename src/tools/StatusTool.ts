import { BaseTool } from './base.js';
import { collectStatus, type ForgeStatus } from '../core/build/outputStatus.js';

export class StatusTool extends BaseTool {
  public name = 'mpy_status';

  public description = 'Show file counts of the source tree, each submodule and the output tree, plus the output version.json summary.';

  public inputSchema = {
    type: 'object' as const,
    additionalProperties: false,
    properties: {}
  };

  public annotations = {
    title: 'Build status',
    readOnlyHint: true,
    destructiveHint: false,
    idempotentHint: true,
    openWorldHint: false
  };

  async execute(): Promise<ForgeStatus> {
    return collectStatus(this.context.settings);
  }
}
