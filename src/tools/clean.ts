import { BaseTool } from './base.js';
import { cleanOutput } from '../core/build/outputStatus.js';
import type { ToolParams } from '../utils/validation.js';

export class CleanTool extends BaseTool {
  public name = 'mpy_clean';

  public description = 'Remove the build output tree (compiled .mpy files, copies and its version.json). The source tree and src/version.json are untouched.';

  public inputSchema = {
    type: 'object' as const,
    additionalProperties: false,
    properties: {
      dryRun: {
        type: 'boolean',
        default: false,
        description: 'Report whether the output tree exists without removing it'
      }
    }
  };

  public annotations = {
    title: 'Clean build output',
    readOnlyHint: false,
    destructiveHint: true,
    idempotentHint: true,
    openWorldHint: false
  };

  async execute(params: ToolParams): Promise<{ path: string; existed: boolean; removed: boolean }> {
    const dryRun = this.validate.optionalBoolean(params, 'dryRun') ?? false;
    return cleanOutput(this.context.settings, dryRun);
  }
}
