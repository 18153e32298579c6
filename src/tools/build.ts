import { BaseTool } from './base.js';
import { BuildOrchestrator, type BuildReport } from '../core/build/BuildOrchestrator.js';
import { BUMP_POLICIES } from '../core/versioning/versionBump.js';
import type { ToolParams } from '../utils/validation.js';

export class BuildTool extends BaseTool {
  public name = 'mpy_build';

  public description = `Build the MicroPython output tree.

Resolves every configured module (source dir first, then each submodule's src/), records its SHA-256 and __version__ in src/version.json, copies copy_only modules verbatim, compiles the rest with the configured mpy-cross command, and writes the output tree's version.json.

With bump, modules whose content changed get their __version__ incremented and rewritten in the source file (minor keeps the patch number: 1.2.3 -> 1.3.3).
Per-module failures do not stop the build; check failures and success in the report.`;

  public inputSchema = {
    type: 'object' as const,
    additionalProperties: false,
    properties: {
      dryRun: {
        type: 'boolean',
        default: false,
        description: 'Report planned actions with estimated compiled sizes; write nothing'
      },
      bump: {
        type: 'string',
        enum: [...BUMP_POLICIES],
        description: 'Increment __version__ of changed modules by this policy'
      }
    }
  };

  public annotations = {
    title: 'Build firmware modules',
    readOnlyHint: false,
    destructiveHint: true,
    idempotentHint: false,
    openWorldHint: false
  };

  async execute(params: ToolParams): Promise<BuildReport> {
    const dryRun = this.validate.optionalBoolean(params, 'dryRun');
    const bump = this.validate.optionalEnum(params, 'bump', BUMP_POLICIES);

    const orchestrator = new BuildOrchestrator(this.context.settings, this.context.compiler);
    return orchestrator.build({ dryRun, bump });
  }
}
