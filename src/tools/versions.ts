import { BaseTool } from './base.js';
import { BUMP_POLICIES } from '../core/versioning/versionBump.js';
import { DEFAULT_UPDATE_POLICY, updateVersions, type VersionUpdateReport } from '../core/versioning/VersionUpdater.js';
import type { ToolParams } from '../utils/validation.js';

export class VersionsTool extends BaseTool {
  public name = 'mpy_versions';

  public description = `Update src/version.json for every .py file in the source tree.

New files are recorded with their __version__ (0.1.0 when absent). Changed files get __version__ bumped in place and re-hashed. Entries whose files disappeared are reported as missing but kept.`;

  public inputSchema = {
    type: 'object' as const,
    additionalProperties: false,
    properties: {
      bump: {
        type: 'string',
        enum: [...BUMP_POLICIES],
        default: DEFAULT_UPDATE_POLICY,
        description: 'Bump policy for changed files (minor keeps the patch number)'
      },
      dryRun: {
        type: 'boolean',
        default: false,
        description: 'Report changes without rewriting sources or version.json'
      }
    }
  };

  public annotations = {
    title: 'Update module versions',
    readOnlyHint: false,
    destructiveHint: false,
    idempotentHint: false,
    openWorldHint: false
  };

  async execute(params: ToolParams): Promise<VersionUpdateReport> {
    return updateVersions({
      srcDir: this.context.settings.srcDir,
      policy: this.validate.optionalEnum(params, 'bump', BUMP_POLICIES),
      dryRun: this.validate.optionalBoolean(params, 'dryRun')
    });
  }
}
