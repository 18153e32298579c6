import { Tool } from '@modelcontextprotocol/sdk/types.js';
import type { ForgeSettings } from '../config/buildConfig.js';
import type { Compiler } from '../core/build/Compiler.js';
import type { TransferAgent } from '../core/sync/TransferAgent.js';
import type { PasswordTransfer } from '../core/sync/WebReplTransfer.js';
import { MCPValidator, type ToolParams } from '../utils/validation.js';

/**
 * Collaborators shared by every tool
 *
 * The server builds the real ones (mpy-cross, mpremote, webrepl_cli.py);
 * tests pass fakes.
 */
export interface ToolContext {
  settings: ForgeSettings;
  compiler: Compiler;
  agent: TransferAgent;
  passwordTransfer: PasswordTransfer;
}

/**
 * Base class for all mpy-forge tools
 *
 * Subclasses declare their MCP metadata and implement execute(). Thrown
 * errors are turned into error responses by the server.
 */
export abstract class BaseTool implements Tool {
  [x: string]: unknown; // Index signature for Tool interface

  /** Tool name as registered with MCP server (must be unique) */
  public abstract name: string;

  public abstract description: string;

  /** JSON schema defining input parameters */
  public abstract inputSchema: {
    type: 'object';
    properties?: Record<string, object>;
    required?: string[];
    [key: string]: unknown;
  };

  /** Optional MCP tool annotations for selection hints */
  public annotations?: {
    title?: string;
    readOnlyHint?: boolean;
    destructiveHint?: boolean;
    idempotentHint?: boolean;
    openWorldHint?: boolean;
  };

  protected readonly validate = MCPValidator;

  constructor(protected readonly context: ToolContext) {}

  abstract execute(params: ToolParams): Promise<unknown>;
}
