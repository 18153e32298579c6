import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import { CallToolRequestSchema, ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js';

import type { ForgeSettings } from '../config/buildConfig.js';
import { MpyCrossCompiler } from '../core/build/Compiler.js';
import { MpremoteAgent } from '../core/sync/MpremoteAgent.js';
import { WebReplCliTransfer } from '../core/sync/WebReplTransfer.js';
import { MpyForgeError, errorMessage } from '../errors/forgeErrors.js';
import { BaseTool, type ToolContext } from '../tools/base.js';
import { BuildTool } from '../tools/build.js';
import { DeployTool } from '../tools/deploy.js';
import { StatusTool } from '../tools/StatusTool.js';
import { CleanTool } from '../tools/clean.js';
import { VersionsTool } from '../tools/versions.js';
import { DevicesTool } from '../tools/devices.js';
import { ServerContext } from './ServerContext.js';

export const SERVER_NAME = 'mpy-forge';
export const SERVER_VERSION = '0.3.0';

/**
 * Real collaborators for the given settings
 */
export function createDefaultContext(settings: ForgeSettings): ToolContext {
  return {
    settings,
    compiler: new MpyCrossCompiler(settings.command),
    agent: new MpremoteAgent(),
    passwordTransfer: new WebReplCliTransfer(settings.deploy)
  };
}

/**
 * MCP server exposing the build and deploy pipeline as tools
 *
 * Tool results are returned as pretty-printed JSON text. Thrown errors become
 * `isError` responses; MpyForgeError subclasses carry their code and data.
 */
export class MpyForgeServer {
  /** Core MCP server instance from the SDK */
  private server: Server;
  private tools: Map<string, BaseTool>;

  constructor(context: ToolContext) {
    this.server = new Server(
      {
        name: SERVER_NAME,
        version: SERVER_VERSION
      },
      {
        capabilities: {
          tools: {},
          logging: {}
        }
      }
    );

    this.tools = new Map<string, BaseTool>();
    for (const tool of [
      new BuildTool(context),
      new DeployTool(context),
      new StatusTool(context),
      new CleanTool(context),
      new VersionsTool(context),
      new DevicesTool(context)
    ]) {
      this.tools.set(tool.name, tool);
    }

    this.setupHandlers();
  }

  /**
   * Register MCP request handlers
   */
  private setupHandlers(): void {
    // List available tools
    this.server.setRequestHandler(ListToolsRequestSchema, async () => {
      const toolSchemas = Array.from(this.tools.values()).map(tool => ({
        name: tool.name,
        description: tool.description,
        inputSchema: tool.inputSchema,
        annotations: tool.annotations
      }));

      return { tools: toolSchemas };
    });

    // Execute tool calls
    this.server.setRequestHandler(CallToolRequestSchema, async (request) => {
      const { name, arguments: args } = request.params;

      try {
        const tool = this.tools.get(name);
        if (!tool) {
          throw new Error(`Unknown tool: ${name}`);
        }

        console.error(`Executing tool: ${name}`);
        const result = await tool.execute(args ?? {});
        console.error(`Tool ${name} completed`);

        return {
          content: [
            {
              type: 'text' as const,
              text: JSON.stringify(result, null, 2)
            }
          ]
        };
      } catch (error: unknown) {
        console.error(`Tool ${name} failed:`, error);

        // Handle mpy-forge errors with structured information
        if (error instanceof MpyForgeError) {
          return {
            content: [
              {
                type: 'text' as const,
                text: JSON.stringify({
                  error: {
                    type: error.constructor.name,
                    message: error.message,
                    code: error.code,
                    data: error.data
                  }
                }, null, 2)
              }
            ],
            isError: true
          };
        }

        // Handle other errors
        return {
          content: [
            {
              type: 'text' as const,
              text: JSON.stringify({
                error: {
                  type: 'UnknownError',
                  message: errorMessage(error) || 'An unexpected error occurred'
                }
              }, null, 2)
            }
          ],
          isError: true
        };
      }
    });
  }

  /**
   * Connect to a transport and route log messages to it
   */
  async connect(transport: Transport): Promise<void> {
    await this.server.connect(transport);
    ServerContext.initialize(this.server);
  }

  /**
   * Start the MCP server on stdio
   */
  async start(): Promise<void> {
    console.error(`Starting ${SERVER_NAME} ${SERVER_VERSION}...`);
    await this.connect(new StdioServerTransport());
    console.error(`${SERVER_NAME} connected and ready: ${Array.from(this.tools.keys()).join(', ')}`);
  }

  /**
   * Stop the server gracefully
   */
  async stop(): Promise<void> {
    console.error(`Stopping ${SERVER_NAME}...`);
    ServerContext.reset();
    await this.server.close();
    console.error(`${SERVER_NAME} stopped`);
  }
}
