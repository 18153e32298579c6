import { Server } from '@modelcontextprotocol/sdk/server/index.js';

/**
 * Holds the server that mcpLogger notifications go through.
 * Set by MpyForgeServer.connect and cleared again by stop.
 */
export class ServerContext {
  private static instance: ServerContext | undefined;
  public server: Server;

  private constructor(server: Server) {
    this.server = server;
  }

  static initialize(server: Server): void {
    ServerContext.instance = new ServerContext(server);
  }

  static getInstance(): ServerContext {
    if (!ServerContext.instance) {
      throw new Error('No MCP server connected yet');
    }
    return ServerContext.instance;
  }

  static isInitialized(): boolean {
    return !!ServerContext.instance;
  }

  static reset(): void {
    ServerContext.instance = undefined;
  }
}
