#!/usr/bin/env node

import { pathToFileURL } from 'url';
import { MpyForgeServer, createDefaultContext } from './server/mcpServer.js';
import { loadSettings, type SettingsOptions } from './config/buildConfig.js';
import { ConfigurationError } from './errors/forgeErrors.js';

/**
 * Parse command line arguments
 *
 * --config <path>, --src-dir <dir>, --output-dir <dir>, --preserve-dirs
 */
export function parseArgs(argv: readonly string[]): SettingsOptions {
  const result: SettingsOptions = {};

  const valueAfter = (index: number, flag: string): string => {
    const value = argv[index + 1];
    if (value === undefined || value.startsWith('--')) {
      throw new ConfigurationError(`${flag} requires a value`, { flag });
    }
    return value;
  };

  for (let i = 0; i < argv.length; i++) {
    switch (argv[i]) {
      case '--config':
      case '-c':
        result.configPath = valueAfter(i, argv[i]);
        i++;
        break;
      case '--src-dir':
        result.srcDir = valueAfter(i, argv[i]);
        i++;
        break;
      case '--output-dir':
        result.outputDir = valueAfter(i, argv[i]);
        i++;
        break;
      case '--preserve-dirs':
        result.preserveDirs = true;
        break;
      default:
        throw new ConfigurationError(`Unknown argument: ${argv[i]}`, { argument: argv[i] });
    }
  }

  return result;
}

/**
 * Main entry point for the mpy-forge MCP server
 */
async function main(): Promise<void> {
  const settings = await loadSettings(parseArgs(process.argv.slice(2)), process.env);
  console.error(`Using config file: ${settings.configPath}`);

  const server = new MpyForgeServer(createDefaultContext(settings));

  const shutdown = async (signal: string): Promise<void> => {
    console.error(`\nReceived ${signal}, shutting down gracefully...`);
    process.removeAllListeners('SIGINT');
    process.removeAllListeners('SIGTERM');
    try {
      await server.stop();
      process.exit(0);
    } catch (error: unknown) {
      console.error('Error during shutdown:', error);
      process.exit(1);
    }
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));

  await server.start();
}

// Only run if this file is executed directly
if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  main().catch((error: unknown) => {
    console.error('Fatal error:', error);
    process.exit(1);
  });
}
