import { ServerContext } from '../server/ServerContext.js';

type LogLevel = 'debug' | 'info' | 'notice' | 'warning' | 'error' | 'critical' | 'alert' | 'emergency';

/**
 * Route one pipeline event to the connected client as a notifications/message.
 * Until a client connects, and whenever delivery fails, the event goes to stderr.
 */
function sendLog(level: LogLevel, logger: string, data: unknown): void {
  if (ServerContext.isInitialized()) {
    ServerContext.getInstance().server
      .sendLoggingMessage({ level, logger, data })
      .catch((error: unknown) => {
        // delivery failed
        console.error(`[${level.toUpperCase()}] [${logger}]`, data, error);
      });
  } else {
    console.error(`[${level.toUpperCase()}] [${logger}]`, data);
  }
}

/** Events tagged by pipeline stage, e.g. `scan`, `probe`, `ledger` */
export const mcpLogger = {
  debug(logger: string, data: unknown): void {
    if (ServerContext.isInitialized()) {
      sendLog('debug', logger, data);
    } else if (process.env.DEBUG) {
      console.error(`[DEBUG] [${logger}]`, data);
    }
  },

  info(logger: string, data: unknown): void {
    sendLog('info', logger, data);
  },

  warning(logger: string, data: unknown): void {
    sendLog('warning', logger, data);
  },

  error(logger: string, data: unknown): void {
    sendLog('error', logger, data);
  },
};
