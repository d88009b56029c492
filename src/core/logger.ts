import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';

// Purely observational: nothing a logger does may change the outcome of an operation.
export type RegionLogger = {
  info: (message: string) => void;
  error: (message: string) => void;
};

export const silentLogger: RegionLogger = {
  info: () => undefined,
  error: () => undefined
};

/**
 * Forwards engine messages to the connected client as MCP `notifications/message`.
 * Messages emitted before a client connects are dropped.
 */
export function createMcpLogger(server: McpServer, loggerName = 'editable-regions'): RegionLogger {
  const send = (level: 'info' | 'error', message: string): void => {
    if (!server.isConnected()) return;

    server.sendLoggingMessage({ level, logger: loggerName, data: message }).catch((error: unknown) => {
      const reason = error instanceof Error ? error.message : String(error);
      // eslint-disable-next-line no-console
      console.error(`Failed to deliver ${level} log message: ${reason}`);
    });
  };

  return {
    info: message => send('info', message),
    error: message => send('error', message)
  };
}
