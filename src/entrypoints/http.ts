import { randomUUID } from 'node:crypto';

import express from 'express';
import { createMcpExpressApp } from '@modelcontextprotocol/sdk/server/express.js';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';

import { getServerConfigFromEnv } from '../core/config.js';
import { createEditableRegionsMcpServer } from '../core/createMcpServer.js';

async function main() {
  // NOTE: This entrypoint is intentionally "minimal".
  // - Binds to 127.0.0.1 only: the tools write to the local filesystem.
  // - Uses JSON response mode (no SSE), so it's easy to test with curl/Postman.
  // - No auth. If you expose beyond localhost, add auth and set REGION_RESTRICT_TO_WORKSPACE=true.

  const config = getServerConfigFromEnv();

  const app = createMcpExpressApp({ host: '127.0.0.1' });
  app.use(express.json({ limit: '8mb' }));

  const server = createEditableRegionsMcpServer({
    workspaceRoot: config.workspaceRoot,
    restrictToWorkspace: config.restrictToWorkspace,
    markers: config.markers
  });

  const transport = new StreamableHTTPServerTransport({
    // A session ID lets one transport serve the initialize request and every follow-up request.
    sessionIdGenerator: randomUUID,
    enableJsonResponse: true
  });

  await server.connect(transport);

  app.post('/mcp', async (req, res) => {
    try {
      await transport.handleRequest(req, res, req.body);
    } catch (err) {
      // eslint-disable-next-line no-console
      console.error('Error handling /mcp request:', err);
      if (!res.headersSent) {
        res.status(500).json({
          jsonrpc: '2.0',
          error: { code: -32603, message: 'Internal server error' },
          id: null
        });
      }
    }
  });

  app.listen(config.port, '127.0.0.1', () => {
    // eslint-disable-next-line no-console
    console.log(`MCP Streamable HTTP (JSON response mode) listening on http://127.0.0.1:${config.port}/mcp`);
  });
}

main().catch(err => {
  // eslint-disable-next-line no-console
  console.error(err);
  process.exitCode = 1;
});
