#!/usr/bin/env node
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';

import { getServerConfigFromEnv } from '../core/config.js';
import { createEditableRegionsMcpServer } from '../core/createMcpServer.js';

async function main() {
  const config = getServerConfigFromEnv();
  const server = createEditableRegionsMcpServer({
    workspaceRoot: config.workspaceRoot,
    restrictToWorkspace: config.restrictToWorkspace,
    markers: config.markers
  });
  const transport = new StdioServerTransport();
  await server.connect(transport);
}

main().catch(err => {
  // eslint-disable-next-line no-console
  console.error(err);
  process.exitCode = 1;
});
