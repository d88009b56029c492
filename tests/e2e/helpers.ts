import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';

import { createEditableRegionsMcpServer, type CreateServerOptions } from '../../src/core/createMcpServer.js';

export type ToolCallResult = {
  structuredContent?: unknown;
  isError?: boolean;
};

export const expectedToolNames = [
  'list_regions',
  'read_region',
  'write_region',
  'replace_in_region',
  'delete_in_region',
  'insert_before_in_region',
  'insert_after_in_region'
].sort();

// Server and client run in this process, linked by an in-memory transport pair.
export async function connectInMemoryClient(params: {
  clientName: string;
  serverOptions?: CreateServerOptions;
}): Promise<{ client: Client; close: () => Promise<void> }> {
  const server = createEditableRegionsMcpServer(params.serverOptions);
  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();

  await server.connect(serverTransport);

  const client = new Client({ name: params.clientName, version: '0.1.0' }, { capabilities: {} });
  await client.connect(clientTransport);

  return {
    client,
    close: async () => {
      await client.close();
      await server.close();
    }
  };
}
