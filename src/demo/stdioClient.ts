import { copyFile, mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { StdioClientTransport } from '@modelcontextprotocol/sdk/client/stdio.js';

type DemoToolResult = {
  content?: unknown;
  structuredContent?: unknown;
  isError?: boolean;
};

function pickStructured(result: DemoToolResult): unknown {
  if (result && typeof result === 'object' && 'structuredContent' in result && result.structuredContent != null) {
    return result.structuredContent;
  }
  return result;
}

async function main() {
  const repoRoot = process.cwd();
  const samplePath = join(repoRoot, 'examples', 'inputs', 'sample-page.html');

  // Work on a scratch copy so the sample stays pristine.
  const workDir = await mkdtemp(join(tmpdir(), 'editable-regions-demo-'));
  const filePath = join(workDir, 'sample-page.html');
  await copyFile(samplePath, filePath);

  const transport = new StdioClientTransport({
    command: process.execPath,
    args: [join(repoRoot, 'dist', 'entrypoints', 'stdio.js')],
    cwd: repoRoot,
    stderr: 'inherit'
  });

  const client = new Client({ name: 'editable-regions-demo-client', version: '0.1.0' }, { capabilities: {} });

  try {
    await client.connect(transport);

    const tools = await client.listTools();
    console.log(JSON.stringify({ tools: tools.tools.map(t => t.name) }, null, 2));

    const regions = await client.callTool({ name: 'list_regions', arguments: { file_path: filePath } });
    const before = await client.callTool({ name: 'read_region', arguments: { file_path: filePath, region_name: 'body' } });

    const replaced = await client.callTool({
      name: 'replace_in_region',
      arguments: { file_path: filePath, region_name: 'body', old_text: 'TBD', new_text: 'next Monday' }
    });

    const inserted = await client.callTool({
      name: 'insert_after_in_region',
      arguments: {
        file_path: filePath,
        region_name: 'body',
        anchor_text: '</h1>\n',
        text_to_insert: '<p>Prepared by the reporting team.</p>\n'
      }
    });

    console.log(
      JSON.stringify(
        {
          input: { samplePath, filePath },
          results: {
            regions: pickStructured(regions as DemoToolResult),
            before: pickStructured(before as DemoToolResult),
            replaced: pickStructured(replaced as DemoToolResult),
            inserted: pickStructured(inserted as DemoToolResult)
          }
        },
        null,
        2
      )
    );

    console.log(await readFile(filePath, 'utf8'));
  } finally {
    await transport.close().catch(() => undefined);
    await rm(workDir, { recursive: true, force: true });
  }
}

main().catch(err => {
  console.error(err);
  process.exitCode = 1;
});
