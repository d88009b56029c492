import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import * as z from 'zod/v4';

import { PathOutsideWorkspaceError, StructuralMarkerError, toErrnoCode } from './errors.js';
import { createMcpLogger } from './logger.js';
import type { MarkerPatterns } from './markers.js';
import { RegionEngine } from './regionEngine.js';
import { UNLIMITED_OCCURRENCES } from './textUtils.js';
import { toWireRegion } from './types.js';

const ToolTextResultSchema = z.object({ ok: z.boolean(), result: z.unknown() });

type ToolResponse = {
  content: { type: 'text'; text: string }[];
  structuredContent: { ok: boolean; result: unknown };
  isError?: boolean;
};

function toolTextResponse(params: { ok: boolean; result: unknown }): ToolResponse {
  return {
    content: [{ type: 'text', text: JSON.stringify(params, null, 2) }],
    structuredContent: params
  };
}

function describeToolError(error: unknown): { kind: string; message: string } {
  if (error instanceof StructuralMarkerError || error instanceof PathOutsideWorkspaceError) {
    return { kind: error.kind, message: error.message };
  }
  const message = error instanceof Error ? error.message : String(error);
  return { kind: toErrnoCode(error) ? 'io-error' : 'internal-error', message };
}

// Failures still carry structured content so clients see the same { ok, result } shape.
async function runTool(action: () => Promise<{ ok: boolean; result: unknown }>): Promise<ToolResponse> {
  try {
    return toolTextResponse(await action());
  } catch (error) {
    return { ...toolTextResponse({ ok: false, result: { error: describeToolError(error) } }), isError: true };
  }
}

export type CreateServerOptions = {
  workspaceRoot?: string;
  restrictToWorkspace?: boolean;
  markers?: MarkerPatterns;
  serverName?: string;
  serverVersion?: string;
};

export function createEditableRegionsMcpServer(options: CreateServerOptions = {}): McpServer {
  const server = new McpServer(
    {
      name: options.serverName ?? 'editable-regions-mcp-server',
      version: options.serverVersion ?? '0.1.0'
    },
    {
      capabilities: {
        // Engine info/error messages reach the client as logging notifications.
        logging: {}
      }
    }
  );

  const engine = new RegionEngine({
    logger: createMcpLogger(server),
    markers: options.markers,
    workspaceRoot: options.workspaceRoot,
    restrictToWorkspace: options.restrictToWorkspace
  });

  // -----------------
  // Tools
  // -----------------

  const filePath = z.string().min(1).describe('Path to the text file, relative to the workspace root or absolute');
  const regionName = z.string().min(1).describe('Name of the editable region (exact, case-sensitive)');

  server.registerTool(
    'list_regions',
    {
      title: 'List Editable Regions',
      description:
        'Lists all editable regions (<!-- #BeginEditable "name" --> ... <!-- #EndEditable -->) with names and 1-based line ranges. ' +
        'Returns an empty list if the file does not exist. Fails on nested, mismatched or unterminated markers.',
      inputSchema: z.object({ file_path: filePath }),
      outputSchema: ToolTextResultSchema
    },
    async ({ file_path }) =>
      runTool(async () => {
        const regions = await engine.listRegions(file_path);
        return { ok: true, result: { regions: regions.map(toWireRegion) } };
      })
  );

  server.registerTool(
    'read_region',
    {
      title: 'Read Editable Region',
      description: 'Returns the text between the begin and end markers of a region, excluding the marker lines.',
      inputSchema: z.object({ file_path: filePath, region_name: regionName }),
      outputSchema: ToolTextResultSchema
    },
    async ({ file_path, region_name }) =>
      runTool(async () => {
        const content = await engine.readRegion(file_path, region_name);
        if (content === undefined) return { ok: false, result: { found: false } };
        return { ok: true, result: { found: true, content } };
      })
  );

  server.registerTool(
    'write_region',
    {
      title: 'Write Editable Region',
      description:
        "Replaces the whole content of a region. Line breaks in the new content are converted to the file's line ending; the marker lines are kept.",
      inputSchema: z.object({
        file_path: filePath,
        region_name: regionName,
        new_content: z.string().describe('New region content (may be empty)')
      }),
      outputSchema: ToolTextResultSchema
    },
    async ({ file_path, region_name, new_content }) =>
      runTool(async () => {
        const success = await engine.writeRegion(file_path, region_name, new_content);
        return { ok: success, result: { success } };
      })
  );

  server.registerTool(
    'replace_in_region',
    {
      title: 'Replace Text In Region',
      description:
        'Replaces occurrences of a substring inside a region only. Succeeds without writing when the text is not present.',
      inputSchema: z.object({
        file_path: filePath,
        region_name: regionName,
        old_text: z.string().min(1).describe('Text to search for'),
        new_text: z.string().describe('Replacement text'),
        max_occurrences: z
          .number()
          .int()
          .optional()
          .describe('Maximum number of replacements, left to right; -1 (default) replaces all')
      }),
      outputSchema: ToolTextResultSchema
    },
    async ({ file_path, region_name, old_text, new_text, max_occurrences }) =>
      runTool(async () => {
        const success = await engine.replaceInRegion(
          file_path,
          region_name,
          old_text,
          new_text,
          max_occurrences ?? UNLIMITED_OCCURRENCES
        );
        return { ok: success, result: { success } };
      })
  );

  server.registerTool(
    'delete_in_region',
    {
      title: 'Delete Text In Region',
      description: 'Deletes the first occurrence of a substring inside a region. Succeeds without writing when the text is not present.',
      inputSchema: z.object({
        file_path: filePath,
        region_name: regionName,
        text_to_delete: z.string().min(1).describe('Text to delete (first occurrence only)')
      }),
      outputSchema: ToolTextResultSchema
    },
    async ({ file_path, region_name, text_to_delete }) =>
      runTool(async () => {
        const success = await engine.deleteInRegion(file_path, region_name, text_to_delete);
        return { ok: success, result: { success } };
      })
  );

  const insertInputSchema = z.object({
    file_path: filePath,
    region_name: regionName,
    anchor_text: z.string().min(1).describe('Text to locate inside the region (first occurrence)'),
    text_to_insert: z.string().describe('Text to insert next to the anchor')
  });

  server.registerTool(
    'insert_before_in_region',
    {
      title: 'Insert Before Text In Region',
      description: 'Inserts text immediately before the first occurrence of an anchor inside a region. Fails if the anchor is absent.',
      inputSchema: insertInputSchema,
      outputSchema: ToolTextResultSchema
    },
    async ({ file_path, region_name, anchor_text, text_to_insert }) =>
      runTool(async () => {
        const success = await engine.insertBeforeInRegion(file_path, region_name, anchor_text, text_to_insert);
        return { ok: success, result: { success } };
      })
  );

  server.registerTool(
    'insert_after_in_region',
    {
      title: 'Insert After Text In Region',
      description: 'Inserts text immediately after the first occurrence of an anchor inside a region. Fails if the anchor is absent.',
      inputSchema: insertInputSchema,
      outputSchema: ToolTextResultSchema
    },
    async ({ file_path, region_name, anchor_text, text_to_insert }) =>
      runTool(async () => {
        const success = await engine.insertAfterInRegion(file_path, region_name, anchor_text, text_to_insert);
        return { ok: success, result: { success } };
      })
  );

  // -----------------
  // Prompts
  // -----------------

  server.registerPrompt(
    'edit-region',
    {
      title: 'Edit Region',
      description: 'Prompt template for changing one editable region without touching the rest of the file.',
      argsSchema: { file_path: z.string(), region_name: z.string(), instruction: z.string() }
    },
    ({ file_path, region_name, instruction }) => ({
      messages: [
        {
          role: 'user',
          content: {
            type: 'text',
            text:
              `Edit the editable region "${region_name}" in ${file_path}.\n` +
              `First call read_region to see its current content. Prefer replace_in_region, delete_in_region, ` +
              `insert_before_in_region or insert_after_in_region for small changes; use write_region only to rewrite the whole region.\n` +
              `Never change text outside the region.\n` +
              `\nINSTRUCTION:\n${instruction}`
          }
        }
      ]
    })
  );

  return server;
}
