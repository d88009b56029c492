import * as z from 'zod/v4';

import { createMarkerPatterns, type MarkerPatterns } from './markers.js';

export type ServerConfig = {
  // Directory that relative file paths resolve against.
  workspaceRoot: string;
  restrictToWorkspace: boolean;
  markers: MarkerPatterns;
  // Only used by the HTTP entrypoint.
  port: number;
};

const DEFAULT_PORT = 3000;

const BooleanFlagSchema = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform(value => value === 'true' || value === '1' || value === 'yes');

const PortSchema = z.coerce.number().int().min(1).max(65_535);

function firstIssueMessage(error: z.ZodError): string {
  return error.issues[0]?.message ?? 'invalid value';
}

export function getServerConfigFromEnv(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const workspaceRoot = env.REGION_WORKSPACE_ROOT || process.cwd();

  let restrictToWorkspace = false;
  const restrictRaw = env.REGION_RESTRICT_TO_WORKSPACE;
  if (restrictRaw) {
    const parsed = BooleanFlagSchema.safeParse(restrictRaw.trim().toLowerCase());
    if (!parsed.success) {
      throw new Error(`Invalid REGION_RESTRICT_TO_WORKSPACE: ${restrictRaw} (expected true or false)`);
    }
    restrictToWorkspace = parsed.data;
  }

  let markers: MarkerPatterns;
  try {
    markers = createMarkerPatterns({ begin: env.REGION_BEGIN_PATTERN, end: env.REGION_END_PATTERN });
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new Error(`Invalid REGION_BEGIN_PATTERN/REGION_END_PATTERN: ${reason}`);
  }

  let port = DEFAULT_PORT;
  const portRaw = env.MCP_PORT;
  if (portRaw) {
    const parsed = PortSchema.safeParse(portRaw);
    if (!parsed.success) {
      throw new Error(`Invalid MCP_PORT: ${portRaw} (${firstIssueMessage(parsed.error)})`);
    }
    port = parsed.data;
  }

  return { workspaceRoot, restrictToWorkspace, markers, port };
}
