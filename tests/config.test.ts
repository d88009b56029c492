import { describe, expect, it } from 'vitest';

import { getServerConfigFromEnv } from '../src/core/config.js';
import { DEFAULT_BEGIN_MARKER, DEFAULT_END_MARKER } from '../src/core/markers.js';

describe('server config from env', () => {
  it('uses defaults when nothing is set', () => {
    const config = getServerConfigFromEnv({});
    expect(config.workspaceRoot).toBe(process.cwd());
    expect(config.restrictToWorkspace).toBe(false);
    expect(config.port).toBe(3000);
    expect(config.markers.begin).toBe(DEFAULT_BEGIN_MARKER);
    expect(config.markers.end).toBe(DEFAULT_END_MARKER);
  });

  it('reads workspace root, restriction flag, port and marker patterns', () => {
    const config = getServerConfigFromEnv({
      REGION_WORKSPACE_ROOT: '/srv/site',
      REGION_RESTRICT_TO_WORKSPACE: 'TRUE',
      MCP_PORT: '8123',
      REGION_BEGIN_PATTERN: '/\\{\\{#edit (\\w+)\\}\\}/',
      REGION_END_PATTERN: '\\{\\{/edit\\}\\}'
    });
    expect(config.workspaceRoot).toBe('/srv/site');
    expect(config.restrictToWorkspace).toBe(true);
    expect(config.port).toBe(8123);
    expect(config.markers.begin.source).toBe('\\{\\{#edit (\\w+)\\}\\}');
    expect(config.markers.end.test('{{/edit}}')).toBe(true);
  });

  it('accepts false-y restriction flags', () => {
    expect(getServerConfigFromEnv({ REGION_RESTRICT_TO_WORKSPACE: '0' }).restrictToWorkspace).toBe(false);
    expect(getServerConfigFromEnv({ REGION_RESTRICT_TO_WORKSPACE: 'no' }).restrictToWorkspace).toBe(false);
  });

  it('throws for an invalid restriction flag', () => {
    expect(() => getServerConfigFromEnv({ REGION_RESTRICT_TO_WORKSPACE: 'sometimes' })).toThrow(
      'Invalid REGION_RESTRICT_TO_WORKSPACE: sometimes (expected true or false)'
    );
  });

  it('throws for an invalid port', () => {
    expect(() => getServerConfigFromEnv({ MCP_PORT: 'http' })).toThrow(/^Invalid MCP_PORT: http \(/);
    expect(() => getServerConfigFromEnv({ MCP_PORT: '70000' })).toThrow(/^Invalid MCP_PORT: 70000 \(/);
  });

  it('throws when the begin pattern has no capture group', () => {
    expect(() => getServerConfigFromEnv({ REGION_BEGIN_PATTERN: '#begin' })).toThrow(
      'Invalid REGION_BEGIN_PATTERN/REGION_END_PATTERN: Begin marker pattern must capture the region name in group 1'
    );
  });
});
