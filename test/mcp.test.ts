/**
 * MCP Server Tests
 */

import { describe, it, before, after } from 'node:test';
import assert from 'node:assert';
import { mkdir, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { randomUUID } from 'crypto';
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import {
  createMCPServer,
  listTools,
  listResources,
  callTool,
  readResource,
  type MCPContext,
  type ToolResult,
} from '../src/mcp/server.js';
import { createConfig } from '../src/config.js';
import { configureLogger } from '../src/logger.js';

configureLogger({ level: 'silent' });

function body(result: ToolResult): string {
  return result.content[0].text;
}

describe('MCP Server', () => {
  let context: MCPContext;

  before(async () => {
    const baseDir = join(tmpdir(), `ska-mcp-${randomUUID()}`);
    await mkdir(baseDir, { recursive: true });
    context = {
      config: createConfig({ checkpoint: { enabled: true, dir: 'ckpt', interval: 25 } }),
      baseDir,
    };
  });

  after(async () => {
    await rm(context.baseDir, { recursive: true, force: true });
  });

  it('should create a server instance', () => {
    assert.ok(createMCPServer(context) instanceof Server);
  });

  it('should list every tool', () => {
    assert.deepStrictEqual(
      listTools().tools.map((t) => t.name),
      ['generate_samples', 'run_stream', 'checkpoint_list', 'checkpoint_verify']
    );
  });

  it('should list every resource', () => {
    assert.deepStrictEqual(
      listResources().resources.map((r) => r.uri),
      ['ska://config/default', 'ska://checkpoints/latest']
    );
  });

  // ===========================================================================
  // Tools
  // ===========================================================================

  describe('generate_samples', () => {
    it('should return the requested samples', async () => {
      const result = await callTool('generate_samples', { count: 3 }, context);
      assert.strictEqual(result.isError, undefined);

      const samples: unknown = JSON.parse(body(result));
      assert.ok(Array.isArray(samples));
      assert.strictEqual(samples.length, 3);
      assert.deepStrictEqual(samples[0], { index: 0, timestamp: 0, value: 1 });
    });

    it('should apply configuration overrides', async () => {
      const result = await callTool(
        'generate_samples',
        { count: 1, config: { oscillator: { components: [{ omega: 1, x0: 2 }] } } },
        context
      );
      assert.deepStrictEqual(JSON.parse(body(result)), [{ index: 0, timestamp: 0, value: 2 }]);
    });

    it('should reject an out-of-range count', async () => {
      const result = await callTool('generate_samples', { count: 0 }, context);
      assert.strictEqual(result.isError, true);
      assert.match(body(result), /^Invalid arguments: /);
    });

    it('should report configuration errors', async () => {
      const result = await callTool(
        'generate_samples',
        { config: { oscillator: { epsilon: -1 } } },
        context
      );
      assert.strictEqual(result.isError, true);
      assert.match(body(result), /^Error: Invalid configuration: oscillator: epsilon/);
    });
  });

  describe('run_stream and checkpoints', () => {
    it('should run a bounded stream and return its summary', async () => {
      const result = await callTool('run_stream', { samples: 60 }, context);
      const summary: unknown = JSON.parse(body(result));
      assert.ok(typeof summary === 'object' && summary !== null);
      assert.ok('processed' in summary && 'status' in summary);
      assert.strictEqual(summary.processed, 60);
      assert.strictEqual(summary.status, 'completed');
    });

    it('should list the checkpoints that run wrote', async () => {
      const result = await callTool('checkpoint_list', {}, context);
      assert.deepStrictEqual(JSON.parse(body(result)), [
        { id: 'ckpt-000000000059', lastIndex: 59 },
        { id: 'ckpt-000000000049', lastIndex: 49 },
        { id: 'ckpt-000000000024', lastIndex: 24 },
      ]);
    });

    it('should verify a checkpoint', async () => {
      const result = await callTool('checkpoint_verify', { id: 'ckpt-000000000049' }, context);
      assert.strictEqual(result.isError, undefined);
      assert.match(body(result), /^Verified: index 49, step 50/);
    });

    it('should flag a missing checkpoint', async () => {
      const result = await callTool('checkpoint_verify', { id: 'ckpt-000000000001' }, context);
      assert.strictEqual(result.isError, true);
    });

    it('should describe the latest checkpoint', async () => {
      const resource = await readResource('ska://checkpoints/latest', context);
      const latest: unknown = JSON.parse(resource.contents[0].text);
      assert.ok(typeof latest === 'object' && latest !== null);
      assert.ok('status' in latest && 'lastIndex' in latest);
      assert.strictEqual(latest.status, 'restored');
      assert.strictEqual(latest.lastIndex, 59);
    });
  });

  it('should reject an unknown tool', async () => {
    const result = await callTool('launch', {}, context);
    assert.deepStrictEqual(result, {
      isError: true,
      content: [{ type: 'text', text: 'Unknown tool: launch' }],
    });
  });

  // ===========================================================================
  // Resources
  // ===========================================================================

  it('should expose the effective configuration', async () => {
    const resource = await readResource('ska://config/default', context);
    assert.strictEqual(resource.contents[0].mimeType, 'application/json');
    assert.deepStrictEqual(JSON.parse(resource.contents[0].text), context.config);
  });

  it('should reject an unknown resource', async () => {
    await assert.rejects(readResource('ska://nothing', context), /Unknown resource/);
  });
});
