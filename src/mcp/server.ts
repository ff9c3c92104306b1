/**
 * SKA Stream MCP Server
 *
 * Model Context Protocol boundary for hosts that want to drive the stream.
 *
 * Resources: read-only observation (effective config, latest checkpoint)
 * Tools: sample generation, bounded runs and checkpoint inspection
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListResourcesRequestSchema,
  ListToolsRequestSchema,
  ReadResourceRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';

import { CheckpointManager, checkpointExpectation } from '../checkpoint.js';
import { createConfig, mergeConfig } from '../config.js';
import { loggers } from '../logger.js';
import { DiscretizationEngine } from '../oscillator.js';
import { runStream } from '../pipeline.js';
import type { StreamConfig } from '../types.js';

const log = loggers.mcp;

export const SERVER_NAME = 'ska-stream';
export const SERVER_VERSION = '0.1.0';

const MAX_GENERATE = 10_000;
const MAX_RUN = 100_000;

// =============================================================================
// Types
// =============================================================================

export interface MCPContext {
  config: StreamConfig;
  baseDir: string;
}

export type ToolResult = {
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
};

export type ResourceResult = {
  contents: Array<{ uri: string; mimeType: string; text: string }>;
};

const GenerateArgsZ = z.object({
  count: z.number().int().positive().max(MAX_GENERATE).default(100),
  config: z.record(z.record(z.unknown())).optional(),
});

const RunArgsZ = z.object({
  samples: z.number().int().positive().max(MAX_RUN).default(1000),
  config: z.record(z.record(z.unknown())).optional(),
});

const VerifyArgsZ = z.object({
  id: z.string().min(1),
});

function text(value: unknown): ToolResult {
  return {
    content: [{ type: 'text', text: typeof value === 'string' ? value : JSON.stringify(value, null, 2) }],
  };
}

function failure(message: string): ToolResult {
  return { isError: true, content: [{ type: 'text', text: message }] };
}

function json(uri: string, value: unknown): ResourceResult {
  return {
    contents: [{ uri, mimeType: 'application/json', text: JSON.stringify(value, null, 2) }],
  };
}

// =============================================================================
// Resources
// =============================================================================

function checkpointManager(context: MCPContext): CheckpointManager {
  return new CheckpointManager(
    context.config.checkpoint,
    context.baseDir,
    checkpointExpectation(context.config)
  );
}

export function listResources() {
  return {
    resources: [
      {
        uri: 'ska://config/default',
        name: 'Effective Configuration',
        description: 'Configuration the server runs streams with',
        mimeType: 'application/json',
      },
      {
        uri: 'ska://checkpoints/latest',
        name: 'Latest Checkpoint',
        description: 'Most recent checkpoint that passes verification',
        mimeType: 'application/json',
      },
    ],
  };
}

export async function readResource(uri: string, context: MCPContext): Promise<ResourceResult> {
  if (uri === 'ska://config/default') {
    return json(uri, context.config);
  }

  if (uri === 'ska://checkpoints/latest') {
    const manager = checkpointManager(context);
    const restored = await manager.restore();
    if (restored.status === 'cold') {
      return json(uri, { status: 'cold', warnings: restored.warnings });
    }
    const { checkpoint } = restored;
    return json(uri, {
      status: 'restored',
      id: checkpoint.id,
      lastIndex: checkpoint.lastIndex,
      step: checkpoint.learner.step,
      knowledge: checkpoint.learner.knowledge,
      weights: checkpoint.learner.weights,
      hash: checkpoint.hash,
      warnings: restored.warnings,
    });
  }

  throw new Error(`Unknown resource: ${uri}`);
}

// =============================================================================
// Tools
// =============================================================================

export function listTools() {
  return {
    tools: [
      {
        name: 'generate_samples',
        description: 'Generate oscillator samples x_n with their indices and timestamps.',
        inputSchema: {
          type: 'object' as const,
          properties: {
            count: { type: 'number', description: `Number of samples (1-${MAX_GENERATE})` },
            config: { type: 'object', description: 'Partial configuration overrides by section' },
          },
          required: [],
        },
      },
      {
        name: 'run_stream',
        description: 'Run the learner over a bounded stream and return the run summary.',
        inputSchema: {
          type: 'object' as const,
          properties: {
            samples: { type: 'number', description: `Samples to stream (1-${MAX_RUN})` },
            config: { type: 'object', description: 'Partial configuration overrides by section' },
          },
          required: [],
        },
      },
      {
        name: 'checkpoint_list',
        description: 'List checkpoints in the configured directory, newest first.',
        inputSchema: { type: 'object' as const, properties: {}, required: [] },
      },
      {
        name: 'checkpoint_verify',
        description: 'Verify hash and state consistency of one checkpoint.',
        inputSchema: {
          type: 'object' as const,
          properties: {
            id: { type: 'string', description: 'Checkpoint id, e.g. ckpt-000000000499' },
          },
          required: ['id'],
        },
      },
    ],
  };
}

export async function callTool(
  name: string,
  args: Record<string, unknown> | undefined,
  context: MCPContext
): Promise<ToolResult> {
  try {
    switch (name) {
      case 'generate_samples': {
        const parsed = GenerateArgsZ.safeParse(args ?? {});
        if (!parsed.success) return failure(`Invalid arguments: ${parsed.error.issues[0]?.message}`);

        const config = mergeConfig(context.config, parsed.data.config);
        const engine = new DiscretizationEngine(config.oscillator);
        return text([...engine.samples(parsed.data.count)]);
      }

      case 'run_stream': {
        const parsed = RunArgsZ.safeParse(args ?? {});
        if (!parsed.success) return failure(`Invalid arguments: ${parsed.error.issues[0]?.message}`);

        const config = mergeConfig(context.config, {
          ...parsed.data.config,
          oscillator: { ...parsed.data.config?.oscillator, sampleCount: parsed.data.samples },
        });
        const { summary } = await runStream(config, { baseDir: context.baseDir });
        return text(summary);
      }

      case 'checkpoint_list': {
        const manager = checkpointManager(context);
        return text(await manager.list());
      }

      case 'checkpoint_verify': {
        const parsed = VerifyArgsZ.safeParse(args ?? {});
        if (!parsed.success) return failure(`Invalid arguments: ${parsed.error.issues[0]?.message}`);

        const manager = checkpointManager(context);
        const result = await manager.verify(parsed.data.id);
        return result.valid ? text(result.details) : failure(result.details);
      }

      default:
        return failure(`Unknown tool: ${name}`);
    }
  } catch (error) {
    log.warn(`Tool ${name} failed`, String(error));
    return failure(`Error: ${error instanceof Error ? error.message : String(error)}`);
  }
}

// =============================================================================
// Server
// =============================================================================

/**
 * Create and configure the MCP server
 */
export function createMCPServer(context: Partial<MCPContext> = {}): Server {
  const ctx: MCPContext = {
    config: context.config ?? createConfig(),
    baseDir: context.baseDir ?? process.cwd(),
  };

  const server = new Server(
    {
      name: SERVER_NAME,
      version: SERVER_VERSION,
    },
    {
      capabilities: {
        resources: {},
        tools: {},
      },
    }
  );

  server.setRequestHandler(ListResourcesRequestSchema, async () => listResources());

  server.setRequestHandler(ReadResourceRequestSchema, async (request) =>
    readResource(request.params.uri, ctx)
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => listTools());

  server.setRequestHandler(CallToolRequestSchema, async (request) =>
    callTool(request.params.name, request.params.arguments, ctx)
  );

  return server;
}

/**
 * Start MCP server with stdio transport
 */
export async function startMCPServer(context: Partial<MCPContext> = {}): Promise<void> {
  const server = createMCPServer(context);
  const transport = new StdioServerTransport();
  await server.connect(transport);
  // stdout carries the protocol
  console.error('SKA stream MCP server started on stdio');
}
