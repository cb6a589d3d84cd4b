import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import {
  CallToolRequestSchema,
  ErrorCode,
  ListResourcesRequestSchema,
  ListToolsRequestSchema,
  McpError,
  ReadResourceRequestSchema,
  type CallToolResult,
  type Tool,
} from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import type { Dispatcher } from './dispatcher.js';
import { failure, type CommandResult } from './errors.js';
import type { Logger } from './log.js';
import { STATUS_RESOURCES } from './resources.js';
import { isInlineScreenshot } from './screenshot.js';
import type { SessionRegistry } from './session-registry.js';

export const SERVER_NAME = 'selenium-mcp';
export const SERVER_VERSION = '2.0.0';

export interface ServerDeps {
  dispatcher: Dispatcher;
  registry: SessionRegistry;
  log: Logger;
}

// ---------- Formatting ----------

const ObjectJsonSchema = z
  .object({
    properties: z.record(z.unknown()).default({}),
    required: z.array(z.string()).default([]),
  })
  .passthrough();

/** JSON Schema for `tools/list`, inlined (no $ref) so every client can read it. */
export function toInputSchema(schema: z.AnyZodObject): Tool['inputSchema'] {
  const { properties, required } = ObjectJsonSchema.parse(zodToJsonSchema(schema, { $refStrategy: 'none' }));
  return {
    type: 'object',
    properties,
    ...(required.length > 0 ? { required } : {}),
  };
}

function json(obj: unknown, isError = false): CallToolResult {
  return {
    content: [{ type: 'text', text: JSON.stringify(obj, null, 2) }],
    ...(isError ? { isError: true } : {}),
  };
}

/**
 * The CommandResult as pretty JSON. An inline screenshot travels as an image
 * block instead of a base64 string inside the JSON. A payload JSON cannot
 * hold (a cycle, a BigInt) turns into an UnknownFailure result.
 */
export function toCallToolResult(result: CommandResult): CallToolResult {
  try {
    return format(result);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    return json(failure('UnknownFailure', `Result could not be serialized: ${message}`), true);
  }
}

function format(result: CommandResult): CallToolResult {
  if (!result.success) return json(result, true);

  if (isInlineScreenshot(result.payload)) {
    const { data, ...rest } = result.payload;
    const formatted = json({ success: true, payload: rest });
    return {
      content: [...formatted.content, { type: 'image', data, mimeType: rest.mimeType }],
    };
  }
  return json(result);
}

// ---------- MCP Server ----------

export function createServer({ dispatcher, registry, log }: ServerDeps): Server {
  const server = new Server(
    { name: SERVER_NAME, version: SERVER_VERSION },
    { capabilities: { tools: {}, resources: {} } },
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: dispatcher.listTools().map((tool) => ({
      name: tool.name,
      description: tool.description,
      inputSchema: toInputSchema(tool.schema),
    })),
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;
    log.debug(`tools/call ${name}`);
    return toCallToolResult(await dispatcher.dispatch(name, args ?? {}));
  });

  server.setRequestHandler(ListResourcesRequestSchema, async () => ({
    resources: STATUS_RESOURCES.map(({ uri, name, description, mimeType }) => ({ uri, name, description, mimeType })),
  }));

  server.setRequestHandler(ReadResourceRequestSchema, async (request) => {
    const { uri } = request.params;
    const resource = STATUS_RESOURCES.find((candidate) => candidate.uri === uri);
    if (!resource) {
      throw new McpError(ErrorCode.InvalidParams, `Unknown resource: ${uri}`);
    }
    return {
      contents: [{ uri, mimeType: resource.mimeType, text: resource.read(registry) }],
    };
  });

  server.onerror = (err) => {
    log.error('MCP transport error:', err);
  };

  return server;
}
