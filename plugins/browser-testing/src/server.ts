import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { CallToolRequestSchema, type CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import type { CommandDispatcher, ToolResult } from './dispatcher.js';
import { toolDefinitions } from './tools.js';

export const SERVER_NAME = 'browser-testing';
export const SERVER_VERSION = '1.0.0';

function json(obj: Record<string, unknown>, isError = false): CallToolResult {
  return {
    content: [{ type: 'text', text: JSON.stringify(obj, null, 2) }],
    ...(isError ? { isError: true } : {}),
  };
}

/**
 * Renders a dispatcher result as an MCP tool result: a JSON text block, plus
 * an image block for screenshots.
 */
export function toCallToolResult(result: ToolResult): CallToolResult {
  if (result.status === 'failure') {
    return json(
      {
        success: false,
        error: { kind: result.kind, message: result.message, ...result.details },
      },
      true,
    );
  }

  const rendered = json({ success: true, ...result.payload });
  if (result.image) {
    rendered.content.push({ type: 'image', data: result.image.data, mimeType: result.image.mimeType });
  }
  return rendered;
}

/**
 * Registers every tool from the registry on a new MCP server.
 *
 * The registered shapes are what `tools/list` advertises. Calls are routed
 * straight to the dispatcher with their raw arguments, so a bad argument or
 * an unknown tool comes back as an `InvalidArgumentError` result rather than
 * a protocol error.
 */
export function createMcpServer(dispatcher: CommandDispatcher): McpServer {
  const server = new McpServer({ name: SERVER_NAME, version: SERVER_VERSION });

  for (const tool of toolDefinitions) {
    server.registerTool(
      tool.name,
      { description: tool.description, inputSchema: tool.shape },
      async (args) => toCallToolResult(await dispatcher.invoke(tool.name, args)),
    );
  }

  server.server.setRequestHandler(CallToolRequestSchema, async (request) =>
    toCallToolResult(await dispatcher.invoke(request.params.name, request.params.arguments)),
  );

  return server;
}
