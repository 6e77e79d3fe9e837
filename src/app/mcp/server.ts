// app/mcp/server.ts

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { GenerateParamsSchema, ValidateParamsSchema } from '../../lib/llm/tools/tool-schemas';
import type { ToolHandlers } from '../../lib/llm/tools/tool-handlers';

export const SERVER_NAME = 'vllm-mcp';
export const SERVER_VERSION = '0.1.0';

// 工具结果统一为一段 JSON 文本
function toToolResult(payload: object, isError = false): CallToolResult {
  return {
    content: [{ type: 'text', text: JSON.stringify(payload, null, 2) }],
    isError,
  };
}

/**
 * 创建注册了三个工具的 MCP 服务实例。
 * 一个 McpServer 只能连接一个传输通道，HTTP/SSE 模式下每个连接各建一个，共享同一个 ToolHandlers。
 */
export function createMcpServer(handlers: ToolHandlers): McpServer {
  const server = new McpServer({ name: SERVER_NAME, version: SERVER_VERSION });

  server.tool(
    'generate_multimodal_response',
    'Generate a response from a vision-capable model. Accepts a text prompt plus optional image URLs and local file paths.',
    GenerateParamsSchema.shape,
    async params => {
      const payload = await handlers.generateMultimodalResponse(params);
      return toToolResult(payload, payload.error !== undefined);
    },
  );

  server.tool(
    'list_available_providers',
    'List the configured model providers and the models each one supports.',
    async () => toToolResult(handlers.listAvailableProviders()),
  );

  server.tool(
    'validate_multimodal_request',
    'Check whether a request with the given model and attachment counts would be accepted, without calling the model.',
    ValidateParamsSchema.shape,
    async params => toToolResult(handlers.validateMultimodalRequest(params)),
  );

  return server;
}
