// app/mcp/transports.ts

import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'node:http';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { SSEServerTransport } from '@modelcontextprotocol/sdk/server/sse.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import { createLogger } from '../../lib/logger';
import type { ToolHandlers } from '../../lib/llm/tools/tool-handlers';
import type { ServerSettings, TransportKind } from '../../lib/llm/types';
import { SERVER_NAME, createMcpServer } from './server';

const log = createLogger('Transport');

export const MCP_PATH = '/mcp';
export const SSE_PATH = '/sse';
export const SSE_MESSAGES_PATH = '/messages';

export interface RunningTransport {
  kind: TransportKind;
  port?: number; // HTTP/SSE 实际监听的端口（配置为 0 时由系统分配）
  close(): Promise<void>;
}

export interface TransportContext {
  handlers: ToolHandlers;
  providerNames: string[]; // 用于 /health
}

function sendJson(res: ServerResponse, status: number, body: unknown): void {
  res.writeHead(status, { 'Content-Type': 'application/json' });
  res.end(JSON.stringify(body));
}

function sendJsonRpcError(res: ServerResponse, status: number, code: number, message: string): void {
  sendJson(res, status, { jsonrpc: '2.0', error: { code, message }, id: null });
}

async function readJsonBody(req: IncomingMessage): Promise<unknown> {
  const chunks: Buffer[] = [];
  for await (const chunk of req) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  const text = Buffer.concat(chunks).toString('utf8');
  return text.trim() === '' ? undefined : JSON.parse(text);
}

function closeQuietly(server: McpServer, what: string): void {
  server.close().catch(error => log.warn(`Failed to close ${what}`, error));
}

function handleHealth(res: ServerResponse, kind: TransportKind, context: TransportContext): void {
  sendJson(res, 200, { status: 'ok', service: SERVER_NAME, transport: kind, providers: context.providerNames });
}

function listen(server: Server, settings: ServerSettings): Promise<number> {
  return new Promise((resolve, reject) => {
    server.once('error', reject);
    server.listen(settings.port, settings.host, () => {
      server.off('error', reject);
      const address = server.address();
      resolve(address !== null && typeof address === 'object' ? address.port : settings.port);
    });
  });
}

function closeHttpServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close(error => (error ? reject(error) : resolve()));
    server.closeAllConnections();
  });
}

export async function startStdio(context: TransportContext): Promise<RunningTransport> {
  const server = createMcpServer(context.handlers);
  await server.connect(new StdioServerTransport());
  log.info('MCP server listening on stdio');
  return {
    kind: 'stdio',
    close: () => server.close(),
  };
}

/**
 * Streamable HTTP 传输，无状态模式：每个 POST 请求创建一组新的 McpServer 与 transport，响应结束即释放。
 */
export async function startStreamableHttp(settings: ServerSettings, context: TransportContext): Promise<RunningTransport> {
  const handleMcp = async (req: IncomingMessage, res: ServerResponse): Promise<void> => {
    if (req.method !== 'POST') {
      sendJsonRpcError(res, 405, -32000, 'Method not allowed.');
      return;
    }

    let body: unknown;
    try {
      body = await readJsonBody(req);
    } catch {
      sendJsonRpcError(res, 400, -32700, 'Parse error');
      return;
    }

    const server = createMcpServer(context.handlers);
    const transport = new StreamableHTTPServerTransport({ sessionIdGenerator: undefined });
    res.on('close', () => {
      transport.close().catch(error => log.warn('Failed to close HTTP transport', error));
      closeQuietly(server, 'per-request MCP server');
    });
    await server.connect(transport);
    await transport.handleRequest(req, res, body);
  };

  const httpServer = createServer((req, res) => {
    const { pathname } = new URL(req.url ?? '/', `http://${req.headers.host ?? 'localhost'}`);

    if (pathname === '/health' && req.method === 'GET') {
      handleHealth(res, 'http', context);
      return;
    }
    if (pathname !== MCP_PATH) {
      sendJson(res, 404, { error: 'Not found' });
      return;
    }

    handleMcp(req, res).catch(error => {
      log.error('Error handling MCP request', error);
      if (!res.headersSent) {
        sendJsonRpcError(res, 500, -32603, 'Internal server error');
      }
    });
  });

  const port = await listen(httpServer, settings);
  log.info(`MCP server listening on http://${settings.host}:${port}${MCP_PATH}`);
  return {
    kind: 'http',
    port,
    close: () => closeHttpServer(httpServer),
  };
}

/**
 * SSE 传输：GET /sse 建立事件流，客户端随后向 POST /messages?sessionId=... 发送消息。
 */
export async function startSse(settings: ServerSettings, context: TransportContext): Promise<RunningTransport> {
  const sessions = new Map<string, { transport: SSEServerTransport; server: McpServer }>();

  const openStream = async (res: ServerResponse): Promise<void> => {
    const transport = new SSEServerTransport(SSE_MESSAGES_PATH, res);
    const server = createMcpServer(context.handlers);
    sessions.set(transport.sessionId, { transport, server });
    log.debug(`SSE session opened: ${transport.sessionId}`);

    res.on('close', () => {
      sessions.delete(transport.sessionId);
      closeQuietly(server, `SSE session ${transport.sessionId}`);
      log.debug(`SSE session closed: ${transport.sessionId}`);
    });
    await server.connect(transport);
  };

  const httpServer = createServer((req, res) => {
    const url = new URL(req.url ?? '/', `http://${req.headers.host ?? 'localhost'}`);

    if (url.pathname === '/health' && req.method === 'GET') {
      handleHealth(res, 'sse', context);
      return;
    }

    if (url.pathname === SSE_PATH && req.method === 'GET') {
      openStream(res).catch(error => {
        log.error('Failed to open SSE stream', error);
        if (!res.headersSent) sendJson(res, 500, { error: 'Internal server error' });
      });
      return;
    }

    if (url.pathname === SSE_MESSAGES_PATH && req.method === 'POST') {
      const sessionId = url.searchParams.get('sessionId') ?? '';
      const session = sessions.get(sessionId);
      if (!session) {
        sendJson(res, 400, { error: `Unknown session: ${sessionId || '(missing)'}` });
        return;
      }
      session.transport.handlePostMessage(req, res).catch(error => {
        log.error(`Error handling message for session ${sessionId}`, error);
        if (!res.headersSent) sendJson(res, 500, { error: 'Internal server error' });
      });
      return;
    }

    sendJson(res, 404, { error: 'Not found' });
  });

  const port = await listen(httpServer, settings);
  log.info(`MCP server listening on http://${settings.host}:${port}${SSE_PATH}`);
  return {
    kind: 'sse',
    port,
    close: async () => {
      await Promise.allSettled(Array.from(sessions.values(), session => session.server.close()));
      sessions.clear();
      await closeHttpServer(httpServer);
    },
  };
}

export function startTransport(settings: ServerSettings, context: TransportContext): Promise<RunningTransport> {
  switch (settings.transport) {
    case 'stdio':
      return startStdio(context);
    case 'http':
      return startStreamableHttp(settings, context);
    case 'sse':
      return startSse(settings, context);
  }
}
