// index.ts

import { Command, InvalidArgumentError, Option } from 'commander';
import { SERVER_NAME, SERVER_VERSION } from './app/mcp/server';
import { startTransport, type RunningTransport } from './app/mcp/transports';
import { LOG_LEVELS, createLogger, setLogLevel } from './lib/logger';
import { loadGatewayConfig } from './lib/llm/model-config';
import { buildProviderRegistry } from './lib/llm/model-factory';
import type { ProviderRegistry } from './lib/llm/provider-registry';
import { ToolHandlers } from './lib/llm/tools/tool-handlers';
import { TRANSPORTS, type ServerSettings, type TransportKind } from './lib/llm/types';

const log = createLogger('Startup');

interface CliOptions {
  transport?: TransportKind;
  host?: string;
  port?: number;
  logLevel?: string;
  config?: string;
}

function parsePortOption(value: string): number {
  const port = Number(value);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new InvalidArgumentError('Port must be an integer between 1 and 65535.');
  }
  return port;
}

function buildProgram(): Command {
  return new Command()
    .name(SERVER_NAME)
    .description('MCP server that lets text-only LLM clients call vision-capable model providers')
    .version(SERVER_VERSION)
    .addOption(new Option('--transport <type>', 'transport type').choices(TRANSPORTS))
    .option('--host <host>', 'host for HTTP/SSE transport')
    .addOption(new Option('--port <port>', 'port for HTTP/SSE transport').argParser(parsePortOption))
    .addOption(new Option('--log-level <level>', 'log level').choices(LOG_LEVELS))
    .option('--config <path>', 'JSON configuration file');
}

async function main(argv: string[]): Promise<void> {
  const program = buildProgram();
  program.parse(argv);
  const options = program.opts<CliOptions>();

  // 先按 CLI / 环境变量设置日志级别，保证加载配置时的日志也受控
  setLogLevel(options.logLevel ?? process.env.VLLM_MCP_LOG_LEVEL ?? 'INFO');

  const overrides: Partial<ServerSettings> = {
    transport: options.transport,
    host: options.host,
    port: options.port,
    logLevel: options.logLevel,
  };
  const config = await loadGatewayConfig({ configPath: options.config, overrides });
  setLogLevel(config.server.logLevel);

  const registry: ProviderRegistry = buildProviderRegistry(config.providers);
  const handlers = new ToolHandlers(registry);

  let running: RunningTransport;
  try {
    running = await startTransport(config.server, { handlers, providerNames: registry.names() });
  } catch (error) {
    await registry.close();
    throw error;
  }
  log.info(`Starting MCP server with ${running.kind} transport, providers: ${registry.names().join(', ')}`);

  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    log.info(`Received ${signal}, shutting down...`);
    await running.close();
    await registry.close();
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      shutdown(signal)
        .then(() => process.exit(0))
        .catch(error => {
          log.error('Error during shutdown', error);
          process.exit(1);
        });
    });
  }
}

main(process.argv).catch(error => {
  log.error(`Fatal: ${error instanceof Error ? error.message : String(error)}`);
  process.exit(1);
});
