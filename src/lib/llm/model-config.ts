// lib/llm/model-config.ts

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { ConfigurationError } from './errors';
import { BACKENDS, DEFAULT_MAX_TOKENS, DEFAULT_TEMPERATURE, DEFAULT_TIMEOUT_MS } from './providers/defaults';
import {
  PROVIDER_KINDS,
  TRANSPORTS,
  type GatewayConfig,
  type ProviderConfig,
  type ProviderKind,
  type ServerSettings,
  type TransportKind,
} from './types';

const DEFAULT_SERVER: ServerSettings = {
  host: 'localhost',
  port: 8080,
  transport: 'stdio',
  logLevel: 'INFO',
};

// JSON 配置文件结构，字段名与环境变量版本保持 snake_case
const FileProviderSchema = z.object({
  provider_type: z.enum(PROVIDER_KINDS),
  name: z.string().min(1).optional(),
  api_key: z.string().optional(),
  base_url: z.string().nullable().optional(),
  default_model: z.string().min(1).optional(),
  supported_models: z.array(z.string()).optional(),
  max_tokens: z.number().int().positive().optional(),
  temperature: z.number().min(0).optional(),
  timeout: z.number().positive().optional(), // 秒
});

const FileConfigSchema = z
  .object({
    host: z.string().min(1).optional(),
    port: z.number().int().min(1).max(65535).optional(),
    transport: z.enum(TRANSPORTS).optional(),
    log_level: z.string().optional(),
    request_timeout: z.number().positive().optional(), // 秒
    providers: z.array(FileProviderSchema).optional(),
  })
  .passthrough();

type FileConfig = z.infer<typeof FileConfigSchema>;
type FileProviderConfig = z.infer<typeof FileProviderSchema>;

export interface LoadConfigOptions {
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  // 命令行参数，优先级最高
  overrides?: Partial<ServerSettings>;
}

/**
 * 解析逗号分隔的模型列表，去掉空白项
 */
export function parseModelList(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(',')
    .map(model => model.trim())
    .filter(Boolean);
}

function envPrefix(kind: ProviderKind): string {
  return kind.toUpperCase();
}

function parsePort(value: string): number {
  const port = Number(value);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new ConfigurationError(`Invalid port: '${value}'`);
  }
  return port;
}

function parseTransport(value: string): TransportKind {
  const normalized = value.trim().toLowerCase();
  const transport = TRANSPORTS.find(item => item === normalized);
  if (!transport) {
    throw new ConfigurationError(`Unsupported transport: '${value}'. Expected one of ${TRANSPORTS.join(', ')}`);
  }
  return transport;
}

function parseSeconds(value: string, name: string): number {
  const seconds = Number(value);
  if (!Number.isFinite(seconds) || seconds <= 0) {
    throw new ConfigurationError(`Invalid ${name}: '${value}'`);
  }
  return seconds;
}

/**
 * 从环境变量中读取某个后端的配置。
 * API Key 为空时依然返回，由工厂决定跳过。
 */
function providerFromEnv(kind: ProviderKind, env: NodeJS.ProcessEnv, timeoutMs: number): ProviderConfig {
  const prefix = envPrefix(kind);
  return {
    name: kind,
    providerType: kind,
    apiKey: env[`${prefix}_API_KEY`]?.trim() ?? '',
    baseUrl: env[`${prefix}_BASE_URL`]?.trim() || undefined,
    defaultModel: env[`${prefix}_DEFAULT_MODEL`]?.trim() || BACKENDS[kind].defaultModel,
    supportedModels: parseModelList(env[`${prefix}_SUPPORTED_MODELS`]),
    maxTokens: DEFAULT_MAX_TOKENS,
    temperature: DEFAULT_TEMPERATURE,
    timeoutMs,
  };
}

/**
 * 把配置文件中的一项合并到已有配置上（文件中出现的字段覆盖已有值）
 */
function mergeFileProvider(base: ProviderConfig | undefined, entry: FileProviderConfig, timeoutMs: number): ProviderConfig {
  const kind = entry.provider_type;
  return {
    name: entry.name ?? kind,
    providerType: kind,
    apiKey: entry.api_key?.trim() ?? base?.apiKey ?? '',
    baseUrl: entry.base_url === null ? undefined : (entry.base_url ?? base?.baseUrl),
    defaultModel: entry.default_model ?? base?.defaultModel ?? BACKENDS[kind].defaultModel,
    supportedModels: entry.supported_models
      ? entry.supported_models.map(model => model.trim()).filter(Boolean)
      : (base?.supportedModels ?? []),
    maxTokens: entry.max_tokens ?? base?.maxTokens ?? DEFAULT_MAX_TOKENS,
    temperature: entry.temperature ?? base?.temperature ?? DEFAULT_TEMPERATURE,
    timeoutMs: entry.timeout !== undefined ? entry.timeout * 1000 : (base?.timeoutMs ?? timeoutMs),
  };
}

async function readConfigFile(configPath: string): Promise<FileConfig> {
  let text: string;
  try {
    text = await readFile(configPath, 'utf8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Cannot read config file ${configPath}: ${reason}`, { cause: error });
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    throw new ConfigurationError(`Config file ${configPath} is not valid JSON`, { cause: error });
  }

  const parsed = FileConfigSchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? issue.path.join('.') : '(root)';
    throw new ConfigurationError(`Invalid config file ${configPath} at ${where}: ${issue?.message ?? 'invalid value'}`);
  }
  return parsed.data;
}

function freezeProvider(config: ProviderConfig): ProviderConfig {
  return Object.freeze({ ...config, supportedModels: Object.freeze([...config.supportedModels]) });
}

/**
 * 合并默认值、环境变量、配置文件和命令行参数，生成只读的网关配置。
 * 优先级从低到高：内置默认值 < 环境变量 < 配置文件 < 命令行参数。
 * @throws ConfigurationError 配置文件不可读、格式错误或取值非法
 */
export async function loadGatewayConfig(options: LoadConfigOptions = {}): Promise<GatewayConfig> {
  const env = options.env ?? process.env;
  const file: FileConfig = options.configPath ? await readConfigFile(options.configPath) : {};

  // 1. 服务端设置
  const server: ServerSettings = {
    host: options.overrides?.host ?? file.host ?? (env.VLLM_MCP_HOST?.trim() || DEFAULT_SERVER.host),
    port: options.overrides?.port ?? file.port ?? (env.VLLM_MCP_PORT ? parsePort(env.VLLM_MCP_PORT) : DEFAULT_SERVER.port),
    transport:
      options.overrides?.transport ??
      file.transport ??
      (env.VLLM_MCP_TRANSPORT ? parseTransport(env.VLLM_MCP_TRANSPORT) : DEFAULT_SERVER.transport),
    logLevel: options.overrides?.logLevel ?? file.log_level ?? (env.VLLM_MCP_LOG_LEVEL?.trim() || DEFAULT_SERVER.logLevel),
  };

  // 2. 全局请求超时，作为各 Provider 的默认值
  const timeoutSeconds =
    file.request_timeout ??
    (env.VLLM_MCP_REQUEST_TIMEOUT ? parseSeconds(env.VLLM_MCP_REQUEST_TIMEOUT, 'VLLM_MCP_REQUEST_TIMEOUT') : undefined);
  const timeoutMs = timeoutSeconds !== undefined ? timeoutSeconds * 1000 : DEFAULT_TIMEOUT_MS;

  // 3. Provider 列表：先取环境变量，再用配置文件覆盖或追加
  const providers: ProviderConfig[] = PROVIDER_KINDS.map(kind => providerFromEnv(kind, env, timeoutMs));
  for (const entry of file.providers ?? []) {
    const name = entry.name ?? entry.provider_type;
    const index = providers.findIndex(provider => provider.name === name);
    if (index >= 0) {
      const base = providers[index];
      if (base.providerType !== entry.provider_type) {
        throw new ConfigurationError(
          `Provider '${name}' is declared as ${entry.provider_type} in ${options.configPath} but is a ${base.providerType} provider`,
        );
      }
      providers[index] = mergeFileProvider(base, entry, timeoutMs);
    } else {
      providers.push(mergeFileProvider(undefined, entry, timeoutMs));
    }
  }

  return Object.freeze({
    server: Object.freeze(server),
    providers: Object.freeze(providers.map(freezeProvider)),
  });
}
