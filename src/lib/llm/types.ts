// lib/llm/types.ts

import type { ErrorDescriptor, UnsupportedModelError, ValidationError } from './errors';

/**
 * 支持的 Provider 类型，封闭集合。
 * 新增后端时必须同时补全 model-prefixes.ts 与 model-factory.ts 中的映射表，否则无法通过类型检查。
 */
export const PROVIDER_KINDS = ['openai', 'dashscope'] as const;
export type ProviderKind = (typeof PROVIDER_KINDS)[number];

/**
 * 定义 Token 使用情况的结构
 */
export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

/**
 * 一次多模态调用的完整请求。
 */
export interface MultimodalRequest {
  model: string;
  prompt: string;
  imageUrls: string[]; // 远程图片，原样透传给上游
  filePaths: string[]; // 本地文件，生成阶段才读取
  systemPrompt?: string;
  maxTokens?: number;
  temperature?: number;
  provider?: string; // 显式指定的 Provider 名称
}

/**
 * Provider 返回的统一响应结构。
 * content 与 error 二者只有一个是主要载荷。
 */
export interface MultimodalResponse {
  content: string | null;
  usage?: TokenUsage;
  provider: string | null;
  model: string;
  finishReason?: string;
  responseTimeMs?: number;
  error?: ErrorDescriptor;
}

/**
 * 校验只关心的那部分请求字段。
 * validate_multimodal_request 只拿得到附件数量，所以两个工具都从这里取值，保证校验结果一致。
 */
export interface ValidationTarget {
  model: string;
  imageCount: number;
  fileCount: number;
  maxTokens?: number;
  temperature?: number;
}

export type ValidationResult =
  | { valid: true }
  | { valid: false; reason: string; error: UnsupportedModelError | ValidationError };

export function toValidationTarget(request: MultimodalRequest): ValidationTarget {
  return {
    model: request.model,
    imageCount: request.imageUrls.length,
    fileCount: request.filePaths.length,
    maxTokens: request.maxTokens,
    temperature: request.temperature,
  };
}

/**
 * 单个 Provider 的配置，启动时构建一次，之后只读。
 */
export interface ProviderConfig {
  readonly name: string;
  readonly providerType: ProviderKind;
  readonly apiKey: string;
  readonly baseUrl?: string;
  readonly defaultModel: string;
  readonly supportedModels: readonly string[];
  readonly maxTokens: number; // 请求未指定 max_tokens 时使用
  readonly temperature: number; // 请求未指定 temperature 时使用
  readonly timeoutMs: number;
}

export const TRANSPORTS = ['stdio', 'http', 'sse'] as const;
export type TransportKind = (typeof TRANSPORTS)[number];

export interface ServerSettings {
  readonly host: string;
  readonly port: number;
  readonly transport: TransportKind;
  readonly logLevel: string;
}

export interface GatewayConfig {
  readonly server: ServerSettings;
  readonly providers: readonly ProviderConfig[];
}

/**
 * list_available_providers 中每个 Provider 的摘要
 */
export interface ProviderSummary {
  name: string;
  type: ProviderKind;
  defaultModel: string;
  supportedModels: string[];
  maxTokens: number;
  temperature: number;
}
