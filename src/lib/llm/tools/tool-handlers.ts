// lib/llm/tools/tool-handlers.ts

import { createLogger } from '../../logger';
import { ValidationError, describeError, type ErrorDescriptor } from '../errors';
import type { ProviderRegistry } from '../provider-registry';
import { toValidationTarget, type MultimodalRequest, type MultimodalResponse, type ProviderKind } from '../types';
import type { GenerateParams, ValidateParams } from './tool-schemas';

const log = createLogger('ToolHandlers');

/**
 * generate_multimodal_response 的响应载荷（线上格式使用 snake_case）
 */
export interface GeneratePayload {
  content: string | null;
  usage?: {
    prompt_tokens: number;
    completion_tokens: number;
    total_tokens: number;
  };
  provider: string | null;
  model: string;
  finish_reason?: string;
  response_time_ms?: number;
  error?: ErrorDescriptor;
}

export interface ProvidersPayload {
  providers: Array<{
    name: string;
    type: ProviderKind;
    default_model: string;
    supported_models: string[];
    max_tokens: number;
    temperature: number;
  }>;
}

export interface ValidatePayload {
  valid: boolean;
  provider?: string;
  reason?: string;
  error_type?: string;
}

function toGeneratePayload(response: MultimodalResponse): GeneratePayload {
  const payload: GeneratePayload = {
    content: response.content,
    provider: response.provider,
    model: response.model,
  };
  if (response.usage) {
    payload.usage = {
      prompt_tokens: response.usage.promptTokens,
      completion_tokens: response.usage.completionTokens,
      total_tokens: response.usage.totalTokens,
    };
  }
  if (response.finishReason) payload.finish_reason = response.finishReason;
  if (response.responseTimeMs !== undefined) payload.response_time_ms = response.responseTimeMs;
  if (response.error) payload.error = response.error;
  return payload;
}

function optionalText(value: string | undefined): string | undefined {
  return value !== undefined && value.trim() !== '' ? value : undefined;
}

/**
 * 把工具入参解码为 MultimodalRequest。
 * @throws ValidationError 模型名或提示词为空，或附件列表中有空项
 */
export function decodeGenerateParams(params: GenerateParams): MultimodalRequest {
  const model = params.model.trim();
  if (!model) {
    throw new ValidationError('model must not be empty');
  }
  if (!params.prompt.trim()) {
    throw new ValidationError('prompt must not be empty');
  }
  const imageUrls = params.image_urls ?? [];
  const filePaths = params.file_paths ?? [];
  if (imageUrls.some(url => !url.trim())) {
    throw new ValidationError('image_urls must not contain empty entries');
  }
  if (filePaths.some(filePath => !filePath.trim())) {
    throw new ValidationError('file_paths must not contain empty entries');
  }

  return {
    model,
    prompt: params.prompt,
    imageUrls,
    filePaths,
    systemPrompt: optionalText(params.system_prompt),
    maxTokens: params.max_tokens,
    temperature: params.temperature,
    provider: optionalText(params.provider),
  };
}

/**
 * 工具调用的分发层。
 * 每次调用都是独立的无状态事务：接收 → 校验 →（调用 Provider → 完成）|（拒绝）→ 响应。
 * 所有错误都在这里转换为结构化载荷，不会抛给传输层。
 */
export class ToolHandlers {
  constructor(private readonly registry: ProviderRegistry) {}

  public async generateMultimodalResponse(params: GenerateParams): Promise<GeneratePayload> {
    let providerName: string | null = optionalText(params.provider) ?? null;

    try {
      const request = decodeGenerateParams(params);

      const provider = this.registry.resolve(request.model, request.provider);
      providerName = provider.name;

      const validation = provider.validateRequest(toValidationTarget(request));
      if (!validation.valid) {
        log.warn(`Rejected request for ${request.model} on ${provider.name}: ${validation.reason}`);
        return toGeneratePayload({
          content: null,
          provider: provider.name,
          model: request.model,
          error: validation.error.toDescriptor(),
        });
      }

      const response = await provider.generateResponse(request);
      return toGeneratePayload(response);
    } catch (error) {
      const descriptor = describeError(error);
      log.error(`Error generating response for ${params.model}: [${descriptor.type}] ${descriptor.message}`);
      return toGeneratePayload({
        content: null,
        provider: providerName,
        model: params.model.trim(),
        error: descriptor,
      });
    }
  }

  public listAvailableProviders(): ProvidersPayload {
    return {
      providers: this.registry.list().map(summary => ({
        name: summary.name,
        type: summary.type,
        default_model: summary.defaultModel,
        supported_models: summary.supportedModels,
        max_tokens: summary.maxTokens,
        temperature: summary.temperature,
      })),
    };
  }

  /**
   * 预检：只做 Provider 解析和 validateRequest，不调用生成接口。
   */
  public validateMultimodalRequest(params: ValidateParams): ValidatePayload {
    const explicitProvider = optionalText(params.provider);
    try {
      const provider = this.registry.resolve(params.model.trim(), explicitProvider);
      const result = provider.validateRequest({
        model: params.model.trim(),
        imageCount: params.image_count ?? 0,
        fileCount: params.file_count ?? 0,
        maxTokens: params.max_tokens,
        temperature: params.temperature,
      });
      if (result.valid) {
        return { valid: true, provider: provider.name };
      }
      return { valid: false, provider: provider.name, reason: result.reason, error_type: result.error.type };
    } catch (error) {
      const descriptor = describeError(error);
      const payload: ValidatePayload = { valid: false, reason: descriptor.message, error_type: descriptor.type };
      if (explicitProvider) payload.provider = explicitProvider;
      return payload;
    }
  }
}
