// lib/llm/base-provider.ts

import type { Dispatcher } from 'undici';
import { createLogger, type Logger } from '../logger';
import { loadAttachments, type ImageAttachment, type LoadedAttachments } from './attachments';
import {
  GatewayError,
  ProviderAuthError,
  ProviderRateLimitError,
  ProviderRequestError,
  ProviderResponseError,
  UnsupportedModelError,
  ValidationError,
} from './errors';
import { ProviderHttpClient, type HttpJsonResponse } from './http-client';
import type { BackendDefinition, ProviderLimits } from './providers/defaults';
import type {
  MultimodalRequest,
  MultimodalResponse,
  ProviderConfig,
  ProviderKind,
  ProviderSummary,
  TokenUsage,
  ValidationResult,
  ValidationTarget,
} from './types';

export interface ProviderDependencies {
  // 测试中注入 MockAgent；不传时由 HTTP 客户端自行创建并负责关闭
  dispatcher?: Dispatcher;
}

/**
 * 本次调用最终生效的生成参数（请求值优先，其次是 Provider 配置的默认值）
 */
export interface GenerationOptions {
  maxTokens: number;
  temperature: number;
}

/**
 * 子类从上游 JSON 中解析出的结果
 */
export interface ParsedCompletion {
  content: string;
  model?: string;
  usage?: TokenUsage;
  finishReason?: string;
}

function invalid(error: UnsupportedModelError | ValidationError): ValidationResult {
  return { valid: false, reason: error.message, error };
}

function formatRange(limits: ProviderLimits['temperature']): string {
  return `[${limits.min}, ${limits.max}${limits.maxInclusive ? ']' : ')'}`;
}

/**
 * 所有视觉模型提供商（Provider）必须继承的抽象基类。
 * 它定义了统一的接口：模型支持检查、请求校验和生成调用。
 * 生成流程采用模板方法模式，子类只负责构建上游载荷和解析上游响应。
 */
export abstract class BaseVisionProvider {
  abstract readonly kind: ProviderKind;
  protected readonly config: ProviderConfig;
  protected readonly backend: BackendDefinition;
  protected readonly http: ProviderHttpClient;
  protected readonly log: Logger;
  readonly supportedModels: readonly string[];

  constructor(config: ProviderConfig, backend: BackendDefinition, deps: ProviderDependencies = {}) {
    this.config = config;
    this.backend = backend;
    this.log = createLogger(`Provider:${config.name}`);
    this.supportedModels = config.supportedModels.length > 0 ? [...config.supportedModels] : [...backend.builtinModels];
    this.http = new ProviderHttpClient({
      baseUrl: config.baseUrl ?? backend.defaultBaseUrl,
      headers: { authorization: `Bearer ${config.apiKey}` },
      timeoutMs: config.timeoutMs,
      dispatcher: deps.dispatcher,
    });
  }

  get name(): string {
    return this.config.name;
  }

  get limits(): ProviderLimits {
    return this.backend.limits;
  }

  public isModelSupported(model: string): boolean {
    return this.supportedModels.includes(model);
  }

  /**
   * 按固定顺序检查，返回第一个违规项。
   * 只看数量和参数范围，不检查本地文件是否存在。
   */
  public validateRequest(target: ValidationTarget): ValidationResult {
    const { limits } = this;

    if (!this.isModelSupported(target.model)) {
      return invalid(
        new UnsupportedModelError(target.model, `provider '${this.name}' supports ${this.supportedModels.join(', ')}`),
      );
    }
    if (target.imageCount < 0 || target.fileCount < 0) {
      return invalid(new ValidationError('image_count and file_count must not be negative'));
    }
    if (target.imageCount > limits.maxImages) {
      return invalid(
        new ValidationError(`Too many images: ${target.imageCount} (provider '${this.name}' accepts at most ${limits.maxImages})`),
      );
    }
    if (target.fileCount > limits.maxFiles) {
      return invalid(
        new ValidationError(`Too many files: ${target.fileCount} (provider '${this.name}' accepts at most ${limits.maxFiles})`),
      );
    }
    if (target.maxTokens !== undefined && (!Number.isInteger(target.maxTokens) || target.maxTokens <= 0)) {
      return invalid(new ValidationError(`max_tokens must be a positive integer, got ${target.maxTokens}`));
    }
    if (target.temperature !== undefined) {
      const range = limits.temperature;
      const t = target.temperature;
      const aboveMax = range.maxInclusive ? t > range.max : t >= range.max;
      if (!Number.isFinite(t) || t < range.min || aboveMax) {
        return invalid(new ValidationError(`temperature must be within ${formatRange(range)}, got ${t}`));
      }
    }
    return { valid: true };
  }

  /**
   * 公开的生成方法，是外部调用的统一入口。
   * 每次调用只发起一次上游请求，失败时直接抛出带类型的错误，不做重试。
   */
  public async generateResponse(request: MultimodalRequest): Promise<MultimodalResponse> {
    const startedAt = Date.now();

    // 1. 读取附件，本地文件有问题时在网络请求之前就失败
    const attachments = await loadAttachments(request);
    this.assertImageTypes(attachments.images);
    this.assertImageCount(attachments.images);

    // 2. 构建上游载荷
    const options: GenerationOptions = {
      maxTokens: request.maxTokens ?? this.config.maxTokens,
      temperature: request.temperature ?? this.config.temperature,
    };
    const payload = this._buildPayload(request, attachments, options);
    this.log.info(
      `Calling ${this.backend.displayName} model=${request.model} images=${attachments.images.length} files=${attachments.textFiles.length} max_tokens=${options.maxTokens} temperature=${options.temperature}`,
    );

    // 3. 发起请求并映射错误
    const response = await this.http.postJson(this.backend.endpoint, payload);
    if (response.status < 200 || response.status >= 300) {
      throw this.toHttpError(response);
    }
    if (response.body === undefined) {
      throw new ProviderResponseError(`${this.backend.displayName} returned a non-JSON response`, { status: response.status });
    }

    // 4. 归一化响应
    const parsed = this._parseCompletion(response.body);
    const elapsed = Date.now() - startedAt;
    this.log.info(`${this.backend.displayName} responded in ${elapsed}ms (finish_reason=${parsed.finishReason ?? 'n/a'})`);

    const result: MultimodalResponse = {
      content: parsed.content,
      provider: this.name,
      model: parsed.model || request.model,
      responseTimeMs: elapsed,
    };
    if (parsed.usage) result.usage = parsed.usage;
    if (parsed.finishReason) result.finishReason = parsed.finishReason;
    return result;
  }

  public summary(): ProviderSummary {
    return {
      name: this.name,
      type: this.kind,
      defaultModel: this.config.defaultModel,
      supportedModels: [...this.supportedModels],
      maxTokens: this.config.maxTokens,
      temperature: this.config.temperature,
    };
  }

  public async close(): Promise<void> {
    await this.http.close();
  }

  private assertImageTypes(images: ImageAttachment[]): void {
    for (const image of images) {
      if (image.source === 'local' && image.mimeType && !this.limits.imageMimeTypes.includes(image.mimeType)) {
        throw new ValidationError(
          `Image type ${image.mimeType} of ${image.path ?? 'attachment'} is not accepted by provider '${this.name}'`,
        );
      }
    }
  }

  // validateRequest 只知道 image_urls 的数量，本地图片读取后再按图片总数检查一次
  private assertImageCount(images: ImageAttachment[]): void {
    if (images.length > this.limits.maxImages) {
      throw new ValidationError(
        `Too many images: ${images.length} (provider '${this.name}' accepts at most ${this.limits.maxImages})`,
      );
    }
  }

  /**
   * HTTP 状态码到错误类型的映射
   */
  private toHttpError(response: HttpJsonResponse): GatewayError {
    const detail = this._extractErrorMessage(response.body) ?? (response.rawText.slice(0, 200) || `HTTP ${response.status}`);
    const message = `${this.backend.displayName} API error (${response.status}): ${detail}`;
    const options = { status: response.status };

    if (response.status === 401 || response.status === 403) {
      return new ProviderAuthError(message, options);
    }
    if (response.status === 429) {
      return new ProviderRateLimitError(message, options);
    }
    if (response.status >= 400 && response.status < 500) {
      return new ProviderRequestError(message, options);
    }
    return new ProviderResponseError(message, options);
  }

  /**
   * 构建上游请求体，每个具体的 Provider 子类都必须实现它。
   */
  protected abstract _buildPayload(
    request: MultimodalRequest,
    attachments: LoadedAttachments,
    options: GenerationOptions,
  ): unknown;

  /**
   * 把上游成功响应解析为 ParsedCompletion，结构不符合预期时抛出 ProviderResponseError。
   */
  protected abstract _parseCompletion(body: unknown): ParsedCompletion;

  /**
   * 从上游错误响应中提取错误信息，提取不到时返回 undefined。
   */
  protected abstract _extractErrorMessage(body: unknown): string | undefined;
}
