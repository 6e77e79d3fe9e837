// lib/llm/errors.ts

/**
 * 返回给 MCP 客户端的错误描述结构。
 */
export interface ErrorDescriptor {
  type: string;
  message: string;
  status?: number;
}

/**
 * 网关内所有可预期错误的基类。
 * type 字段是稳定的错误名称，会原样出现在工具响应的 error.type 中。
 */
export abstract class GatewayError extends Error {
  abstract readonly type: string;
  readonly status?: number;

  constructor(message: string, options?: { status?: number; cause?: unknown }) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = new.target.name;
    this.status = options?.status;
  }

  toDescriptor(): ErrorDescriptor {
    const descriptor: ErrorDescriptor = { type: this.type, message: this.message };
    if (this.status !== undefined) {
      descriptor.status = this.status;
    }
    return descriptor;
  }
}

// 启动阶段的配置错误，是唯一允许终止进程的错误
export class ConfigurationError extends GatewayError {
  readonly type = 'ConfigurationError';
}

export class UnknownProviderError extends GatewayError {
  readonly type = 'UnknownProviderError';

  constructor(readonly providerName: string, available: string[]) {
    super(
      `Provider '${providerName}' not available. Available providers: ${available.length > 0 ? available.join(', ') : '(none)'}`,
    );
  }
}

export class UnsupportedModelError extends GatewayError {
  readonly type = 'UnsupportedModelError';

  constructor(readonly model: string, detail?: string) {
    super(detail ? `Model '${model}' is not supported: ${detail}` : `Model '${model}' is not supported`);
  }
}

// 参数范围错误、附件数量超限、附件类型不被接受
export class ValidationError extends GatewayError {
  readonly type = 'ValidationError';
}

export class FileNotFoundError extends GatewayError {
  readonly type = 'FileNotFoundError';

  constructor(readonly filePath: string, cause?: unknown) {
    super(`File not found: ${filePath}`, { cause });
  }
}

export class UnreadableFileError extends GatewayError {
  readonly type = 'UnreadableFileError';

  constructor(readonly filePath: string, reason: string, cause?: unknown) {
    super(`Cannot read file ${filePath}: ${reason}`, { cause });
  }
}

export class ProviderAuthError extends GatewayError {
  readonly type = 'ProviderAuthError';
}

export class ProviderRateLimitError extends GatewayError {
  readonly type = 'ProviderRateLimitError';
}

// 上游明确拒绝的请求（4xx，认证与限流除外）
export class ProviderRequestError extends GatewayError {
  readonly type = 'ProviderRequestError';
}

export class ProviderNetworkError extends GatewayError {
  readonly type = 'ProviderNetworkError';
}

export class ProviderTimeoutError extends GatewayError {
  readonly type = 'ProviderTimeoutError';
}

// 上游 5xx，或响应体不是预期的 JSON 结构
export class ProviderResponseError extends GatewayError {
  readonly type = 'ProviderResponseError';
}

/**
 * 把任意异常转换为错误描述，未知异常统一归为 InternalError。
 */
export function describeError(error: unknown): ErrorDescriptor {
  if (error instanceof GatewayError) {
    return error.toDescriptor();
  }
  const message = error instanceof Error ? error.message : String(error);
  return { type: 'InternalError', message };
}
