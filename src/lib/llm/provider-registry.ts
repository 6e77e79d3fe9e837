// lib/llm/provider-registry.ts

import { createLogger } from '../logger';
import type { BaseVisionProvider } from './base-provider';
import { UnknownProviderError, UnsupportedModelError } from './errors';
import { MODEL_PREFIXES, inferProviderKind } from './model-prefixes';
import type { ProviderSummary } from './types';

const log = createLogger('Registry');

/**
 * Provider 注册表。
 * 启动时显式构建一次并以引用方式传给各处，运行期间只读；进程退出时调用 close() 释放连接。
 */
export class ProviderRegistry {
  // Map 保留插入顺序，按前缀推断时先注册者优先
  private readonly providers = new Map<string, BaseVisionProvider>();

  /**
   * 注册一个 Provider，同名时覆盖旧实例（保留原来的注册位置）
   */
  public register(provider: BaseVisionProvider): void {
    if (this.providers.has(provider.name)) {
      log.warn(`Provider ${provider.name} already registered, replacing it`);
    }
    this.providers.set(provider.name, provider);
    log.debug(`Registered provider: ${provider.name} (${provider.kind})`);
  }

  public get(name: string): BaseVisionProvider | undefined {
    return this.providers.get(name);
  }

  public get size(): number {
    return this.providers.size;
  }

  public names(): string[] {
    return Array.from(this.providers.keys());
  }

  /**
   * 为模型选择 Provider。
   * @param modelName 模型名称
   * @param explicitProvider 客户端显式指定的 Provider 名称，优先于前缀推断
   * @throws UnknownProviderError 显式指定的 Provider 不存在
   * @throws UnsupportedModelError 前缀无法推断，或推断出的类型没有已注册的 Provider
   */
  public resolve(modelName: string, explicitProvider?: string): BaseVisionProvider {
    if (explicitProvider) {
      const provider = this.providers.get(explicitProvider);
      if (!provider) {
        throw new UnknownProviderError(explicitProvider, this.names());
      }
      return provider;
    }

    const kind = inferProviderKind(modelName);
    if (!kind) {
      const known = Object.values(MODEL_PREFIXES).flat().map(prefix => `'${prefix}'`).join(', ');
      throw new UnsupportedModelError(
        modelName,
        `cannot infer a provider from the model name (known prefixes: ${known}); pass 'provider' explicitly`,
      );
    }

    for (const provider of this.providers.values()) {
      if (provider.kind === kind) {
        log.debug(`Model ${modelName} routed to ${provider.name} by prefix`);
        return provider;
      }
    }
    throw new UnsupportedModelError(modelName, `no ${kind} provider is configured`);
  }

  public list(): ProviderSummary[] {
    return Array.from(this.providers.values(), provider => provider.summary());
  }

  public async close(): Promise<void> {
    const results = await Promise.allSettled(Array.from(this.providers.values(), provider => provider.close()));
    for (const result of results) {
      if (result.status === 'rejected') {
        log.warn('Failed to close provider client', result.reason);
      }
    }
  }
}
