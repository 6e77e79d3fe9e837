// lib/llm/model-factory.ts

import { createLogger } from '../logger';
import type { BaseVisionProvider, ProviderDependencies } from './base-provider';
import { ConfigurationError } from './errors';
import { ProviderRegistry } from './provider-registry';
import { DashscopeVisionProvider } from './providers/dashscope';
import { OpenAIVisionProvider } from './providers/openai';
import type { ProviderConfig, ProviderKind } from './types';

const log = createLogger('Factory');

type ProviderConstructor = new (config: ProviderConfig, deps?: ProviderDependencies) => BaseVisionProvider;

// Provider 类型到实现类的映射表
const PROVIDER_CLASSES: Readonly<Record<ProviderKind, ProviderConstructor>> = {
  openai: OpenAIVisionProvider,
  dashscope: DashscopeVisionProvider,
};

/**
 * 根据配置创建 Provider 实例。
 * @param config Provider 配置
 * @param deps 可选依赖（测试中注入 dispatcher）
 */
export function createProvider(config: ProviderConfig, deps?: ProviderDependencies): BaseVisionProvider {
  const ProviderClass = PROVIDER_CLASSES[config.providerType];
  return new ProviderClass(config, deps);
}

/**
 * 构建 Provider 注册表。
 * 没有 API Key 的配置直接跳过；单个 Provider 创建失败只记录日志，不影响其他 Provider。
 * @throws ConfigurationError 一个 Provider 都没有创建成功
 */
export function buildProviderRegistry(configs: readonly ProviderConfig[], deps?: ProviderDependencies): ProviderRegistry {
  const registry = new ProviderRegistry();

  for (const config of configs) {
    if (!config.apiKey.trim()) {
      log.info(`Skipping provider ${config.name}: no API key configured`);
      continue;
    }
    try {
      registry.register(createProvider(config, deps));
      log.info(`Initialized ${config.providerType} provider '${config.name}' with default model: ${config.defaultModel}`);
    } catch (error) {
      log.error(`Failed to initialize provider '${config.name}': ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  if (registry.size === 0) {
    throw new ConfigurationError(
      'No provider configured. Set OPENAI_API_KEY and/or DASHSCOPE_API_KEY, or list providers in the --config file.',
    );
  }
  return registry;
}
