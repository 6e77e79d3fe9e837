// lib/llm/model-prefixes.ts

import { PROVIDER_KINDS, type ProviderKind } from './types';

/**
 * 模型名称前缀到 Provider 类型的映射表。
 * 未显式指定 provider 时按此表推断，Record 类型保证每种 ProviderKind 都有条目。
 */
export const MODEL_PREFIXES: Readonly<Record<ProviderKind, readonly string[]>> = {
  openai: ['gpt-'],
  dashscope: ['qwen'],
};

/**
 * 根据模型名称推断 Provider 类型，没有任何前缀匹配时返回 undefined。
 */
export function inferProviderKind(model: string): ProviderKind | undefined {
  const normalized = model.trim().toLowerCase();
  for (const kind of PROVIDER_KINDS) {
    if (MODEL_PREFIXES[kind].some(prefix => normalized.startsWith(prefix))) {
      return kind;
    }
  }
  return undefined;
}
