// lib/llm/providers/defaults.ts

import type { ProviderKind } from '../types';

export interface ProviderLimits {
  maxImages: number;
  maxFiles: number;
  temperature: { min: number; max: number; maxInclusive: boolean };
  imageMimeTypes: readonly string[]; // 本地图片允许的 MIME 类型
}

/**
 * 每种后端的内置默认值与硬性限制。
 */
export interface BackendDefinition {
  displayName: string;
  defaultBaseUrl: string;
  endpoint: string;
  defaultModel: string;
  builtinModels: readonly string[];
  limits: ProviderLimits;
}

export const BACKENDS: Readonly<Record<ProviderKind, BackendDefinition>> = {
  openai: {
    displayName: 'OpenAI',
    defaultBaseUrl: 'https://api.openai.com/v1',
    endpoint: '/chat/completions',
    defaultModel: 'gpt-4o',
    builtinModels: ['gpt-4o', 'gpt-4o-mini', 'gpt-4-turbo', 'gpt-4-vision-preview'],
    limits: {
      maxImages: 5,
      maxFiles: 5,
      temperature: { min: 0, max: 2, maxInclusive: true },
      imageMimeTypes: ['image/jpeg', 'image/png', 'image/gif', 'image/webp'],
    },
  },
  dashscope: {
    displayName: 'Dashscope',
    defaultBaseUrl: 'https://dashscope.aliyuncs.com/api/v1',
    endpoint: '/services/aigc/multimodal-generation/generation',
    defaultModel: 'qwen-vl-plus',
    builtinModels: ['qwen-vl-plus', 'qwen-vl-max', 'qwen-vl-chat', 'qwen2-vl-7b-instruct', 'qwen2-vl-72b-instruct'],
    limits: {
      maxImages: 10,
      maxFiles: 10,
      // Dashscope 的 temperature 取值区间为 [0, 2)
      temperature: { min: 0, max: 2, maxInclusive: false },
      imageMimeTypes: ['image/jpeg', 'image/png', 'image/gif', 'image/webp', 'image/bmp'],
    },
  },
};

export const DEFAULT_MAX_TOKENS = 4000;
export const DEFAULT_TEMPERATURE = 0.7;
export const DEFAULT_TIMEOUT_MS = 60_000;
