import { MockAgent } from 'undici';
import { BACKENDS } from '../providers/defaults';
import type { ProviderConfig, ProviderKind } from '../types';

export const OPENAI_ORIGIN = 'https://api.openai.test';
export const OPENAI_BASE_URL = `${OPENAI_ORIGIN}/v1`;
export const OPENAI_PATH = '/v1/chat/completions';

export const DASHSCOPE_ORIGIN = 'https://dashscope.test';
export const DASHSCOPE_BASE_URL = `${DASHSCOPE_ORIGIN}/api/v1`;
export const DASHSCOPE_PATH = '/api/v1/services/aigc/multimodal-generation/generation';

export function makeProviderConfig(kind: ProviderKind, overrides?: Partial<ProviderConfig>): ProviderConfig {
  return {
    name: kind,
    providerType: kind,
    apiKey: `test-${kind}-key`,
    baseUrl: kind === 'openai' ? OPENAI_BASE_URL : DASHSCOPE_BASE_URL,
    defaultModel: BACKENDS[kind].defaultModel,
    supportedModels: [],
    maxTokens: 4000,
    temperature: 0.7,
    timeoutMs: 5000,
    ...overrides,
  };
}

/** MockAgent that refuses any request without a matching interceptor */
export function makeMockAgent(): MockAgent {
  const agent = new MockAgent();
  agent.disableNetConnect();
  return agent;
}
