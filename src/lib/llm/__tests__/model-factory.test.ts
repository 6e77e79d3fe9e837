import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type { MockAgent } from 'undici';
import { ConfigurationError } from '../errors';
import { buildProviderRegistry, createProvider } from '../model-factory';
import { DashscopeVisionProvider } from '../providers/dashscope';
import { OpenAIVisionProvider } from '../providers/openai';
import { makeMockAgent, makeProviderConfig } from './fixtures';

let agent: MockAgent;

beforeEach(() => {
  agent = makeMockAgent();
});

afterEach(async () => {
  await agent.close();
});

describe('createProvider', () => {
  it('should pick the implementation from the provider type', () => {
    expect(createProvider(makeProviderConfig('openai'), { dispatcher: agent })).toBeInstanceOf(OpenAIVisionProvider);
    expect(createProvider(makeProviderConfig('dashscope'), { dispatcher: agent })).toBeInstanceOf(DashscopeVisionProvider);
  });
});

describe('buildProviderRegistry', () => {
  it('should register only the providers that could be constructed', () => {
    const registry = buildProviderRegistry(
      [
        makeProviderConfig('openai'),
        makeProviderConfig('dashscope', { apiKey: '  ' }),
        makeProviderConfig('openai', { name: 'broken', baseUrl: 'not a url' }),
      ],
      { dispatcher: agent },
    );

    expect(registry.names()).toEqual(['openai']);
    expect(registry.list().map(summary => summary.name)).toEqual(['openai']);
  });

  it('should fail when no provider is left', () => {
    expect(() => buildProviderRegistry([makeProviderConfig('openai', { apiKey: '' })], { dispatcher: agent })).toThrow(
      ConfigurationError,
    );
    expect(() => buildProviderRegistry([], { dispatcher: agent })).toThrow(/^No provider configured/);
  });
});
