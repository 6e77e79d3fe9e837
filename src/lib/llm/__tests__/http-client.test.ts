import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { Agent, Dispatcher, ProxyAgent, type MockAgent } from 'undici';
import { ConfigurationError, ProviderNetworkError, ProviderTimeoutError } from '../errors';
import { ProviderHttpClient, createDispatcher } from '../http-client';
import { OPENAI_ORIGIN, makeMockAgent } from './fixtures';

/**
 * 接受连接但永远不返回响应的 dispatcher，用来触发超时
 */
class StalledDispatcher extends Dispatcher {
  dispatch(_options: Dispatcher.DispatchOptions, handler: Dispatcher.DispatchHandlers): boolean {
    handler.onConnect?.(reason => handler.onError?.(reason ?? new Error('aborted')));
    return true;
  }
}

let agent: MockAgent;

beforeEach(() => {
  agent = makeMockAgent();
});

afterEach(async () => {
  await agent.close();
});

describe('ProviderHttpClient', () => {
  it('should reject an invalid base URL', () => {
    expect(() => new ProviderHttpClient({ baseUrl: 'not a url', headers: {}, timeoutMs: 1000, dispatcher: agent })).toThrow(
      new ConfigurationError("Invalid base URL: 'not a url'"),
    );
  });

  it('should join the base URL and path without doubled slashes', async () => {
    agent.get(OPENAI_ORIGIN).intercept({ path: '/v1/ping', method: 'POST' }).reply(200, { ok: true });
    const client = new ProviderHttpClient({ baseUrl: `${OPENAI_ORIGIN}/v1/`, headers: {}, timeoutMs: 1000, dispatcher: agent });

    const response = await client.postJson('ping', {});
    expect(response.status).toBe(200);
    expect(response.body).toEqual({ ok: true });
    expect(response.rawText).toBe('{"ok":true}');
  });

  it('should return non-JSON bodies as raw text only', async () => {
    agent.get(OPENAI_ORIGIN).intercept({ path: '/v1/ping', method: 'POST' }).reply(502, 'Bad Gateway');
    const client = new ProviderHttpClient({ baseUrl: `${OPENAI_ORIGIN}/v1`, headers: {}, timeoutMs: 1000, dispatcher: agent });

    const response = await client.postJson('/ping', {});
    expect(response).toEqual({ status: 502, body: undefined, rawText: 'Bad Gateway' });
  });

  it('should report requests no interceptor answers as network errors', async () => {
    const client = new ProviderHttpClient({ baseUrl: `${OPENAI_ORIGIN}/v1`, headers: {}, timeoutMs: 1000, dispatcher: agent });

    await expect(client.postJson('/ping', {})).rejects.toBeInstanceOf(ProviderNetworkError);
  });

  it('should abort and report a timeout when the upstream never answers', async () => {
    const client = new ProviderHttpClient({
      baseUrl: `${OPENAI_ORIGIN}/v1`,
      headers: {},
      timeoutMs: 50,
      dispatcher: new StalledDispatcher(),
    });

    await expect(client.postJson('/ping', {})).rejects.toThrow(
      new ProviderTimeoutError(`Request to ${OPENAI_ORIGIN}/v1/ping timed out after 0.05 seconds`),
    );
  });
});

describe('createDispatcher', () => {
  it('should use a proxy agent when HTTPS_PROXY is set', async () => {
    const dispatcher = createDispatcher({ HTTPS_PROXY: 'http://proxy.test:3128' });
    expect(dispatcher).toBeInstanceOf(ProxyAgent);
    await dispatcher.close();
  });

  it('should use a plain agent without proxy variables', async () => {
    const dispatcher = createDispatcher({});
    expect(dispatcher).toBeInstanceOf(Agent);
    await dispatcher.close();
  });

  it('should reject a malformed proxy URL', () => {
    expect(() => createDispatcher({ HTTP_PROXY: 'not a url' })).toThrow(ConfigurationError);
  });
});
