// lib/llm/http-client.ts

import { Agent, ProxyAgent, request, type Dispatcher } from 'undici';
import { createLogger } from '../logger';
import { ConfigurationError, ProviderNetworkError, ProviderTimeoutError } from './errors';

const log = createLogger('HttpClient');

/**
 * 创建上游请求使用的 undici dispatcher。
 * 设置了 HTTPS_PROXY / HTTP_PROXY 时走代理，否则使用带连接复用的 Agent。
 */
export function createDispatcher(env: NodeJS.ProcessEnv = process.env): Dispatcher {
  const proxyUrl = env.HTTPS_PROXY || env.HTTP_PROXY;
  if (proxyUrl) {
    log.info(`Proxy found: ${proxyUrl}. Routing provider traffic through it.`);
    try {
      return new ProxyAgent(proxyUrl);
    } catch (error) {
      throw new ConfigurationError(`Invalid proxy URL '${proxyUrl}': ${error instanceof Error ? error.message : String(error)}`);
    }
  }
  return new Agent({ keepAliveTimeout: 30_000 });
}

export interface HttpJsonResponse {
  status: number;
  body: unknown; // 解析失败时为 undefined
  rawText: string;
}

export interface ProviderHttpClientOptions {
  baseUrl: string;
  headers: Record<string, string>;
  timeoutMs: number;
  // 外部传入的 dispatcher 由调用方负责关闭
  dispatcher?: Dispatcher;
}

function parseJson(text: string): unknown {
  if (text.trim() === '') {
    return undefined;
  }
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * 绑定到单个 Provider 的 HTTP 客户端。
 * 启动时创建一次，所有请求复用同一个连接池，进程退出时关闭。
 */
export class ProviderHttpClient {
  readonly baseUrl: string;
  private readonly headers: Record<string, string>;
  private readonly timeoutMs: number;
  private readonly dispatcher: Dispatcher;
  private readonly ownsDispatcher: boolean;

  constructor(options: ProviderHttpClientOptions) {
    try {
      new URL(options.baseUrl);
    } catch {
      throw new ConfigurationError(`Invalid base URL: '${options.baseUrl}'`);
    }
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.headers = options.headers;
    this.timeoutMs = options.timeoutMs;
    this.ownsDispatcher = options.dispatcher === undefined;
    this.dispatcher = options.dispatcher ?? createDispatcher();
  }

  /**
   * 发送一次 JSON POST 请求，不做任何重试。
   * 只在网络层失败（连接失败、超时）时抛错，HTTP 状态码交给调用方解释。
   */
  public async postJson(pathname: string, payload: unknown): Promise<HttpJsonResponse> {
    const url = `${this.baseUrl}${pathname.startsWith('/') ? pathname : `/${pathname}`}`;

    const controller = new AbortController();
    let timedOut = false;
    const timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort(); // 超时，中止请求
    }, this.timeoutMs);

    try {
      const response = await request(url, {
        method: 'POST',
        headers: { 'content-type': 'application/json', accept: 'application/json', ...this.headers },
        body: JSON.stringify(payload),
        dispatcher: this.dispatcher,
        signal: controller.signal,
      });
      const rawText = await response.body.text();
      log.debug(`POST ${url} -> ${response.statusCode}`);
      return { status: response.statusCode, body: parseJson(rawText), rawText };
    } catch (error) {
      if (timedOut) {
        throw new ProviderTimeoutError(`Request to ${url} timed out after ${this.timeoutMs / 1000} seconds`, { cause: error });
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new ProviderNetworkError(`Request to ${url} failed: ${message}`, { cause: error });
    } finally {
      clearTimeout(timeoutId);
    }
  }

  public async close(): Promise<void> {
    if (this.ownsDispatcher) {
      await this.dispatcher.close();
    }
  }
}
