import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type { MockAgent } from 'undici';
import {
  FileNotFoundError,
  ProviderAuthError,
  ProviderNetworkError,
  ProviderRateLimitError,
  ProviderRequestError,
  ProviderResponseError,
  UnsupportedModelError,
  ValidationError,
} from '../errors';
import { DashscopeVisionProvider } from '../providers/dashscope';
import { OpenAIVisionProvider } from '../providers/openai';
import type { MultimodalRequest } from '../types';
import {
  DASHSCOPE_ORIGIN,
  DASHSCOPE_PATH,
  OPENAI_ORIGIN,
  OPENAI_PATH,
  makeMockAgent,
  makeProviderConfig,
} from './fixtures';

let agent: MockAgent;
let workDir: string;

beforeEach(async () => {
  agent = makeMockAgent();
  workDir = await mkdtemp(join(tmpdir(), 'vllm-mcp-providers-'));
});

afterEach(async () => {
  await agent.close();
  await rm(workDir, { recursive: true, force: true });
});

function openai(): OpenAIVisionProvider {
  return new OpenAIVisionProvider(makeProviderConfig('openai'), { dispatcher: agent });
}

function dashscope(): DashscopeVisionProvider {
  return new DashscopeVisionProvider(makeProviderConfig('dashscope'), { dispatcher: agent });
}

function request(overrides: Partial<MultimodalRequest>): MultimodalRequest {
  return { model: 'gpt-4o', prompt: 'describe', imageUrls: [], filePaths: [], ...overrides };
}

const OPENAI_OK = {
  model: 'gpt-4o-2024-08-06',
  choices: [{ message: { role: 'assistant', content: 'A cat' }, finish_reason: 'stop' }],
  usage: { prompt_tokens: 12, completion_tokens: 3, total_tokens: 15 },
};

describe('validateRequest', () => {
  it('should accept requests within the limits', () => {
    expect(openai().validateRequest({ model: 'gpt-4o', imageCount: 5, fileCount: 5 })).toEqual({ valid: true });
    expect(dashscope().validateRequest({ model: 'qwen-vl-max', imageCount: 10, fileCount: 10 })).toEqual({ valid: true });
  });

  it('should reject image counts above the cap whatever the other fields are', () => {
    const provider = openai();
    for (const fileCount of [0, 3, 5]) {
      for (const maxTokens of [undefined, 1, 4000]) {
        const result = provider.validateRequest({ model: 'gpt-4o', imageCount: 6, fileCount, maxTokens });
        expect(result.valid).toBe(false);
      }
    }
    const result = provider.validateRequest({ model: 'gpt-4o', imageCount: 6, fileCount: 0 });
    if (result.valid) throw new Error('expected an invalid result');
    expect(result.reason).toBe("Too many images: 6 (provider 'openai' accepts at most 5)");
    expect(result.error).toBeInstanceOf(ValidationError);
  });

  it('should reject file counts above the cap', () => {
    const result = dashscope().validateRequest({ model: 'qwen-vl-max', imageCount: 0, fileCount: 11 });
    if (result.valid) throw new Error('expected an invalid result');
    expect(result.reason).toBe("Too many files: 11 (provider 'dashscope' accepts at most 10)");
  });

  it('should report an unsupported model before the counts', () => {
    const result = openai().validateRequest({ model: 'gpt-3.5-turbo', imageCount: 99, fileCount: 0 });
    if (result.valid) throw new Error('expected an invalid result');
    expect(result.error).toBeInstanceOf(UnsupportedModelError);
    expect(result.reason).toBe(
      "Model 'gpt-3.5-turbo' is not supported: provider 'openai' supports gpt-4o, gpt-4o-mini, gpt-4-turbo, gpt-4-vision-preview",
    );
  });

  it('should reject max_tokens that are not positive integers', () => {
    const provider = openai();
    for (const maxTokens of [0, -1, 1.5]) {
      const result = provider.validateRequest({ model: 'gpt-4o', imageCount: 0, fileCount: 0, maxTokens });
      if (result.valid) throw new Error(`expected max_tokens=${maxTokens} to be rejected`);
      expect(result.reason).toBe(`max_tokens must be a positive integer, got ${maxTokens}`);
    }
  });

  it('should apply each backend temperature range', () => {
    const target = { imageCount: 0, fileCount: 0, temperature: 2 };
    expect(openai().validateRequest({ model: 'gpt-4o', ...target })).toEqual({ valid: true });

    const result = dashscope().validateRequest({ model: 'qwen-vl-max', ...target });
    if (result.valid) throw new Error('expected an invalid result');
    expect(result.reason).toBe('temperature must be within [0, 2), got 2');

    const negative = openai().validateRequest({ model: 'gpt-4o', imageCount: 0, fileCount: 0, temperature: -0.1 });
    if (negative.valid) throw new Error('expected an invalid result');
    expect(negative.reason).toBe('temperature must be within [0, 2], got -0.1');
  });
});

describe('OpenAIVisionProvider.generateResponse', () => {
  it('should send a chat completion payload and normalize the reply', async () => {
    let sent: unknown;
    agent
      .get(OPENAI_ORIGIN)
      .intercept({ path: OPENAI_PATH, method: 'POST', headers: { authorization: 'Bearer test-openai-key' } })
      .reply(opts => {
        sent = JSON.parse(String(opts.body));
        return { statusCode: 200, data: OPENAI_OK };
      });

    const response = await openai().generateResponse(
      request({ imageUrls: ['https://images.test/cat.jpg'], systemPrompt: 'be brief' }),
    );

    expect(sent).toEqual({
      model: 'gpt-4o',
      messages: [
        { role: 'system', content: 'be brief' },
        {
          role: 'user',
          content: [
            { type: 'text', text: 'describe' },
            { type: 'image_url', image_url: { url: 'https://images.test/cat.jpg' } },
          ],
        },
      ],
      max_tokens: 4000,
      temperature: 0.7,
      stream: false,
    });
    expect(response.content).toBe('A cat');
    expect(response.provider).toBe('openai');
    expect(response.model).toBe('gpt-4o-2024-08-06');
    expect(response.finishReason).toBe('stop');
    expect(response.usage).toEqual({ promptTokens: 12, completionTokens: 3, totalTokens: 15 });
    expect(typeof response.responseTimeMs).toBe('number');
  });

  it('should inline local images as data URLs and text files as text parts', async () => {
    const imagePath = join(workDir, 'pixel.png');
    const notesPath = join(workDir, 'notes.txt');
    await writeFile(imagePath, Buffer.from([0x89, 0x50, 0x4e, 0x47]));
    await writeFile(notesPath, 'hello');

    let sent: unknown;
    agent
      .get(OPENAI_ORIGIN)
      .intercept({ path: OPENAI_PATH, method: 'POST' })
      .reply(opts => {
        sent = JSON.parse(String(opts.body));
        return { statusCode: 200, data: OPENAI_OK };
      });

    await openai().generateResponse(
      request({ imageUrls: ['https://images.test/a.png'], filePaths: [notesPath, imagePath], maxTokens: 100, temperature: 0 }),
    );

    expect(sent).toEqual({
      model: 'gpt-4o',
      messages: [
        {
          role: 'user',
          content: [
            { type: 'text', text: 'describe' },
            { type: 'image_url', image_url: { url: 'https://images.test/a.png' } },
            { type: 'image_url', image_url: { url: 'data:image/png;base64,iVBORw==' } },
            { type: 'text', text: 'File: notes.txt\nhello' },
          ],
        },
      ],
      max_tokens: 100,
      temperature: 0,
      stream: false,
    });
  });

  it('should fall back to the requested model when the reply omits it', async () => {
    agent
      .get(OPENAI_ORIGIN)
      .intercept({ path: OPENAI_PATH, method: 'POST' })
      .reply(200, { choices: [{ message: { content: null } }] });

    const response = await openai().generateResponse(request({ model: 'gpt-4o-mini' }));
    expect(response.content).toBe('');
    expect(response.model).toBe('gpt-4o-mini');
    expect(response.usage).toBeUndefined();
    expect(response.finishReason).toBeUndefined();
  });

  it('should fail before any network call when a local file is missing', async () => {
    agent.get(OPENAI_ORIGIN).intercept({ path: OPENAI_PATH, method: 'POST' }).reply(200, OPENAI_OK);
    const missing = join(workDir, 'missing.png');

    await expect(openai().generateResponse(request({ filePaths: [missing] }))).rejects.toThrow(FileNotFoundError);
    expect(agent.pendingInterceptors()).toHaveLength(1);
  });

  it('should count local images against the image cap before calling upstream', async () => {
    agent.get(OPENAI_ORIGIN).intercept({ path: OPENAI_PATH, method: 'POST' }).reply(200, OPENAI_OK);
    const imageUrls = Array.from({ length: 5 }, (_, i) => `https://images.test/${i}.png`);
    const filePaths: string[] = [];
    for (const name of ['a.png', 'b.png']) {
      const filePath = join(workDir, name);
      await writeFile(filePath, Buffer.from([0x89, 0x50, 0x4e, 0x47]));
      filePaths.push(filePath);
    }

    const provider = openai();
    expect(provider.validateRequest({ model: 'gpt-4o', imageCount: 5, fileCount: 2 })).toEqual({ valid: true });

    const failure = provider.generateResponse(request({ imageUrls, filePaths }));
    await expect(failure).rejects.toBeInstanceOf(ValidationError);
    await expect(failure).rejects.toThrow("Too many images: 7 (provider 'openai' accepts at most 5)");
    expect(agent.pendingInterceptors()).toHaveLength(1);
  });

  it('should reject a local image type the backend does not accept', async () => {
    const bitmap = join(workDir, 'scan.bmp');
    await writeFile(bitmap, Buffer.from([0x42, 0x4d]));

    await expect(openai().generateResponse(request({ filePaths: [bitmap] }))).rejects.toThrow(
      `Image type image/bmp of ${bitmap} is not accepted by provider 'openai'`,
    );
  });

  it.each([
    [401, ProviderAuthError],
    [403, ProviderAuthError],
    [429, ProviderRateLimitError],
    [400, ProviderRequestError],
    [500, ProviderResponseError],
  ])('should map HTTP %i to %o', async (status, ErrorType) => {
    agent
      .get(OPENAI_ORIGIN)
      .intercept({ path: OPENAI_PATH, method: 'POST' })
      .reply(status, { error: { message: 'upstream said no' } });

    const failure = openai().generateResponse(request({}));
    await expect(failure).rejects.toBeInstanceOf(ErrorType);
    await expect(failure).rejects.toMatchObject({
      message: `OpenAI API error (${status}): upstream said no`,
      status,
    });
  });

  it('should use the raw body when the error reply is not JSON', async () => {
    agent.get(OPENAI_ORIGIN).intercept({ path: OPENAI_PATH, method: 'POST' }).reply(503, 'upstream down');

    await expect(openai().generateResponse(request({}))).rejects.toThrow('OpenAI API error (503): upstream down');
  });

  it('should reject a successful reply that is not JSON', async () => {
    agent.get(OPENAI_ORIGIN).intercept({ path: OPENAI_PATH, method: 'POST' }).reply(200, 'not json');

    await expect(openai().generateResponse(request({}))).rejects.toThrow(
      new ProviderResponseError('OpenAI returned a non-JSON response'),
    );
  });

  it('should reject a reply without choices', async () => {
    agent.get(OPENAI_ORIGIN).intercept({ path: OPENAI_PATH, method: 'POST' }).reply(200, { choices: [] });

    await expect(openai().generateResponse(request({}))).rejects.toThrow(/^Invalid response structure from OpenAI/);
  });

  it('should wrap connection failures in ProviderNetworkError', async () => {
    agent
      .get(OPENAI_ORIGIN)
      .intercept({ path: OPENAI_PATH, method: 'POST' })
      .replyWithError(new Error('socket hang up'));

    await expect(openai().generateResponse(request({}))).rejects.toBeInstanceOf(ProviderNetworkError);
  });
});

describe('DashscopeVisionProvider.generateResponse', () => {
  it('should send the native multimodal payload and join content items', async () => {
    let sent: unknown;
    agent
      .get(DASHSCOPE_ORIGIN)
      .intercept({ path: DASHSCOPE_PATH, method: 'POST', headers: { authorization: 'Bearer test-dashscope-key' } })
      .reply(opts => {
        sent = JSON.parse(String(opts.body));
        return {
          statusCode: 200,
          data: {
            request_id: 'req-1',
            output: {
              choices: [{ finish_reason: 'stop', message: { role: 'assistant', content: [{ text: 'A dog' }, { text: 'on grass' }] } }],
            },
            usage: { input_tokens: 20, output_tokens: 5 },
          },
        };
      });

    const response = await dashscope().generateResponse(
      request({ model: 'qwen-vl-max', systemPrompt: 'be brief', imageUrls: ['https://images.test/dog.jpg'] }),
    );

    expect(sent).toEqual({
      model: 'qwen-vl-max',
      input: {
        messages: [
          { role: 'system', content: [{ text: 'be brief' }] },
          { role: 'user', content: [{ text: 'describe' }, { image: 'https://images.test/dog.jpg' }] },
        ],
      },
      parameters: { max_tokens: 4000, temperature: 0.7 },
    });
    expect(response).toMatchObject({
      content: 'A dog\non grass',
      provider: 'dashscope',
      model: 'qwen-vl-max',
      finishReason: 'stop',
      usage: { promptTokens: 20, completionTokens: 5, totalTokens: 25 },
    });
  });

  it('should ignore the literal "null" finish reason', async () => {
    agent
      .get(DASHSCOPE_ORIGIN)
      .intercept({ path: DASHSCOPE_PATH, method: 'POST' })
      .reply(200, { output: { choices: [{ finish_reason: 'null', message: { content: 'partial' } }] } });

    const response = await dashscope().generateResponse(request({ model: 'qwen-vl-plus' }));
    expect(response.content).toBe('partial');
    expect(response.finishReason).toBeUndefined();
  });

  it('should report the code and message of an error reply', async () => {
    agent
      .get(DASHSCOPE_ORIGIN)
      .intercept({ path: DASHSCOPE_PATH, method: 'POST' })
      .reply(400, { code: 'InvalidParameter', message: 'bad image' });

    const failure = dashscope().generateResponse(request({ model: 'qwen-vl-max' }));
    await expect(failure).rejects.toBeInstanceOf(ProviderRequestError);
    await expect(failure).rejects.toThrow('Dashscope API error (400): InvalidParameter: bad image');
  });

  it('should surface an error body returned with status 200', async () => {
    agent
      .get(DASHSCOPE_ORIGIN)
      .intercept({ path: DASHSCOPE_PATH, method: 'POST' })
      .reply(200, { code: 'DataInspectionFailed', message: 'content rejected' });

    await expect(dashscope().generateResponse(request({ model: 'qwen-vl-max' }))).rejects.toThrow(
      'Dashscope API error: DataInspectionFailed: content rejected',
    );
  });
});
