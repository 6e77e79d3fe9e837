// lib/llm/providers/openai.ts

import { z } from 'zod';
import { formatTextFile, type LoadedAttachments } from '../attachments';
import { BaseVisionProvider, type GenerationOptions, type ParsedCompletion, type ProviderDependencies } from '../base-provider';
import { ProviderResponseError } from '../errors';
import type { MultimodalRequest, ProviderConfig } from '../types';
import { BACKENDS } from './defaults';

type OpenAIContentPart =
  | { type: 'text'; text: string }
  | { type: 'image_url'; image_url: { url: string } };

interface OpenAIChatMessage {
  role: 'system' | 'user';
  content: string | OpenAIContentPart[];
}

export interface OpenAIChatPayload {
  model: string;
  messages: OpenAIChatMessage[];
  max_tokens: number;
  temperature: number;
  stream: false;
}

// 兼容 OpenAI 协议的服务也可能把 content 返回成分段数组
const CompletionSchema = z.object({
  model: z.string().optional(),
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z
            .union([z.string(), z.array(z.object({ type: z.string().optional(), text: z.string().optional() }))])
            .nullable()
            .optional(),
        }),
        finish_reason: z.string().nullable().optional(),
      }),
    )
    .min(1),
  usage: z
    .object({
      prompt_tokens: z.number(),
      completion_tokens: z.number(),
      total_tokens: z.number(),
    })
    .nullable()
    .optional(),
});

const ErrorBodySchema = z.object({
  error: z.union([z.string(), z.object({ message: z.string() })]),
});

export class OpenAIVisionProvider extends BaseVisionProvider {
  readonly kind = 'openai' as const;

  constructor(config: ProviderConfig, deps?: ProviderDependencies) {
    super(config, BACKENDS.openai, deps);
  }

  /**
   * 将通用请求转换为 Chat Completions 的消息格式。
   * 用户消息内的顺序：提示词、图片（远程在前，本地在后）、文本文件。
   */
  protected _buildPayload(
    request: MultimodalRequest,
    attachments: LoadedAttachments,
    options: GenerationOptions,
  ): OpenAIChatPayload {
    const messages: OpenAIChatMessage[] = [];
    if (request.systemPrompt) {
      messages.push({ role: 'system', content: request.systemPrompt });
    }

    const content: OpenAIContentPart[] = [{ type: 'text', text: request.prompt }];
    for (const image of attachments.images) {
      content.push({ type: 'image_url', image_url: { url: image.url } });
    }
    for (const file of attachments.textFiles) {
      content.push({ type: 'text', text: formatTextFile(file.filename, file.text) });
    }
    messages.push({ role: 'user', content });

    return {
      model: request.model,
      messages,
      max_tokens: options.maxTokens,
      temperature: options.temperature,
      stream: false,
    };
  }

  protected _parseCompletion(body: unknown): ParsedCompletion {
    const parsed = CompletionSchema.safeParse(body);
    if (!parsed.success) {
      throw new ProviderResponseError(`Invalid response structure from OpenAI: ${parsed.error.issues[0]?.message ?? 'unknown shape'}`);
    }

    const { model, choices, usage } = parsed.data;
    const choice = choices[0];
    const raw = choice.message.content;
    const text = Array.isArray(raw) ? raw.map(part => part.text ?? '').join('') : (raw ?? '');

    const completion: ParsedCompletion = { content: text, model };
    if (usage) {
      completion.usage = {
        promptTokens: usage.prompt_tokens,
        completionTokens: usage.completion_tokens,
        totalTokens: usage.total_tokens,
      };
    }
    if (choice.finish_reason) {
      completion.finishReason = choice.finish_reason;
    }
    return completion;
  }

  protected _extractErrorMessage(body: unknown): string | undefined {
    const parsed = ErrorBodySchema.safeParse(body);
    if (!parsed.success) return undefined;
    const { error } = parsed.data;
    return typeof error === 'string' ? error : error.message;
  }
}
