// lib/llm/providers/dashscope.ts

import { z } from 'zod';
import { formatTextFile, type LoadedAttachments } from '../attachments';
import { BaseVisionProvider, type GenerationOptions, type ParsedCompletion, type ProviderDependencies } from '../base-provider';
import { ProviderResponseError } from '../errors';
import type { MultimodalRequest, ProviderConfig } from '../types';
import { BACKENDS } from './defaults';

type DashscopeContentItem = { text: string } | { image: string };

interface DashscopeMessage {
  role: 'system' | 'user';
  content: DashscopeContentItem[];
}

export interface DashscopePayload {
  model: string;
  input: { messages: DashscopeMessage[] };
  parameters: { max_tokens: number; temperature: number };
}

const ResponseSchema = z.object({
  request_id: z.string().optional(),
  output: z.object({
    choices: z
      .array(
        z.object({
          finish_reason: z.string().nullable().optional(),
          message: z.object({
            content: z.union([z.string(), z.array(z.object({ text: z.string().optional() }).passthrough())]),
          }),
        }),
      )
      .min(1),
  }),
  usage: z
    .object({
      input_tokens: z.number().optional(),
      output_tokens: z.number().optional(),
      total_tokens: z.number().optional(),
    })
    .optional(),
});

const ErrorBodySchema = z.object({
  code: z.string().optional(),
  message: z.string(),
});

/**
 * 通义千问 VL 系列，走 Dashscope 原生的多模态生成接口。
 */
export class DashscopeVisionProvider extends BaseVisionProvider {
  readonly kind = 'dashscope' as const;

  constructor(config: ProviderConfig, deps?: ProviderDependencies) {
    super(config, BACKENDS.dashscope, deps);
  }

  protected _buildPayload(
    request: MultimodalRequest,
    attachments: LoadedAttachments,
    options: GenerationOptions,
  ): DashscopePayload {
    const messages: DashscopeMessage[] = [];
    if (request.systemPrompt) {
      messages.push({ role: 'system', content: [{ text: request.systemPrompt }] });
    }

    const content: DashscopeContentItem[] = [{ text: request.prompt }];
    for (const image of attachments.images) {
      content.push({ image: image.url });
    }
    for (const file of attachments.textFiles) {
      content.push({ text: formatTextFile(file.filename, file.text) });
    }
    messages.push({ role: 'user', content });

    return {
      model: request.model,
      input: { messages },
      parameters: { max_tokens: options.maxTokens, temperature: options.temperature },
    };
  }

  protected _parseCompletion(body: unknown): ParsedCompletion {
    const parsed = ResponseSchema.safeParse(body);
    if (!parsed.success) {
      // 部分网关在 200 响应里返回 {code, message}
      const message = this._extractErrorMessage(body);
      throw new ProviderResponseError(
        message ? `Dashscope API error: ${message}` : 'Invalid response structure from Dashscope: no choices',
      );
    }

    const { output, usage } = parsed.data;
    const choice = output.choices[0];
    const raw = choice.message.content;
    const text = typeof raw === 'string'
      ? raw
      : raw.flatMap(item => (item.text !== undefined ? [item.text] : [])).join('\n');

    const completion: ParsedCompletion = { content: text };
    if (usage) {
      const promptTokens = usage.input_tokens ?? 0;
      const completionTokens = usage.output_tokens ?? 0;
      completion.usage = {
        promptTokens,
        completionTokens,
        totalTokens: usage.total_tokens ?? promptTokens + completionTokens,
      };
    }
    // Dashscope 在未结束时返回字符串 "null"
    if (choice.finish_reason && choice.finish_reason !== 'null') {
      completion.finishReason = choice.finish_reason;
    }
    return completion;
  }

  protected _extractErrorMessage(body: unknown): string | undefined {
    const parsed = ErrorBodySchema.safeParse(body);
    if (!parsed.success) return undefined;
    const { code, message } = parsed.data;
    return code ? `${code}: ${message}` : message;
  }
}
