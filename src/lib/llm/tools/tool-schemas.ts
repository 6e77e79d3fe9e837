// lib/llm/tools/tool-schemas.ts

import { z } from 'zod';

/**
 * 三个 MCP 工具的入参定义。
 * 这里只约束类型和基本形状，取值范围由对应 Provider 的 validateRequest 判断。
 */
export const GenerateParamsSchema = z.object({
  model: z.string().describe('Model name to use, e.g. gpt-4o or qwen-vl-max'),
  prompt: z.string().describe('Text prompt'),
  image_urls: z.array(z.string()).optional().describe('Remote image URLs, passed to the provider as-is'),
  file_paths: z
    .array(z.string())
    .optional()
    .describe('Local file paths; images are base64-encoded, text files are inlined'),
  system_prompt: z.string().optional().describe('Optional system prompt'),
  max_tokens: z.number().int().optional().describe('Maximum tokens to generate'),
  temperature: z.number().optional().describe('Generation temperature'),
  provider: z.string().optional().describe('Provider name (e.g. openai, dashscope); inferred from the model name when omitted'),
});

export const ValidateParamsSchema = z.object({
  model: z.string().describe('Model name to validate'),
  image_count: z.number().int().optional().describe('Number of images in the request'),
  file_count: z.number().int().optional().describe('Number of files in the request'),
  max_tokens: z.number().int().optional().describe('Maximum tokens the request will ask for'),
  temperature: z.number().optional().describe('Temperature the request will use'),
  provider: z.string().optional().describe('Optional provider name'),
});

export type GenerateParams = z.infer<typeof GenerateParamsSchema>;
export type ValidateParams = z.infer<typeof ValidateParamsSchema>;
