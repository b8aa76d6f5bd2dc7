import OpenAI from 'openai';
import type { CompletionTransport } from '../adapters/generator/LlmContentGenerator.js';

export interface OpenRouterOptions {
  apiKey: string;
  model: string;
  timeoutMs: number;
}

export const createOpenRouterCompletion = (options: OpenRouterOptions): CompletionTransport => {
  const client = new OpenAI({
    baseURL: 'https://openrouter.ai/api/v1',
    apiKey: options.apiKey,
    timeout: options.timeoutMs,
    maxRetries: 0,
  });

  return async ({ system, prompt }) => {
    const response = await client.chat.completions.create({
      model: options.model,
      messages: [
        { role: 'system', content: system },
        { role: 'user', content: prompt },
      ],
      temperature: 0.3,
      max_tokens: 200,
    });

    return response.choices[0]?.message?.content ?? null;
  };
};
