/**
 * Anthropic LLM Provider
 *
 * Implementation of LLMProvider for the Anthropic messages API.
 */

import { randomUUID } from 'crypto';
import { z } from 'zod';
import { EMPTY_USAGE, type LLMProvider, type LLMInput, type LLMResponse } from './types';

const ANTHROPIC_API_URL = 'https://api.anthropic.com/v1/messages';

const AnthropicResponseSchema = z.object({
  id: z.string().optional(),
  content: z.array(
    z.object({
      type: z.string(),
      text: z.string().optional()
    })
  ),
  stop_reason: z.string().nullable().optional(),
  usage: z.object({
    input_tokens: z.number(),
    output_tokens: z.number()
  })
});

export class AnthropicLLMProvider implements LLMProvider {
  name = 'anthropic';
  modelId: string;

  private readonly apiKey: string;
  private readonly timeout: number;
  private readonly url: string;

  constructor(config: { apiKey: string; modelId?: string; timeout?: number; baseUrl?: string }) {
    this.apiKey = config.apiKey;
    this.modelId = config.modelId ?? 'claude-3-5-sonnet-20241022';
    this.timeout = config.timeout ?? 120000;
    this.url = config.baseUrl ? `${config.baseUrl.replace(/\/+$/, '')}/v1/messages` : ANTHROPIC_API_URL;
  }

  async call(input: LLMInput): Promise<LLMResponse> {
    const requestId = randomUUID();
    const startTime = Date.now();
    const metadata = () => ({
      requestId,
      model: this.modelId,
      promptVersion: input.promptVersion,
      role: input.role,
      latencyMs: Date.now() - startTime,
      retryCount: 0,
      timestamp: new Date()
    });

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);

    try {
      // Anthropic requires system message separately
      const systemMessage = input.messages.find((m) => m.role === 'system');
      const otherMessages = input.messages.filter((m) => m.role !== 'system');

      const response = await fetch(this.url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          'x-api-key': this.apiKey,
          'anthropic-version': '2023-06-01'
        },
        body: JSON.stringify({
          model: this.modelId,
          max_tokens: input.maxOutputTokens,
          temperature: input.temperature,
          system: systemMessage?.content ?? '',
          messages: otherMessages.map((m) => ({
            role: m.role === 'user' ? 'user' : 'assistant',
            content: m.content
          }))
        }),
        signal: controller.signal
      });

      if (!response.ok) {
        const errorText = await response.text();
        throw new Error(`Anthropic API error: ${response.status} - ${errorText}`);
      }

      const parsed = AnthropicResponseSchema.safeParse(await response.json());
      if (!parsed.success) {
        throw new Error(`Anthropic API returned an unexpected body: ${parsed.error.message}`);
      }

      const textContent = parsed.data.content
        .filter((c) => c.type === 'text')
        .map((c) => c.text ?? '')
        .join('');
      const { input_tokens, output_tokens } = parsed.data.usage;

      return {
        success: true,
        rawContent: textContent,
        usage: {
          inputTokens: input_tokens,
          outputTokens: output_tokens,
          totalTokens: input_tokens + output_tokens
        },
        metadata: metadata()
      };
    } catch (error) {
      return {
        success: false,
        error: error instanceof Error ? error.message : String(error),
        usage: { ...EMPTY_USAGE },
        metadata: metadata()
      };
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
