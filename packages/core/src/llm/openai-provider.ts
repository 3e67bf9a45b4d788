/**
 * OpenAI LLM Provider
 *
 * Chat-completions provider for OpenAI and Azure OpenAI deployments.
 */

import { randomUUID } from 'crypto';
import { z } from 'zod';
import { EMPTY_USAGE, type LLMProvider, type LLMInput, type LLMResponse, type TokenUsage } from './types';

const OPENAI_API_URL = 'https://api.openai.com/v1/chat/completions';
const DEFAULT_AZURE_API_VERSION = '2024-06-01';

const OpenAIResponseSchema = z.object({
  id: z.string().optional(),
  model: z.string().optional(),
  choices: z.array(
    z.object({
      index: z.number().optional(),
      message: z.object({
        role: z.string(),
        content: z.string().nullable()
      }),
      finish_reason: z.string().nullable().optional()
    })
  ),
  usage: z
    .object({
      prompt_tokens: z.number(),
      completion_tokens: z.number(),
      total_tokens: z.number()
    })
    .optional()
});

type OpenAIResponse = z.infer<typeof OpenAIResponseSchema>;

export interface OpenAIProviderConfig {
  apiKey: string;
  modelId?: string;
  timeout?: number;
  /**
   * Azure resource endpoint, e.g. https://my-resource.openai.azure.com.
   * When set, modelId is used as the deployment name.
   */
  azureEndpoint?: string;
  apiVersion?: string;
  /** Overrides the OpenAI endpoint for compatible gateways. */
  baseUrl?: string;
}

export class OpenAILLMProvider implements LLMProvider {
  name: string;
  modelId: string;

  private readonly apiKey: string;
  private readonly timeout: number;
  private readonly url: string;
  private readonly azure: boolean;

  constructor(config: OpenAIProviderConfig) {
    this.apiKey = config.apiKey;
    this.modelId = config.modelId ?? 'gpt-4o';
    this.timeout = config.timeout ?? 120000;
    this.azure = config.azureEndpoint !== undefined;
    this.name = this.azure ? 'azure' : 'openai';

    if (config.azureEndpoint !== undefined) {
      const endpoint = config.azureEndpoint.replace(/\/+$/, '');
      const apiVersion = config.apiVersion ?? DEFAULT_AZURE_API_VERSION;
      this.url =
        `${endpoint}/openai/deployments/${encodeURIComponent(this.modelId)}` +
        `/chat/completions?api-version=${encodeURIComponent(apiVersion)}`;
    } else {
      this.url = config.baseUrl ? `${config.baseUrl.replace(/\/+$/, '')}/chat/completions` : OPENAI_API_URL;
    }
  }

  get endpoint(): string {
    return this.url;
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
      const response = await fetch(this.url, {
        method: 'POST',
        headers: this.headers(),
        body: JSON.stringify({
          ...(this.azure ? {} : { model: this.modelId }),
          messages: input.messages.map((m) => ({
            role: m.role,
            content: m.content
          })),
          temperature: input.temperature,
          max_tokens: input.maxOutputTokens
        }),
        signal: controller.signal
      });

      if (!response.ok) {
        const errorText = await response.text();
        throw new Error(`${this.name} API error: ${response.status} - ${errorText}`);
      }

      const parsed = OpenAIResponseSchema.safeParse(await response.json());
      if (!parsed.success) {
        throw new Error(`${this.name} API returned an unexpected body: ${parsed.error.message}`);
      }

      return {
        success: true,
        rawContent: parsed.data.choices[0]?.message.content ?? '',
        usage: toUsage(parsed.data.usage),
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

  private headers(): Record<string, string> {
    if (this.azure) {
      return { 'Content-Type': 'application/json', 'api-key': this.apiKey };
    }
    return { 'Content-Type': 'application/json', Authorization: `Bearer ${this.apiKey}` };
  }
}

function toUsage(usage: OpenAIResponse['usage']): TokenUsage {
  if (!usage) {
    return { ...EMPTY_USAGE };
  }
  return {
    inputTokens: usage.prompt_tokens,
    outputTokens: usage.completion_tokens,
    totalTokens: usage.total_tokens
  };
}
