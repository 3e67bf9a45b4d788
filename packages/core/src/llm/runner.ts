/**
 * LLM Runner
 *
 * Builds role-prompted requests and runs them with retry and backoff.
 */

import { Logger } from '@nestjs/common';
import { randomUUID } from 'crypto';
import { getCurrentVersion, getRoleConfig, getPrompt } from './prompts';
import {
  EMPTY_USAGE,
  type AgentRole,
  type LLMInput,
  type LLMProvider,
  type LLMResponse,
  type RetryCondition,
  type RetryConfig,
  type TokenUsage
} from './types';

const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxRetries: 3,
  baseDelayMs: 1000,
  maxDelayMs: 30000,
  retryOn: ['rate_limit', 'timeout', 'server_error']
};

export interface RunnerConfig {
  provider: LLMProvider;
  retryConfig?: RetryConfig;
}

export interface RunOptions {
  promptVersion?: string;
  temperature?: number;
  maxOutputTokens?: number;
}

export class LLMRunner {
  private readonly logger = new Logger(LLMRunner.name);
  private readonly provider: LLMProvider;
  private readonly retryConfig: RetryConfig;

  private sessionUsage: TokenUsage = { ...EMPTY_USAGE };

  constructor(config: RunnerConfig) {
    this.provider = config.provider;
    this.retryConfig = config.retryConfig ?? DEFAULT_RETRY_CONFIG;
  }

  /**
   * Run an LLM call with retry on transient provider failures.
   */
  async run(role: AgentRole, userPrompt: string, options: RunOptions = {}): Promise<LLMResponse> {
    const requestId = randomUUID();
    const startTime = Date.now();
    const promptVersion = options.promptVersion ?? getCurrentVersion(role);
    const roleConfig = getRoleConfig(role);

    const input: LLMInput = {
      role,
      promptVersion,
      messages: [
        { role: 'system', content: getPrompt(role, promptVersion) },
        { role: 'user', content: userPrompt }
      ],
      temperature: options.temperature ?? roleConfig.temperature,
      maxOutputTokens: options.maxOutputTokens ?? roleConfig.maxTokens
    };

    let lastError = 'Unknown error';
    let retryCount = 0;

    for (let attempt = 0; attempt <= this.retryConfig.maxRetries; attempt++) {
      let response: LLMResponse;
      try {
        response = await this.provider.call(input);
      } catch (error) {
        response = {
          success: false,
          error: error instanceof Error ? error.message : String(error),
          usage: { ...EMPTY_USAGE },
          metadata: this.metadata(requestId, promptVersion, role, startTime, retryCount)
        };
      }

      this.updateSessionUsage(response.usage);

      if (response.success) {
        return {
          ...response,
          metadata: this.metadata(requestId, promptVersion, role, startTime, retryCount)
        };
      }

      lastError = response.error ?? lastError;
      const condition = classifyError(lastError);
      if (!this.shouldRetry(condition, attempt)) {
        break;
      }

      retryCount++;
      this.logger.warn(`${this.provider.name} ${role} call failed (${condition}), retry ${retryCount}`);
      await this.delay(attempt);
    }

    return {
      success: false,
      error: `PROVIDER_ERROR: ${lastError}`,
      usage: { ...EMPTY_USAGE },
      metadata: this.metadata(requestId, promptVersion, role, startTime, retryCount)
    };
  }

  getSessionUsage(): TokenUsage {
    return { ...this.sessionUsage };
  }

  // ============================================================================
  // Private Helpers
  // ============================================================================

  private metadata(requestId: string, promptVersion: string, role: AgentRole, startTime: number, retryCount: number) {
    return {
      requestId,
      model: this.provider.modelId,
      promptVersion,
      role,
      latencyMs: Date.now() - startTime,
      retryCount,
      timestamp: new Date()
    };
  }

  private updateSessionUsage(usage: TokenUsage): void {
    this.sessionUsage.inputTokens += usage.inputTokens;
    this.sessionUsage.outputTokens += usage.outputTokens;
    this.sessionUsage.totalTokens += usage.totalTokens;
  }

  private shouldRetry(condition: RetryCondition, attempt: number): boolean {
    return attempt < this.retryConfig.maxRetries && this.retryConfig.retryOn.includes(condition);
  }

  private async delay(attempt: number): Promise<void> {
    const delay = Math.min(this.retryConfig.baseDelayMs * Math.pow(2, attempt), this.retryConfig.maxDelayMs);
    await new Promise((resolve) => setTimeout(resolve, delay));
  }
}

export function classifyError(message: string): RetryCondition {
  const lowered = message.toLowerCase();

  if (lowered.includes('rate limit') || lowered.includes('429')) {
    return 'rate_limit';
  }
  if (lowered.includes('timeout') || lowered.includes('timed out') || lowered.includes('aborted')) {
    return 'timeout';
  }
  if (lowered.includes('500') || lowered.includes('502') || lowered.includes('503')) {
    return 'server_error';
  }

  return 'invalid_response';
}

// ============================================================================
// Stub Provider (for testing)
// ============================================================================

export class StubLLMProvider implements LLMProvider {
  name = 'stub';
  modelId = 'stub-model';

  readonly calls: LLMInput[] = [];
  private readonly queued = new Map<AgentRole, string[]>();
  private defaultResponse = '';

  /**
   * Queue responses for a role; they are returned in order, the last one repeating.
   */
  setResponses(role: AgentRole, responses: string[]): void {
    this.queued.set(role, [...responses]);
  }

  setDefaultResponse(response: string): void {
    this.defaultResponse = response;
  }

  async call(input: LLMInput): Promise<LLMResponse> {
    this.calls.push(input);

    const queue = this.queued.get(input.role) ?? [];
    const rawContent = (queue.length > 1 ? queue.shift() : queue[0]) ?? this.defaultResponse;
    const inputTokens = estimateTokens(input.messages.map((m) => m.content).join('\n'));
    const outputTokens = estimateTokens(rawContent);

    return {
      success: true,
      rawContent,
      usage: { inputTokens, outputTokens, totalTokens: inputTokens + outputTokens },
      metadata: {
        requestId: randomUUID(),
        model: this.modelId,
        promptVersion: input.promptVersion,
        role: input.role,
        latencyMs: 0,
        retryCount: 0,
        timestamp: new Date()
      }
    };
  }
}

/**
 * Rough estimate: ~4 characters per token.
 */
export function estimateTokens(text: string): number {
  return Math.ceil(text.length / 4);
}
