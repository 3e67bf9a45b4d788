/**
 * LLM Provider Factory
 *
 * Selects the LLM provider from the `llm` block of the settings.
 *
 * Environment Variables (read by loadSettings):
 *   LLM_PROVIDER               - openai|azure|anthropic, defaults to 'azure'
 *   AZURE_OPENAI_ENDPOINT      - Azure resource endpoint
 *   AZURE_OPENAI_KEY           - Azure API key
 *   AZURE_OPENAI_DEPLOYMENT    - Azure deployment name
 *   AZURE_OPENAI_API_VERSION   - Azure API version
 *   OPENAI_API_KEY / ANTHROPIC_API_KEY
 *   LLM_MODEL, LLM_BASE_URL    - model and endpoint for openai/anthropic
 */

import { Logger } from '@nestjs/common';
import type { LLMSettings } from '../config/settings';
import { AnthropicLLMProvider } from './anthropic-provider';
import { OpenAILLMProvider } from './openai-provider';
import { StubLLMProvider } from './runner';
import type { LLMProvider } from './types';

const logger = new Logger('ProviderFactory');

/**
 * Create the configured provider. Returns null if the API key is not set.
 */
export function createProvider(llm: LLMSettings): LLMProvider | null {
  if (!llm.apiKey) {
    return null;
  }

  switch (llm.provider) {
    case 'azure':
      return new OpenAILLMProvider({
        apiKey: llm.apiKey,
        modelId: llm.modelId,
        timeout: llm.timeoutMs,
        azureEndpoint: llm.baseUrl,
        apiVersion: llm.apiVersion
      });

    case 'openai':
      return new OpenAILLMProvider({
        apiKey: llm.apiKey,
        modelId: llm.modelId,
        timeout: llm.timeoutMs,
        baseUrl: llm.baseUrl
      });

    case 'anthropic':
      return new AnthropicLLMProvider({
        apiKey: llm.apiKey,
        modelId: llm.modelId,
        timeout: llm.timeoutMs,
        baseUrl: llm.baseUrl
      });
  }
}

/**
 * Create the configured provider, falling back to StubLLMProvider when no API key is available.
 */
export function createProviderWithFallback(llm: LLMSettings): LLMProvider {
  const provider = createProvider(llm);
  if (provider) {
    return provider;
  }

  logger.warn(`No API key found for ${llm.provider} provider; using the stub provider.`);
  return new StubLLMProvider();
}
