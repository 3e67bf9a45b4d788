/**
 * LLM Types
 *
 * Core types for the LLM layer the fix workflow talks to.
 */

// ============================================================================
// Role Types
// ============================================================================

/**
 * Roles map to the four requests the workflow makes of the model.
 */
export type AgentRole =
  | 'planner'   // Terse JSON plan for the fix
  | 'patcher'   // First unified diff for the plan
  | 'refiner'   // Corrected diff after an apply failure
  | 'rewriter'; // Whole corrected file, last resort

/**
 * Role configuration including system prompt and sampling.
 */
export interface RoleConfig {
  role: AgentRole;
  systemPrompt: string;
  temperature: number;
  maxTokens: number;
}

// ============================================================================
// Input/Output Types
// ============================================================================

export interface LLMMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface LLMInput {
  role: AgentRole;
  promptVersion: string;
  messages: LLMMessage[];
  temperature: number;
  maxOutputTokens: number;
}

/**
 * LLM response. Transport failures come back as `success: false`
 * rather than as thrown errors.
 */
export interface LLMResponse {
  success: boolean;
  rawContent?: string;
  error?: string;
  usage: TokenUsage;
  metadata: ResponseMetadata;
}

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
}

export interface ResponseMetadata {
  requestId: string;
  model: string;
  promptVersion: string;
  role: AgentRole;
  latencyMs: number;
  retryCount: number;
  timestamp: Date;
}

// ============================================================================
// Retry Types
// ============================================================================

export interface RetryConfig {
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  retryOn: RetryCondition[];
}

export type RetryCondition =
  | 'rate_limit'
  | 'timeout'
  | 'server_error'
  | 'invalid_response';

// ============================================================================
// Provider Types
// ============================================================================

/**
 * LLM Provider interface for multiple backends.
 */
export interface LLMProvider {
  name: string;
  modelId: string;
  call(input: LLMInput): Promise<LLMResponse>;
}

export const EMPTY_USAGE: TokenUsage = {
  inputTokens: 0,
  outputTokens: 0,
  totalTokens: 0
};
