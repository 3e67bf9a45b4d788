/**
 * Role-Based Prompts
 *
 * System prompts for each request the fix workflow makes, with versioning,
 * plus the builders for the matching user messages.
 */

import type { AgentRole, RoleConfig } from './types';

// ============================================================================
// Role Prompts
// ============================================================================

const PLANNER_PROMPT_V1 = `You are a senior engineer. Produce a terse JSON plan for fixing the bug.

Respond with JSON containing the keys:
- analysis: one paragraph on the root cause
- proposed_changes: array of { "file": <repo-relative path>, "change": <what to change> }
- tests: the concrete regression test you will add or update`;

const PATCHER_PROMPT_V1 = `You output unified diff patches compatible with git apply.

Constraints:
- Each file must start with 'diff --git' and include proper context
- Wrap the entire response in one \`\`\`diff code fence
- Only modify the minimal lines related to the bug; do not rewrite unrelated code
- Always include the test changes required to prove the fix`;

const REFINER_PROMPT_V1 = `You output unified diff patches compatible with git apply.

Constraints:
- Each file must begin with diff --git and include context
- Wrap everything in a \`\`\`diff fence
- Only touch lines relevant to the failure
- Include or fix the corresponding test case`;

const REWRITER_PROMPT_V1 = `Rewrite the provided file to fix the bug.

Return the full file content only, inside a single code fence.
Do not include explanations.`;

// ============================================================================
// Prompt Registry
// ============================================================================

const PROMPT_VERSIONS: Record<AgentRole, Map<string, string>> = {
  planner: new Map([['v1', PLANNER_PROMPT_V1]]),
  patcher: new Map([['v1', PATCHER_PROMPT_V1]]),
  refiner: new Map([['v1', REFINER_PROMPT_V1]]),
  rewriter: new Map([['v1', REWRITER_PROMPT_V1]])
};

const CURRENT_VERSIONS: Record<AgentRole, string> = {
  planner: 'v1',
  patcher: 'v1',
  refiner: 'v1',
  rewriter: 'v1'
};

/**
 * Get the system prompt for a role and version.
 */
export function getPrompt(role: AgentRole, version?: string): string {
  const targetVersion = version ?? CURRENT_VERSIONS[role];
  const prompt = PROMPT_VERSIONS[role].get(targetVersion);

  if (prompt === undefined) {
    throw new Error(`Unknown prompt version ${targetVersion} for role ${role}`);
  }

  return prompt;
}

export function getCurrentVersion(role: AgentRole): string {
  return CURRENT_VERSIONS[role];
}

export function getRoleConfig(role: AgentRole): RoleConfig {
  const configs: Record<AgentRole, Omit<RoleConfig, 'role' | 'systemPrompt'>> = {
    planner: { temperature: 0.2, maxTokens: 2000 },
    patcher: { temperature: 0.1, maxTokens: 8000 },
    refiner: { temperature: 0.1, maxTokens: 8000 },
    rewriter: { temperature: 0.1, maxTokens: 8000 }
  };

  return {
    role,
    systemPrompt: getPrompt(role),
    ...configs[role]
  };
}

export function registerPromptVersion(role: AgentRole, version: string, prompt: string): void {
  PROMPT_VERSIONS[role].set(version, prompt);
}

// ============================================================================
// User Messages
// ============================================================================

function formatPlan(plan: unknown): string {
  return JSON.stringify(plan, null, 2);
}

export function buildPlanMessage(issuePrompt: string, repoSummary: string): string {
  return [
    'Issue:',
    issuePrompt,
    '',
    'Repository status:',
    repoSummary,
    'Respond with JSON containing keys analysis, proposed_changes, tests. ' +
      'Tests section must describe the concrete regression test you will add or update.'
  ].join('\n');
}

export function buildPatchMessage(issuePrompt: string, plan: unknown, repoContext: string): string {
  return [
    'Issue:',
    issuePrompt,
    'Plan:',
    formatPlan(plan),
    'Repository context:',
    repoContext,
    'Return diff relative to working tree.'
  ].join('\n');
}

export function buildRefineMessage(
  issuePrompt: string,
  plan: unknown,
  repoContext: string,
  failedPatch: string,
  errorMessage: string
): string {
  return [
    'Issue:',
    issuePrompt,
    'Plan:',
    formatPlan(plan),
    'Repository context:',
    repoContext,
    'The previous patch failed to apply with error:',
    errorMessage,
    'Here is the failing patch:',
    '```diff',
    failedPatch,
    '```',
    'Return a corrected patch.'
  ].join('\n');
}

export function buildRewriteMessage(issuePrompt: string, plan: unknown, filePath: string, currentText: string): string {
  return [
    'Issue:',
    issuePrompt,
    'Plan:',
    formatPlan(plan),
    '',
    `File path: ${filePath}`,
    'Current contents:',
    '```',
    currentText,
    '```',
    'Return the corrected file contents.'
  ].join('\n');
}
