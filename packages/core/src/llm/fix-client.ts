/**
 * Fix LLM Client
 *
 * The four requests the fix workflow makes of the model, on top of LLMRunner.
 */

import { Logger } from '@nestjs/common';
import { buildPatchMessage, buildPlanMessage, buildRefineMessage, buildRewriteMessage } from './prompts';
import { parsePlanResponse, type Plan, type PlanResult } from './plan';
import type { LLMRunner } from './runner';
import type { AgentRole } from './types';

export class LLMRequestError extends Error {
  readonly name = 'LLMRequestError';

  constructor(
    readonly role: AgentRole,
    readonly reason: string
  ) {
    super(`LLM ${role} request failed: ${reason}`);
  }
}

export class FixLLMClient {
  private readonly logger = new Logger(FixLLMClient.name);

  constructor(private readonly runner: LLMRunner) {}

  async generatePlan(issuePrompt: string, repoSummary: string): Promise<PlanResult> {
    const raw = await this.request('planner', buildPlanMessage(issuePrompt, repoSummary));
    const result = parsePlanResponse(raw);
    if (result.kind !== 'parsed') {
      this.logger.warn(`Planner response was ${result.kind}`);
    }
    return result;
  }

  async proposePatch(issuePrompt: string, plan: Plan, repoContext: string): Promise<string> {
    return this.request('patcher', buildPatchMessage(issuePrompt, plan, repoContext));
  }

  async refinePatch(
    issuePrompt: string,
    plan: Plan,
    repoContext: string,
    failedPatch: string,
    errorMessage: string
  ): Promise<string> {
    return this.request('refiner', buildRefineMessage(issuePrompt, plan, repoContext, failedPatch, errorMessage));
  }

  async rewriteFile(issuePrompt: string, plan: Plan, filePath: string, currentText: string): Promise<string> {
    return this.request('rewriter', buildRewriteMessage(issuePrompt, plan, filePath, currentText));
  }

  private async request(role: AgentRole, userPrompt: string): Promise<string> {
    const response = await this.runner.run(role, userPrompt);
    if (!response.success) {
      throw new LLMRequestError(role, response.error ?? 'unknown error');
    }
    return (response.rawContent ?? '').trim();
  }
}
