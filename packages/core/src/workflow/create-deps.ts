/**
 * Production wiring for the fix workflow: a git working tree at
 * `settings.repoPath`, the configured LLM provider, the external apply
 * strategies and, when a GitHub token is set, an Octokit pull request client.
 */

import { Logger } from '@nestjs/common';
import type { Settings } from '../config/settings';
import { GitWorkingTree } from '../git/working-tree';
import { OctokitPullRequestClient } from '../github/octokit-client';
import type { PullRequestClient } from '../github/pull-request-client';
import { FixLLMClient } from '../llm/fix-client';
import { createProviderWithFallback } from '../llm/provider-factory';
import { LLMRunner } from '../llm/runner';
import type { LLMProvider } from '../llm/types';
import { PatchApplier } from '../patch/applier';
import type { FixWorkflowDeps } from './fix-workflow';
import type { ProgressSink } from './progress';

const logger = new Logger('FixWorkflowDeps');

export interface CreateDepsOptions {
  onProgress?: ProgressSink;
  /** Replaces the provider chosen from `settings.llm`. */
  provider?: LLMProvider;
  /** Replaces the Octokit client. */
  pullRequests?: PullRequestClient;
}

export function createFixWorkflowDeps(settings: Settings, options: CreateDepsOptions = {}): FixWorkflowDeps {
  const provider = options.provider ?? createProviderWithFallback(settings.llm);
  logger.log(`Using ${provider.name} provider (${provider.modelId})`);

  return {
    settings,
    llm: new FixLLMClient(new LLMRunner({ provider })),
    tree: new GitWorkingTree(settings.repoPath),
    applier: new PatchApplier(),
    pullRequests: options.pullRequests ?? createPullRequestClient(settings),
    onProgress: options.onProgress
  };
}

function createPullRequestClient(settings: Settings): PullRequestClient | undefined {
  const { token, baseUrl } = settings.github;
  return token ? OctokitPullRequestClient.fromToken(token, baseUrl) : undefined;
}
