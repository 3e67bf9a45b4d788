/**
 * Fix Workflow
 *
 * Issue in, branch (and optionally a pull request) out:
 * plan, propose patches, apply each with refinement, test, commit, publish.
 */

import { Logger } from '@nestjs/common';
import { randomBytes } from 'crypto';
import type { Settings } from '../config/settings';
import type { WorkingTree } from '../git/working-tree';
import { formatTestResults, runTestCommands, type TestCommandResult } from '../git/test-runner';
import { parseRepoSlug, type PullRequestClient } from '../github/pull-request-client';
import { planForPrompt, type Plan, type PlanResult } from '../llm/plan';
import type { PatchApplier } from '../patch/applier';
import { PatchExtractionError } from '../patch/errors';
import { extractPatches } from '../patch/extractor';
import { applyWithRefinement, type PatchRefiner } from '../refinement/refinement-loop';
import { collectIssueContext, collectPlanFileContext } from './context';
import { formatIssuePrompt, type IssueDetails } from './issue';
import { createProgressEmitter, type ProgressSink } from './progress';

const PREVIEW_LINES = 80;

export interface IssueFixModel extends PatchRefiner {
  generatePlan(issuePrompt: string, repoSummary: string): Promise<PlanResult>;
  proposePatch(issuePrompt: string, plan: Plan, repoContext: string): Promise<string>;
}

export type TestRunner = (commands: string[], cwd: string) => Promise<TestCommandResult[]>;

export interface FixWorkflowDeps {
  settings: Settings;
  llm: IssueFixModel;
  tree: WorkingTree;
  applier: PatchApplier;
  /** Required to open a pull request; without it the run stops after pushing. */
  pullRequests?: PullRequestClient;
  runTests?: TestRunner;
  onProgress?: ProgressSink;
}

export interface FixWorkflowResult {
  issue: string | null;
  branch: string;
  prUrl: string | null;
}

export class NoChangesError extends Error {
  readonly name = 'NoChangesError';

  constructor() {
    super('No changes detected after applying patch');
  }
}

const logger = new Logger('FixWorkflow');

export async function runFixWorkflow(deps: FixWorkflowDeps, issue: IssueDetails): Promise<FixWorkflowResult> {
  const { settings, llm, tree } = deps;
  const emit = createProgressEmitter(deps.onProgress);
  const issuePrompt = formatIssuePrompt(issue);

  emit('issue_received', { issue });

  // 1. Plan
  const baseContext = await collectIssueContext(issue, tree);
  const planResult = await llm.generatePlan(issuePrompt, baseContext);
  const plan = planForPrompt(planResult);
  const planFiles = await collectPlanFileContext(plan, tree);
  const repoContext = planFiles ? `${baseContext}\n\n${planFiles}` : baseContext;
  emit('plan_generated', { kind: planResult.kind, plan, summary: plan.analysis, tests: plan.tests });

  // 2. Propose
  const patches = extractPatches(await llm.proposePatch(issuePrompt, plan, repoContext));
  if (patches.length === 0) {
    throw new PatchExtractionError();
  }
  emit('patches_proposed', { count: patches.length });

  // 3. Branch
  const branch = buildBranchName(settings.branchPrefix, issue.key);
  await tree.ensureBranch(settings.baseBranch, branch);
  emit('branch_ready', { branch });

  // 4. Apply
  for (const [offset, patch] of patches.entries()) {
    const index = offset + 1;
    emit('patch_apply_queue', { index, total: patches.length });
    emit('patch_preview', { index, diff: diffSnippet(patch) });
    await applyWithRefinement({
      llm,
      applier: deps.applier,
      tree,
      issuePrompt,
      plan,
      repoContext,
      patchText: patch,
      maxAttempts: settings.maxPatchAttempts,
      emit
    });
    emit('patch_applied', { index });
  }

  // 5. Verify the working tree moved
  const changed = await tree.changedFiles();
  if (changed.length === 0) {
    throw new NoChangesError();
  }
  emit('workspace_changed', { files: changed });

  // 6. Test and commit
  let testResults: TestCommandResult[] | null = null;
  if (settings.testCommands.length > 0) {
    const runTests = deps.runTests ?? runTestCommands;
    testResults = await runTests(settings.testCommands, tree.root);
    emit('tests_completed', { commands: settings.testCommands, results: testResults });
  } else {
    emit('tests_skipped', {});
  }

  const commitMessage = `${issue.key ?? 'ISSUE'}: ${issue.summary ?? 'Auto fix'}`;
  await tree.commitAll(commitMessage);
  emit('commit_created', { message: commitMessage });

  const result: FixWorkflowResult = { issue: issue.key ?? null, branch, prUrl: null };

  // 7. Publish
  if (settings.dryRun) {
    logger.log('Dry run mode - skipping push and PR.');
    emit('dry_run_complete', { branch });
    return result;
  }

  await tree.pushBranch(branch);
  emit('branch_pushed', { branch });

  const { token, repo } = settings.github;
  if (deps.pullRequests && token && repo) {
    const { owner, repo: name } = parseRepoSlug(repo);
    const pr = await deps.pullRequests.openPullRequest({
      owner,
      repo: name,
      head: branch,
      base: settings.baseBranch,
      title: commitMessage,
      body: buildPullRequestBody(issue, plan, testResults, settings.testCommands),
      draft: false,
      reviewers: settings.github.reviewers
    });
    logger.log(`PR created: ${pr.url}`);
    result.prUrl = pr.url;
    emit('pr_created', { url: pr.url });
  } else {
    logger.warn('GitHub credentials missing - push completed without PR.');
    emit('push_complete', { branch });
  }

  return result;
}

/**
 * `<prefix>/<slug>-<6 hex>`; the suffix keeps reruns on the same issue apart.
 */
export function buildBranchName(prefix: string, issueKey?: string): string {
  const slug = (issueKey || 'issue').toLowerCase().replace(/ /g, '-');
  return `${prefix}/${slug}-${randomBytes(3).toString('hex')}`;
}

export function diffSnippet(diffText: string, maxLines = PREVIEW_LINES): string {
  const trimmed = diffText.trim();
  if (!trimmed) return '';
  const lines = trimmed.split('\n');
  const snippet = lines.slice(0, maxLines).join('\n');
  return lines.length > maxLines ? `${snippet}\n...` : snippet;
}

export function buildPullRequestBody(
  issue: IssueDetails,
  plan: Plan,
  testResults: TestCommandResult[] | null,
  testCommands: string[]
): string {
  const summary = plan.analysis.trim() || `Automated fix for ${issue.key ?? 'issue'}`;
  return [
    '## Summary',
    `- Issue: ${issue.url ?? issue.key ?? 'n/a'}`,
    `- Fix: ${summary}`,
    '',
    '## Tests',
    formatTestResults(testResults, testCommands)
  ].join('\n');
}
