import { loadSettings, type SettingsOverrides } from '@core/config/settings';
import { GitWorkingTree } from '@core/git/working-tree';
import { OctokitPullRequestClient } from '@core/github/octokit-client';
import { StubPullRequestClient } from '@core/github/pull-request-client';
import { StubLLMProvider } from '@core/llm/runner';
import { createFixWorkflowDeps } from '@core/workflow/create-deps';

describe('createFixWorkflowDeps', () => {
  const settings = (github: SettingsOverrides['github'] = {}) =>
    loadSettings({ repoPath: '/srv/repo', llm: { provider: 'openai' }, github }, {}, { envFile: null });

  it('should wire a git working tree at the repository path', () => {
    const deps = createFixWorkflowDeps(settings());

    expect(deps.tree).toBeInstanceOf(GitWorkingTree);
    expect(deps.tree.root).toBe('/srv/repo');
    expect(deps.pullRequests).toBeUndefined();
  });

  it('should open pull requests through Octokit when a token is set', () => {
    const deps = createFixWorkflowDeps(settings({ token: 'test-token' }));

    expect(deps.pullRequests).toBeInstanceOf(OctokitPullRequestClient);
  });

  it('should accept replacements', () => {
    const pullRequests = new StubPullRequestClient();
    const provider = new StubLLMProvider();

    const deps = createFixWorkflowDeps(settings({ token: 'test-token' }), { provider, pullRequests });

    expect(deps.pullRequests).toBe(pullRequests);
  });
});
