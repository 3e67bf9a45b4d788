/**
 * Pull Request Client Interface and Types
 *
 * Implemented by:
 * - StubPullRequestClient: For testing (no real API calls)
 * - OctokitPullRequestClient: For production (GitHub REST API via Octokit)
 */

export type OpenPullRequestParams = {
  owner: string;
  repo: string;
  head: string;
  base: string;
  title: string;
  body?: string;
  draft?: boolean;
  reviewers?: string[];
};

export type OpenPullRequestResult = {
  url: string;
  number: number;
};

export interface PullRequestClient {
  openPullRequest(params: OpenPullRequestParams): Promise<OpenPullRequestResult>;
}

/**
 * Split "owner/name" into its parts.
 */
export function parseRepoSlug(slug: string): { owner: string; repo: string } {
  const match = /^([^/\s]+)\/([^/\s]+)$/.exec(slug.trim());
  if (!match) {
    throw new Error(`Repository must look like owner/name, got "${slug}"`);
  }
  return { owner: match[1], repo: match[2].replace(/\.git$/, '') };
}

// ============================================================================
// Stub Implementation (for testing)
// ============================================================================

export class StubPullRequestClient implements PullRequestClient {
  private nextPrNumber = 1;
  readonly opened: OpenPullRequestParams[] = [];

  async openPullRequest(params: OpenPullRequestParams): Promise<OpenPullRequestResult> {
    this.opened.push(params);
    const number = this.nextPrNumber++;
    return {
      url: `https://github.com/${params.owner}/${params.repo}/pull/${number}`,
      number
    };
  }
}
