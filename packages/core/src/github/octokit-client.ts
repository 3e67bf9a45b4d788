/**
 * Octokit Pull Request Client
 *
 * Opens pull requests through the GitHub REST API with a token.
 */

import { Logger } from '@nestjs/common';
import { Octokit } from '@octokit/rest';
import type { OpenPullRequestParams, OpenPullRequestResult, PullRequestClient } from './pull-request-client';

export class OctokitPullRequestClient implements PullRequestClient {
  private readonly logger = new Logger(OctokitPullRequestClient.name);
  private readonly octokit: Octokit;

  constructor(octokit: Octokit) {
    this.octokit = octokit;
  }

  /**
   * Create a client from a personal access token. `baseUrl` selects GitHub Enterprise.
   */
  static fromToken(token: string, baseUrl?: string): OctokitPullRequestClient {
    const octokit = new Octokit({
      auth: token,
      baseUrl
    });
    return new OctokitPullRequestClient(octokit);
  }

  async openPullRequest(params: OpenPullRequestParams): Promise<OpenPullRequestResult> {
    const { data } = await this.octokit.pulls.create({
      owner: params.owner,
      repo: params.repo,
      head: params.head,
      base: params.base,
      title: params.title,
      body: params.body,
      draft: params.draft
    });

    if (params.reviewers && params.reviewers.length > 0) {
      try {
        await this.octokit.pulls.requestReviewers({
          owner: params.owner,
          repo: params.repo,
          pull_number: data.number,
          reviewers: params.reviewers
        });
      } catch (error) {
        this.logger.warn(
          `Could not request reviewers on #${data.number}: ${error instanceof Error ? error.message : String(error)}`
        );
      }
    }

    return {
      url: data.html_url,
      number: data.number
    };
  }
}
