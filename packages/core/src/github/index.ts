export * from './pull-request-client';
export * from './octokit-client';
