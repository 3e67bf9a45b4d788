/**
 * Issue details handed to the fix workflow by whatever tracker fetched them.
 */
export interface IssueDetails {
  key?: string;
  summary?: string;
  description?: string;
  url?: string;
  status?: string;
  priority?: string;
  errorCode?: string;
  stackTrace?: string;
}

export function formatIssuePrompt(issue: IssueDetails): string {
  return [
    `Issue ${issue.key ?? 'ISSUE'}: ${issue.summary ?? ''}`,
    `Status: ${issue.status ?? 'n/a'} | Priority: ${issue.priority ?? 'n/a'}`,
    'Description:',
    issue.description ?? '',
    `Error Code: ${issue.errorCode ?? 'n/a'}`,
    'Stack Trace:',
    issue.stackTrace ?? 'n/a',
    `URL: ${issue.url ?? 'n/a'}`
  ].join('\n');
}
