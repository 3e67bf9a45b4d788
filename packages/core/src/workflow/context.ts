/**
 * Repository context for prompts: working tree status, files named in the
 * issue and files the plan intends to touch.
 */

import path from 'path';
import type { WorkingTree, WorkingTreeReader } from '../git/working-tree';
import type { Plan } from '../llm/plan';
import type { IssueDetails } from './issue';

const STACK_FILE_PATTERN = /([A-Za-z0-9_./\\-]+\.(?:js|jsx|ts|tsx|java|kt|py|rb|go))(?::(\d+))?/g;
const MAX_FILE_LINES = 400;
const MAX_STACK_FILES = 5;
const SNIPPET_CONTEXT = 5;

export async function collectIssueContext(issue: IssueDetails, tree: WorkingTree): Promise<string> {
  const sections = [`## Repo Status\n${await tree.summary()}`];

  const stackSnippets = await stackTraceSnippets(issue.stackTrace, tree);
  if (stackSnippets.length > 0) {
    sections.push(`## Stack Trace Matches\n${stackSnippets.join('\n\n')}`);
  }
  if (issue.description?.trim()) {
    sections.push(`## Issue Description\n\`\`\`\n${issue.description.trim()}\n\`\`\``);
  }
  if (issue.stackTrace?.trim()) {
    sections.push(`## Issue Stack Trace\n\`\`\`\n${issue.stackTrace.trim()}\n\`\`\``);
  }

  return sections.join('\n\n');
}

/**
 * Full text of each existing file the plan proposes to change.
 */
export async function collectPlanFileContext(plan: Plan, tree: WorkingTreeReader): Promise<string> {
  const seen = new Set<string>();
  const rendered: string[] = [];

  for (const change of plan.proposed_changes) {
    const file = change.file.trim().replace(/^[./]+/, '');
    if (!file || seen.has(file) || !(await safeExists(tree, file))) continue;
    seen.add(file);
    rendered.push(renderFile(file, await tree.readText(file)));
  }

  return rendered.length > 0 ? `## Files Referenced in Plan\n${rendered.join('\n\n')}` : '';
}

export function renderFile(file: string, text: string, maxLines = MAX_FILE_LINES): string {
  const lines = text.split('\n');
  if (lines[lines.length - 1] === '') lines.pop();

  const body = lines.slice(0, maxLines).map((line, idx) => `${String(idx + 1).padStart(4)}: ${line}`);
  if (lines.length > maxLines) {
    body.push('... (truncated)');
  }
  return `File: ${file}\n\`\`\`${fenceLanguage(file)}\n${body.join('\n')}\n\`\`\``;
}

function fenceLanguage(file: string): string {
  const ext = path.extname(file).toLowerCase();
  if (ext === '.json') return 'json';
  if (['.js', '.jsx', '.ts', '.tsx'].includes(ext)) return 'jsx';
  return '';
}

async function stackTraceSnippets(stackTrace: string | undefined, tree: WorkingTreeReader): Promise<string[]> {
  if (!stackTrace) return [];

  const seen = new Set<string>();
  const snippets: string[] = [];
  for (const match of stackTrace.matchAll(STACK_FILE_PATTERN)) {
    const file = match[1];
    const line = Number(match[2] ?? '1');
    if (seen.has(file) || !(await safeExists(tree, file))) continue;
    seen.add(file);

    const lines = (await tree.readText(file)).split('\n');
    const start = Math.max(line - SNIPPET_CONTEXT - 1, 0);
    const end = Math.min(line + SNIPPET_CONTEXT, lines.length);
    const body = lines.slice(start, end).map((content, idx) => `${String(start + idx + 1).padStart(4)}: ${content}`);
    snippets.push(`File: ${file}\n${body.join('\n')}`);

    if (snippets.length >= MAX_STACK_FILES) break;
  }
  return snippets;
}

// Paths from model or tracker text may point outside the tree
async function safeExists(tree: WorkingTreeReader, file: string): Promise<boolean> {
  try {
    return await tree.exists(file);
  } catch {
    return false;
  }
}
