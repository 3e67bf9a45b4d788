import 'reflect-metadata';

export * from './config/settings';

export * from './patch/errors';
export * from './patch/diff-files';
export * from './patch/extractor';
export * from './patch/normalizer';
export * from './patch/change-detector';
export * from './patch/diff-generator';
export * from './patch/applier';
export * from './patch/rewrite';

export * from './refinement/attempt-state';
export * from './refinement/transition';
export * from './refinement/refinement-loop';

export * from './git/command';
export * from './git/apply-strategies';
export * from './git/working-tree';
export * from './git/test-runner';

export * from './llm/types';
export * from './llm/prompts';
export * from './llm/runner';
export * from './llm/plan';
export * from './llm/fix-client';
export * from './llm/openai-provider';
export * from './llm/anthropic-provider';
export * from './llm/provider-factory';

export * from './github';

export * from './workflow/progress';
export * from './workflow/issue';
export * from './workflow/context';
export * from './workflow/fix-workflow';
export * from './workflow/create-deps';
