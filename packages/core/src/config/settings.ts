import { existsSync, readFileSync } from 'fs';
import path from 'path';
import dotenv from 'dotenv';
import { z } from 'zod';

export const llmProviderSchema = z.enum(['openai', 'azure', 'anthropic']);

export type LLMProviderName = z.infer<typeof llmProviderSchema>;

const DEFAULT_MODELS: Record<LLMProviderName, string> = {
  openai: 'gpt-4o',
  azure: 'gpt-4o',
  anthropic: 'claude-3-5-sonnet-20241022'
};

export const llmSettingsSchema = z
  .object({
    provider: llmProviderSchema.default('azure'),
    apiKey: z.string().min(1).optional(),
    modelId: z.string().min(1),
    baseUrl: z.string().url().optional(),
    apiVersion: z.string().min(1).optional(),
    timeoutMs: z.number().int().positive().default(120000)
  })
  .refine((llm) => llm.provider !== 'azure' || llm.baseUrl !== undefined, {
    message: 'AZURE_OPENAI_ENDPOINT is required for the azure provider',
    path: ['baseUrl']
  });

export type LLMSettings = z.infer<typeof llmSettingsSchema>;

export const githubSettingsSchema = z.object({
  token: z.string().min(1).optional(),
  repo: z
    .string()
    .regex(/^[^/\s]+\/[^/\s]+$/, 'GITHUB_REPO must look like owner/name')
    .optional(),
  baseUrl: z.string().url().default('https://api.github.com'),
  reviewers: z.array(z.string().min(1)).default([])
});

export type GitHubSettings = z.infer<typeof githubSettingsSchema>;

export const settingsSchema = z.object({
  repoPath: z.string().min(1),
  baseBranch: z.string().min(1).default('main'),
  branchPrefix: z.string().min(1).default('agent'),
  testCommands: z.array(z.string().min(1)).default([]),
  maxPatchAttempts: z.number().int().min(1).default(3),
  dryRun: z.boolean().default(false),
  llm: llmSettingsSchema,
  github: githubSettingsSchema
});

export type Settings = z.infer<typeof settingsSchema>;

export interface SettingsOverrides {
  repoPath?: string;
  baseBranch?: string;
  branchPrefix?: string;
  testCommands?: string[];
  maxPatchAttempts?: number;
  dryRun?: boolean;
  llm?: Partial<LLMSettings>;
  github?: Partial<GitHubSettings>;
}

export interface LoadSettingsOptions {
  /** Path of a dotenv file whose values sit below `env`; null disables it. */
  envFile?: string | null;
}

type Env = Record<string, string | undefined>;

/**
 * Build the settings struct once: overrides, then environment, then defaults.
 */
export function loadSettings(
  overrides: SettingsOverrides = {},
  env: Env = process.env,
  options: LoadSettingsOptions = {}
): Settings {
  const envFile = options.envFile === undefined ? path.resolve(process.cwd(), '.env') : options.envFile;
  const source: Env = { ...readEnvFile(envFile), ...env };

  const provider = overrides.llm?.provider ?? parseProvider(source.LLM_PROVIDER);
  const providerName = provider ?? 'azure';

  const payload = {
    repoPath: path.resolve(overrides.repoPath ?? source.AGENT_REPO ?? process.cwd()),
    baseBranch: overrides.baseBranch ?? source.AGENT_BASE_BRANCH,
    branchPrefix: overrides.branchPrefix ?? source.AGENT_BRANCH_PREFIX,
    testCommands: overrides.testCommands ?? splitList(source.AGENT_TEST_COMMANDS, ';'),
    maxPatchAttempts: overrides.maxPatchAttempts ?? parseInteger(source.AGENT_MAX_PATCH_ATTEMPTS),
    dryRun: overrides.dryRun ?? parseFlag(source.AGENT_DRY_RUN),
    llm: {
      provider,
      apiKey: overrides.llm?.apiKey ?? blankToUndefined(apiKeyFor(providerName, source)),
      modelId:
        overrides.llm?.modelId ??
        blankToUndefined(providerName === 'azure' ? source.AZURE_OPENAI_DEPLOYMENT : source.LLM_MODEL) ??
        DEFAULT_MODELS[providerName],
      baseUrl:
        overrides.llm?.baseUrl ??
        blankToUndefined(providerName === 'azure' ? source.AZURE_OPENAI_ENDPOINT : source.LLM_BASE_URL),
      apiVersion: overrides.llm?.apiVersion ?? blankToUndefined(source.AZURE_OPENAI_API_VERSION),
      timeoutMs: overrides.llm?.timeoutMs ?? parseInteger(source.LLM_TIMEOUT_MS)
    },
    github: {
      token: overrides.github?.token ?? blankToUndefined(source.GITHUB_TOKEN),
      repo: overrides.github?.repo ?? blankToUndefined(source.GITHUB_REPO),
      baseUrl: overrides.github?.baseUrl ?? blankToUndefined(source.GITHUB_API_URL),
      reviewers: overrides.github?.reviewers ?? splitList(source.GITHUB_REVIEWERS, ',')
    }
  };

  const parsed = settingsSchema.safeParse(payload);
  if (!parsed.success) {
    const message = parsed.error.issues.map((issue) => issue.message).join('; ');
    throw new Error(`Failed to load settings: ${message}`);
  }

  return parsed.data;
}

function readEnvFile(envFile: string | null): Env {
  if (!envFile || !existsSync(envFile)) {
    return {};
  }
  return dotenv.parse(readFileSync(envFile));
}

function apiKeyFor(provider: LLMProviderName, env: Env): string | undefined {
  switch (provider) {
    case 'azure':
      return env.AZURE_OPENAI_KEY ?? env.AZURE_OPENAI_API_KEY;
    case 'anthropic':
      return env.ANTHROPIC_API_KEY;
    case 'openai':
      return env.OPENAI_API_KEY;
  }
}

function parseProvider(value: string | undefined): LLMProviderName | undefined {
  const parsed = llmProviderSchema.safeParse(value?.trim().toLowerCase());
  return parsed.success ? parsed.data : undefined;
}

function splitList(value: string | undefined, separator: string): string[] | undefined {
  if (value === undefined) {
    return undefined;
  }
  return value
    .split(separator)
    .map((part) => part.trim())
    .filter((part) => part.length > 0);
}

function parseInteger(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  return Number(value);
}

function parseFlag(value: string | undefined): boolean | undefined {
  if (value === undefined) {
    return undefined;
  }
  return ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());
}

function blankToUndefined(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === '' ? undefined : value;
}
