// Application configuration

import { LogLevel } from '@slack/bolt';
import { createValidationError } from './shared/errors.js';
import { DEFAULT_TIMEOUT_MS, type LLMConfig } from './shared/llm.js';
import { isLoggingLevel, type LoggingLevel } from './shared/logger.js';
import type { HumanReviewMode, WorkflowConfig } from './workflow/types.js';

export interface SlackConfig {
  botToken: string;
  appToken: string;
  signingSecret: string;
  auditChannel?: string;
  logLevel?: LogLevel;
}

export interface Config {
  llm: LLMConfig;

  workflow: WorkflowConfig;

  database: {
    path: string;
  };

  logging: {
    level: LoggingLevel;
  };
}

export const DEFAULT_WORKFLOW_CONFIG: WorkflowConfig = {
  maxIterations: 3,
  maxErrors: 3,
  qualityThreshold: 7,
  sourceCharLimit: 2000,
  insightLimit: 5,
  platform: 'LinkedIn',
  humanReview: 'abandon',
  temperatures: {
    generation: 0.7,
    critique: 0.3,
    refinement: 0.5
  }
};

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): Config => {
  return {
    llm: {
      provider: parseProvider(env.LLM_PROVIDER),
      model: env.LLM_MODEL || 'gpt-4o',
      maxTokens: parseIntEnv(env, 'LLM_MAX_TOKENS', 4096),
      temperature: parseFloatEnv(env, 'LLM_TEMPERATURE', 0.7),
      timeoutMs: parseIntEnv(env, 'LLM_TIMEOUT_MS', DEFAULT_TIMEOUT_MS)
    },

    workflow: resolveWorkflowConfig({
      maxIterations: parseIntEnv(env, 'WORKFLOW_MAX_ITERATIONS', DEFAULT_WORKFLOW_CONFIG.maxIterations),
      maxErrors: parseIntEnv(env, 'WORKFLOW_MAX_ERRORS', DEFAULT_WORKFLOW_CONFIG.maxErrors),
      qualityThreshold: parseIntEnv(env, 'WORKFLOW_QUALITY_THRESHOLD', DEFAULT_WORKFLOW_CONFIG.qualityThreshold),
      sourceCharLimit: parseIntEnv(env, 'WORKFLOW_SOURCE_CHAR_LIMIT', DEFAULT_WORKFLOW_CONFIG.sourceCharLimit),
      insightLimit: parseIntEnv(env, 'WORKFLOW_INSIGHT_LIMIT', DEFAULT_WORKFLOW_CONFIG.insightLimit),
      platform: env.WORKFLOW_PLATFORM || DEFAULT_WORKFLOW_CONFIG.platform,
      humanReview: parseHumanReview(env.WORKFLOW_HUMAN_REVIEW),
      temperatures: {
        generation: parseFloatEnv(env, 'WORKFLOW_GENERATION_TEMPERATURE', DEFAULT_WORKFLOW_CONFIG.temperatures.generation),
        critique: parseFloatEnv(env, 'WORKFLOW_CRITIQUE_TEMPERATURE', DEFAULT_WORKFLOW_CONFIG.temperatures.critique),
        refinement: parseFloatEnv(env, 'WORKFLOW_REFINEMENT_TEMPERATURE', DEFAULT_WORKFLOW_CONFIG.temperatures.refinement)
      }
    }),

    database: {
      path: env.DATABASE_PATH || './data/db/main.sqlite'
    },

    logging: {
      level: parseLoggingLevel(env.LOG_LEVEL)
    }
  };
};

// Slack credentials are only needed when the Slack surface starts
export const loadSlackConfig = (env: NodeJS.ProcessEnv = process.env): SlackConfig => {
  return {
    botToken: requireEnv(env, 'SLACK_BOT_TOKEN'),
    appToken: requireEnv(env, 'SLACK_APP_TOKEN'),
    signingSecret: requireEnv(env, 'SLACK_SIGNING_SECRET'),
    auditChannel: env.SLACK_AUDIT_CHANNEL,
    logLevel: parseLogLevel(env.SLACK_LOG_LEVEL)
  };
};

export type WorkflowOverrides = Partial<Omit<WorkflowConfig, 'temperatures'>> & {
  temperatures?: Partial<WorkflowConfig['temperatures']>;
};

export const resolveWorkflowConfig = (
  overrides: WorkflowOverrides = {},
  base: WorkflowConfig = DEFAULT_WORKFLOW_CONFIG
): WorkflowConfig => {
  const config: WorkflowConfig = {
    ...base,
    ...overrides,
    temperatures: { ...base.temperatures, ...overrides.temperatures }
  };

  const positive: Array<keyof Omit<WorkflowConfig, 'platform' | 'humanReview' | 'temperatures'>> = [
    'maxIterations',
    'maxErrors',
    'sourceCharLimit',
    'insightLimit'
  ];
  for (const key of positive) {
    if (!Number.isInteger(config[key]) || config[key] < 1) {
      throw createValidationError(`${key} must be a positive integer`);
    }
  }

  if (!Number.isInteger(config.qualityThreshold) || config.qualityThreshold < 1 || config.qualityThreshold > 10) {
    throw createValidationError('qualityThreshold must be an integer from 1 to 10');
  }

  for (const [stage, temperature] of Object.entries(config.temperatures)) {
    if (temperature < 0 || temperature > 2) {
      throw createValidationError(`${stage} temperature must be between 0 and 2`);
    }
  }

  return config;
};

const requireEnv = (env: NodeJS.ProcessEnv, name: string): string => {
  const value = env[name];
  if (!value) {
    throw new Error(`Required environment variable ${name} is not set`);
  }
  return value;
};

const parseIntEnv = (env: NodeJS.ProcessEnv, name: string, fallback: number): number => {
  const raw = env[name];
  if (!raw) return fallback;

  const value = Number(raw);
  if (!Number.isInteger(value)) {
    throw createValidationError(`${name} must be an integer, got "${raw}"`);
  }
  return value;
};

const parseFloatEnv = (env: NodeJS.ProcessEnv, name: string, fallback: number): number => {
  const raw = env[name];
  if (!raw) return fallback;

  const value = Number(raw);
  if (Number.isNaN(value)) {
    throw createValidationError(`${name} must be a number, got "${raw}"`);
  }
  return value;
};

const parseProvider = (provider?: string): LLMConfig['provider'] => {
  if (!provider) return 'openai';
  if (provider === 'openai' || provider === 'anthropic') return provider;
  throw createValidationError(`LLM_PROVIDER must be openai or anthropic, got "${provider}"`);
};

const parseHumanReview = (mode?: string): HumanReviewMode => {
  if (!mode) return DEFAULT_WORKFLOW_CONFIG.humanReview;
  if (mode === 'pause' || mode === 'abandon') return mode;
  throw createValidationError(`WORKFLOW_HUMAN_REVIEW must be pause or abandon, got "${mode}"`);
};

const parseLoggingLevel = (level?: string): LoggingLevel => {
  const normalized = level?.toLowerCase();
  return normalized && isLoggingLevel(normalized) ? normalized : 'info';
};

export const parseLogLevel = (level?: string): LogLevel | undefined => {
  if (!level) return undefined;

  const levels: Record<string, LogLevel> = {
    'error': LogLevel.ERROR,
    'warn': LogLevel.WARN,
    'info': LogLevel.INFO,
    'debug': LogLevel.DEBUG
  };

  return levels[level.toLowerCase()];
};

export default loadConfig;
