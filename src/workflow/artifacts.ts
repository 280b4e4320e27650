// Draft and evaluation construction rules

import { randomUUID } from 'node:crypto';
import { createSchemaError } from '../shared/errors.js';
import type { Draft, DraftOrigin, Evaluation, QualityLevel } from './types.js';

export const QUALITY_THRESHOLD = 7;
export const TAG_MARKER = '#';

export const qualityLevelFor = (score: number): QualityLevel => {
  if (score >= 9) return 'publish_ready';
  if (score >= 7) return 'excellent';
  if (score >= 5) return 'good';
  return 'draft';
};

export const isApproved = (score: number, threshold: number = QUALITY_THRESHOLD): boolean => {
  const level = qualityLevelFor(score);
  return score >= threshold && (level === 'excellent' || level === 'publish_ready');
};

export const normalizeTag = (tag: string): string =>
  tag.startsWith(TAG_MARKER) ? tag : `${TAG_MARKER}${tag}`;

const WORD_CHAR = /[\p{L}\p{N}_]/u;

// The hook must end on a word boundary inside the body, never mid-word
const endsAtBoundary = (hook: string, body: string): boolean => {
  const next = body.charAt(hook.length);
  return !next || !WORD_CHAR.test(next) || !WORD_CHAR.test(hook.charAt(hook.length - 1));
};

// Drop the hook from the front of the body when the model repeated it
export const separateHook = (hook: string, body: string): string => {
  const trimmedHook = hook.trim();
  const trimmedBody = body.trim();
  if (!trimmedHook || !trimmedBody.startsWith(trimmedHook) || !endsAtBoundary(trimmedHook, trimmedBody)) {
    return trimmedBody;
  }
  return trimmedBody.slice(trimmedHook.length).trim();
};

export interface DraftFields {
  title: string;
  hook: string;
  body: string;
  callToAction: string;
  tags: readonly string[];
  targetAudience: string;
  estimatedEngagement?: number;
}

export const createDraft = (fields: DraftFields, origin: DraftOrigin): Draft => {
  const body = separateHook(fields.hook, fields.body);
  if (!body) {
    throw createSchemaError('body only repeats the hook');
  }

  return {
    id: randomUUID(),
    title: fields.title.trim(),
    hook: fields.hook.trim(),
    body,
    callToAction: fields.callToAction.trim(),
    tags: fields.tags
      .map(tag => tag.trim())
      .filter(tag => tag.length > 0)
      .map(normalizeTag),
    targetAudience: fields.targetAudience,
    estimatedEngagement: fields.estimatedEngagement,
    origin,
    createdAt: new Date().toISOString()
  };
};

export type EvaluationFields = Omit<Evaluation, 'qualityLevel' | 'approved' | 'createdAt'> & {
  createdAt?: string;
};

// The only way an Evaluation is built, both fresh from the model and when
// reloaded from storage: level and approval always follow the score.
export const buildEvaluation = (fields: EvaluationFields, threshold: number = QUALITY_THRESHOLD): Evaluation => ({
  overallScore: fields.overallScore,
  qualityLevel: qualityLevelFor(fields.overallScore),
  dimensions: fields.dimensions,
  strengths: fields.strengths,
  weaknesses: fields.weaknesses,
  specificImprovements: fields.specificImprovements,
  toneFeedback: fields.toneFeedback,
  engagementFeedback: fields.engagementFeedback,
  platformFeedback: fields.platformFeedback,
  approved: isApproved(fields.overallScore, threshold),
  createdAt: fields.createdAt ?? new Date().toISOString()
});

export const formatDraftText = (draft: Draft): string => {
  const sections = [draft.hook, draft.body, draft.callToAction].filter(section => section.length > 0);
  const tagLine = draft.tags.join(' ');
  return tagLine ? `${sections.join('\n\n')}\n\n${tagLine}` : sections.join('\n\n');
};
