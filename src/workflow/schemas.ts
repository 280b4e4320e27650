// Strict decoding of structured model output

import { z } from 'zod';
import { createSchemaError } from '../shared/errors.js';
import type { DraftFields, EvaluationFields } from './artifacts.js';

const score = z.number().int().min(1).max(10);

export const DraftPayloadSchema = z.object({
  title: z.string(),
  hook: z.string().default(''),
  body: z.string(),
  call_to_action: z.string().default(''),
  tags: z.array(z.string()).default([]),
  target_audience: z.string().default('Professional network'),
  estimated_engagement: score.nullish()
});

export const EvaluationPayloadSchema = z.object({
  overall_score: score,
  // Accepted but ignored: level and approval are derived locally
  quality_level: z.string().optional(),
  approved: z.boolean().optional(),
  hook_strength: score,
  value_delivery: score,
  platform_fit: score,
  engagement_potential: score,
  tone: score,
  strengths: z.array(z.string()).default([]),
  weaknesses: z.array(z.string()).default([]),
  specific_improvements: z.array(z.string()).default([]),
  tone_feedback: z.string().default(''),
  engagement_feedback: z.string().default(''),
  platform_feedback: z.string().default('')
});

export type DraftPayload = z.infer<typeof DraftPayloadSchema>;
export type EvaluationPayload = z.infer<typeof EvaluationPayloadSchema>;

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

// Models like to wrap JSON in a markdown fence; nothing else is tolerated
export const stripDelimiters = (raw: string): string => {
  const trimmed = raw.trim();
  const fenced = trimmed.match(/^```(?:json)?\s*([\s\S]*?)\s*```$/i);
  return fenced ? fenced[1] : trimmed;
};

export const decodeJsonObject = (raw: string): Record<string, unknown> => {
  let parsed: unknown;
  try {
    parsed = JSON.parse(stripDelimiters(raw));
  } catch {
    throw createSchemaError('response is not valid JSON');
  }

  if (!isRecord(parsed)) {
    throw createSchemaError('response is not a JSON object');
  }
  return parsed;
};

const requireText = (record: Record<string, unknown>, field: string): void => {
  const value = record[field];
  if (typeof value !== 'string' || value.trim().length === 0) {
    throw createSchemaError(`required field "${field}" is missing or empty`);
  }
};

const formatIssues = (issues: z.ZodIssue[]): string =>
  issues
    .map(issue => `${issue.path.length > 0 ? issue.path.join('.') : 'response'}: ${issue.message}`)
    .join('; ');

export const decodeDraftPayload = (raw: string): DraftFields => {
  const record = decodeJsonObject(raw);
  requireText(record, 'title');
  requireText(record, 'body');

  const result = DraftPayloadSchema.safeParse(record);
  if (!result.success) {
    throw createSchemaError(formatIssues(result.error.issues));
  }

  const payload = result.data;
  return {
    title: payload.title,
    hook: payload.hook,
    body: payload.body,
    callToAction: payload.call_to_action,
    tags: payload.tags,
    targetAudience: payload.target_audience,
    estimatedEngagement: payload.estimated_engagement ?? undefined
  };
};

export const decodeEvaluationPayload = (raw: string): EvaluationFields => {
  const record = decodeJsonObject(raw);

  const result = EvaluationPayloadSchema.safeParse(record);
  if (!result.success) {
    throw createSchemaError(formatIssues(result.error.issues));
  }

  const payload = result.data;
  return {
    overallScore: payload.overall_score,
    dimensions: {
      hookStrength: payload.hook_strength,
      valueDelivery: payload.value_delivery,
      platformFit: payload.platform_fit,
      engagementPotential: payload.engagement_potential,
      tone: payload.tone
    },
    strengths: payload.strengths,
    weaknesses: payload.weaknesses,
    specificImprovements: payload.specific_improvements,
    toneFeedback: payload.tone_feedback,
    engagementFeedback: payload.engagement_feedback,
    platformFeedback: payload.platform_feedback
  };
};
