// Session state: creation and the persisted record format

import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import { ErrorCategory } from '../shared/errors.js';
import { buildEvaluation } from './artifacts.js';
import type { ContentInput, WorkflowConfig, WorkflowState } from './types.js';

export const createInitialState = (
  input: ContentInput,
  config: WorkflowConfig,
  sessionId: string = randomUUID()
): WorkflowState => {
  const now = new Date().toISOString();
  return {
    sessionId,
    sourceContent: input.sourceContent,
    contentInsights: [...input.contentInsights],
    requirements: input.requirements,
    node: 'generating',
    status: 'generating',
    iterationCount: 0,
    maxIterations: config.maxIterations,
    refinementPass: 0,
    errorCount: 0,
    maxErrors: config.maxErrors,
    lastError: '',
    draftHistory: [],
    critiqueHistory: [],
    humanFeedback: '',
    feedbackHistory: [],
    humanApproved: false,
    isComplete: false,
    transitions: [],
    createdAt: now,
    updatedAt: now
  };
};

const DraftRecordSchema = z.object({
  id: z.string(),
  title: z.string(),
  hook: z.string(),
  body: z.string(),
  callToAction: z.string(),
  tags: z.array(z.string()),
  targetAudience: z.string(),
  estimatedEngagement: z.number().int().optional(),
  origin: z.enum(['generated', 'refined']),
  createdAt: z.string()
});

const score = z.number().int().min(1).max(10);

// qualityLevel and approved are stored for readers of the raw JSON but
// always recomputed on load
const EvaluationRecordSchema = z.object({
  overallScore: score,
  qualityLevel: z.string().optional(),
  approved: z.boolean().optional(),
  dimensions: z.object({
    hookStrength: score,
    valueDelivery: score,
    platformFit: score,
    engagementPotential: score,
    tone: score
  }),
  strengths: z.array(z.string()),
  weaknesses: z.array(z.string()),
  specificImprovements: z.array(z.string()),
  toneFeedback: z.string(),
  engagementFeedback: z.string(),
  platformFeedback: z.string(),
  createdAt: z.string()
});

const FeedbackRecordSchema = z.object({
  message: z.string(),
  satisfaction: z.number().int().min(1).max(5).optional(),
  approve: z.boolean(),
  regenerate: z.boolean(),
  changeRequests: z.array(z.string()),
  createdAt: z.string()
});

const NodeSchema = z.enum([
  'generating',
  'critiquing',
  'refining',
  'human_review',
  'final_polish',
  'error_recovery',
  'complete',
  'failed'
]);

const StageErrorCategorySchema = z.union([
  z.literal(ErrorCategory.TRANSPORT),
  z.literal(ErrorCategory.SCHEMA_VIOLATION),
  z.literal(ErrorCategory.LOGICAL)
]);

export const WorkflowRecordSchema = z.object({
  sessionId: z.string(),
  sourceContent: z.string(),
  contentInsights: z.array(z.string()),
  requirements: z.string(),
  node: NodeSchema,
  status: z.enum(['generating', 'critiquing', 'refining', 'awaiting_human', 'completed', 'failed', 'abandoned']),
  iterationCount: z.number().int().min(0),
  maxIterations: z.number().int().min(1),
  refinementPass: z.number().int().min(0),
  errorCount: z.number().int().min(0),
  maxErrors: z.number().int().min(1),
  lastError: z.string(),
  lastErrorCategory: StageErrorCategorySchema.optional(),
  failedNode: z.enum(['generating', 'critiquing', 'refining']).optional(),
  currentDraft: DraftRecordSchema.optional(),
  currentEvaluation: EvaluationRecordSchema.optional(),
  draftHistory: z.array(DraftRecordSchema),
  critiqueHistory: z.array(EvaluationRecordSchema),
  humanFeedback: z.string(),
  pendingFeedback: FeedbackRecordSchema.optional(),
  feedbackHistory: z.array(FeedbackRecordSchema),
  humanApproved: z.boolean(),
  finalDraft: DraftRecordSchema.optional(),
  isComplete: z.boolean(),
  transitions: z.array(z.object({
    from: NodeSchema,
    to: NodeSchema,
    reason: z.string(),
    iterationCount: z.number().int(),
    errorCount: z.number().int(),
    at: z.string()
  })),
  createdAt: z.string(),
  updatedAt: z.string()
});

export type WorkflowRecord = z.infer<typeof WorkflowRecordSchema>;

export const serializeState = (state: WorkflowState): string => JSON.stringify(state);

export const deserializeState = (json: string, qualityThreshold?: number): WorkflowState => {
  const record = WorkflowRecordSchema.parse(JSON.parse(json));
  const { currentEvaluation, critiqueHistory, ...rest } = record;

  return {
    ...rest,
    currentEvaluation: currentEvaluation ? buildEvaluation(currentEvaluation, qualityThreshold) : undefined,
    critiqueHistory: critiqueHistory.map(evaluation => buildEvaluation(evaluation, qualityThreshold))
  };
};
