// Refinement workflow types

import type { StageErrorCategory, StageFailure } from '../shared/errors.js';

export type QualityLevel = 'draft' | 'good' | 'excellent' | 'publish_ready';

export type DraftOrigin = 'generated' | 'refined';

// One version of the post. Never mutated; refinement creates a new one.
export interface Draft {
  readonly id: string;
  readonly title: string;
  readonly hook: string;
  readonly body: string;
  readonly callToAction: string;
  readonly tags: readonly string[];
  readonly targetAudience: string;
  readonly estimatedEngagement?: number;
  readonly origin: DraftOrigin;
  readonly createdAt: string;
}

export interface DimensionScores {
  readonly hookStrength: number;
  readonly valueDelivery: number;
  readonly platformFit: number;
  readonly engagementPotential: number;
  readonly tone: number;
}

export interface Evaluation {
  readonly overallScore: number;
  readonly qualityLevel: QualityLevel;
  readonly dimensions: DimensionScores;
  readonly strengths: readonly string[];
  readonly weaknesses: readonly string[];
  readonly specificImprovements: readonly string[];
  readonly toneFeedback: string;
  readonly engagementFeedback: string;
  readonly platformFeedback: string;
  readonly approved: boolean;
  readonly createdAt: string;
}

export interface Feedback {
  readonly message: string;
  readonly satisfaction?: number;
  readonly approve: boolean;
  readonly regenerate: boolean;
  readonly changeRequests: readonly string[];
  readonly createdAt: string;
}

export interface FeedbackInput {
  message?: string;
  satisfaction?: number;
  approve?: boolean;
  regenerate?: boolean;
}

export type ProcessingStatus =
  | 'generating'
  | 'critiquing'
  | 'refining'
  | 'awaiting_human'
  | 'completed'
  | 'failed'
  | 'abandoned';

export type WorkflowNode =
  | 'generating'
  | 'critiquing'
  | 'refining'
  | 'human_review'
  | 'final_polish'
  | 'error_recovery'
  | 'complete'
  | 'failed';

// Nodes a failure can be retried from
export type RecoverableNode = 'generating' | 'critiquing' | 'refining';

export interface Transition {
  readonly from: WorkflowNode;
  readonly to: WorkflowNode;
  readonly reason: string;
  readonly iterationCount: number;
  readonly errorCount: number;
  readonly at: string;
}

export interface ContentInput {
  sourceContent: string;
  contentInsights: string[];
  requirements: string;
}

export interface WorkflowState {
  readonly sessionId: string;

  // Input
  readonly sourceContent: string;
  readonly contentInsights: readonly string[];
  readonly requirements: string;

  // Processing
  readonly node: WorkflowNode;
  readonly status: ProcessingStatus;
  readonly iterationCount: number;
  readonly maxIterations: number;
  readonly refinementPass: number;

  // Errors
  readonly errorCount: number;
  readonly maxErrors: number;
  readonly lastError: string;
  readonly lastErrorCategory?: StageErrorCategory;
  readonly failedNode?: RecoverableNode;

  // Artifacts
  readonly currentDraft?: Draft;
  readonly currentEvaluation?: Evaluation;
  readonly draftHistory: readonly Draft[];
  readonly critiqueHistory: readonly Evaluation[];

  // Human input
  readonly humanFeedback: string;
  readonly pendingFeedback?: Feedback;
  readonly feedbackHistory: readonly Feedback[];
  readonly humanApproved: boolean;

  // Output
  readonly finalDraft?: Draft;
  readonly isComplete: boolean;

  readonly transitions: readonly Transition[];
  readonly createdAt: string;
  readonly updatedAt: string;
}

export type HumanReviewMode = 'pause' | 'abandon';

export interface WorkflowConfig {
  maxIterations: number;
  maxErrors: number;
  qualityThreshold: number;
  sourceCharLimit: number;
  insightLimit: number;
  platform: string;
  humanReview: HumanReviewMode;
  temperatures: {
    generation: number;
    critique: number;
    refinement: number;
  };
}

// What every stage hands back to the controller
export type StageResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: StageFailure };

export interface EvaluationContext {
  iteration: number;
  previousScore?: number;
}
