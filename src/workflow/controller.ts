// Refinement workflow controller: the state machine over generate, critique and refine

import { createLogicalError, toStageFailure } from '../shared/errors.js';
import type { StageFailure } from '../shared/errors.js';
import { createLogger } from '../shared/logger.js';
import type { TextGenerator } from '../shared/llm.js';
import { DraftEvaluator } from './evaluator.js';
import { buildFeedbackSummary, createFeedback, extractFocusAreas } from './feedback.js';
import { DraftGenerator } from './generator.js';
import { DraftRefiner } from './refiner.js';
import { createInitialState } from './state.js';
import type {
  ContentInput,
  FeedbackInput,
  ProcessingStatus,
  RecoverableNode,
  WorkflowConfig,
  WorkflowNode,
  WorkflowState
} from './types.js';

const log = createLogger('Workflow');

const NODE_STATUS: Partial<Record<WorkflowNode, ProcessingStatus>> = {
  generating: 'generating',
  critiquing: 'critiquing',
  refining: 'refining',
  human_review: 'awaiting_human',
  complete: 'completed',
  failed: 'failed'
};

export const isTerminal = (state: WorkflowState): boolean =>
  state.node === 'complete' || state.node === 'failed';

const hasActionableFeedback = (state: WorkflowState): boolean => {
  const feedback = state.pendingFeedback;
  if (state.humanApproved) return true;
  if (!feedback) return false;
  return feedback.approve || feedback.regenerate || feedback.message.length > 0;
};

// At human review with nothing to act on
export const isAwaitingHuman = (state: WorkflowState): boolean =>
  state.node === 'human_review' && !hasActionableFeedback(state);

type StatePatch = Partial<Omit<WorkflowState, 'node' | 'transitions' | 'sessionId' | 'createdAt'>>;

const advance = (state: WorkflowState, to: WorkflowNode, reason: string, patch: StatePatch = {}): WorkflowState => {
  const now = new Date().toISOString();
  const next: WorkflowState = {
    ...state,
    status: NODE_STATUS[to] ?? state.status,
    ...patch,
    node: to,
    updatedAt: now
  };

  log.debug(`${state.sessionId}: ${state.node} -> ${to} (${reason})`);

  return {
    ...next,
    transitions: [
      ...state.transitions,
      {
        from: state.node,
        to,
        reason,
        iterationCount: next.iterationCount,
        errorCount: next.errorCount,
        at: now
      }
    ]
  };
};

// Every stage failure is recorded the same way, whatever its category
const recordFailure = (state: WorkflowState, failure: StageFailure, failedNode: RecoverableNode): StatePatch => ({
  errorCount: state.errorCount + 1,
  lastError: failure.message,
  lastErrorCategory: failure.category,
  failedNode
});

const SUCCESS_PATCH: StatePatch = {
  lastError: '',
  lastErrorCategory: undefined,
  failedNode: undefined
};

export class RefinementWorkflow {
  private config: WorkflowConfig;
  private generator: DraftGenerator;
  private evaluator: DraftEvaluator;
  private refiner: DraftRefiner;

  constructor(llm: TextGenerator, config: WorkflowConfig) {
    this.config = config;
    this.generator = new DraftGenerator(llm, config);
    this.evaluator = new DraftEvaluator(llm, config);
    this.refiner = new DraftRefiner(llm, config);
  }

  createSession(input: ContentInput, sessionId?: string): WorkflowState {
    return createInitialState(input, this.config, sessionId);
  }

  // Drive the session until it completes, fails or waits for a human
  async run(state: WorkflowState): Promise<WorkflowState> {
    let current = state;
    log.info(`${current.sessionId}: running from ${current.node}`);

    const pauses = this.config.humanReview === 'pause';

    while (!isTerminal(current) && !(pauses && isAwaitingHuman(current))) {
      current = await this.step(current);
    }

    if (current.node === 'complete') {
      log.info(`${current.sessionId}: completed after ${current.iterationCount} iteration(s)`);
    } else if (current.node === 'failed') {
      log.warn(`${current.sessionId}: ${current.status} (${current.lastError || 'no feedback'})`);
    } else {
      log.info(`${current.sessionId}: waiting for human review`);
    }
    return current;
  }

  async step(state: WorkflowState): Promise<WorkflowState> {
    switch (state.node) {
      case 'generating':
        return this.generate(state);
      case 'critiquing':
        return this.critique(state);
      case 'refining':
        return this.refine(state);
      case 'human_review':
        return this.review(state);
      case 'error_recovery':
        return this.recover(state);
      case 'final_polish':
        return this.polish(state);
      case 'complete':
      case 'failed':
        return state;
    }
  }

  // Attach human feedback. With a draft the session goes back to review;
  // without one the feedback waits for the next generation.
  injectFeedback(state: WorkflowState, input: FeedbackInput): WorkflowState {
    const feedback = createFeedback(input);
    const feedbackHistory = [...state.feedbackHistory, feedback];

    if (!state.currentDraft) {
      return {
        ...state,
        humanFeedback: feedback.message || state.humanFeedback,
        feedbackHistory,
        updatedAt: new Date().toISOString()
      };
    }

    return advance(state, 'human_review', 'feedback received', {
      status: 'awaiting_human',
      pendingFeedback: feedback,
      feedbackHistory,
      humanApproved: feedback.approve,
      finalDraft: undefined,
      isComplete: false
    });
  }

  private async generate(state: WorkflowState): Promise<WorkflowState> {
    const previous = state.transitions[state.transitions.length - 1];
    const isRetry = previous !== undefined
      && previous.to === 'generating'
      && (previous.from === 'generating' || previous.from === 'error_recovery');
    const iterationCount = isRetry ? state.iterationCount : state.iterationCount + 1;
    const entered: WorkflowState = { ...state, iterationCount };

    const result = await this.generator.generate({
      sourceContent: state.sourceContent,
      insights: state.contentInsights,
      requirements: state.requirements,
      iteration: iterationCount,
      previousFeedback: buildFeedbackSummary(state.currentEvaluation, state.humanFeedback)
    });

    if (!result.ok) {
      const patch = recordFailure(entered, result.error, 'generating');
      const errorCount = entered.errorCount + 1;
      return errorCount >= entered.maxErrors
        ? advance(entered, 'error_recovery', 'generation failed, error budget spent', patch)
        : advance(entered, 'generating', 'generation failed, retrying', patch);
    }

    return advance(entered, 'critiquing', 'draft generated', {
      ...SUCCESS_PATCH,
      currentDraft: result.value,
      draftHistory: [...state.draftHistory, result.value],
      humanFeedback: '',
      refinementPass: 0
    });
  }

  private async critique(state: WorkflowState): Promise<WorkflowState> {
    const draft = state.currentDraft;
    const result = draft
      ? await this.evaluator.evaluate(draft, {
        iteration: state.iterationCount,
        previousScore: state.currentEvaluation?.overallScore
      })
      : { ok: false as const, error: toStageFailure('Critique failed', createLogicalError('No draft available to critique')) };

    if (!result.ok) {
      return advance(state, 'error_recovery', 'critique failed', recordFailure(state, result.error, 'critiquing'));
    }

    const evaluation = result.value;
    const patch: StatePatch = {
      ...SUCCESS_PATCH,
      currentEvaluation: evaluation,
      critiqueHistory: [...state.critiqueHistory, evaluation]
    };

    if (evaluation.approved) {
      return advance(state, 'final_polish', `score ${evaluation.overallScore} passed the quality gate`, patch);
    }
    if (state.iterationCount >= state.maxIterations) {
      return advance(state, 'human_review', `score ${evaluation.overallScore}, iteration limit reached`, patch);
    }
    return advance(state, 'refining', `score ${evaluation.overallScore} below threshold`, patch);
  }

  private async refine(state: WorkflowState): Promise<WorkflowState> {
    const focusAreas = extractFocusAreas(state.currentEvaluation?.weaknesses ?? []);
    const result = await this.refiner.refine(
      state.currentDraft,
      state.currentEvaluation,
      focusAreas,
      state.humanFeedback
    );

    if (!result.ok) {
      return advance(state, 'error_recovery', 'refinement failed', recordFailure(state, result.error, 'refining'));
    }

    const refinementPass = state.refinementPass + 1;
    const patch: StatePatch = {
      ...SUCCESS_PATCH,
      currentDraft: result.value,
      draftHistory: [...state.draftHistory, result.value],
      humanFeedback: '',
      refinementPass
    };

    if (state.iterationCount >= state.maxIterations) {
      return advance(state, 'final_polish', 'draft refined at iteration limit', patch);
    }
    // Each refine-critique cycle after a generation counts as an iteration
    return advance(state, 'critiquing', 'draft refined', {
      ...patch,
      iterationCount: Math.max(state.iterationCount, refinementPass)
    });
  }

  private review(state: WorkflowState): WorkflowState {
    const feedback = state.pendingFeedback;

    if (state.humanApproved || feedback?.approve) {
      return advance(state, 'final_polish', 'approved by reviewer', {
        humanApproved: true,
        pendingFeedback: undefined
      });
    }

    if (feedback?.regenerate) {
      return advance(state, 'generating', 'reviewer asked to regenerate', {
        iterationCount: 0,
        refinementPass: 0,
        humanFeedback: feedback.message,
        pendingFeedback: undefined
      });
    }

    if (feedback && feedback.message.length > 0) {
      return advance(state, 'refining', 'reviewer requested changes', {
        humanFeedback: feedback.message,
        pendingFeedback: undefined
      });
    }

    if (this.config.humanReview === 'abandon') {
      return advance(state, 'failed', 'no reviewer feedback', {
        status: 'abandoned',
        finalDraft: undefined,
        pendingFeedback: undefined,
        isComplete: true
      });
    }

    // Pause: nothing to act on, run() stops here
    return { ...state, status: 'awaiting_human', pendingFeedback: undefined };
  }

  private recover(state: WorkflowState): WorkflowState {
    if (state.errorCount >= state.maxErrors) {
      return advance(state, 'failed', `error budget spent after ${state.errorCount} error(s)`, {
        finalDraft: undefined,
        isComplete: true
      });
    }

    const resumeAt = state.failedNode ?? 'generating';
    return advance(state, resumeAt, `resuming ${resumeAt} after error`);
  }

  private polish(state: WorkflowState): WorkflowState {
    if (!state.currentDraft) {
      const failure = toStageFailure('Final polish failed', createLogicalError('No draft available to finalize'));
      return advance(state, 'error_recovery', 'nothing to finalize', recordFailure(state, failure, 'generating'));
    }

    return advance(state, 'complete', 'final draft selected', {
      ...SUCCESS_PATCH,
      finalDraft: state.currentDraft,
      isComplete: true
    });
  }
}
