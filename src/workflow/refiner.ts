// Refinement stage: rewrites a Draft against its Evaluation

import { createLogicalError, toStageFailure } from '../shared/errors.js';
import type { TextGenerator } from '../shared/llm.js';
import { createDraft } from './artifacts.js';
import { buildRefinementPrompt, refinerSystemPrompt } from './prompts.js';
import { decodeDraftPayload } from './schemas.js';
import type { Draft, Evaluation, StageResult, WorkflowConfig } from './types.js';

export class DraftRefiner {
  private llm: TextGenerator;
  private config: WorkflowConfig;

  constructor(llm: TextGenerator, config: WorkflowConfig) {
    this.llm = llm;
    this.config = config;
  }

  async refine(
    draft: Draft | undefined,
    evaluation: Evaluation | undefined,
    focusAreas: readonly string[],
    humanFeedback: string
  ): Promise<StageResult<Draft>> {
    try {
      if (!draft) {
        throw createLogicalError('No draft available to refine');
      }
      if (!evaluation) {
        throw createLogicalError('No evaluation available to refine against');
      }

      const raw = await this.llm.complete({
        label: 'refine',
        systemPrompt: refinerSystemPrompt(this.config.platform),
        prompt: buildRefinementPrompt(draft, evaluation, focusAreas, humanFeedback),
        temperature: this.config.temperatures.refinement
      });

      return { ok: true, value: createDraft(decodeDraftPayload(raw), 'refined') };
    } catch (error) {
      return { ok: false, error: toStageFailure('Refinement failed', error) };
    }
  }
}
