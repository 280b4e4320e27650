// Evaluation stage: scores a Draft on five dimensions

import { toStageFailure } from '../shared/errors.js';
import type { TextGenerator } from '../shared/llm.js';
import { buildEvaluation } from './artifacts.js';
import { buildCritiquePrompt, criticSystemPrompt } from './prompts.js';
import { decodeEvaluationPayload } from './schemas.js';
import type { Draft, Evaluation, EvaluationContext, StageResult, WorkflowConfig } from './types.js';

export const describeContext = (context: EvaluationContext): string => {
  const parts = [`Iteration ${context.iteration}`];
  if (context.previousScore !== undefined) {
    parts.push(`Previous score: ${context.previousScore}`);
  }
  return parts.join(', ');
};

export class DraftEvaluator {
  private llm: TextGenerator;
  private config: WorkflowConfig;

  constructor(llm: TextGenerator, config: WorkflowConfig) {
    this.llm = llm;
    this.config = config;
  }

  async evaluate(draft: Draft, context: EvaluationContext): Promise<StageResult<Evaluation>> {
    try {
      const raw = await this.llm.complete({
        label: 'critique',
        systemPrompt: criticSystemPrompt(this.config.platform),
        prompt: buildCritiquePrompt(draft, describeContext(context)),
        temperature: this.config.temperatures.critique
      });

      const fields = decodeEvaluationPayload(raw);
      return { ok: true, value: buildEvaluation(fields, this.config.qualityThreshold) };
    } catch (error) {
      return { ok: false, error: toStageFailure('Critique failed', error) };
    }
  }
}
