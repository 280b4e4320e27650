// Generation stage: source material in, first Draft out

import { toStageFailure } from '../shared/errors.js';
import type { TextGenerator } from '../shared/llm.js';
import { createDraft } from './artifacts.js';
import { buildGenerationPrompt, generatorSystemPrompt } from './prompts.js';
import { decodeDraftPayload } from './schemas.js';
import type { Draft, StageResult, WorkflowConfig } from './types.js';

export interface GenerationInput {
  sourceContent: string;
  insights: readonly string[];
  requirements: string;
  iteration: number;
  // Condensed critique plus human note from earlier rounds, may be empty
  previousFeedback: string;
}

export class DraftGenerator {
  private llm: TextGenerator;
  private config: WorkflowConfig;

  constructor(llm: TextGenerator, config: WorkflowConfig) {
    this.llm = llm;
    this.config = config;
  }

  async generate(input: GenerationInput): Promise<StageResult<Draft>> {
    try {
      const raw = await this.llm.complete({
        label: 'generate',
        systemPrompt: generatorSystemPrompt(this.config.platform),
        prompt: buildGenerationPrompt(input, {
          sourceCharLimit: this.config.sourceCharLimit,
          insightLimit: this.config.insightLimit
        }),
        temperature: this.config.temperatures.generation
      });

      return { ok: true, value: createDraft(decodeDraftPayload(raw), 'generated') };
    } catch (error) {
      return { ok: false, error: toStageFailure('Generation failed', error) };
    }
  }
}
