import { describe, expect, it } from 'vitest';
import { resolveWorkflowConfig } from '../../../src/config.js';
import { RefinementWorkflow } from '../../../src/workflow/controller.js';
import { createInitialState, deserializeState, serializeState } from '../../../src/workflow/state.js';
import { ScriptedGenerator, draftJson, evaluationJson } from '../../helpers/fake-llm.js';

const input = {
  sourceContent: 'Notes from the retro',
  contentInsights: ['Pairing helped'],
  requirements: ''
};

describe('createInitialState', () => {
  it('copies limits from the config', () => {
    const state = createInitialState(input, resolveWorkflowConfig({ maxIterations: 5, maxErrors: 2 }));
    expect(state.maxIterations).toBe(5);
    expect(state.maxErrors).toBe(2);
    expect(state.sessionId).toMatch(/^[0-9a-f-]{36}$/);
    expect(state.draftHistory).toEqual([]);
  });

  it('does not share the insight array with the caller', () => {
    const insights = ['one'];
    const state = createInitialState({ ...input, contentInsights: insights }, resolveWorkflowConfig());
    insights.push('two');
    expect(state.contentInsights).toEqual(['one']);
  });
});

describe('session records', () => {
  it('reload to an equal state that can keep running', async () => {
    const llm = new ScriptedGenerator([draftJson(), evaluationJson(6), draftJson(), evaluationJson(6)]);
    const workflow = new RefinementWorkflow(llm, resolveWorkflowConfig({ maxIterations: 1, humanReview: 'pause' }));
    const paused = await workflow.run(workflow.createSession(input, 'record-1'));
    expect(paused.node).toBe('human_review');

    const restored = deserializeState(serializeState(paused));
    expect(restored).toEqual(paused);

    const result = await workflow.run(workflow.injectFeedback(restored, { approve: true }));
    expect(result.status).toBe('completed');
  });

  it('re-derive approval from the score on load', () => {
    const state = createInitialState(input, resolveWorkflowConfig(), 'record-2');
    const record = JSON.parse(serializeState(state)) as Record<string, unknown>;
    const evaluation = {
      overallScore: 5,
      qualityLevel: 'publish_ready',
      approved: true,
      dimensions: { hookStrength: 5, valueDelivery: 5, platformFit: 5, engagementPotential: 5, tone: 5 },
      strengths: [],
      weaknesses: [],
      specificImprovements: [],
      toneFeedback: '',
      engagementFeedback: '',
      platformFeedback: '',
      createdAt: '2026-01-01T00:00:00.000Z'
    };

    const restored = deserializeState(JSON.stringify({ ...record, currentEvaluation: evaluation, critiqueHistory: [evaluation] }));

    expect(restored.currentEvaluation?.approved).toBe(false);
    expect(restored.currentEvaluation?.qualityLevel).toBe('good');
    expect(restored.critiqueHistory[0]?.approved).toBe(false);
  });

  it('reject a record with an unknown node', () => {
    const record = JSON.parse(serializeState(createInitialState(input, resolveWorkflowConfig()))) as Record<string, unknown>;
    expect(() => deserializeState(JSON.stringify({ ...record, node: 'publishing' }))).toThrow();
  });
});
