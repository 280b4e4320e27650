import { describe, expect, it } from 'vitest';
import { buildEvaluation, createDraft } from '../../../src/workflow/artifacts.js';
import {
  buildCritiquePrompt,
  buildGenerationPrompt,
  buildRefinementPrompt,
  generatorSystemPrompt,
  truncateSource
} from '../../../src/workflow/prompts.js';

const limits = { sourceCharLimit: 2000, insightLimit: 5 };

const draft = createDraft({
  title: 'Ship smaller pull requests',
  hook: 'Small pull requests merge faster.',
  body: 'Three habits keep reviews short.',
  callToAction: 'What is your limit?',
  tags: ['Engineering'],
  targetAudience: 'Engineers'
}, 'generated');

const evaluation = (score: number) => buildEvaluation({
  overallScore: score,
  dimensions: { hookStrength: 4, valueDelivery: 6, platformFit: 7, engagementPotential: 5, tone: 8 },
  strengths: ['Clear'],
  weaknesses: [],
  specificImprovements: ['Add a number'],
  toneFeedback: 'Warm',
  engagementFeedback: 'Flat',
  platformFeedback: 'Fine'
});

describe('truncateSource', () => {
  it('marks truncated content', () => {
    expect(truncateSource('abcdef', 3)).toBe('abc\n...[content truncated]...');
  });

  it('leaves short content alone', () => {
    expect(truncateSource('abc', 3)).toBe('abc');
  });
});

describe('buildGenerationPrompt', () => {
  it('uses only the top insights', () => {
    const prompt = buildGenerationPrompt({
      sourceContent: 'Notes',
      insights: ['alpha', 'bravo', 'charlie', 'delta', 'echo', 'foxtrot'],
      requirements: '',
      iteration: 1,
      previousFeedback: ''
    }, limits);
    expect(prompt).toContain('- echo');
    expect(prompt).not.toContain('foxtrot');
  });

  it('falls back when there are no insights', () => {
    const prompt = buildGenerationPrompt({
      sourceContent: 'Notes',
      insights: [],
      requirements: 'Under 200 words',
      iteration: 1,
      previousFeedback: ''
    }, limits);
    expect(prompt).toContain('- No specific insights provided');
    expect(prompt).toContain('## Requirements\nUnder 200 words');
    expect(prompt).not.toContain('what to improve');
  });

  it('includes earlier feedback with the iteration number', () => {
    const prompt = buildGenerationPrompt({
      sourceContent: 'Notes',
      insights: [],
      requirements: '',
      iteration: 2,
      previousFeedback: 'Previous score: 5/10'
    }, limits);
    expect(prompt).toContain('## Iteration 2: what to improve\nPrevious score: 5/10');
  });

  it('truncates long source content', () => {
    const prompt = buildGenerationPrompt({
      sourceContent: 'x'.repeat(30),
      insights: [],
      requirements: '',
      iteration: 1,
      previousFeedback: ''
    }, { sourceCharLimit: 10, insightLimit: 5 });
    expect(prompt).toContain(`${'x'.repeat(10)}\n...[content truncated]...`);
  });
});

describe('system prompts', () => {
  it('name the target platform', () => {
    expect(generatorSystemPrompt('Mastodon')).toContain('You are a Mastodon content strategist.');
  });
});

describe('buildCritiquePrompt', () => {
  it('reports metrics and context', () => {
    const prompt = buildCritiquePrompt(draft, 'Iteration 2, Previous score: 5');
    expect(prompt).toContain('- Tag count: 1');
    expect(prompt).toContain('## Context\nIteration 2, Previous score: 5');
  });
});

describe('buildRefinementPrompt', () => {
  it('aims two points higher', () => {
    expect(buildRefinementPrompt(draft, evaluation(5), [], '')).toContain('Target score: 7/10');
  });

  it('caps the target at ten', () => {
    expect(buildRefinementPrompt(draft, evaluation(9), [], '')).toContain('Target score: 10/10');
  });

  it('lists focus areas and human feedback', () => {
    const prompt = buildRefinementPrompt(draft, evaluation(5), ['hook', 'length'], 'Drop the jargon');
    expect(prompt).toContain('## Priority focus areas\nhook, length');
    expect(prompt).toContain('## Human feedback (highest priority)\nDrop the jargon');
    expect(prompt).toContain('Weaknesses (fix these):\n- (none)');
  });
});
