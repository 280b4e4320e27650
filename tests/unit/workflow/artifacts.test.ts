import { describe, expect, it } from 'vitest';
import {
  buildEvaluation,
  createDraft,
  formatDraftText,
  isApproved,
  normalizeTag,
  qualityLevelFor,
  separateHook
} from '../../../src/workflow/artifacts.js';
import type { EvaluationFields } from '../../../src/workflow/artifacts.js';

const fields = (score: number): EvaluationFields => ({
  overallScore: score,
  dimensions: { hookStrength: score, valueDelivery: score, platformFit: score, engagementPotential: score, tone: score },
  strengths: [],
  weaknesses: [],
  specificImprovements: [],
  toneFeedback: '',
  engagementFeedback: '',
  platformFeedback: ''
});

describe('qualityLevelFor', () => {
  it('maps scores to levels with inclusive boundaries', () => {
    expect([1, 4, 5, 6, 7, 8, 9, 10].map(qualityLevelFor)).toEqual([
      'draft', 'draft', 'good', 'good', 'excellent', 'excellent', 'publish_ready', 'publish_ready'
    ]);
  });
});

describe('isApproved', () => {
  it('approves at the default threshold of 7', () => {
    expect(isApproved(6)).toBe(false);
    expect(isApproved(7)).toBe(true);
  });

  it('respects a stricter threshold', () => {
    expect(isApproved(8, 9)).toBe(false);
    expect(isApproved(9, 9)).toBe(true);
  });

  it('never approves below the excellent level even with a low threshold', () => {
    expect(isApproved(5, 5)).toBe(false);
  });
});

describe('normalizeTag', () => {
  it('prepends the marker once', () => {
    expect(normalizeTag('AI')).toBe('#AI');
    expect(normalizeTag(normalizeTag('AI'))).toBe('#AI');
  });
});

describe('separateHook', () => {
  it('removes a repeated hook from the start of the body', () => {
    expect(separateHook('Small PRs win.', 'Small PRs win. Here is why.')).toBe('Here is why.');
  });

  it('leaves an unrelated body alone', () => {
    expect(separateHook('Small PRs win.', '  Here is why.  ')).toBe('Here is why.');
  });

  it('keeps a body whose first word only starts with the hook', () => {
    expect(separateHook('AI', 'AIs are changing code review.')).toBe('AIs are changing code review.');
  });

  it('removes a hook that ends on a word boundary', () => {
    expect(separateHook('AI', 'AI is changing code review.')).toBe('is changing code review.');
    expect(separateHook('AI wins.', 'AI wins.Here is why.')).toBe('Here is why.');
  });
});

describe('createDraft', () => {
  const base = {
    title: ' Title ',
    hook: 'Hook line.',
    body: 'Body text.',
    callToAction: 'Thoughts?',
    tags: ['AI', '  ', '#ML'],
    targetAudience: 'Engineers'
  };

  it('normalizes tags and drops blank ones', () => {
    const draft = createDraft(base, 'generated');
    expect(draft.tags).toEqual(['#AI', '#ML']);
    expect(draft.title).toBe('Title');
    expect(draft.origin).toBe('generated');
  });

  it('rejects a body that only repeats the hook', () => {
    expect(() => createDraft({ ...base, body: 'Hook line.' }, 'refined'))
      .toThrow('Schema violation: body only repeats the hook');
  });

  it('gives every draft its own id', () => {
    expect(createDraft(base, 'generated').id).not.toBe(createDraft(base, 'generated').id);
  });
});

describe('buildEvaluation', () => {
  it('derives level and approval from the score', () => {
    const evaluation = buildEvaluation(fields(8));
    expect(evaluation.qualityLevel).toBe('excellent');
    expect(evaluation.approved).toBe(true);
  });

  it('uses the threshold it is given', () => {
    expect(buildEvaluation(fields(8), 9).approved).toBe(false);
  });

  it('keeps a stored timestamp', () => {
    expect(buildEvaluation({ ...fields(3), createdAt: '2026-01-02T03:04:05.000Z' }).createdAt)
      .toBe('2026-01-02T03:04:05.000Z');
  });
});

describe('formatDraftText', () => {
  it('joins hook, body, call to action and tags', () => {
    const draft = createDraft({
      title: 'T',
      hook: 'H',
      body: 'B',
      callToAction: 'C',
      tags: ['a', 'b'],
      targetAudience: 'Everyone'
    }, 'generated');
    expect(formatDraftText(draft)).toBe('H\n\nB\n\nC\n\n#a #b');
  });

  it('skips empty sections', () => {
    const draft = createDraft({
      title: 'T',
      hook: '',
      body: 'B',
      callToAction: '',
      tags: [],
      targetAudience: 'Everyone'
    }, 'generated');
    expect(formatDraftText(draft)).toBe('B');
  });
});
