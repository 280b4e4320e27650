import { describe, expect, it } from 'vitest';
import { buildEvaluation } from '../../../src/workflow/artifacts.js';
import {
  buildFeedbackSummary,
  createFeedback,
  extractChangeRequests,
  extractFocusAreas,
  wantsRegeneration
} from '../../../src/workflow/feedback.js';

describe('extractChangeRequests', () => {
  it('pulls out requested changes', () => {
    expect(extractChangeRequests('Make it shorter. Add a statistic about review time.'))
      .toEqual(['shorter', 'a statistic about review time']);
  });

  it('groups requests by phrase kind', () => {
    expect(extractChangeRequests('Remove the emoji. Make it punchier.'))
      .toEqual(['punchier', 'the emoji']);
  });

  it('keeps at most five requests', () => {
    expect(extractChangeRequests('Add a. Add b. Add c. Add d. Add e. Add f.'))
      .toEqual(['a', 'b', 'c', 'd', 'e']);
  });

  it('returns nothing for plain praise', () => {
    expect(extractChangeRequests('Looks great')).toEqual([]);
  });
});

describe('wantsRegeneration', () => {
  it('spots a request to start over', () => {
    expect(wantsRegeneration('please regenerate')).toBe(true);
    expect(wantsRegeneration('Can this be regenerated with a new angle?')).toBe(true);
    expect(wantsRegeneration('Try regenerating it')).toBe(true);
    expect(wantsRegeneration('Start over with a different angle')).toBe(true);
    expect(wantsRegeneration('tighten the hook')).toBe(false);
  });
});

describe('createFeedback', () => {
  it('trims the message and derives flags', () => {
    const feedback = createFeedback({ message: '  please regenerate ' });
    expect(feedback.message).toBe('please regenerate');
    expect(feedback.regenerate).toBe(true);
    expect(feedback.approve).toBe(false);
    expect(feedback.changeRequests).toEqual([]);
  });

  it('lets an explicit regenerate flag win over the text', () => {
    expect(createFeedback({ message: 'please regenerate', regenerate: false }).regenerate).toBe(false);
  });

  it('treats an approval without text as approval', () => {
    const feedback = createFeedback({ approve: true });
    expect(feedback.approve).toBe(true);
    expect(feedback.message).toBe('');
  });

  it('rejects satisfaction outside 1-5', () => {
    expect(() => createFeedback({ message: 'ok', satisfaction: 6 }))
      .toThrow('Validation error: satisfaction must be an integer from 1 to 5');
  });
});

describe('extractFocusAreas', () => {
  it('collects distinct areas in encounter order', () => {
    expect(extractFocusAreas([
      'The hook is generic',
      'Too many hashtags and no CTA',
      'Way too long',
      'Weak opening'
    ])).toEqual(['hook', 'tags', 'call_to_action', 'length']);
  });

  it('finds value and engagement complaints', () => {
    expect(extractFocusAreas(['Few actionable insights', 'Nothing invites interaction']))
      .toEqual(['value', 'engagement']);
  });

  it('returns an empty list when nothing matches', () => {
    expect(extractFocusAreas(['Great tone'])).toEqual([]);
  });

  it('is deterministic', () => {
    const weaknesses = ['Hook lacks tension', 'Call-to-action is vague'];
    expect(extractFocusAreas(weaknesses)).toEqual(extractFocusAreas(weaknesses));
  });
});

describe('buildFeedbackSummary', () => {
  const evaluation = buildEvaluation({
    overallScore: 5,
    dimensions: { hookStrength: 5, valueDelivery: 5, platformFit: 5, engagementPotential: 5, tone: 5 },
    strengths: [],
    weaknesses: ['a', 'b', 'c', 'd'],
    specificImprovements: ['x'],
    toneFeedback: '',
    engagementFeedback: '',
    platformFeedback: ''
  });

  it('condenses the last critique and the human note', () => {
    expect(buildFeedbackSummary(evaluation, 'shorter please')).toBe(
      'Previous score: 5/10\nIssues: a; b; c\nNeeded: x\n\nHuman feedback (priority): shorter please'
    );
  });

  it('is empty without any feedback', () => {
    expect(buildFeedbackSummary(undefined, '')).toBe('');
  });

  it('carries a human note on its own', () => {
    expect(buildFeedbackSummary(undefined, 'keep it casual')).toBe('Human feedback (priority): keep it casual');
  });
});
