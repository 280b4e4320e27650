// Refinement workflow prompts

import type { Draft, Evaluation } from './types.js';

export const TRUNCATION_MARKER = '\n...[content truncated]...';

export const truncateSource = (source: string, limit: number): string =>
  source.length > limit ? `${source.slice(0, limit)}${TRUNCATION_MARKER}` : source;

const basePrompt = (platform: string) => `You are a ${platform} content strategist. You turn source material into short posts people actually stop scrolling for.

## Principles
- Authentic professional voice, no corporate speak
- Deliver value before anything that sounds like promotion
- Short paragraphs, line breaks, mobile-first readability
- One clear idea per post

## ${platform} rules of thumb
- Post length: 150-1300 characters, sweet spot 400-800
- Hook: the first one or two sentences decide whether anyone reads on
- Tags: 5-8 relevant tags, each starting with #
- Call to action: a specific question that starts a conversation`;

const DRAFT_FORMAT = `## Output format
Return ONLY a JSON object with exactly these field names:
{
  "title": "Short headline (10-60 characters)",
  "hook": "Opening line or two. Never repeat it inside body.",
  "body": "Main content that follows the hook",
  "call_to_action": "Specific engagement question",
  "tags": ["#Tag1", "#Tag2", "#Tag3", "#Tag4", "#Tag5"],
  "target_audience": "Who this is for",
  "estimated_engagement": 7
}

"title" and "body" are required and must not be empty. "estimated_engagement" is an integer from 1 to 10.`;

export const generatorSystemPrompt = (platform: string) => `${basePrompt(platform)}

## Your role: writer
Transform the source material into a ${platform} post that hooks in the first sentence, delivers concrete value and ends with a real question.

${DRAFT_FORMAT}`;

export interface GenerationPromptInput {
  sourceContent: string;
  insights: readonly string[];
  requirements: string;
  iteration: number;
  previousFeedback: string;
}

export const buildGenerationPrompt = (
  input: GenerationPromptInput,
  limits: { sourceCharLimit: number; insightLimit: number }
): string => {
  const insights = input.insights.slice(0, limits.insightLimit);
  const insightsText = insights.length > 0
    ? insights.map(insight => `- ${insight}`).join('\n')
    : '- No specific insights provided';

  const requirementsText = input.requirements
    ? `\n## Requirements\n${input.requirements}\n`
    : '';

  const feedbackText = input.previousFeedback
    ? `\n## Iteration ${input.iteration}: what to improve\n${input.previousFeedback}\n\nKeep what worked before and fix the issues above.\n`
    : '';

  return `Write a post from this material.

## Source content
${truncateSource(input.sourceContent, limits.sourceCharLimit)}

## Key insights
${insightsText}
${requirementsText}${feedbackText}
## Approach
1. Hook: a question, a surprising number or a bold claim
2. Body: 3-5 concrete points with examples or data
3. Structure: short paragraphs or a numbered list
4. Call to action: one question readers want to answer`;
};

export const criticSystemPrompt = (platform: string) => `${basePrompt(platform)}

## Your role: critic
Score the post on five dimensions, each an integer from 1 to 10:
1. hook_strength: does the opening stop the scroll?
2. value_delivery: are there concrete, actionable insights?
3. platform_fit: length, formatting and tags suit ${platform}?
4. engagement_potential: will people comment or share?
5. tone: credible, human, professional?

Scoring guide: 1-3 poor, 4-6 needs work, 7-8 good, 9-10 ready to publish.
overall_score is the rounded average of the five dimensions.

## Output format
Return ONLY a JSON object:
{
  "overall_score": 7,
  "hook_strength": 8,
  "value_delivery": 7,
  "platform_fit": 7,
  "engagement_potential": 6,
  "tone": 8,
  "strengths": ["..."],
  "weaknesses": ["..."],
  "specific_improvements": ["..."],
  "tone_feedback": "...",
  "engagement_feedback": "...",
  "platform_feedback": "..."
}

All scores are whole numbers. Name 3-5 strengths, weaknesses and improvements, and be specific.`;

export const buildCritiquePrompt = (draft: Draft, context: string): string => {
  const totalLength = draft.hook.length + draft.body.length + draft.callToAction.length;

  return `Evaluate this post.

Title: ${draft.title}

Hook: ${draft.hook}

Body:
${draft.body}

Call to action: ${draft.callToAction}

Tags: ${draft.tags.join(', ')}

Target audience: ${draft.targetAudience}

## Metrics
- Total length: ${totalLength} characters
- Tag count: ${draft.tags.length}
- Hook length: ${draft.hook.length} characters
${context ? `\n## Context\n${context}\n` : ''}`;
};

export const refinerSystemPrompt = (platform: string) => `${basePrompt(platform)}

## Your role: editor
Improve an existing ${platform} post using the critique you are given.
- Keep every listed strength
- Fix every listed weakness
- Apply the specific improvements
- Human feedback overrides everything else
- Keep the core message and voice

${DRAFT_FORMAT}`;

const bulletList = (items: readonly string[], marker: string): string =>
  items.length > 0 ? items.map(item => `${marker} ${item}`).join('\n') : `${marker} (none)`;

export const buildRefinementPrompt = (
  draft: Draft,
  evaluation: Evaluation,
  focusAreas: readonly string[],
  humanFeedback: string
): string => {
  const focusText = focusAreas.length > 0
    ? `\n## Priority focus areas\n${focusAreas.join(', ')}\n`
    : '';
  const humanText = humanFeedback
    ? `\n## Human feedback (highest priority)\n${humanFeedback}\n`
    : '';

  return `Refine this post.

## Current post
Title: ${draft.title}
Hook: ${draft.hook}
Body: ${draft.body}
Call to action: ${draft.callToAction}
Tags: ${draft.tags.join(', ')}

## Critique
Overall: ${evaluation.overallScore}/10 (${evaluation.qualityLevel})
- Hook strength: ${evaluation.dimensions.hookStrength}/10
- Value delivery: ${evaluation.dimensions.valueDelivery}/10
- Platform fit: ${evaluation.dimensions.platformFit}/10
- Engagement potential: ${evaluation.dimensions.engagementPotential}/10
- Tone: ${evaluation.dimensions.tone}/10

Strengths (keep these):
${bulletList(evaluation.strengths, '+')}

Weaknesses (fix these):
${bulletList(evaluation.weaknesses, '-')}

Specific improvements:
${bulletList(evaluation.specificImprovements, '>')}

Tone: ${evaluation.toneFeedback}
Engagement: ${evaluation.engagementFeedback}
Platform: ${evaluation.platformFeedback}
${focusText}${humanText}
Target score: ${Math.min(evaluation.overallScore + 2, 10)}/10`;
};
