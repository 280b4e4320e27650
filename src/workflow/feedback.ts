// Human feedback: parsing, focus areas and the summary fed back into generation

import { createValidationError } from '../shared/errors.js';
import type { Evaluation, Feedback, FeedbackInput } from './types.js';

const MAX_CHANGE_REQUESTS = 5;

const CHANGE_REQUEST_PATTERNS: RegExp[] = [
  /\bmake it\s+(.+?)(?:\.|$)/gim,
  /\badd\s+(.+?)(?:\.|$)/gim,
  /\bremove\s+(.+?)(?:\.|$)/gim,
  /\bchange\s+(.+?)(?:\.|$)/gim,
  /\bimprove\s+(.+?)(?:\.|$)/gim
];

const REGENERATE_PATTERN = /\bregenerat|\bstart over\b|\bfrom scratch\b/i;

export const extractChangeRequests = (message: string): string[] => {
  const requests: string[] = [];
  for (const pattern of CHANGE_REQUEST_PATTERNS) {
    for (const match of message.matchAll(pattern)) {
      const request = match[1].trim();
      if (request && !requests.includes(request)) {
        requests.push(request);
      }
    }
  }
  return requests.slice(0, MAX_CHANGE_REQUESTS);
};

export const wantsRegeneration = (message: string): boolean => REGENERATE_PATTERN.test(message);

export const createFeedback = (input: FeedbackInput): Feedback => {
  const message = (input.message ?? '').trim();

  if (input.satisfaction !== undefined) {
    if (!Number.isInteger(input.satisfaction) || input.satisfaction < 1 || input.satisfaction > 5) {
      throw createValidationError('satisfaction must be an integer from 1 to 5');
    }
  }

  return {
    message,
    satisfaction: input.satisfaction,
    approve: input.approve ?? false,
    regenerate: input.regenerate ?? wantsRegeneration(message),
    changeRequests: extractChangeRequests(message),
    createdAt: new Date().toISOString()
  };
};

const FOCUS_AREAS: Array<[string, RegExp]> = [
  ['hook', /\bhook|\bopening\b|\bfirst line/i],
  ['value', /\bvalue\b|\binsights?\b|\bactionable\b/i],
  ['engagement', /\bengag|\binteract/i],
  ['tags', /\b(hash)?tags?\b/i],
  ['call_to_action', /\bcall[- ]to[- ]action\b|\bcta\b/i],
  ['length', /\blength\b|\btoo (long|short)\b|\bverbose\b|\bwordy\b/i]
];

// Distinct focus areas in the order the weaknesses first mention them
export const extractFocusAreas = (weaknesses: readonly string[]): string[] => {
  const areas: string[] = [];
  for (const weakness of weaknesses) {
    for (const [area, pattern] of FOCUS_AREAS) {
      if (pattern.test(weakness) && !areas.includes(area)) {
        areas.push(area);
      }
    }
  }
  return areas;
};

// Condensed critique (and human note) handed to the next generation
export const buildFeedbackSummary = (evaluation: Evaluation | undefined, humanFeedback: string): string => {
  const parts: string[] = [];

  if (evaluation) {
    parts.push(`Previous score: ${evaluation.overallScore}/10`);
    if (evaluation.weaknesses.length > 0) {
      parts.push(`Issues: ${evaluation.weaknesses.slice(0, 3).join('; ')}`);
    }
    if (evaluation.specificImprovements.length > 0) {
      parts.push(`Needed: ${evaluation.specificImprovements.slice(0, 3).join('; ')}`);
    }
  }

  const summary = parts.join('\n');
  if (!humanFeedback) {
    return summary;
  }
  const humanPart = `Human feedback (priority): ${humanFeedback}`;
  return summary ? `${summary}\n\n${humanPart}` : humanPart;
};
