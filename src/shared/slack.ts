// Slack formatting for refinement sessions

import { formatDraftText } from '../workflow/artifacts.js';
import type { Draft, Evaluation, WorkflowState } from '../workflow/types.js';

// Strip bot mention from message
export const stripBotMention = (text: string): string => {
  if (!text) return '';

  // Remove <@USERID> mentions
  let cleaned = text.replace(/<@[A-Z0-9]+>/g, '').trim();

  // Collapse spaces but keep line breaks
  cleaned = cleaned.replace(/[ \t]+/g, ' ').replace(/ *\n */g, '\n');

  return cleaned;
};

export const hasMention = (text: string): boolean => /<@[A-Z0-9]+>/.test(text);

// Build thread key; also used as the session id for thread-started sessions
export const buildThreadKey = (channelId: string, threadTs?: string): string => {
  return threadTs ? `${channelId}:${threadTs}` : channelId;
};

// Truncate text with ellipsis
export const truncate = (text: string, maxLength: number): string => {
  if (text.length <= maxLength) return text;
  return text.slice(0, maxLength - 3) + '...';
};

export const formatError = (message: string): string => {
  return `:x: ${message}`;
};

export const formatInfo = (message: string): string => {
  return `:information_source: ${message}`;
};

export const formatDraft = (draft: Draft): string => {
  return `*${draft.title}*\n\n${formatDraftText(draft)}`;
};

export const formatEvaluation = (evaluation: Evaluation): string => {
  const lines = [`Score: *${evaluation.overallScore}/10* (${evaluation.qualityLevel})`];
  if (evaluation.weaknesses.length > 0) {
    lines.push(`Open issues: ${evaluation.weaknesses.slice(0, 3).join('; ')}`);
  }
  return lines.join('\n');
};

const REVIEW_HINT = 'Reply in this thread with changes, "regenerate" to start over, or "approve" to accept.';

export const formatSessionReply = (state: WorkflowState): string => {
  const iterations = `${state.iterationCount} iteration(s)`;

  switch (state.status) {
    case 'completed': {
      const header = state.humanApproved
        ? `:white_check_mark: *Approved* after ${iterations}`
        : `:white_check_mark: *Final post* after ${iterations}`;
      const scoreLine = state.currentEvaluation ? `\n${formatEvaluation(state.currentEvaluation)}` : '';
      const body = state.finalDraft ? `\n\n${formatDraft(state.finalDraft)}` : '';
      return `${header}${scoreLine}${body}`;
    }
    case 'awaiting_human': {
      const scoreLine = state.currentEvaluation ? `\n${formatEvaluation(state.currentEvaluation)}` : '';
      const body = state.currentDraft ? `\n\n${formatDraft(state.currentDraft)}` : '';
      return `:eyes: *Needs your review* after ${iterations}${scoreLine}${body}\n\n${REVIEW_HINT}`;
    }
    case 'abandoned': {
      const header = `:zzz: Stopped after ${iterations} without reviewer feedback.`;
      if (!state.currentDraft) return header;
      const scoreLine = state.currentEvaluation ? `\n${formatEvaluation(state.currentEvaluation)}` : '';
      return `${header}${scoreLine}\n\n${formatDraft(state.currentDraft)}\n\n${REVIEW_HINT}`;
    }
    case 'failed':
      return formatError(`Refinement failed after ${state.errorCount} error(s): ${state.lastError}`);
    default:
      return formatInfo(`Still working (${state.status}, ${iterations}).`);
  }
};
