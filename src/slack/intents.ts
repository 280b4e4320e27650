// Interpreting Slack text as session commands

export type MentionIntent =
  | { type: 'help' }
  | { type: 'start'; sourceContent: string; insights: string[]; requirements: string };

export type ReplyIntent =
  | { type: 'help' }
  | { type: 'approve' }
  | { type: 'status' }
  | { type: 'feedback'; message: string };

const APPROVE_WORDS = new Set(['approve', 'approved', 'lgtm', 'ship it', 'looks good']);

const normalizeCommand = (text: string): string =>
  text.toLowerCase().replace(/[.!]+$/, '').replace(/\s+/g, ' ').trim();

// Mention text: free source content plus optional "insights:" and
// "requirements:" lines
export const interpretMention = (text: string): MentionIntent => {
  const command = normalizeCommand(text);
  if (!command || command === 'help') {
    return { type: 'help' };
  }

  const insights: string[] = [];
  const requirements: string[] = [];
  const source: string[] = [];

  for (const line of text.split('\n')) {
    const insightMatch = line.match(/^\s*insights?:\s*(.*)$/i);
    if (insightMatch) {
      insights.push(...insightMatch[1].split(';').map(item => item.trim()).filter(item => item.length > 0));
      continue;
    }
    const requirementMatch = line.match(/^\s*requirements?:\s*(.*)$/i);
    if (requirementMatch) {
      const requirement = requirementMatch[1].trim();
      if (requirement) requirements.push(requirement);
      continue;
    }
    source.push(line);
  }

  const sourceContent = source.join('\n').trim();
  if (!sourceContent) {
    return { type: 'help' };
  }

  return { type: 'start', sourceContent, insights, requirements: requirements.join(' ') };
};

export const interpretReply = (text: string): ReplyIntent => {
  const command = normalizeCommand(text);
  if (command === 'help') return { type: 'help' };
  if (command === 'status') return { type: 'status' };
  if (APPROVE_WORDS.has(command)) return { type: 'approve' };
  return { type: 'feedback', message: text.trim() };
};

export const HELP_TEXT = `Mention me with the material you want turned into a post. Optional lines:
• \`insights: first point; second point\`
• \`requirements: keep it under 150 words\`
Then reply in the thread with changes, "regenerate", "status", or "approve".`;
