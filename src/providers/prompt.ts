import { type ChatMessage } from '../types/request.js';

export const HUMAN_PROMPT = '\n\nHuman:';
export const AI_PROMPT = '\n\nAssistant:';

/**
 * Render messages in Claude's text-completion format:
 * system text first, then alternating `Human:`/`Assistant:` turns, ending on an open
 * `Assistant:` turn for the model to complete.
 */
export function buildClaudePrompt(messages: ChatMessage[]): string {
  let prompt = messages
    .filter((m) => m.role === 'system')
    .map((m) => m.content)
    .join('\n\n');

  for (const m of messages) {
    if (m.role === 'user') prompt += `${HUMAN_PROMPT} ${m.content}`;
    else if (m.role === 'assistant') prompt += `${AI_PROMPT} ${m.content}`;
  }

  return prompt + AI_PROMPT;
}

export interface TranscriptLabels {
  user: string;
  assistant: string;
}

/**
 * Flatten a conversation into one prompt string for upstreams that take a single text
 * input. A lone user message (after any system text) is sent as-is; longer
 * conversations become a labelled transcript.
 */
export function flattenMessages(
  messages: ChatMessage[],
  labels: TranscriptLabels = { user: 'Human', assistant: 'Assistant' }
): string {
  const system = messages.filter((m) => m.role === 'system').map((m) => m.content);
  const turns = messages.filter((m) => m.role !== 'system');

  const only = turns[0];
  if (turns.length === 1 && only?.role === 'user') {
    return [...system, only.content].join('\n\n');
  }

  const transcript = turns.map(
    (m) => `${m.role === 'user' ? labels.user : labels.assistant}: ${m.content}`
  );
  return [...system, ...transcript].join('\n\n');
}
