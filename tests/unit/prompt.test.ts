import { describe, it, expect } from 'vitest';
import { buildClaudePrompt, flattenMessages } from '../../src/providers/prompt.js';

describe('buildClaudePrompt', () => {
  it('ends on an open assistant turn', () => {
    expect(buildClaudePrompt([{ role: 'user', content: 'Hi' }])).toBe('\n\nHuman: Hi\n\nAssistant:');
  });

  it('joins system messages ahead of the turns', () => {
    expect(
      buildClaudePrompt([
        { role: 'system', content: 'Rule one.' },
        { role: 'system', content: 'Rule two.' },
        { role: 'user', content: 'Go' },
      ])
    ).toBe('Rule one.\n\nRule two.\n\nHuman: Go\n\nAssistant:');
  });
});

describe('flattenMessages', () => {
  it('sends a lone user message as-is', () => {
    expect(flattenMessages([{ role: 'user', content: 'Hi' }])).toBe('Hi');
  });

  it('keeps system text ahead of a lone user message', () => {
    expect(
      flattenMessages([
        { role: 'system', content: 'Be kind.' },
        { role: 'user', content: 'Hi' },
      ])
    ).toBe('Be kind.\n\nHi');
  });

  it('labels every turn of a longer conversation', () => {
    expect(
      flattenMessages([
        { role: 'user', content: 'Hi' },
        { role: 'assistant', content: 'Hello' },
        { role: 'user', content: 'Bye' },
      ])
    ).toBe('Human: Hi\n\nAssistant: Hello\n\nHuman: Bye');
  });

  it('takes custom labels', () => {
    expect(
      flattenMessages(
        [
          { role: 'assistant', content: 'Ready.' },
          { role: 'user', content: 'Go' },
        ],
        { user: 'Q', assistant: 'A' }
      )
    ).toBe('A: Ready.\n\nQ: Go');
  });
});
