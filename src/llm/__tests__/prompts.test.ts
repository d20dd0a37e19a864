import { describe, it, expect } from 'vitest';
import { buildSummaryMessages, clipForInput, SUMMARY_SYSTEM_PROMPT } from '../prompts.js';

describe('clipForInput', () => {
  it('leaves short content alone', () => {
    expect(clipForInput('short', 2000)).toBe('short');
  });

  it('clips to four characters per token and marks the cut', () => {
    const clipped = clipForInput('x'.repeat(10_000), 2000);
    expect(clipped).toBe('x'.repeat(8000) + '\n[truncated]');
  });

  it('keeps a surrogate pair whole at the cut', () => {
    expect(clipForInput('abc\u{1F600}def', 1)).toBe('abc\n[truncated]');
  });
});

describe('buildSummaryMessages', () => {
  it('puts the rules in the system message and the item in the user message', () => {
    const messages = buildSummaryMessages({
      title: 'Budget passes',
      url: 'https://news.example.com/budget',
      content: 'Body text.',
      maxInputTokens: 2000,
    });

    expect(messages).toEqual([
      { role: 'system', content: SUMMARY_SYSTEM_PROMPT },
      {
        role: 'user',
        content: 'Title: Budget passes\nURL: https://news.example.com/budget\n\nContent:\nBody text.',
      },
    ]);
  });

  it('summarizes from the title alone when there is no text', () => {
    const messages = buildSummaryMessages({
      title: 'Video drop',
      url: 'https://v.example.com/1',
      content: '',
      maxInputTokens: 2000,
    });
    expect(messages[1]?.content).toBe(
      'Title: Video drop\nURL: https://v.example.com/1\n\nContent:\n(no body text available)',
    );
  });
});
