import OpenAI from 'openai';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { ExpenseParseError } from '../errors.js';
import { OpenAIExpenseParser, buildParsePrompt, extractJson } from '../expense-parser.js';

import type { ParseContext } from '../expense-parser.js';

const context: ParseContext = {
  requester: { id: 1, firstName: 'Asha', lastName: null },
  friends: [
    { id: 2, firstName: 'John', lastName: 'Smith' },
    { id: 4, firstName: 'Bob', lastName: null },
  ],
};

function completion(content: string | null): OpenAI.ChatCompletion {
  return {
    id: 'chatcmpl-test',
    object: 'chat.completion',
    created: 1714564800,
    model: 'gpt-4o-mini',
    choices: [
      {
        index: 0,
        finish_reason: 'stop',
        logprobs: null,
        message: { role: 'assistant', content, refusal: null },
      },
    ],
  };
}

describe('buildParsePrompt', () => {
  it('names the requester and their friends', () => {
    const prompt = buildParsePrompt('I paid 900 for dinner with John', context);

    expect(prompt.user).toContain('You are the user: Asha (id: 1).');
    expect(prompt.user).toContain('You may refer to yourself as: Asha, me, mine, self.');
    expect(prompt.user).toContain('Your friends are: John Smith (id: 2), Bob (id: 4).');
    expect(prompt.user).toContain('The user sent this message: "I paid 900 for dinner with John".');
    expect(prompt.system).toContain('Return ONLY a raw JSON object');
  });

  it('says when there are no friends', () => {
    expect(buildParsePrompt('hi', { ...context, friends: [] }).user).toContain('Your friends are: none.');
  });
});

describe('extractJson', () => {
  it('reads plain and fenced JSON', () => {
    expect(extractJson('{"amount": 900}')).toEqual({ amount: 900 });
    expect(extractJson('```json\n{"amount": 900}\n```')).toEqual({ amount: 900 });
  });

  it('raises ExpenseParseError for anything else', () => {
    expect(() => extractJson('sorry, I cannot help')).toThrow(ExpenseParseError);
  });
});

describe('OpenAIExpenseParser', () => {
  const openai = new OpenAI({ apiKey: 'test-key' });
  const parser = new OpenAIExpenseParser(openai);

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('asks for a JSON object and returns the parsed reply', async () => {
    const create = vi.spyOn(openai.chat.completions, 'create');
    create.mockResolvedValueOnce(completion('{"amount": 900, "participants": ["me", "John"]}'));

    await expect(parser.parse('I paid 900 with John', context)).resolves.toEqual({
      amount: 900,
      participants: ['me', 'John'],
    });
    expect(create).toHaveBeenCalledWith(
      expect.objectContaining({ model: 'gpt-4o-mini', response_format: { type: 'json_object' }, temperature: 0.1 }),
    );
  });

  it('raises ExpenseParseError for an empty reply', async () => {
    vi.spyOn(openai.chat.completions, 'create').mockResolvedValueOnce(completion(null));

    await expect(parser.parse('I paid 900 with John', context)).rejects.toThrow('No response from the language model');
  });

  it('raises ExpenseParseError when the API call fails', async () => {
    vi.spyOn(openai.chat.completions, 'create').mockRejectedValueOnce(new Error('rate limited'));

    await expect(parser.parse('I paid 900 with John', context)).rejects.toThrow('Parsing failed: rate limited');
  });

  it('treats an OK verdict as clear', async () => {
    vi.spyOn(openai.chat.completions, 'create').mockResolvedValueOnce(completion('OK.'));

    await expect(parser.checkClarity('I paid 900 with John', { amount: 900 })).resolves.toBeNull();
  });

  it('returns the clarification question otherwise', async () => {
    vi.spyOn(openai.chat.completions, 'create').mockResolvedValueOnce(completion('Who else shared the dinner?'));

    await expect(parser.checkClarity('dinner 900', { amount: 900 })).resolves.toBe('Who else shared the dinner?');
  });
});
