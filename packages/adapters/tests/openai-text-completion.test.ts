import { describe, expect, it, vi } from 'vitest';
import OpenAI from 'openai';
import { CancelledError, PermanentCollaboratorError, TransientCollaboratorError } from '@helix/core';

import { OpenAITextCompletion, mapOpenAIError, type ChatCompletionLike } from '../src/index';

function fakeClient(create: (body: OpenAI.Chat.Completions.ChatCompletionCreateParamsNonStreaming) => Promise<ChatCompletionLike>) {
  return { chat: { completions: { create } } };
}

describe('OpenAITextCompletion', () => {
  it('maps the completion response to the text completion contract', async () => {
    const create = vi.fn(async (_body: OpenAI.Chat.Completions.ChatCompletionCreateParamsNonStreaming) => ({
      model: 'gpt-4o-mini',
      usage: { prompt_tokens: 12, completion_tokens: 5 },
      choices: [{ message: { content: 'The sequence has a TATA box.' } }]
    }));

    const provider = new OpenAITextCompletion({ apiKey: 'sk-test', model: 'gpt-4o-mini', client: fakeClient(create) });

    const result = await provider.complete({
      prompt: 'What does it contain?',
      history: [
        { role: 'user', content: 'hi' },
        { role: 'assistant', content: 'hello' }
      ],
      systemPrompt: 'you are a bioinformatics assistant'
    });

    expect(result).toEqual({
      text: 'The sequence has a TATA box.',
      model: 'gpt-4o-mini',
      tokensIn: 12,
      tokensOut: 5
    });
    expect(create).toHaveBeenCalledTimes(1);
    expect(create.mock.calls[0]?.[0]).toEqual({
      model: 'gpt-4o-mini',
      messages: [
        { role: 'system', content: 'you are a bioinformatics assistant' },
        { role: 'user', content: 'hi' },
        { role: 'assistant', content: 'hello' },
        { role: 'user', content: 'What does it contain?' }
      ]
    });
  });

  it('defaults missing content and usage to empty values', async () => {
    const provider = new OpenAITextCompletion({
      apiKey: 'sk-test',
      model: 'gpt-4o-mini',
      client: fakeClient(async () => ({ model: 'gpt-4o-mini', usage: null, choices: [] }))
    });

    const result = await provider.complete({ prompt: 'x', history: [] });

    expect(result).toEqual({ text: '', model: 'gpt-4o-mini', tokensIn: 0, tokensOut: 0 });
  });

  it('raises a transient error when the API rate limits', async () => {
    const provider = new OpenAITextCompletion({
      apiKey: 'sk-test',
      model: 'gpt-4o-mini',
      client: fakeClient(async () => {
        throw new OpenAI.APIError(429, undefined, 'Rate limit reached', undefined);
      })
    });

    await expect(provider.complete({ prompt: 'x', history: [] })).rejects.toBeInstanceOf(TransientCollaboratorError);
  });
});

describe('mapOpenAIError', () => {
  it('treats server faults as transient and client faults as permanent', () => {
    expect(mapOpenAIError(new OpenAI.APIError(503, undefined, 'unavailable', undefined))).toBeInstanceOf(TransientCollaboratorError);
    expect(mapOpenAIError(new OpenAI.APIError(401, undefined, 'bad key', undefined))).toBeInstanceOf(PermanentCollaboratorError);
    expect(mapOpenAIError(new OpenAI.APIError(400, undefined, 'bad request', undefined))).toBeInstanceOf(PermanentCollaboratorError);
  });

  it('maps aborted requests to cancellation', () => {
    expect(mapOpenAIError(new OpenAI.APIUserAbortError())).toBeInstanceOf(CancelledError);
  });

  it('passes through errors that did not come from the API', () => {
    const error = new Error('boom');
    expect(mapOpenAIError(error)).toBe(error);
  });
});
