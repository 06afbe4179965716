import { describe, expect, it } from 'vitest';
import { PermanentCollaboratorError, TransientCollaboratorError, unwrap } from '@helix/core';
import { FlakyRecordStore, SEQUENCE_WITH_ORF } from '@helix/testing';

import { classifyMessage } from '../src/index';
import { createHarness } from './harness';

describe('classifyMessage', () => {
  it('routes messages with a nucleotide run of 20 or more to analysis', () => {
    expect(classifyMessage(`analyze ${SEQUENCE_WITH_ORF.toLowerCase()} please`)).toEqual({
      route: 'analysis',
      sequence: SEQUENCE_WITH_ORF
    });
  });

  it('routes short runs to conversation', () => {
    expect(classifyMessage('what is a codon? ACGTACGT')).toEqual({ route: 'conversation' });
  });

  it('picks the longest run', () => {
    const short = 'ACGTACGTACGTACGTACGT';
    const long = 'TTTTTTTTTTGGGGGGGGGGCCCCC';
    expect(classifyMessage(`${short} vs ${long}`)).toEqual({ route: 'analysis', sequence: long });
  });
});

describe('RequestRouter', () => {
  it('answers conversation through the text completion collaborator', async () => {
    const { router, fakes, sessions } = createHarness();

    const result = await router.route('hello', undefined, 'user-1');

    expect(result).toEqual({ success: true, sessionId: 's-1', route: 'conversation', response: 'Fake response' });
    expect(fakes.textCompletion.requests[0]?.history).toEqual([]);
    expect(fakes.textCompletion.requests[0]?.prompt).toBe('hello');
    const messages = unwrap(await sessions.recentMessages('s-1', 10));
    expect(messages.map((m) => [m.role, m.content])).toEqual([
      ['user', 'hello'],
      ['assistant', 'Fake response']
    ]);
  });

  it('renders the system prompt with session variables', async () => {
    const { router, fakes } = createHarness({
      systemPrompt: 'Assisting {{ session.ownerId }} ({{ session.messageCount }} messages, last run: {{ context.last_run.orfCount or "none" }})'
    });

    await router.route('hello', undefined, 'user-1');

    expect(fakes.textCompletion.requests[0]?.systemPrompt).toBe('Assisting user-1 (1 messages, last run: none)');
  });

  it('sends only the configured window of prior messages', async () => {
    const { router, fakes } = createHarness({ historyWindow: 2 });

    await router.route('first');
    await router.route('second', 's-1');
    await router.route('third', 's-1');

    expect(fakes.textCompletion.requests[2]?.history).toEqual([
      { role: 'user', content: 'second' },
      { role: 'assistant', content: 'Fake response' }
    ]);
  });

  it('runs the pipeline for sequences and summarizes the result', async () => {
    const { router } = createHarness();

    const result = await router.route(`Please analyze ${SEQUENCE_WITH_ORF.toLowerCase()}`);

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.route).toBe('analysis');
    expect(result.run?.status).toBe('COMPLETED');
    expect(result.response).toBe([
      'Analysis complete for a 25 bp DNA sequence.',
      'GC content: 44%',
      'Open reading frames: 1',
      'Motifs: TATA_box',
      'Proteins: 1 prediction, 0 with a signal peptide',
      'Literature: 1 paper found',
      'Hypothesis (85%): This sequence contains transcriptional regulatory elements that may control gene expression',
      'Hypothesis (75%): This sequence encodes a functional protein with potential biological activity',
      '',
      'Fake response',
      '',
      'Report: reports/run-1.pdf'
    ].join('\n'));
  });

  it('records failed runs in the session and reports the stage', async () => {
    const { router, sessions } = createHarness({ maxSequenceLength: 10 });

    const result = await router.route(SEQUENCE_WITH_ORF);

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.stage).toBe('sequence_analysis');
    expect(result.error).toEqual({ kind: 'validation', message: 'Sequence length 25 exceeds the maximum of 10' });
    expect(result.response).toBe(
      'That sequence could not be analyzed (stage: sequence_analysis): Sequence length 25 exceeds the maximum of 10'
    );
    const messages = unwrap(await sessions.recentMessages(result.sessionId, 10));
    expect(messages.at(-1)?.metadata).toEqual({ route: 'analysis', runId: 'run-1', status: 'FAILED' });
  });

  it('returns a failure when the conversation collaborator rejects the request', async () => {
    const { router, fakes, sessions } = createHarness();
    fakes.textCompletion.outcomes.failNext(new PermanentCollaboratorError('text-completion', 'bad key'));

    const result = await router.route('hello');

    expect(result).toEqual({
      success: false,
      sessionId: 's-1',
      route: 'conversation',
      error: { kind: 'permanent', message: 'text-completion: bad key' },
      response: 'I could not answer that message'
    });
    const messages = unwrap(await sessions.recentMessages('s-1', 10));
    expect(messages.map((m) => [m.role, m.content])).toEqual([
      ['user', 'hello'],
      ['assistant', 'I could not answer that message']
    ]);
    expect(messages[1]?.metadata).toEqual({ route: 'conversation', status: 'FAILED' });
  });

  it('keeps history alternating after a failed conversation turn', async () => {
    const { router, fakes } = createHarness({ retry: { maxRetries: 0 } });
    fakes.textCompletion.outcomes.failNext(new TransientCollaboratorError('text-completion', 'overloaded'));

    const failed = await router.route('first');
    await router.route('second', 's-1');

    expect(failed.success).toBe(false);
    if (failed.success) return;
    expect(failed.response).toBe('The assistant is temporarily unavailable; please try again shortly');
    expect(fakes.textCompletion.requests[1]?.history.map((entry) => entry.role)).toEqual(['user', 'assistant']);
  });

  it('records the collaborator invoked by a conversation turn', async () => {
    const { router, tracker } = createHarness();

    await router.route('hello');

    expect(tracker.records().map((record) => [record.stageName, record.toolCalls])).toEqual([
      ['conversation', ['text_completion']]
    ]);
  });

  it('fails the turn when the session cannot be read', async () => {
    const records = new FlakyRecordStore();
    const { router, sessions } = createHarness({}, {}, records);
    await sessions.create();
    records.failGet(new Error('read ECONNRESET'));

    const result = await router.route('hello', 's-1');

    expect(result).toEqual({
      success: false,
      sessionId: 's-1',
      route: 'conversation',
      error: { kind: 'transient', message: 'read ECONNRESET' }
    });
    expect(await records.list()).toEqual(['s-1']);
  });

  it('serializes turns within a session', async () => {
    const { router, fakes, sessions } = createHarness();
    const session = await sessions.create();

    await Promise.all([router.route('first', session.id), router.route('second', session.id)]);

    expect(fakes.textCompletion.requests[1]?.history).toEqual([
      { role: 'user', content: 'first' },
      { role: 'assistant', content: 'Fake response' }
    ]);
  });

  it('starts a new session for an unknown id', async () => {
    const { router } = createHarness();

    const result = await router.route('hello', 'does-not-exist');

    expect(result.sessionId).toBe('s-1');
  });
});
