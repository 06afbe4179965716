import {
  type ErrorKind,
  type HistoryEntry,
  type Logger,
  type RetryPolicy,
  type Session,
  type TextCompletion,
  type TextCompletionPort,
  KeyedMutex,
  classifyError,
  errorMessage,
  retryIdempotent,
  unwrap,
  withTimeout
} from '@helix/core';

import type { PerformanceTracker } from '../metrics/performanceTracker';
import { TOOL_NAMES } from '../pipeline/nodes';
import type { PipelineOrchestrator, PipelineRunResult } from '../pipeline/orchestrator';
import type { SessionStore } from '../session/sessionStore';
import { type RouteKind, classifyMessage } from './classify';
import { formatConversationFailure, formatRunFailure, formatRunSummary } from './format';
import { renderSystemPrompt } from './prompt';

export const CONVERSATION_STAGE = 'conversation';

export interface RouteOptions {
  signal?: AbortSignal | undefined;
  /** Analysis runs only: compare the detected sequence against this one. */
  compareWith?: string | undefined;
  deadline?: number | undefined;
}

export interface RoutedSuccess {
  success: true;
  sessionId: string;
  route: RouteKind;
  response: string;
  run?: PipelineRunResult;
}

export interface RoutedFailure {
  success: false;
  sessionId: string;
  route: RouteKind;
  error: { kind: ErrorKind; message: string };
  /** Pipeline stage that failed, for analysis runs. */
  stage?: string;
  /** Message recorded in the session, when one was. */
  response?: string;
  run?: PipelineRunResult;
}

export type RoutedResult = RoutedSuccess | RoutedFailure;

export interface RequestRouterOptions {
  sessions: SessionStore;
  orchestrator: PipelineOrchestrator;
  tracker: PerformanceTracker;
  textCompletion: TextCompletionPort;
  logger: Logger;
  retry: RetryPolicy;
  collaboratorTimeoutMs: number;
  historyWindow: number;
  systemPrompt: string;
  random?: () => number;
}

/**
 * Entry point for every inbound message. Turns within one session are
 * serialized; different sessions proceed concurrently.
 */
export class RequestRouter {
  private readonly turns = new KeyedMutex();
  private readonly logger: Logger;

  public constructor(private readonly options: RequestRouterOptions) {
    this.logger = options.logger.child({ component: 'router' });
  }

  public async route(
    message: string,
    sessionId?: string,
    ownerId?: string,
    options: RouteOptions = {}
  ): Promise<RoutedResult> {
    const classified = classifyMessage(message);
    let session: Session;
    try {
      session = await this.options.sessions.getOrCreate(sessionId, ownerId);
    } catch (error) {
      return this.failed(sessionId ?? '', classified.route, error);
    }

    return this.turns.runExclusive(session.id, async () => {
      const logger = this.logger.child({ sessionId: session.id, route: classified.route });
      try {
        unwrap(await this.options.sessions.appendMessage(session.id, 'user', message, { route: classified.route }));

        if (classified.route === 'analysis') {
          logger.info({ length: classified.sequence.length }, 'Routing to analysis pipeline');
          return await this.analyze(session.id, classified.sequence, options);
        }

        logger.debug('Routing to conversation');
        return await this.converse(session.id, message, options);
      } catch (error) {
        logger.error({ error: errorMessage(error) }, 'Turn failed');
        return this.failed(session.id, classified.route, error);
      }
    });
  }

  private async analyze(sessionId: string, sequence: string, options: RouteOptions): Promise<RoutedResult> {
    const run = await this.options.orchestrator.run({
      sequence,
      sessionId,
      compareWith: options.compareWith,
      signal: options.signal,
      deadline: options.deadline
    });

    const response = run.success ? formatRunSummary(run) : formatRunFailure(run);
    unwrap(await this.options.sessions.appendMessage(sessionId, 'assistant', response, {
      route: 'analysis',
      runId: run.runId,
      status: run.status
    }));

    if (run.success) {
      return { success: true, sessionId, route: 'analysis', response, run };
    }
    return { success: false, sessionId, route: 'analysis', error: run.error, stage: run.stage, response, run };
  }

  private async converse(sessionId: string, message: string, options: RouteOptions): Promise<RoutedResult> {
    const { historyWindow, retry, collaboratorTimeoutMs, textCompletion, tracker } = this.options;

    const session = unwrap(await this.options.sessions.get(sessionId));
    const systemPrompt = renderSystemPrompt(this.options.systemPrompt, session);
    const recent = session.recentMessages(historyWindow + 1);
    const history: HistoryEntry[] = recent
      .slice(0, -1)
      .map((entry) => ({ role: entry.role, content: entry.content }));

    let completion: TextCompletion;
    try {
      completion = await retryIdempotent({
        ...retry,
        signal: options.signal,
        random: this.options.random,
        run: () => tracker.record(
          CONVERSATION_STAGE,
          () => withTimeout({
            timeoutMs: collaboratorTimeoutMs,
            label: CONVERSATION_STAGE,
            signal: options.signal,
            run: () => textCompletion.complete({
              prompt: message,
              history,
              systemPrompt,
              signal: options.signal
            })
          }),
          (result) => ({ tokensIn: result.tokensIn, tokensOut: result.tokensOut, model: result.model }),
          [TOOL_NAMES.textCompletion]
        )
      });
    } catch (error) {
      // Every user turn is followed by an assistant message, failed turns included.
      const failure = this.failed(sessionId, 'conversation', error);
      const response = formatConversationFailure(failure.error.kind);
      unwrap(await this.options.sessions.appendMessage(sessionId, 'assistant', response, {
        route: 'conversation',
        status: 'FAILED'
      }));
      return { ...failure, response };
    }

    unwrap(await this.options.sessions.appendMessage(sessionId, 'assistant', completion.text, {
      route: 'conversation',
      model: completion.model
    }));

    return { success: true, sessionId, route: 'conversation', response: completion.text };
  }

  private failed(sessionId: string, route: RouteKind, error: unknown): RoutedFailure {
    return {
      success: false,
      sessionId,
      route,
      error: { kind: classifyError(error), message: errorMessage(error) }
    };
  }
}
