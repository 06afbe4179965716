import { type RuntimeResource } from '../lifecycle';
import { type MessageRole } from '../entities/session';

export interface HistoryEntry {
  role: MessageRole;
  content: string;
}

export interface TextCompletionRequest {
  prompt: string;
  history: HistoryEntry[];
  systemPrompt?: string | undefined;
  signal?: AbortSignal | undefined;
}

export interface TextCompletion {
  text: string;
  model: string;
  tokensIn: number;
  tokensOut: number;
}

/**
 * Natural-language generator. Non-deterministic; implementations should raise
 * TransientCollaboratorError / PermanentCollaboratorError so callers can retry.
 */
export interface TextCompletionPort extends RuntimeResource {
  complete(request: TextCompletionRequest): Promise<TextCompletion>;
}
