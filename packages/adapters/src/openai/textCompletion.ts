import OpenAI from 'openai';
import {
    type HistoryEntry,
    type TextCompletion,
    type TextCompletionPort,
    type TextCompletionRequest,
    CancelledError,
    PermanentCollaboratorError,
    TransientCollaboratorError,
    errorMessage
} from '@helix/core';

type OpenAIMessage = OpenAI.Chat.Completions.ChatCompletionMessageParam;

const COLLABORATOR = 'text-completion';

/** The slice of a chat completion this adapter reads. */
export interface ChatCompletionLike {
    model: string;
    usage?: { prompt_tokens: number; completion_tokens: number } | null | undefined;
    choices: Array<{ message: { content: string | null } }>;
}

/** The slice of the OpenAI client this adapter calls. An `OpenAI` instance satisfies it. */
export interface ChatCompletionsClient {
    chat: {
        completions: {
            create(
                body: OpenAI.Chat.Completions.ChatCompletionCreateParamsNonStreaming,
                options?: { signal?: AbortSignal | undefined }
            ): Promise<ChatCompletionLike>;
        };
    };
}

export interface OpenAITextCompletionOptions {
    apiKey: string;
    model: string;
    baseUrl?: string | undefined;
    client?: ChatCompletionsClient;
}

function toOpenAIMessages(systemPrompt: string | undefined, history: HistoryEntry[], prompt: string): OpenAIMessage[] {
    const mapped: OpenAIMessage[] = [];
    if (systemPrompt) {
        mapped.push({ role: 'system', content: systemPrompt });
    }

    for (const entry of history) {
        mapped.push({ role: entry.role, content: entry.content });
    }

    mapped.push({ role: 'user', content: prompt });
    return mapped;
}

const TRANSIENT_STATUSES = new Set([408, 409, 429]);

/** Rate limits, timeouts and server faults are retryable; everything else the API rejects is not. */
export function mapOpenAIError(error: unknown): Error {
    if (error instanceof OpenAI.APIUserAbortError) {
        return new CancelledError('Text completion cancelled');
    }
    if (error instanceof OpenAI.APIConnectionError) {
        return new TransientCollaboratorError(COLLABORATOR, error.message, error);
    }
    if (error instanceof OpenAI.APIError) {
        const status = error.status;
        if (status === undefined || TRANSIENT_STATUSES.has(status) || status >= 500) {
            return new TransientCollaboratorError(COLLABORATOR, error.message, error);
        }
        return new PermanentCollaboratorError(COLLABORATOR, error.message, error);
    }
    return error instanceof Error ? error : new Error(errorMessage(error));
}

export class OpenAITextCompletion implements TextCompletionPort {
    private readonly client: ChatCompletionsClient;

    public constructor(private readonly opts: OpenAITextCompletionOptions) {
        this.client = opts.client ?? new OpenAI({
            baseURL: opts.baseUrl,
            apiKey: opts.apiKey
        });
    }

    public async complete(request: TextCompletionRequest): Promise<TextCompletion> {
        const params: OpenAI.Chat.Completions.ChatCompletionCreateParamsNonStreaming = {
            model: this.opts.model,
            messages: toOpenAIMessages(request.systemPrompt, request.history, request.prompt)
        };

        let response: ChatCompletionLike;
        try {
            response = await this.client.chat.completions.create(params, { signal: request.signal });
        } catch (error) {
            throw mapOpenAIError(error);
        }

        const content = response.choices[0]?.message.content ?? '';

        return {
            text: content,
            model: response.model,
            tokensIn: response.usage?.prompt_tokens ?? 0,
            tokensOut: response.usage?.completion_tokens ?? 0
        };
    }
}
