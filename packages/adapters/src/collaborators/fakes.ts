import {
    type LiteratureResult,
    type LiteratureSearchPort,
    type ReportArtifact,
    type ReportPort,
    type ReportRequest,
    type TextCompletion,
    type TextCompletionPort,
    type TextCompletionRequest,
    type VisualizationPort,
    type VisualizationRequest,
    type VisualizationResult,
    CancelledError
} from '@helix/core';
import { OutcomeQueue } from './queue';

function throwIfAborted(signal: AbortSignal | undefined): void {
    if (signal?.aborted) {
        throw new CancelledError('Collaborator call cancelled');
    }
}

export class FakeTextCompletion implements TextCompletionPort {
    public readonly requests: TextCompletionRequest[] = [];
    public readonly outcomes: OutcomeQueue<TextCompletion>;

    public constructor(fallback: Partial<TextCompletion> = {}) {
        const completion: TextCompletion = { text: 'Fake response', model: 'fake-model', tokensIn: 10, tokensOut: 5, ...fallback };
        this.outcomes = new OutcomeQueue(() => ({ ...completion }));
    }

    public async start(): Promise<void> { }
    public async close(): Promise<void> { }

    public async complete(request: TextCompletionRequest): Promise<TextCompletion> {
        this.requests.push(request);
        throwIfAborted(request.signal);
        return this.outcomes.next();
    }
}

export class FakeLiteratureSearch implements LiteratureSearchPort {
    public readonly queries: string[] = [];
    public readonly outcomes = new OutcomeQueue<LiteratureResult>(() => ({
        totalResults: 1,
        papers: [
            {
                id: 'paper-1',
                title: 'Promoter architecture of a test gene',
                authors: ['Doe J'],
                year: 2020,
                abstract: 'A placeholder abstract.'
            }
        ]
    }));

    public async search(query: string, options?: { signal?: AbortSignal | undefined }): Promise<LiteratureResult> {
        this.queries.push(query);
        throwIfAborted(options?.signal);
        return this.outcomes.next();
    }
}

export class FakeVisualizer implements VisualizationPort {
    public readonly requests: VisualizationRequest[] = [];
    public readonly outcomes = new OutcomeQueue<VisualizationResult>(() => ({ plots: [] }));

    public async render(request: VisualizationRequest, options?: { signal?: AbortSignal | undefined }): Promise<VisualizationResult> {
        this.requests.push(request);
        throwIfAborted(options?.signal);
        return this.outcomes.next();
    }
}

export class FakeReportBuilder implements ReportPort {
    public readonly requests: ReportRequest[] = [];
    public readonly outcomes: OutcomeQueue<ReportArtifact>;

    public constructor() {
        this.outcomes = new OutcomeQueue(() => ({
            reportPath: `reports/${this.requests[this.requests.length - 1]?.runId ?? 'report'}.pdf`,
            pageCount: 1,
            fileSizeBytes: 1024
        }));
    }

    public async generate(request: ReportRequest, options?: { signal?: AbortSignal | undefined }): Promise<ReportArtifact> {
        this.requests.push(request);
        throwIfAborted(options?.signal);
        return this.outcomes.next();
    }
}
