import { describe, it, expect, beforeEach, vi } from 'vitest';
import { BackendRequest, IChatCompletionClient, OpenAIBackendAdapter } from '../../../src/services/backend.service';
import { BackendInvalidOutputError, BackendUnavailableError } from '../../../src/engine/errors';
import { createMockLogger } from '../../fixtures';

const request: BackendRequest = {
    task: 'job_analysis',
    instructions: 'Analyze the job posting.',
    input: { roleTitle: 'Data Engineer' }
};

describe('OpenAI Backend Adapter - Dependency Injection Tests', () => {
    const complete = vi.fn<IChatCompletionClient['complete']>();
    const mockClient: IChatCompletionClient = { complete };
    const mockLogger = createMockLogger();
    const signal = new AbortController().signal;
    let adapter: OpenAIBackendAdapter;

    beforeEach(() => {
        vi.clearAllMocks();
        adapter = new OpenAIBackendAdapter(mockClient, mockLogger, 'test-llm-model', 0.5, 1000);
    });

    describe('Constructor and Factory', () => {
        it('should create adapter with injected dependencies', () => {
            expect(adapter).toBeInstanceOf(OpenAIBackendAdapter);
        });

        it('should create adapter with factory method', () => {
            const prodAdapter = OpenAIBackendAdapter.create({
                openaiApiKey: 'test-secret',
                llmModel: 'gpt-4o-mini',
                llmTemperature: 0.2
            });
            expect(prodAdapter).toBeInstanceOf(OpenAIBackendAdapter);
        });
    });

    describe('invoke', () => {
        it('should send one JSON-mode request and parse the answer', async () => {
            complete.mockResolvedValue({ content: '{"seniorityLevel":"mid"}', totalTokens: 42 });

            const result = await adapter.invoke(request, signal);

            expect(result).toEqual({ seniorityLevel: 'mid' });
            expect(complete).toHaveBeenCalledWith({
                model: 'test-llm-model',
                messages: [
                    {
                        role: 'system',
                        content: 'Analyze the job posting.\nRespond with a single JSON object and nothing else.'
                    },
                    { role: 'user', content: '{"roleTitle":"Data Engineer"}' }
                ],
                temperature: 0.5,
                max_tokens: 1000
            }, signal);
            expect(mockLogger.info).toHaveBeenCalledWith(
                { task: 'job_analysis', tokensUsed: 42, contentLength: 24 },
                'Backend response received'
            );
        });

        it('should report transport failures as unavailable', async () => {
            complete.mockRejectedValue(new Error('socket hang up'));

            const pending = adapter.invoke(request, signal);

            await expect(pending).rejects.toBeInstanceOf(BackendUnavailableError);
            await expect(pending).rejects.toThrow('Backend request failed: socket hang up');
        });

        it('should report an empty answer as unavailable', async () => {
            complete.mockResolvedValue({ content: null, totalTokens: 0 });

            await expect(adapter.invoke(request, signal)).rejects.toThrow('No content returned from backend');
        });

        it('should report malformed JSON as invalid output', async () => {
            complete.mockResolvedValue({ content: 'not json', totalTokens: 3 });

            const pending = adapter.invoke(request, signal);

            await expect(pending).rejects.toBeInstanceOf(BackendInvalidOutputError);
            await expect(pending).rejects.toMatchObject({ kind: 'backend_invalid_output', task: 'job_analysis' });
        });
    });
});
