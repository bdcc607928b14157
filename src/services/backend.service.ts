import OpenAI from 'openai';
import { logger, ILogger } from '../config/logger';
import { errorMessage } from '../utils/error.util';
import { EngineConfig } from '../config/engine.config';
import { BackendInvalidOutputError, BackendUnavailableError } from '../engine/errors';

export type ChatMessage = OpenAI.Chat.ChatCompletionMessageParam;

/**
 * One structured request to the intelligent backend. `input` must be JSON
 * serializable; the backend answers with a JSON object.
 */
export interface BackendRequest {
    task: string;
    instructions: string;
    input: Record<string, unknown>;
}

/**
 * Intelligent Backend Adapter
 *
 * The single point through which tasks delegate to a generative backend.
 * The engine only relies on this contract: structured input in, parsed
 * JSON or a rejection out. Transport, authentication and model identity
 * stay behind it.
 */
export interface IBackendAdapter {
    invoke(request: BackendRequest, signal: AbortSignal): Promise<unknown>;
}

// Narrow view of the OpenAI client, for testability
export interface IChatCompletionClient {
    complete(params: {
        model: string;
        messages: ChatMessage[];
        temperature: number;
        max_tokens: number;
    }, signal: AbortSignal): Promise<{ content: string | null; totalTokens: number }>;
}

/**
 * OpenAI Backend Adapter
 *
 * Sends one JSON-mode chat completion per request. SDK retries are turned
 * off: a failed call goes straight to the task's fallback.
 */
export class OpenAIBackendAdapter implements IBackendAdapter {
    constructor(
        private client: IChatCompletionClient,
        private logger: ILogger,
        private model: string = 'gpt-4o-mini',
        private temperature: number = 0.2,
        private maxTokens: number = 2000
    ) { }

    /**
     * Factory method for production use
     */
    static create(config: Pick<EngineConfig, 'openaiApiKey' | 'llmModel' | 'llmTemperature'>): OpenAIBackendAdapter {
        const openai = new OpenAI({
            apiKey: config.openaiApiKey,
            maxRetries: 0
        });

        const client: IChatCompletionClient = {
            async complete(params, signal) {
                const response = await openai.chat.completions.create({
                    ...params,
                    response_format: { type: 'json_object' }
                }, { signal });

                return {
                    content: response.choices[0]?.message?.content ?? null,
                    totalTokens: response.usage?.total_tokens ?? 0
                };
            }
        };

        return new OpenAIBackendAdapter(client, logger, config.llmModel, config.llmTemperature);
    }

    async invoke(request: BackendRequest, signal: AbortSignal): Promise<unknown> {
        this.logger.info({
            task: request.task,
            model: this.model
        }, 'Invoking backend');

        const messages: ChatMessage[] = [
            {
                role: 'system',
                content: `${request.instructions}\nRespond with a single JSON object and nothing else.`
            },
            {
                role: 'user',
                content: JSON.stringify(request.input)
            }
        ];

        let completion: { content: string | null; totalTokens: number };
        try {
            completion = await this.client.complete({
                model: this.model,
                messages,
                temperature: this.temperature,
                max_tokens: this.maxTokens
            }, signal);
        } catch (error) {
            throw new BackendUnavailableError(request.task, `Backend request failed: ${errorMessage(error)}`);
        }

        if (!completion.content) {
            throw new BackendUnavailableError(request.task, 'No content returned from backend');
        }

        let parsed: unknown;
        try {
            parsed = JSON.parse(completion.content);
        } catch (error) {
            throw new BackendInvalidOutputError(request.task, [`response is not valid JSON: ${errorMessage(error)}`]);
        }

        this.logger.info({
            task: request.task,
            tokensUsed: completion.totalTokens,
            contentLength: completion.content.length
        }, 'Backend response received');

        return parsed;
    }
}
