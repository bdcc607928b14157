import { describe, it, expect } from 'vitest';
import { ZodError } from 'zod';
import { assertValidWeights, DEFAULT_SCORE_WEIGHTS, loadEngineConfig } from '../../../src/config/engine.config';

describe('Engine Configuration', () => {
    it('should apply defaults when nothing is set', () => {
        const config = loadEngineConfig({});

        expect(config).toEqual({
            workerPoolSize: 4,
            taskTimeoutMs: 20000,
            deadlineMs: 60000,
            backendEnabled: false,
            openaiApiKey: undefined,
            llmModel: 'gpt-4o-mini',
            llmTemperature: 0.2,
            scoreWeights: { ...DEFAULT_SCORE_WEIGHTS }
        });
    });

    it('should enable the backend only when an API key is present', () => {
        expect(loadEngineConfig({ OPENAI_API_KEY: 'test-secret' }).backendEnabled).toBe(true);
        expect(loadEngineConfig({
            OPENAI_API_KEY: 'test-secret',
            ENGINE_BACKEND_ENABLED: 'false'
        }).backendEnabled).toBe(false);
    });

    it('should coerce numeric variables and ignore blank ones', () => {
        const config = loadEngineConfig({
            ENGINE_WORKER_POOL_SIZE: '2',
            ENGINE_TASK_TIMEOUT_MS: '1500',
            ENGINE_DEADLINE_MS: ''
        });

        expect(config.workerPoolSize).toBe(2);
        expect(config.taskTimeoutMs).toBe(1500);
        expect(config.deadlineMs).toBe(60000);
    });

    it('should read custom weights', () => {
        const config = loadEngineConfig({
            SCORE_WEIGHT_KEYWORD: '0.5',
            SCORE_WEIGHT_QUALIFICATION: '0.2'
        });

        expect(config.scoreWeights).toEqual({
            keywordCoverage: 0.5,
            qualificationCoverage: 0.2,
            structuralCompliance: 0.1,
            semanticFit: 0.2
        });
    });

    it('should reject weights that do not sum to one', () => {
        expect(() => loadEngineConfig({ SCORE_WEIGHT_KEYWORD: '0.9' })).toThrow('Score weights must sum to 1.0');
    });

    it('should reject a non-positive worker pool', () => {
        expect(() => loadEngineConfig({ ENGINE_WORKER_POOL_SIZE: '0' })).toThrow(ZodError);
    });

    it('should accept the default weights', () => {
        expect(() => assertValidWeights(DEFAULT_SCORE_WEIGHTS)).not.toThrow();
    });
});
