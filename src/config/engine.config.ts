import { z } from 'zod';

/**
 * Relative weight of each match sub-score in the overall score.
 * Product decision; override with SCORE_WEIGHT_* variables.
 */
export interface ScoreWeights {
    keywordCoverage: number;
    qualificationCoverage: number;
    structuralCompliance: number;
    semanticFit: number;
}

export const DEFAULT_SCORE_WEIGHTS: Readonly<ScoreWeights> = Object.freeze({
    keywordCoverage: 0.4,
    qualificationCoverage: 0.3,
    structuralCompliance: 0.1,
    semanticFit: 0.2
});

const WEIGHT_SUM_TOLERANCE = 1e-6;

const weight = (fallback: number) => z.coerce.number().min(0).max(1).default(fallback);

const booleanFlag = (fallback: boolean) =>
    z.enum(['true', 'false', '1', '0'])
        .default(fallback ? 'true' : 'false')
        .transform(value => value === 'true' || value === '1');

const EnvSchema = z.object({
    ENGINE_WORKER_POOL_SIZE: z.coerce.number().int().positive().default(4),
    ENGINE_TASK_TIMEOUT_MS: z.coerce.number().int().positive().default(20000),
    ENGINE_DEADLINE_MS: z.coerce.number().int().positive().default(60000),
    ENGINE_BACKEND_ENABLED: booleanFlag(true),
    OPENAI_API_KEY: z.string().optional(),
    LLM_MODEL: z.string().min(1).default('gpt-4o-mini'),
    LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.2),
    SCORE_WEIGHT_KEYWORD: weight(DEFAULT_SCORE_WEIGHTS.keywordCoverage),
    SCORE_WEIGHT_QUALIFICATION: weight(DEFAULT_SCORE_WEIGHTS.qualificationCoverage),
    SCORE_WEIGHT_STRUCTURAL: weight(DEFAULT_SCORE_WEIGHTS.structuralCompliance),
    SCORE_WEIGHT_SEMANTIC: weight(DEFAULT_SCORE_WEIGHTS.semanticFit)
});

export interface EngineConfig {
    workerPoolSize: number;
    taskTimeoutMs: number;
    deadlineMs: number;
    backendEnabled: boolean;
    openaiApiKey?: string;
    llmModel: string;
    llmTemperature: number;
    scoreWeights: ScoreWeights;
}

/**
 * Throws when the four weights do not add up to 1.0.
 */
export function assertValidWeights(weights: ScoreWeights): void {
    const sum = weights.keywordCoverage
        + weights.qualificationCoverage
        + weights.structuralCompliance
        + weights.semanticFit;

    if (Math.abs(sum - 1) > WEIGHT_SUM_TOLERANCE) {
        throw new Error(`Score weights must sum to 1.0, got ${sum}`);
    }
}

/**
 * Engine Configuration
 *
 * Reads the engine's tunables from the environment. Empty strings are
 * treated as unset so a blank line in .env falls back to the default.
 */
export function loadEngineConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
    const present = Object.fromEntries(
        Object.entries(env).filter(([, value]) => value !== undefined && value !== '')
    );
    const parsed = EnvSchema.parse(present);

    const scoreWeights: ScoreWeights = {
        keywordCoverage: parsed.SCORE_WEIGHT_KEYWORD,
        qualificationCoverage: parsed.SCORE_WEIGHT_QUALIFICATION,
        structuralCompliance: parsed.SCORE_WEIGHT_STRUCTURAL,
        semanticFit: parsed.SCORE_WEIGHT_SEMANTIC
    };
    assertValidWeights(scoreWeights);

    return {
        workerPoolSize: parsed.ENGINE_WORKER_POOL_SIZE,
        taskTimeoutMs: parsed.ENGINE_TASK_TIMEOUT_MS,
        deadlineMs: parsed.ENGINE_DEADLINE_MS,
        backendEnabled: parsed.ENGINE_BACKEND_ENABLED && Boolean(parsed.OPENAI_API_KEY),
        openaiApiKey: parsed.OPENAI_API_KEY,
        llmModel: parsed.LLM_MODEL,
        llmTemperature: parsed.LLM_TEMPERATURE,
        scoreWeights
    };
}
