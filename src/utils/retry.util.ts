import { logger } from '../config/logger';
import { errorMessage } from './error.util';

export interface RetryOptions {
    maxAttempts?: number;
    baseDelay?: number;
    maxDelay?: number;
    backoffMultiplier?: number;
    operationName?: string;
}

// Postgres SQLSTATEs worth another attempt: connection loss, admin shutdown,
// too many connections, serialization failure, deadlock.
const RETRYABLE_SQLSTATES = new Set(['08000', '08001', '08003', '08006', '57P01', '53300', '40001', '40P01']);
const RETRYABLE_NETWORK_CODES = new Set(['ECONNRESET', 'ENOTFOUND', 'ECONNREFUSED', 'ETIMEDOUT', 'EPIPE']);
const RETRYABLE_MESSAGES = ['timeout', 'connection', 'network', 'terminating'];

function errorCode(error: unknown): string | null {
    if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
        return error.code;
    }
    return null;
}

/**
 * Retry Utility
 *
 * Exponential backoff for storage writes. Backend calls never go through
 * here: a failed backend call is replaced by the task's fallback instead.
 */
export class RetryUtil {
    static async executeWithRetry<T>(
        operation: () => Promise<T>,
        options: RetryOptions = {}
    ): Promise<T> {
        const {
            maxAttempts = 3,
            baseDelay = 200,
            maxDelay = 2000,
            backoffMultiplier = 2,
            operationName = 'operation'
        } = options;

        let lastError: unknown = null;
        let attemptsMade = 0;

        for (let attempt = 1; attempt <= maxAttempts; attempt++) {
            attemptsMade = attempt;
            try {
                logger.debug({
                    operation: operationName,
                    attempt,
                    maxAttempts
                }, `Executing ${operationName} (attempt ${attempt}/${maxAttempts})`);

                const result = await operation();

                if (attempt > 1) {
                    logger.info({
                        operation: operationName,
                        attempt,
                        maxAttempts
                    }, `${operationName} succeeded on attempt ${attempt}`);
                }

                return result;

            } catch (error) {
                lastError = error;
                const retryable = this.isRetryableError(error);

                logger.warn({
                    operation: operationName,
                    attempt,
                    maxAttempts,
                    error: errorMessage(error),
                    isRetryable: retryable
                }, `${operationName} failed on attempt ${attempt}`);

                if (attempt === maxAttempts) {
                    break;
                }

                if (!retryable) {
                    logger.error({
                        operation: operationName,
                        error: errorMessage(error)
                    }, `${operationName} failed with non-retryable error`);
                    break;
                }

                const delay = Math.min(
                    baseDelay * Math.pow(backoffMultiplier, attempt - 1),
                    maxDelay
                );

                logger.info({
                    operation: operationName,
                    attempt,
                    delay
                }, `Retrying ${operationName} in ${delay}ms`);

                await this.sleep(delay);
            }
        }

        logger.error({
            operation: operationName,
            attemptsMade,
            error: lastError === null ? null : errorMessage(lastError)
        }, `${operationName} failed after ${attemptsMade} attempts`);

        throw lastError instanceof Error
            ? lastError
            : new Error(`${operationName} failed after ${attemptsMade} attempts: ${errorMessage(lastError)}`);
    }

    static isRetryableError(error: unknown): boolean {
        const code = errorCode(error);
        if (code !== null && (RETRYABLE_NETWORK_CODES.has(code) || RETRYABLE_SQLSTATES.has(code))) {
            return true;
        }

        const message = errorMessage(error).toLowerCase();
        return RETRYABLE_MESSAGES.some(fragment => message.includes(fragment));
    }

    private static sleep(ms: number): Promise<void> {
        return new Promise(resolve => setTimeout(resolve, ms));
    }
}
