import { describe, it, expect, beforeEach, vi } from 'vitest';
import { RetryUtil } from '../../../src/utils/retry.util';

// Mock the logger
vi.mock('../../../src/config/logger', () => ({
    logger: {
        debug: vi.fn(),
        info: vi.fn(),
        warn: vi.fn(),
        error: vi.fn()
    }
}));

describe('RetryUtil - Static Utility Tests', () => {
    beforeEach(() => {
        vi.clearAllMocks();
    });

    describe('executeWithRetry - Success Cases', () => {
        it('should execute operation successfully on first attempt', async () => {
            const mockOperation = vi.fn().mockResolvedValue('success');
            const result = await RetryUtil.executeWithRetry(mockOperation, {
                operationName: 'test-operation'
            });

            expect(result).toBe('success');
            expect(mockOperation).toHaveBeenCalledTimes(1);
        });

        it('should execute operation successfully on second attempt after first failure', async () => {
            const mockOperation = vi.fn()
                .mockRejectedValueOnce(new Error('network error'))
                .mockResolvedValueOnce('success');

            const result = await RetryUtil.executeWithRetry(mockOperation, {
                operationName: 'test-operation',
                maxAttempts: 3,
                baseDelay: 10
            });

            expect(result).toBe('success');
            expect(mockOperation).toHaveBeenCalledTimes(2);
        });

        it('should use default options when none provided', async () => {
            const mockOperation = vi.fn().mockResolvedValue({ id: 7 });
            const result = await RetryUtil.executeWithRetry(mockOperation);

            expect(result).toEqual({ id: 7 });
            expect(mockOperation).toHaveBeenCalledTimes(1);
        });
    });

    describe('executeWithRetry - Failure Cases', () => {
        it('should fail after max attempts with retryable error', async () => {
            const mockOperation = vi.fn().mockRejectedValue(new Error('connection reset'));

            await expect(RetryUtil.executeWithRetry(mockOperation, {
                operationName: 'test-operation',
                maxAttempts: 3,
                baseDelay: 5
            })).rejects.toThrow('connection reset');

            expect(mockOperation).toHaveBeenCalledTimes(3);
        });

        it('should fail immediately with non-retryable error', async () => {
            const mockOperation = vi.fn().mockRejectedValue(new Error('duplicate key value violates unique constraint'));

            await expect(RetryUtil.executeWithRetry(mockOperation, {
                operationName: 'test-operation',
                maxAttempts: 3
            })).rejects.toThrow('duplicate key value violates unique constraint');

            expect(mockOperation).toHaveBeenCalledTimes(1);
        });

        it('should wrap non-Error rejections', async () => {
            const mockOperation = vi.fn().mockRejectedValue('String error');

            await expect(RetryUtil.executeWithRetry(mockOperation, {
                operationName: 'test-operation',
                maxAttempts: 2,
                baseDelay: 10
            })).rejects.toThrow('test-operation failed after 1 attempts: String error');

            expect(mockOperation).toHaveBeenCalledTimes(1);
        });

        it('should respect maxDelay limit', async () => {
            const mockOperation = vi.fn().mockRejectedValue(new Error('network error'));
            const startTime = Date.now();

            await expect(RetryUtil.executeWithRetry(mockOperation, {
                operationName: 'test-operation',
                maxAttempts: 3,
                baseDelay: 1000,
                maxDelay: 20,
                backoffMultiplier: 2
            })).rejects.toThrow('network error');

            expect(Date.now() - startTime).toBeLessThan(500);
            expect(mockOperation).toHaveBeenCalledTimes(3);
        });
    });

    describe('isRetryableError - Error Classification', () => {
        it('should identify network error codes as retryable', () => {
            for (const code of ['ECONNRESET', 'ENOTFOUND', 'ECONNREFUSED', 'ETIMEDOUT', 'EPIPE']) {
                expect(RetryUtil.isRetryableError({ code })).toBe(true);
            }
        });

        it('should identify transient Postgres states as retryable', () => {
            for (const code of ['08006', '57P01', '53300', '40001', '40P01']) {
                expect(RetryUtil.isRetryableError({ code })).toBe(true);
            }
        });

        it('should identify transient messages as retryable', () => {
            expect(RetryUtil.isRetryableError(new Error('Query read timeout'))).toBe(true);
            expect(RetryUtil.isRetryableError({ message: 'Connection terminated unexpectedly' })).toBe(true);
            expect(RetryUtil.isRetryableError(new Error('terminating connection due to administrator command'))).toBe(true);
        });

        it('should identify non-retryable errors correctly', () => {
            expect(RetryUtil.isRetryableError({ code: '23505', message: 'duplicate key' })).toBe(false);
            expect(RetryUtil.isRetryableError(new Error('relation "audit_records" does not exist'))).toBe(false);
            expect(RetryUtil.isRetryableError('String error')).toBe(false);
            expect(RetryUtil.isRetryableError(null)).toBe(false);
        });
    });

    describe('executeWithRetry - Logging Integration', () => {
        it('should log debug information for each attempt', async () => {
            const { logger } = await import('../../../src/config/logger');
            const mockOperation = vi.fn().mockRejectedValue(new Error('network error'));

            await expect(RetryUtil.executeWithRetry(mockOperation, {
                operationName: 'test-operation',
                maxAttempts: 2,
                baseDelay: 10
            })).rejects.toThrow();

            expect(logger.debug).toHaveBeenCalledWith(
                expect.objectContaining({ operation: 'test-operation', attempt: 1, maxAttempts: 2 }),
                'Executing test-operation (attempt 1/2)'
            );
            expect(logger.debug).toHaveBeenCalledWith(
                expect.objectContaining({ operation: 'test-operation', attempt: 2, maxAttempts: 2 }),
                'Executing test-operation (attempt 2/2)'
            );
            expect(logger.debug).toHaveBeenCalledTimes(2);
        });

        it('should log success on retry', async () => {
            const { logger } = await import('../../../src/config/logger');
            const mockOperation = vi.fn()
                .mockRejectedValueOnce(new Error('network error'))
                .mockResolvedValueOnce('success');

            await RetryUtil.executeWithRetry(mockOperation, {
                operationName: 'test-operation',
                maxAttempts: 3,
                baseDelay: 10
            });

            expect(logger.info).toHaveBeenCalledWith(
                expect.objectContaining({ operation: 'test-operation', attempt: 2, maxAttempts: 3 }),
                'test-operation succeeded on attempt 2'
            );
        });

        it('should log warnings for failed attempts', async () => {
            const { logger } = await import('../../../src/config/logger');
            const mockOperation = vi.fn().mockRejectedValue(new Error('network error'));

            await expect(RetryUtil.executeWithRetry(mockOperation, {
                operationName: 'test-operation',
                maxAttempts: 2,
                baseDelay: 10
            })).rejects.toThrow();

            expect(logger.warn).toHaveBeenCalledWith(
                expect.objectContaining({
                    operation: 'test-operation',
                    attempt: 1,
                    maxAttempts: 2,
                    error: 'network error',
                    isRetryable: true
                }),
                'test-operation failed on attempt 1'
            );
        });

        it('should log the final failure with the attempts made', async () => {
            const { logger } = await import('../../../src/config/logger');
            const mockOperation = vi.fn().mockRejectedValue(new Error('network error'));

            await expect(RetryUtil.executeWithRetry(mockOperation, {
                operationName: 'test-operation',
                maxAttempts: 2,
                baseDelay: 10
            })).rejects.toThrow();

            expect(logger.error).toHaveBeenCalledWith(
                expect.objectContaining({ operation: 'test-operation', attemptsMade: 2, error: 'network error' }),
                'test-operation failed after 2 attempts'
            );
        });
    });
});
