import { describe, expect, test } from 'vitest';
import { SyncCancelledError } from '../../src/types/errors';
import { backoffDelay, chunkArray, formatError, sleep, throwIfAborted } from '../../src/utils/util';

describe('util', () => {
    describe('backoffDelay', () => {
        test('should double per attempt without jitter', () => {
            const noJitter = () => 0;
            expect(backoffDelay(1, 1000, 16000, noJitter)).toBe(1000);
            expect(backoffDelay(2, 1000, 16000, noJitter)).toBe(2000);
            expect(backoffDelay(4, 1000, 16000, noJitter)).toBe(8000);
        });

        test('should cap at the maximum delay', () => {
            expect(backoffDelay(10, 1000, 16000, () => 0)).toBe(16000);
        });

        test('should subtract at most a fifth as jitter', () => {
            expect(backoffDelay(1, 1000, 16000, () => 1)).toBe(800);
            expect(backoffDelay(1, 1000, 16000, () => 0.5)).toBe(900);
        });
    });

    test('should split arrays into chunks of the given size', () => {
        expect(chunkArray([1, 2, 3, 4, 5], 2)).toEqual([[1, 2], [3, 4], [5]]);
        expect(chunkArray([], 3)).toEqual([]);
    });

    test('should format errors and other values', () => {
        expect(formatError(new Error('boom'))).toBe('boom');
        expect(formatError(42)).toBe('42');
    });

    describe('cancellation', () => {
        test('should reject sleep when the signal is already aborted', async () => {
            const controller = new AbortController();
            controller.abort();
            await expect(sleep(1000, controller.signal)).rejects.toBeInstanceOf(SyncCancelledError);
        });

        test('should reject a pending sleep once the signal aborts', async () => {
            const controller = new AbortController();
            const pending = sleep(60_000, controller.signal);
            controller.abort();
            await expect(pending).rejects.toBeInstanceOf(SyncCancelledError);
        });

        test('should throw only for aborted signals', () => {
            expect(() => throwIfAborted(undefined)).not.toThrow();
            const controller = new AbortController();
            controller.abort();
            expect(() => throwIfAborted(controller.signal)).toThrow(SyncCancelledError);
        });
    });
});
