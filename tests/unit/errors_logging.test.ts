// tests/unit/errors_logging.test.ts

import {
    ErrorFactory,
    NonDeterminismError,
    OrchestrationError,
    StepFailureError,
    describeError,
} from '../../src/core/errors';
import { LogLevel, Logger } from '../../src/core/logging/Logger';

describe('Errors', () => {
    it('should build typed errors with codes', () => {
        const error = ErrorFactory.stepFailure('prepare', 5, 'Step prepare failed: jammed');
        expect(error).toBeInstanceOf(StepFailureError);
        expect(error).toBeInstanceOf(OrchestrationError);
        expect(error.context.code).toBe('STEP_FAILED');
        expect(error.step).toBe('prepare');
        expect(error.attempts).toBe(5);
    });

    it('should let the caller override the default retryable flag', () => {
        expect(ErrorFactory.external('gateway down').retryable).toBe(true);
        expect(ErrorFactory.external('card declined', { retryable: false }).retryable).toBe(false);
    });

    it('should format user-friendly messages with a tip', () => {
        const error = new NonDeterminismError('priced at 999 but replay computes 525');
        expect(error.toUserFriendly()).toBe(
            '[NON_DETERMINISM] priced at 999 but replay computes 525\n' +
            'Tip: Inspect the recorded history; the instance is left open for manual review'
        );
    });

    it('should serialize to JSON', () => {
        const json = ErrorFactory.notFound('No workflow instance for order X', { operation: 'status' }).toJSON();
        expect(json).toMatchObject({
            name: 'NotFoundError',
            message: 'No workflow instance for order X',
            context: { code: 'NOT_FOUND', operation: 'status', retryable: false },
        });
    });

    it('should describe thrown values', () => {
        expect(describeError(new Error('boom'))).toBe('boom');
        expect(describeError('plain')).toBe('plain');
        expect(describeError(undefined)).toBe('undefined');
    });
});

describe('Logger', () => {
    const originalLevel = Logger.getLevel();
    let output: string[];
    let spy: jest.SpyInstance;

    beforeEach(() => {
        output = [];
        spy = jest.spyOn(console, 'error').mockImplementation((line: unknown) => {
            output.push(String(line));
        });
    });

    afterEach(() => {
        spy.mockRestore();
        Logger.setLevel(originalLevel);
    });

    it('should redact payment secrets in strings and objects', () => {
        expect(Logger.redact('token sk_test_abcdefghijklmnop1234 used')).toBe('token [REDACTED] used');
        expect(Logger.redact({ key: 'pk_live_ABCDEFGHIJKLMNOPQRST' })).toEqual({ key: '[REDACTED]' });
        expect(Logger.redact('sk_short')).toBe('sk_short');
    });

    it('should write to stderr with level and module', () => {
        Logger.setLevel(LogLevel.INFO);
        Logger.info('OrderWorkflow', 'Order A1 closed as COMPLETED', { amount: 525 });
        expect(output).toHaveLength(1);
        expect(output[0]).toMatch(/^\[\d{4}-\d{2}-\d{2}T[^\]]+\] \[INFO\] \[OrderWorkflow\] Order A1 closed as COMPLETED \{"amount":525\}$/);
    });

    it('should drop messages below the current level', () => {
        Logger.setLevel(LogLevel.WARN);
        Logger.debug('Test', 'hidden');
        Logger.info('Test', 'hidden');
        Logger.warn('Test', 'shown');
        expect(output).toHaveLength(1);
        expect(output[0]).toContain('[WARN] [Test] shown');
    });
});
