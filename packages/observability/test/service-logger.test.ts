import { afterAll, beforeEach, describe, expect, it, vi } from 'vitest';
import { createServiceLogger } from '../src/service-logger.js';

function parseLine(calls: unknown[][], call = 0): Record<string, unknown> {
    const line = calls[call]?.[0];
    if (typeof line !== 'string') {
        throw new Error('Expected a log line.');
    }
    return JSON.parse(line) as Record<string, unknown>;
}

describe('createServiceLogger', () => {
    const stdout = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const stderr = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    beforeEach(() => {
        stdout.mockClear();
        stderr.mockClear();
    });

    afterAll(() => {
        stdout.mockRestore();
        stderr.mockRestore();
    });

    it('injects the service name and keeps metadata', () => {
        const logger = createServiceLogger({ service: 'transfer-workload', minLevel: 'debug' });
        logger.info('balances printed', { accounts: 2 });

        const entry = parseLine(stdout.mock.calls);
        expect(entry.level).toBe('info');
        expect(entry.message).toBe('balances printed');
        expect(entry.metadata).toEqual({ service: 'transfer-workload', accounts: 2 });
    });

    it('drops lines below the minimum level', () => {
        const logger = createServiceLogger({ service: 'svc', minLevel: 'info' });
        logger.debug('hidden');
        logger.warn('shown');

        expect(stdout).toHaveBeenCalledTimes(1);
        expect(parseLine(stdout.mock.calls).level).toBe('warn');
    });

    it('writes errors to stderr', () => {
        const logger = createServiceLogger({ service: 'svc', minLevel: 'debug' });
        logger.error('failed');

        expect(stdout).not.toHaveBeenCalled();
        expect(parseLine(stderr.mock.calls).message).toBe('failed');
    });

    it('redacts credential fields, including nested ones', () => {
        const logger = createServiceLogger({ service: 'svc', minLevel: 'debug' });
        logger.info('token fetched', {
            grant: 'password',
            idToken: 'test-token',
            request: { client_secret: 'test-secret', username: 'demo' }
        });

        expect(parseLine(stdout.mock.calls).metadata).toEqual({
            service: 'svc',
            grant: 'password',
            idToken: '[REDACTED]',
            request: { client_secret: '[REDACTED]', username: 'demo' }
        });
    });

    it('flattens errors to name and message', () => {
        const logger = createServiceLogger({ service: 'svc', minLevel: 'debug' });
        const failure = new Error('boom');
        failure.name = 'StoreError';
        logger.warn('rollback failed', { error: failure });

        expect(parseLine(stdout.mock.calls).metadata).toEqual({
            service: 'svc',
            error: { name: 'StoreError', message: 'boom' }
        });
    });

    it('scopes child loggers under the parent service', () => {
        const logger = createServiceLogger({ service: 'svc', minLevel: 'info' });
        const child = logger.child('db');
        child.debug('hidden');
        child.info('connected');

        expect(stdout).toHaveBeenCalledTimes(1);
        expect(parseLine(stdout.mock.calls).metadata).toEqual({ service: 'svc:db' });
    });
});
