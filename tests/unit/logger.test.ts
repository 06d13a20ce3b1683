/**
 * Logger Tests
 * Uses the real pino-backed logger
 */
import { describe, it, expect, afterEach } from 'vitest';
import { createLogger, logger, serializeError, setLogLevel } from '../../src/observability/logger.js';
import { HttpError } from '../../src/fetchers/http.js';

describe('setLogLevel', () => {
    afterEach(() => {
        setLogLevel('info');
    });

    it('should reach loggers created before the level was set', () => {
        const writeLog = createLogger({ stage: 'write' });
        const pageLog = writeLog.child({ page: 2, requestId: 'req-1' });

        setLogLevel('error');

        expect(logger.level).toBe('error');
        expect(writeLog.level).toBe('error');
        expect(pageLog.level).toBe('error');
    });

    it('should follow later changes as well', () => {
        const fetchLog = createLogger({ stage: 'fetch' });
        setLogLevel('warn');
        expect(fetchLog.level).toBe('warn');

        setLogLevel('debug');
        expect(fetchLog.level).toBe('debug');
    });
});

describe('serializeError', () => {
    it('should include the status of an HTTP failure', () => {
        const error = new HttpError(503, 'Service Unavailable', 'https://api.example.test/v2/x', 'down');

        expect(serializeError(error)).toEqual({
            error: {
                code: 'HttpError',
                message: 'HTTP 503 Service Unavailable for https://api.example.test/v2/x',
                status: 503,
                stack: error.stack,
            },
        });
    });

    it('should leave status out for plain errors', () => {
        const error = new TypeError('fetch failed');

        expect(serializeError(error)).toEqual({
            error: { code: 'TypeError', message: 'fetch failed', stack: error.stack },
        });
    });

    it('should pass non-Error values through', () => {
        expect(serializeError('boom')).toEqual({ error: 'boom' });
    });
});
