import { describe, it, expect, afterEach } from 'vitest';
import logger, { formatLine, setLogLevel } from '../logger';

describe('formatLine', () => {
    it('tags the line with the service and appends meta as JSON', () => {
        expect(formatLine({
            level: 'info',
            message: 'Created session',
            timestamp: '2024-05-01 10:00:00',
            service: 'mdmerge',
            totalFiles: 3,
        })).toBe('2024-05-01 10:00:00 [mdmerge] INFO: Created session {"totalFiles":3}');
    });

    it('leaves out empty meta', () => {
        expect(formatLine({ level: 'warn', message: 'Skipping a.txt', timestamp: 't', service: 'mdmerge' }))
            .toBe('t [mdmerge] WARN: Skipping a.txt');
    });
});

describe('setLogLevel', () => {
    const initial = logger.level;

    afterEach(() => {
        logger.level = initial;
    });

    it('applies known levels', () => {
        expect(setLogLevel('debug')).toBe('debug');
        expect(logger.level).toBe('debug');
    });

    it('falls back to info for unknown names', () => {
        expect(setLogLevel('loud')).toBe('info');
        expect(logger.isDebugEnabled()).toBe(false);
    });
});
