import { mkdtemp, readFile, rm } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { getLogLevel, isLogLevel, logger, setLogFile, setLogLevel } from '../src/utils/logger';

describe('logger', () => {
    const initialLevel = getLogLevel();

    afterEach(() => {
        setLogLevel(initialLevel);
        setLogFile(undefined);
        jest.restoreAllMocks();
    });

    it('should drop messages below the current level', () => {
        const info = jest.spyOn(console, 'info').mockImplementation(() => undefined);
        const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
        setLogLevel('WARN');

        logger.info('hidden');
        logger.warn('shown', 42);

        expect(getLogLevel()).toBe('WARN');
        expect(info).not.toHaveBeenCalled();
        expect(warn).toHaveBeenCalledTimes(1);
        expect(warn.mock.calls[0][0]).toMatch(/^\[\d{4}-\d{2}-\d{2}T[\d:.]+Z\] \[WARN\]$/);
        expect(warn.mock.calls[0].slice(1)).toEqual(['shown', 42]);
    });

    it('should recognise level names', () => {
        expect(isLogLevel('DEBUG')).toBe(true);
        expect(isLogLevel('debug')).toBe(false);
        expect(isLogLevel('TRACE')).toBe(false);
    });

    describe('log file', () => {
        let dir: string;

        beforeEach(async () => {
            dir = await mkdtemp(path.join(os.tmpdir(), 'index-tracker-log-'));
        });

        afterEach(async () => {
            await rm(dir, { recursive: true, force: true });
        });

        it('should append emitted lines to the file', async () => {
            jest.spyOn(console, 'info').mockImplementation(() => undefined);
            jest.spyOn(console, 'debug').mockImplementation(() => undefined);
            const file = path.join(dir, 'logs', 'tracker.log');
            setLogLevel('INFO');
            setLogFile(file);

            logger.info('Loaded', 3, 'securities');
            logger.debug('hidden');
            logger.info('Done');

            const lines = (await readFile(file, 'utf-8')).split('\n');
            expect(lines).toHaveLength(3);
            expect(lines[0]).toMatch(/^\[\d{4}-\d{2}-\d{2}T[\d:.]+Z\] \[INFO\] Loaded 3 securities$/);
            expect(lines[1]).toMatch(/\[INFO\] Done$/);
            expect(lines[2]).toBe('');
        });

        it('should stop writing once the file is cleared', async () => {
            jest.spyOn(console, 'warn').mockImplementation(() => undefined);
            const file = path.join(dir, 'tracker.log');
            setLogLevel('WARN');
            setLogFile(file);

            logger.warn('kept');
            setLogFile(undefined);
            logger.warn('console only');

            const text = await readFile(file, 'utf-8');
            expect(text.trim().split('\n')).toHaveLength(1);
            expect(text).toMatch(/\[WARN\] kept\n$/);
        });
    });
});
