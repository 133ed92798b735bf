import { jest, describe, it, expect, afterEach } from '@jest/globals';
import { getLogLevel, getLogger, parseLogLevel, setLogLevel } from '../src/logger.js';

describe('logger', () => {
    afterEach(() => {
        jest.restoreAllMocks();
        setLogLevel('silent');
    });

    it('should parse level names loosely', () => {
        expect(parseLogLevel(' DEBUG ')).toBe('debug');
        expect(parseLogLevel('loud')).toBeUndefined();
        expect(parseLogLevel(undefined)).toBeUndefined();
    });

    it('should ignore unknown levels', () => {
        setLogLevel('warn');
        setLogLevel('loud');
        expect(getLogLevel()).toBe('warn');
    });

    it('should prefix messages with the scope and filter by level', () => {
        const info = jest.spyOn(console, 'info').mockImplementation(() => { });
        const debug = jest.spyOn(console, 'debug').mockImplementation(() => { });
        setLogLevel('info');

        const logger = getLogger('loader');
        logger.info('loaded', 3);
        logger.debug('hidden');

        expect(info).toHaveBeenCalledWith('[expflow][loader] loaded', 3);
        expect(debug).not.toHaveBeenCalled();
    });

    it('should send trace output to console.log', () => {
        const log = jest.spyOn(console, 'log').mockImplementation(() => { });
        setLogLevel('trace');

        getLogger().trace('step');

        expect(log).toHaveBeenCalledWith('[expflow] step');
    });

    it('should hand out one logger per scope', () => {
        expect(getLogger('merge')).toBe(getLogger('merge'));
    });
});
