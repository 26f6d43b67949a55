import { describe, it, expect, vi, afterEach } from 'vitest';
import { createAccessSet, PrivKey } from '../index';
import { Logger } from '../lib/utils';

const publicKeys = [new PrivKey([7n, 8n, 9n, 10n]).getPublicKey()];

describe('Logger', () => {

    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('should indent sub-step messages', () => {
        const spy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
        const logger = new Logger();
        const log = logger.sub('Computing low degree proof');
        logger.done(log);
        expect(spy).toHaveBeenCalledTimes(1);
        expect(spy).toHaveBeenCalledWith('  Computing low degree proof');
    });

    it('should skip sub-steps when they are disabled', () => {
        const spy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
        const logger = new Logger(false);
        const log = logger.sub('Computing low degree proof');
        log('Computed FRI layer at depth 0');
        expect(spy).not.toHaveBeenCalled();
    });

    it('should pass the sub-step setting from access set options to the console logger', () => {
        const spy = vi.spyOn(console, 'log').mockImplementation(() => undefined);

        const quiet = createAccessSet(publicKeys, { detailedLog: false });
        spy.mockClear();
        quiet.stark.logger.sub('Computing composition polynomial');
        expect(spy).not.toHaveBeenCalled();

        const detailed = createAccessSet(publicKeys);
        spy.mockClear();
        detailed.stark.logger.sub('Computing composition polynomial');
        expect(spy).toHaveBeenCalledWith('  Computing composition polynomial');
    });
});
