async function loadLogger(level: string) {
    vi.stubEnv('LOG_LEVEL', level);
    vi.resetModules();
    const mod = await import('../logger');
    return mod.logger;
}

describe('logger', () => {
    afterEach(() => {
        vi.unstubAllEnvs();
        vi.restoreAllMocks();
    });

    it('prefixes messages with time, source and level', async () => {
        const info = vi.spyOn(console, 'info').mockImplementation(() => undefined);
        const logger = await loadLogger('info');

        logger.info('built 3 layers', 'WaveTray');

        expect(info).toHaveBeenCalledTimes(1);
        expect(info.mock.calls[0][0]).toMatch(/^\[\d{4}-\d{2}-\d{2}T[\d:.]+Z\] \[WaveTray\] INFO: built 3 layers$/);
    });

    it('drops messages below the configured level', async () => {
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
        const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
        const logger = await loadLogger('error');

        logger.warn('ignored');
        logger.error('kept');

        expect(warn).not.toHaveBeenCalled();
        expect(error).toHaveBeenCalledTimes(1);
    });

    it('falls back to info for names that are not levels', async () => {
        const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
        const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
        const logger = await loadLogger('constructor');

        logger.debug('hidden');
        logger.error('boom', 'Main');

        expect(debug).not.toHaveBeenCalled();
        expect(error).toHaveBeenCalledTimes(1);
        expect(error.mock.calls[0][0]).toMatch(/\[Main\] ERROR: boom$/);
    });
});
