import { engineLogger, logger } from '../../../src/cli/utils/logger';

describe('engineLogger', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('tags engine messages with their component', () => {
    const info = jest.spyOn(logger, 'info').mockImplementation(() => logger);

    engineLogger.info('Board shuffled', { seed: 42, steps: 100 });

    expect(info).toHaveBeenCalledWith('Board shuffled', { component: 'engine', seed: 42, steps: 100 });
  });

  it('routes debug output to the debug level', () => {
    const debug = jest.spyOn(logger, 'debug').mockImplementation(() => logger);

    engineLogger.debug('Solver finished');

    expect(debug).toHaveBeenCalledWith('Solver finished', { component: 'engine' });
  });

  it('routes warnings to the warn level', () => {
    const warn = jest.spyOn(logger, 'warn').mockImplementation(() => logger);

    engineLogger.warn('Variant table reloaded', { variants: 6 });

    expect(warn).toHaveBeenCalledWith('Variant table reloaded', { component: 'engine', variants: 6 });
  });
});

describe('logger', () => {
  it('runs at the configured level with the service name attached', () => {
    expect(logger.level).toBe('error');
    expect(logger.defaultMeta).toEqual({ service: 'klotski-cli', environment: 'test' });
  });
});
