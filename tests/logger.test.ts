import { createConsoleLogger } from '../src/logger';

describe('createConsoleLogger', () => {
  let debug: jest.SpyInstance;
  let log: jest.SpyInstance;
  let warn: jest.SpyInstance;

  beforeEach(() => {
    debug = jest.spyOn(console, 'debug').mockImplementation(() => undefined);
    log = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should prefix every line', () => {
    const logger = createConsoleLogger();
    logger.info('Uploading: a.md');
    logger.warn('failed', 'detail');

    expect(log).toHaveBeenCalledWith('[md2page]', 'Uploading: a.md');
    expect(warn).toHaveBeenCalledWith('[md2page]', 'failed', 'detail');
  });

  it('should suppress debug and info when quiet', () => {
    const logger = createConsoleLogger({ quiet: true, prefix: '[sync]' });
    logger.debug('hidden');
    logger.info('hidden');
    logger.warn('shown');

    expect(debug).not.toHaveBeenCalled();
    expect(log).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith('[sync]', 'shown');
  });
});
