import { createLogger } from './logger';

describe('createLogger', () => {
  let spy: jest.SpyInstance;

  beforeEach(() => {
    spy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    spy.mockRestore();
  });

  it('prefixes lines with the tag and level', () => {
    createLogger('scan').info('scan complete', { matches: 2 });
    expect(spy).toHaveBeenCalledWith('[scan] info: scan complete', { matches: 2 });
  });

  it('drops messages below the configured level', () => {
    const logger = createLogger('scan', 'warn');
    logger.debug('noise');
    logger.info('noise');
    logger.warn('careful');
    expect(spy).toHaveBeenCalledTimes(1);
    expect(spy).toHaveBeenCalledWith('[scan] warn: careful');
  });

  it('stays quiet when silent', () => {
    createLogger('scan', 'silent').error('ignored');
    expect(spy).not.toHaveBeenCalled();
  });
});
