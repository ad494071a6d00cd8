import { createLogger, setLogLevel } from '../../src/index.js';

describe('logger', () => {
  afterEach(() => {
    setLogLevel('info');
  });

  it('returns one logger per module', () => {
    expect(createLogger('lv03')).toBe(createLogger('lv03'));
    expect(createLogger('lv03')).not.toBe(createLogger('projection'));
  });

  it('binds the module name', () => {
    expect(createLogger('test-module').bindings().module).toBe('test-module');
  });

  it('changes the level of existing module loggers', () => {
    const logger = createLogger('level-test');
    setLogLevel('silent');
    expect(logger.level).toBe('silent');
    expect(logger.isLevelEnabled('error')).toBe(false);

    setLogLevel('debug');
    expect(logger.isLevelEnabled('debug')).toBe(true);
  });
});
