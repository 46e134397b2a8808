import { ConfigService } from './config.service';

describe('ConfigService', () => {
  const saved = { ...process.env };

  beforeEach(() => {
    process.env.NODE_ENV = 'test';
    delete process.env.TRACKER_TEST_KEY;
    delete process.env.LOG_LEVEL;
  });

  afterAll(() => {
    process.env = saved;
  });

  it('should read process variables', () => {
    process.env.TRACKER_TEST_KEY = 'value';

    expect(new ConfigService().get('TRACKER_TEST_KEY')).toBe('value');
  });

  it('should throw for a missing required key', () => {
    expect(() => new ConfigService().get('TRACKER_TEST_KEY')).toThrow(
      'Configuration error: Missing required environment variable TRACKER_TEST_KEY',
    );
  });

  it('should fall back for missing or empty optional keys', () => {
    process.env.TRACKER_TEST_KEY = '';
    const config = new ConfigService();

    expect(config.getOrDefault('TRACKER_TEST_KEY', 'fallback')).toBe('fallback');
    expect(config.getNumber('TRACKER_TEST_KEY', 5000)).toBe(5000);
    expect(config.getBoolean('TRACKER_TEST_KEY', true)).toBe(true);
  });

  it('should parse numbers and booleans', () => {
    process.env.TRACKER_TEST_KEY = '8080';
    expect(new ConfigService().getNumber('TRACKER_TEST_KEY', 5000)).toBe(8080);

    process.env.TRACKER_TEST_KEY = 'abc';
    expect(new ConfigService().getNumber('TRACKER_TEST_KEY', 5000)).toBe(5000);

    process.env.TRACKER_TEST_KEY = 'TRUE';
    expect(new ConfigService().getBoolean('TRACKER_TEST_KEY', false)).toBe(true);
  });

  it.each([
    ['error', ['error', 'fatal']],
    ['warn', ['error', 'fatal', 'warn']],
    ['info', ['error', 'fatal', 'warn', 'log']],
    ['DEBUG', ['error', 'fatal', 'warn', 'log', 'debug']],
    ['chatty', ['error', 'fatal', 'warn', 'log', 'debug']],
  ])('should map LOG_LEVEL=%s', (level, expected) => {
    process.env.LOG_LEVEL = level;

    expect(new ConfigService().logLevels()).toEqual(expected);
  });
});
