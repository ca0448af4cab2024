import { parseLogLevel, createLogger, type LogLevel } from './logger';

describe('parseLogLevel', () => {
  it.each<[string | undefined, LogLevel]>([
    [undefined, 'info'],
    ['', 'info'],
    ['debug', 'debug'],
    ['silent', 'silent'],
    ['WARN', 'warn'],
    ['  trace  ', 'trace'],
    ['verbose', 'info'],
  ])('should parse %p as "%s"', (input, expected) => {
    expect(parseLogLevel(input)).toBe(expected);
  });
});

describe('createLogger', () => {
  const originalEnv = process.env;

  beforeEach(() => {
    process.env = { ...originalEnv };
  });

  afterAll(() => {
    process.env = originalEnv;
  });

  it('should default to info when LOG_LEVEL is unset', () => {
    delete process.env.LOG_LEVEL;
    expect(createLogger({ pretty: false }).level).toBe('info');
  });

  it('should read LOG_LEVEL when no level option is given', () => {
    process.env.LOG_LEVEL = 'warn';
    expect(createLogger({ pretty: false }).level).toBe('warn');
  });

  it('should prefer the level option over LOG_LEVEL', () => {
    process.env.LOG_LEVEL = 'warn';
    expect(createLogger({ level: 'error', pretty: false }).level).toBe('error');
  });

  it('should accept structured log calls', () => {
    const log = createLogger({ level: 'silent', pretty: false });
    expect(() => log.info({ scenario: 'healthy' }, 'scenario changed')).not.toThrow();
  });
});
