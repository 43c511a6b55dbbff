import { describe, it, expect, afterEach } from '@jest/globals';
import { ConsoleLogger, LoggerFactory, LogLevel, parseLogLevel } from './Logger';

function capture(config: ConstructorParameters<typeof ConsoleLogger>[0] = {}): { logger: ConsoleLogger; lines: string[] } {
  const lines: string[] = [];
  const logger = new ConsoleLogger({
    name: 'Test',
    timestamp: false,
    colorize: false,
    write: line => lines.push(line),
    ...config
  });
  return { logger, lines };
}

describe('ConsoleLogger', () => {
  it('should write level, name and message', () => {
    const { logger, lines } = capture();

    logger.info('hello');

    expect(lines).toEqual(['[INFO] [Test] hello']);
  });

  it('should append metadata as JSON', () => {
    const { logger, lines } = capture();

    logger.warn('slow response', { ms: 1200 });

    expect(lines).toEqual(['[WARN] [Test] slow response {"ms":1200}']);
  });

  it('should drop entries below the configured level', () => {
    const { logger, lines } = capture({ level: LogLevel.WARN });

    logger.debug('noise');
    logger.info('more noise');
    logger.error('kept');

    expect(lines).toEqual(['[ERROR] [Test] kept']);
  });

  it('should print the error message under the entry', () => {
    const { logger, lines } = capture();

    logger.error('request failed', new Error('boom'));

    expect(lines[0]).toBe('[ERROR] [Test] request failed');
    expect(lines[1]).toBe('  Error: boom');
  });

  it('should write one JSON object per entry in json mode', () => {
    const { logger, lines } = capture({ json: true });

    logger.warn('careful', { path: '/tmp/a' });

    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0])).toMatchObject({
      level: 'WARN',
      logger: 'Test',
      message: 'careful',
      meta: { path: '/tmp/a' }
    });
  });

  it('should accept a level name in setLevel', () => {
    const { logger, lines } = capture();

    logger.setLevel('debug');
    logger.debug('visible');
    logger.setLevel('nonsense');
    logger.debug('still visible');

    expect(lines).toEqual(['[DEBUG] [Test] visible', '[DEBUG] [Test] still visible']);
  });
});

describe('parseLogLevel', () => {
  it('should parse names case-insensitively', () => {
    expect(parseLogLevel('warn')).toBe(LogLevel.WARN);
    expect(parseLogLevel('SILENT')).toBe(LogLevel.SILENT);
  });

  it('should return undefined for unknown names', () => {
    expect(parseLogLevel('loud')).toBeUndefined();
  });
});

describe('LoggerFactory', () => {
  afterEach(() => {
    LoggerFactory.clear();
    LoggerFactory.setDefaultConfig({ level: LogLevel.INFO });
  });

  it('should hand out one logger per name', () => {
    expect(LoggerFactory.getLogger('Engine')).toBe(LoggerFactory.getLogger('Engine'));
    expect(LoggerFactory.getLogger('Engine')).not.toBe(LoggerFactory.getLogger('Resolver'));
  });

  it('should apply new defaults to loggers already created', () => {
    const lines: string[] = [];
    const logger = LoggerFactory.getLogger('Engine', { timestamp: false, colorize: false, write: line => lines.push(line) });

    logger.debug('hidden');
    LoggerFactory.setDefaultConfig({ level: LogLevel.DEBUG });
    logger.debug('shown');

    expect(lines).toEqual(['[DEBUG] [Engine] shown']);
  });
});
