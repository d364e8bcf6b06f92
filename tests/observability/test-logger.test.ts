import { describe, it, expect } from 'vitest';
import { Logger, getDefaultLogger, type LoggerOptions } from '../../src/observability/logger.js';

function createBufferOutput() {
  const lines: string[] = [];
  return {
    output: { write: (s: string) => lines.push(s) },
    lines,
  };
}

describe('Logger', () => {
  it('logs JSON format by default', () => {
    const { output, lines } = createBufferOutput();
    const logger = new Logger({ output });
    logger.info('test message', { path: 'search' });
    expect(lines).toHaveLength(1);
    const parsed = JSON.parse(lines[0]);
    expect(parsed.level).toBe('info');
    expect(parsed.message).toBe('test message');
    expect(parsed.logger).toBe('optscope');
    expect(parsed.extra).toEqual({ path: 'search' });
  });

  it('writes null extra when none is given', () => {
    const { output, lines } = createBufferOutput();
    new Logger({ output }).warn('plain');
    expect(JSON.parse(lines[0]).extra).toBeNull();
  });

  it('logs text format', () => {
    const { output, lines } = createBufferOutput();
    const logger = new Logger({ format: 'text', name: 'parser', output });
    logger.error('bad input', { position: 3 });
    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatch(/^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2} \[ERROR\] \[parser\] bad input position=3\n$/);
  });

  it('respects level filtering', () => {
    const { output, lines } = createBufferOutput();
    const logger = new Logger({ level: 'warn', output });
    logger.trace('hidden');
    logger.debug('hidden');
    logger.info('hidden');
    logger.warn('shown');
    logger.error('shown');
    logger.fatal('shown');
    expect(lines).toHaveLength(3);
  });

  it('falls back to info for an unknown level', () => {
    const { output, lines } = createBufferOutput();
    const untyped: LoggerOptions = JSON.parse('{"level":"verbose"}');
    const logger = new Logger({ ...untyped, output });
    logger.debug('hidden');
    logger.info('shown');
    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0]).message).toBe('shown');
  });

  it('reports whether a level is enabled', () => {
    const logger = new Logger({ level: 'info', output: { write: () => undefined } });
    expect(logger.isEnabled('debug')).toBe(false);
    expect(logger.isEnabled('info')).toBe(true);
  });

  it('child loggers share output and level', () => {
    const { output, lines } = createBufferOutput();
    const parent = new Logger({ level: 'debug', output });
    const child = parent.child('optscope.parser');
    expect(child.name).toBe('optscope.parser');
    child.debug('opened');
    expect(JSON.parse(lines[0]).logger).toBe('optscope.parser');
  });

  it('returns a shared default logger', () => {
    expect(getDefaultLogger()).toBe(getDefaultLogger());
    expect(getDefaultLogger().isEnabled('debug')).toBe(false);
  });
});
