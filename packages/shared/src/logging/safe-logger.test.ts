import { describe, it, expect } from 'vitest';
import { createLogger, type LogLevel } from './logger.js';
import { createSafeLogger, assertSafeLogging } from './safe-logger.js';

const FIXED_NOW = (): Date => new Date('2024-03-01T12:00:00.000Z');

function captureSink(): { lines: string[]; sink: (level: LogLevel, line: string) => void } {
  const lines: string[] = [];
  return { lines, sink: (_level, line) => lines.push(line) };
}

describe('createLogger', () => {
  it('should format level, prefix and context', () => {
    const { lines, sink } = captureSink();
    const logger = createLogger({ sink, now: FIXED_NOW, prefix: 'test' });

    logger.info('Built spreadsheet', { rows: 2 });

    expect(lines).toEqual(['[2024-03-01T12:00:00.000Z] [INFO] [test] Built spreadsheet {"rows":2}']);
  });

  it('should drop messages below the configured level', () => {
    const { lines, sink } = captureSink();
    const logger = createLogger({ sink, now: FIXED_NOW, level: 'warn' });

    logger.debug('hidden');
    logger.info('hidden');
    logger.warn('shown');

    expect(lines).toHaveLength(1);
    expect(lines[0]).toContain('[WARN]');
  });

  it('should merge child context', () => {
    const { lines, sink } = captureSink();
    const logger = createLogger({ sink, now: FIXED_NOW, context: { a: 1 } }).child({ b: 2 });

    logger.error('failed');

    expect(lines[0]).toBe('[2024-03-01T12:00:00.000Z] [ERROR] [cfdi-bundle] failed {"a":1,"b":2}');
  });
});

describe('createSafeLogger', () => {
  it('should redact sensitive context keys', () => {
    const { lines, sink } = captureSink();
    const logger = createSafeLogger({ sink, now: FIXED_NOW, sessionId: 'ses-1' });

    logger.info('Build started', { contactEmail: 'someone@example.com', records: 3 });

    expect(lines[0]).toBe(
      '[2024-03-01T12:00:00.000Z] [INFO] [cfdi-bundle] Build started {"sessionId":"ses-1","contactEmail":"[REDACTED]","records":3}',
    );
  });

  it('should scrub PII patterns from messages and values', () => {
    const { lines, sink } = captureSink();
    const logger = createSafeLogger({ sink, now: FIXED_NOW });

    logger.warn('Issuer AAA010101AAA sent 6f1e2a3b-1c2d-4e5f-8a9b-0c1d2e3f4a5b', {
      note: 'mail test@example.com',
    });

    expect(lines[0]).toBe(
      '[2024-03-01T12:00:00.000Z] [WARN] [cfdi-bundle] Issuer [RFC:REDACTED] sent [UUID:REDACTED] {"note":"mail [EMAIL:REDACTED]"}',
    );
    expect(() => assertSafeLogging(lines[0] ?? '')).not.toThrow();
  });

  it('should keep values when scrubbing is disabled', () => {
    const { lines, sink } = captureSink();
    const logger = createSafeLogger({ sink, now: FIXED_NOW, scrubPii: false });

    logger.info('rfc AAA010101AAA');

    expect(lines[0]).toContain('rfc AAA010101AAA');
  });

  it('should keep scrubbing in child loggers', () => {
    const { lines, sink } = captureSink();
    const logger = createSafeLogger({ sink, now: FIXED_NOW }).child({ rfc: 'AAA010101AAA' });

    logger.info('child');

    expect(lines[0]).toContain('"rfc":"[REDACTED]"');
  });
});

describe('assertSafeLogging', () => {
  it('should detect a CURP', () => {
    expect(() => assertSafeLogging('id GODE561231HDFRRN04')).toThrow('Potential PII detected in log output: curp');
  });
});
