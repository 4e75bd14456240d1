import { describe, it, expect } from 'vitest';
import { REDACTED, createConsoleLogger, redact, silentLogger } from '../src/logging/logger.js';
import { makeLogSink } from './helpers/fake-http-client.js';

const FIXED_NOW = () => new Date('2026-01-02T03:04:05.000Z');

describe('createConsoleLogger', () => {
  it('writes one JSON line per entry', () => {
    const sink = makeLogSink();
    const logger = createConsoleLogger({ write: sink.write, now: FIXED_NOW, serviceName: 'svc' });

    logger.info('hello', { count: 2 });

    expect(sink.lines).toEqual([
      JSON.stringify({
        level: 'info',
        timestamp: '2026-01-02T03:04:05.000Z',
        service: 'svc',
        message: 'hello',
        context: { count: 2 },
      }),
    ]);
  });

  it('omits context when there is none', () => {
    const sink = makeLogSink();
    const logger = createConsoleLogger({ write: sink.write, now: FIXED_NOW });

    logger.warn('plain');

    expect(JSON.parse(sink.lines[0]!)).toEqual({
      level: 'warn',
      timestamp: '2026-01-02T03:04:05.000Z',
      service: 'orcabase-client',
      message: 'plain',
    });
  });

  it('drops entries more verbose than the configured level', () => {
    const sink = makeLogSink();
    const logger = createConsoleLogger({ write: sink.write, level: 'warn' });

    logger.debug('d');
    logger.info('i');
    logger.warn('w');
    logger.error('e');

    expect(sink.lines.map((line) => JSON.parse(line).message)).toEqual(['w', 'e']);
  });

  it('defaults to info', () => {
    const sink = makeLogSink();
    const logger = createConsoleLogger({ write: sink.write });

    logger.debug('hidden');
    logger.info('shown');

    expect(sink.lines).toHaveLength(1);
  });

  it('child loggers merge bound context, call context winning', () => {
    const sink = makeLogSink();
    const logger = createConsoleLogger({ write: sink.write })
      .child({ operation: 'getChanges', attempt: 1 })
      .child({ serviceName: 'LoadBalancer' });

    logger.info('x', { attempt: 2 });

    expect(JSON.parse(sink.lines[0]!).context).toEqual({
      operation: 'getChanges',
      attempt: 2,
      serviceName: 'LoadBalancer',
    });
  });

  it('redacts secrets in context', () => {
    const sink = makeLogSink();
    const logger = createConsoleLogger({ write: sink.write, level: 'debug' });

    logger.debug('request', { body: { username: 'team_a', password: 'test-secret' }, token: 'test-token' });

    expect(JSON.parse(sink.lines[0]!).context).toEqual({
      body: { username: 'team_a', password: REDACTED },
      token: REDACTED,
    });
  });

  it('serializes errors to name and message', () => {
    const sink = makeLogSink();
    const logger = createConsoleLogger({ write: sink.write });

    logger.error('failed', { error: new TypeError('nope') });

    expect(JSON.parse(sink.lines[0]!).context).toEqual({
      error: { name: 'TypeError', message: 'nope' },
    });
  });
});

describe('redact', () => {
  it('matches keys case-insensitively and walks arrays', () => {
    expect(redact([{ Authorization: 'Token abc', apiKey: 'k', keep: 1 }])).toEqual([
      { Authorization: REDACTED, apiKey: REDACTED, keep: 1 },
    ]);
  });

  it('returns primitives unchanged', () => {
    expect(redact('text')).toBe('text');
    expect(redact(null)).toBeNull();
  });
});

describe('silentLogger', () => {
  it('accepts every call and returns itself as child', () => {
    silentLogger.error('e');
    silentLogger.debug('d', { a: 1 });
    expect(silentLogger.child({ a: 1 })).toBe(silentLogger);
  });
});
