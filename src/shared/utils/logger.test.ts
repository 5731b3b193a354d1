import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { Logger, redactSensitive, truncateForLog, type LogSink } from './logger.js';

function captureSink(): { sink: LogSink; lines: string[] } {
  const lines: string[] = [];
  const push = (line: string) => {
    lines.push(line);
  };
  return { sink: { error: push, warn: push, info: push }, lines };
}

/** Drop the leading "[timestamp] " part */
function withoutTimestamp(line: string): string {
  return line.replace(/^\[[^\]]+\] /, '');
}

describe('Logger', () => {
  it('filters by level', () => {
    const { sink, lines } = captureSink();
    const logger = new Logger({ level: 'warn', component: 'BnpHTTP', sink });

    logger.debug('hidden');
    logger.info('hidden');
    logger.warn('Landing page empty');
    logger.error('login form not found');

    assert.deepEqual(lines.map(withoutTimestamp), [
      '[WARN] [BnpHTTP] Landing page empty',
      '[ERROR] [BnpHTTP] login form not found'
    ]);
  });

  it('redacts credentials in debug data', () => {
    const { sink, lines } = captureSink();
    const logger = new Logger({ level: 'debug', component: 'BnpHTTP', sink });

    logger.debug('Submitting form esp_form', { url: '/login', fields: { userid: '12345678', password: 'test-secret', ok: 'Valider' } });

    assert.equal(
      withoutTimestamp(lines[0]),
      '[DEBUG] [BnpHTTP] Submitting form esp_form {"url":"/login","fields":{"userid":"<redacted>","password":"<redacted>","ok":"Valider"}}'
    );
  });

  it('creates children with the same level and sink', () => {
    const { sink, lines } = captureSink();
    const child = new Logger({ level: 'info', component: 'BnpClient', sink }).child('HTTP');

    child.info('GET /SAF_TLC');

    assert.equal(child.getLevel(), 'info');
    assert.equal(withoutTimestamp(lines[0]), '[INFO] [HTTP] GET /SAF_TLC');
  });

  it('stays quiet when silent', () => {
    const { sink, lines } = captureSink();
    const logger = new Logger({ level: 'silent', sink });

    logger.error('nothing');
    logger.setLevel('error');
    logger.error('something');

    assert.equal(lines.length, 1);
  });
});

describe('redactSensitive', () => {
  it('only touches non-empty strings under sensitive keys', () => {
    assert.deepEqual(redactSensitive({ Password: 'x', cookie: '', attempts: 3, nested: { sessionId: 'abc' } }), {
      Password: '<redacted>',
      cookie: '',
      attempts: 3,
      nested: { sessionId: '<redacted>' }
    });
  });
});

describe('truncateForLog', () => {
  it('keeps the first characters', () => {
    assert.equal(truncateForLog('12345678'), '123***');
    assert.equal(truncateForLog('ab'), '**');
  });
});
