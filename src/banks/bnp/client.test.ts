import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { checkBalance, createBnpClient } from './client.js';
import { ConfigurationError } from '../../shared/errors.js';
import { CookieFetch } from '../../shared/utils/http-client.js';
import { Logger } from '../../shared/utils/logger.js';
import { createFakeFetch, html, redirect, type RouteHandler } from '../../shared/testing/fake-fetch.js';

const ORIGIN = 'https://portal.bnp.test';

function createPortal(overrides: Record<string, RouteHandler> = {}) {
  const fake = createFakeFetch({
    [`GET ${ORIGIN}/controller?type=auth`]: () =>
      html('<form name="esp_form" action="/login" method="post"><input name="userid"><input type="password" name="password"></form>'),
    [`POST ${ORIGIN}/login`]: () => redirect('/accueil'),
    [`GET ${ORIGIN}/accueil`]: () => html('<html>accueil</html>'),
    [`GET ${ORIGIN}/SAF_TLC`]: () => html('<form action="/SAF_TLC" method="post"></form>'),
    [`POST ${ORIGIN}/SAF_TLC`]: () => html('<a href="/f/1.exl">1</a>'),
    [`GET ${ORIGIN}/f/1.exl`]: () =>
      new Response('John Doe\t12345 123456789 01\t\t31/12/23\t\t1234,56\n15/12/23\tCARTE  ACHAT   X\t-12,00\n'),
    ...overrides
  });
  const http = new CookieFetch({ fetch: fake.fetch, logger: new Logger({ level: 'silent' }) });
  return { fake, http };
}

describe('checkBalance', () => {
  it('returns the parsed accounts', async () => {
    const { http } = createPortal();

    const accounts = await checkBalance({ username: '12345678', password: 'test-secret', baseUrl: ORIGIN, http });

    assert.equal(accounts.length, 1);
    const [account] = accounts;
    assert.equal(account.statementDate(), '2023-12-31');
    assert.equal(account.balance(), 1234.56);
    const [statement] = account.statements();
    assert.equal(statement.date(), '2023-12-15');
    assert.equal(statement.description(), 'CARTE ACHAT X');
    assert.equal(statement.amount(), -12);
  });

  it('returns diagnostics alongside the accounts under skip-and-continue', async () => {
    const { http } = createPortal({
      [`POST ${ORIGIN}/SAF_TLC`]: () => html('<a href="/f/1.exl">1</a><a href="/f/2.exl">2</a>'),
      [`GET ${ORIGIN}/f/1.exl`]: () => new Response('A\t12345 123456789 01\t31/12/23\t10,00\n15/12/23\tX\t-1,00\n16/12/23\tY\n'),
      [`GET ${ORIGIN}/f/2.exl`]: () => new Response('not an export\n')
    });

    const result = await checkBalance({
      username: '12345678',
      password: 'test-secret',
      baseUrl: ORIGIN,
      http,
      parsePolicy: 'skip-and-continue'
    });

    assert.equal(result.accounts.length, 1);
    assert.equal(result.accounts[0].statements().length, 1);
    assert.deepEqual(
      result.diagnostics.map((d) => [d.source, d.skipped, d.field, d.lineNumber]),
      [
        [`${ORIGIN}/f/1.exl`, 'line', 'line', 3],
        [`${ORIGIN}/f/2.exl`, 'account', 'header', 1]
      ]
    );
  });

  it('sends a session cookie seeded on the pre-configured client', async () => {
    const { fake, http } = createPortal();
    await http.setCookie('SESSION=seed; Path=/', `${ORIGIN}/`);

    await checkBalance({ username: '12345678', password: 'test-secret', baseUrl: ORIGIN, http });

    assert.equal(fake.requests[0].headers['cookie'], 'SESSION=seed');
    assert.deepEqual((await http.getCookies(`${ORIGIN}/`)).map((c) => c.key), ['SESSION']);
  });

  it('rejects a missing password before any request', async () => {
    const { fake, http } = createPortal();

    await assert.rejects(
      checkBalance({ username: '12345678', baseUrl: ORIGIN, http }),
      (error: unknown) => error instanceof ConfigurationError && error.message === 'Must provide a password'
    );
    assert.equal(fake.requests.length, 0);
  });

  it('rejects a missing or blank username before any request', async () => {
    const { fake, http } = createPortal();

    for (const username of [undefined, '', '   ']) {
      await assert.rejects(
        checkBalance({ username, password: 'test-secret', baseUrl: ORIGIN, http }),
        (error: unknown) => error instanceof ConfigurationError && error.code === 'CONFIGURATION'
      );
    }
    assert.equal(fake.requests.length, 0);
  });
});

describe('BnpClient', () => {
  it('validates credentials on construction', () => {
    assert.throws(() => createBnpClient({ username: '12345678' }), ConfigurationError);
  });

  it('returns accounts together with diagnostics', async () => {
    const { http } = createPortal();
    const client = createBnpClient({ username: '12345678', password: 'test-secret' }, { baseUrl: ORIGIN, http });

    const result = await client.checkBalance();

    assert.equal(result.accounts.length, 1);
    assert.deepEqual(result.diagnostics, []);
  });
});
