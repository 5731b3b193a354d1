/**
 * Session flow tests against an in-process portal stand-in
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { BnpHttpClient } from './bnp-http-client.js';
import { ParseError, SessionError } from '../../../shared/errors.js';
import { CookieFetch } from '../../../shared/utils/http-client.js';
import { Logger } from '../../../shared/utils/logger.js';
import { createFakeFetch, html, redirect, type RouteHandler } from '../../../shared/testing/fake-fetch.js';
import type { BnpHttpConfig } from './bnp-http-client.js';

const ORIGIN = 'https://portal.bnp.test';
const silent = new Logger({ level: 'silent' });
const credentials = { username: '12345678', password: 'test-secret' };

const LANDING_PAGE = `<html><body>
  <form name="esp_form" action="/login" method="post">
    <input type="hidden" name="esp_token" value="abc123">
    <input type="text" name="userid">
    <input type="password" name="password">
    <input type="submit" name="ok" value="Valider">
  </form>
</body></html>`;

const EXPORT_FORM_PAGE = `<html><body>
  <form action="/SAF_TLC_RES" method="post">
    <input type="hidden" name="ch_ctx" value="42">
    <select name="ch_rop"><option value="sel">Compte choisi</option><option value="tous">Tous</option></select>
  </form>
  <form name="autre" action="/autre"></form>
</body></html>`;

const EXPORT_LIST_PAGE = `<html><body>
  <a href="/exports/00001.exl">Compte cheques</a>
  <a href="/exports/00002.exl">Livret</a>
  <a href="/aide.html">Aide</a>
</body></html>`;

const CHEQUES_EXPORT = [
  'COMPTE CHEQUES\t00012 345678901 23\t\t31/12/23\t\t1234,56',
  '15/12/23\tCARTE  ACHAT   X\t-12,00',
  '20/12/23\tVIR SEPA  RECU\t250,00\tREF1',
  ''
].join('\n');

const NO_ACTIVITY = '<HTML><BODY>Aucune operation sur la periode</BODY></HTML>';

function text(body: string): Response {
  return new Response(body, { headers: { 'content-type': 'text/plain; charset=iso-8859-1' } });
}

function portalRoutes(overrides: Record<string, RouteHandler> = {}): Record<string, RouteHandler> {
  return {
    [`GET ${ORIGIN}/controller?type=auth`]: () => html(LANDING_PAGE),
    [`POST ${ORIGIN}/login`]: () => redirect('/home', 302, ['SESSION=s1; Path=/']),
    [`GET ${ORIGIN}/home`]: () => html('<html><body>Bienvenue</body></html>'),
    [`GET ${ORIGIN}/SAF_TLC`]: () => html(EXPORT_FORM_PAGE),
    [`POST ${ORIGIN}/SAF_TLC_RES`]: () => html(EXPORT_LIST_PAGE),
    [`GET ${ORIGIN}/exports/00001.exl`]: () => text(CHEQUES_EXPORT),
    [`GET ${ORIGIN}/exports/00002.exl`]: () => text(NO_ACTIVITY),
    ...overrides
  };
}

function createClient(routes: Record<string, RouteHandler>, config: BnpHttpConfig = {}) {
  const fake = createFakeFetch(routes);
  const http = new CookieFetch({ fetch: fake.fetch, logger: silent });
  const client = new BnpHttpClient(credentials, { baseUrl: ORIGIN, logger: silent, http, ...config });
  return { client, fake };
}

describe('BnpHttpClient.fetchAccounts', () => {
  it('logs in, requests the export and parses every account with activity', async () => {
    const { client, fake } = createClient(portalRoutes());

    const { accounts, diagnostics } = await client.fetchAccounts();

    assert.deepEqual(
      fake.requests.map((r) => `${r.method} ${r.url}`),
      [
        `GET ${ORIGIN}/controller?type=auth`,
        `POST ${ORIGIN}/login`,
        `GET ${ORIGIN}/home`,
        `GET ${ORIGIN}/SAF_TLC`,
        `POST ${ORIGIN}/SAF_TLC_RES`,
        `GET ${ORIGIN}/exports/00001.exl`,
        `GET ${ORIGIN}/exports/00002.exl`
      ]
    );

    assert.deepEqual(diagnostics, []);
    assert.equal(accounts.length, 1);

    const [account] = accounts;
    assert.equal(account.name(), 'COMPTE CHEQUES');
    assert.equal(account.accountNumber(), '00012 345678901 23');
    assert.equal(account.statementDate(), '2023-12-31');
    assert.equal(account.balance(), 1234.56);
    assert.deepEqual(
      account.statements().map((s) => s.asString()),
      ['2023-12-15\tCARTE ACHAT X\t-12.00', '2023-12-20\tVIR SEPA RECU\t250.00']
    );
  });

  it('fills the login form from the markup plus the credentials', async () => {
    const { client, fake } = createClient(portalRoutes());

    await client.fetchAccounts();

    const login = fake.requests[1];
    assert.deepEqual(Object.fromEntries(new URLSearchParams(login.body)), {
      esp_token: 'abc123',
      userid: '12345678',
      password: 'test-secret',
      ok: 'Valider'
    });
  });

  it('submits the export options on the first form of the page', async () => {
    const { client, fake } = createClient(portalRoutes());

    await client.fetchAccounts();

    const exportRequest = fake.requests[4];
    assert.deepEqual(Object.fromEntries(new URLSearchParams(exportRequest.body)), {
      ch_ctx: '42',
      ch_rop: 'tous',
      ch_rop_fmt_fic: 'RTEXC',
      ch_rop_fmt_dat: 'JJMMAA',
      ch_rop_fmt_sep: 'VG',
      ch_rop_dat: 'tous',
      ch_rop_dat_deb: '',
      ch_rop_dat_fin: '',
      ch_memo: 'OUI'
    });
  });

  it('sends Accept: text/html from the export page on, and the session cookie after login', async () => {
    const { client, fake } = createClient(portalRoutes());

    await client.fetchAccounts();

    assert.deepEqual(
      fake.requests.map((r) => r.headers['accept'] ?? '-'),
      ['-', '-', '-', 'text/html', 'text/html', 'text/html', 'text/html']
    );
    assert.deepEqual(
      fake.requests.map((r) => r.headers['cookie'] ?? '-'),
      ['-', '-', 'SESSION=s1', 'SESSION=s1', 'SESSION=s1', 'SESSION=s1', 'SESSION=s1']
    );
  });

  it('returns no accounts when every export is a no-activity page', async () => {
    const { client } = createClient(portalRoutes({
      [`GET ${ORIGIN}/exports/00001.exl`]: () => html(NO_ACTIVITY)
    }));

    const { accounts } = await client.fetchAccounts();

    assert.deepEqual(accounts, []);
  });

  it('fails fast on a malformed export by default', async () => {
    const { client } = createClient(portalRoutes({
      [`GET ${ORIGIN}/exports/00002.exl`]: () => text('not an export\n')
    }));

    await assert.rejects(client.fetchAccounts(), (error: unknown) => {
      return error instanceof ParseError && error.field === 'header';
    });
  });

  it('skips bad lines and accounts under skip-and-continue', async () => {
    const { client } = createClient(
      portalRoutes({
        [`GET ${ORIGIN}/exports/00001.exl`]: () =>
          text('COMPTE CHEQUES\t00012 345678901 23\t31/12/23\t10,00\n15/12/23\tCARTE X\t-1,00\n16/12/23\tCARTE Y\n'),
        [`GET ${ORIGIN}/exports/00002.exl`]: () => text('not an export\n')
      }),
      { parsePolicy: 'skip-and-continue' }
    );

    const { accounts, diagnostics } = await client.fetchAccounts();

    assert.equal(accounts.length, 1);
    assert.equal(accounts[0].statements().length, 1);
    assert.deepEqual(
      diagnostics.map((d) => [d.source, d.skipped, d.field, d.lineNumber]),
      [
        [`${ORIGIN}/exports/00001.exl`, 'line', 'line', 3],
        [`${ORIGIN}/exports/00002.exl`, 'account', 'header', 1]
      ]
    );
  });
});

describe('BnpHttpClient.loadLandingPage', () => {
  it('retries while the landing page is empty', async () => {
    const { client, fake } = createClient({
      [`GET ${ORIGIN}/controller?type=auth`]: (_, call) => html(call < 3 ? '' : LANDING_PAGE)
    });

    const context = await client.loadLandingPage();

    assert.equal(fake.requests.length, 3);
    assert.equal(context.url, `${ORIGIN}/controller?type=auth`);
    assert.equal(context.html, LANDING_PAGE);
  });

  it('gives up after 13 empty responses', async () => {
    const { client, fake } = createClient({
      [`GET ${ORIGIN}/controller?type=auth`]: () => html('   \n')
    });

    await assert.rejects(client.fetchAccounts(), (error: unknown) => {
      return error instanceof SessionError && error.message.startsWith('site unreachable or empty response');
    });
    assert.equal(fake.requests.length, 13);
  });

  it('honours a custom attempt bound', async () => {
    const { client, fake } = createClient(
      { [`GET ${ORIGIN}/controller?type=auth`]: () => html('') },
      { maxLandingAttempts: 2 }
    );

    await assert.rejects(client.loadLandingPage(), SessionError);
    assert.equal(fake.requests.length, 2);
  });

  it('does not retry an HTTP error', async () => {
    const { client, fake } = createClient({
      [`GET ${ORIGIN}/controller?type=auth`]: () => new Response('down', { status: 503 })
    });

    await assert.rejects(client.loadLandingPage(), (error: unknown) => {
      return error instanceof SessionError && error.status === 503;
    });
    assert.equal(fake.requests.length, 1);
  });

  it('rejects a non-positive attempt bound', () => {
    assert.throws(() => new BnpHttpClient(credentials, { maxLandingAttempts: 0, logger: silent }), RangeError);
  });
});

describe('BnpHttpClient failures', () => {
  it('reports a missing login form', async () => {
    const { client, fake } = createClient(portalRoutes({
      [`GET ${ORIGIN}/controller?type=auth`]: () => html('<html><body>Maintenance</body></html>')
    }));

    await assert.rejects(client.fetchAccounts(), (error: unknown) => {
      return error instanceof SessionError && error.message === 'login form not found';
    });
    assert.equal(fake.requests.length, 1);
  });

  it('reports an HTTP error on login submission', async () => {
    const { client } = createClient(portalRoutes({
      [`POST ${ORIGIN}/login`]: () => new Response('boom', { status: 500 })
    }));

    await assert.rejects(client.fetchAccounts(), (error: unknown) => {
      return error instanceof SessionError && error.status === 500 && error.url === `${ORIGIN}/login`;
    });
  });

  it('reports a missing export form', async () => {
    const { client } = createClient(portalRoutes({
      [`GET ${ORIGIN}/SAF_TLC`]: () => html('<html><body>Service indisponible</body></html>')
    }));

    await assert.rejects(client.fetchAccounts(), (error: unknown) => {
      return error instanceof SessionError && error.message === 'export form not found';
    });
  });

  it('reports an HTTP error on an export download', async () => {
    const { client } = createClient(portalRoutes({
      [`GET ${ORIGIN}/exports/00002.exl`]: () => new Response('gone', { status: 410 })
    }));

    await assert.rejects(client.fetchAccounts(), (error: unknown) => {
      return error instanceof SessionError && error.status === 410;
    });
  });
});
