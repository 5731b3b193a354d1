/**
 * BNPNet HTTP Client
 *
 * Pure HTTP session against the BNP Paribas online banking portal.
 * Uses a cookie jar for session management and cheerio for HTML parsing.
 *
 * Flow:
 * 1. GET `/controller?type=auth` - landing page (retried while the body is empty)
 * 2. Submit form `esp_form` - userid + password
 * 3. GET `/SAF_TLC` with `Accept: text/html` - statement export page
 * 4. Submit the first form - export options (all accounts, EXL format, DDMMYY dates)
 * 5. GET every link ending in `.exl` - one export per account
 *
 * Each step takes the previous `SessionContext` and returns the next one.
 */

import { SessionError, ParseError } from '../../../shared/errors.js';
import { createCookieFetch, type CookieFetch, type HttpResponse } from '../../../shared/utils/http-client.js';
import { createLogger, truncateForLog, type Logger } from '../../../shared/utils/logger.js';
import { AccountRecord } from '../parsers/account.js';
import {
  buildFormSubmission,
  extractLinks,
  filterLinksBySuffix,
  findForm,
  isNoActivityBody
} from './page-parser.js';
import {
  BNP_FORMS,
  BNP_LOGIN_FIELDS,
  BNP_URLS,
  DEFAULT_MAX_LANDING_ATTEMPTS,
  EXPORT_LINK_SUFFIX,
  type BnpClientConfig,
  type BnpCredentials,
  type ExportDownload,
  type FetchAccountsResult,
  type FormConfig,
  type ParseDiagnostic,
  type ParsePolicy,
  type SessionContext
} from '../types/index.js';

// ============================================================================
// Types
// ============================================================================

export type BnpHttpConfig = Omit<BnpClientConfig, 'debug'> & {
  logger?: Logger;
};

interface ResolvedConfig {
  baseUrl: string;
  timeout: number;
  parsePolicy: ParsePolicy;
  maxLandingAttempts: number;
}

// ============================================================================
// BNP HTTP Client
// ============================================================================

export class BnpHttpClient {
  private readonly credentials: BnpCredentials;
  private readonly config: ResolvedConfig;
  private readonly http: CookieFetch;
  private readonly logger: Logger;

  constructor(credentials: BnpCredentials, config: BnpHttpConfig = {}) {
    this.credentials = credentials;
    this.config = {
      baseUrl: config.baseUrl ?? BNP_URLS.BASE,
      timeout: config.timeout ?? 30000,
      parsePolicy: config.parsePolicy ?? 'fail-fast',
      maxLandingAttempts: config.maxLandingAttempts ?? DEFAULT_MAX_LANDING_ATTEMPTS
    };
    this.logger = config.logger ?? createLogger('BnpHTTP');

    this.http = config.http ?? createCookieFetch({
      timeout: this.config.timeout,
      userAgent: config.userAgent,
      logger: this.logger.child('HTTP')
    });

    if (!Number.isInteger(this.config.maxLandingAttempts) || this.config.maxLandingAttempts < 1) {
      throw new RangeError(`maxLandingAttempts must be a positive integer, got ${this.config.maxLandingAttempts}`);
    }

    this.logger.debug('BnpHttpClient initialized', {
      baseUrl: this.config.baseUrl,
      username: truncateForLog(credentials.username),
      parsePolicy: this.config.parsePolicy
    });
  }

  // ==========================================================================
  // Public API
  // ==========================================================================

  /**
   * Run the whole session: login, export request, one download per account.
   */
  async fetchAccounts(): Promise<FetchAccountsResult> {
    const startTime = Date.now();

    const landing = await this.loadLandingPage();
    const loggedIn = await this.submitLogin(landing);
    const exportPage = await this.openExportPage(loggedIn);
    const exportList = await this.requestExport(exportPage);

    const links = this.collectExportLinks(exportList);
    this.logger.info(`Found ${links.length} export link(s)`);

    const accounts: AccountRecord[] = [];
    const diagnostics: ParseDiagnostic[] = [];

    for (const link of links) {
      const download = await this.downloadExport(exportList, link);

      if (download.kind === 'no-activity') {
        this.logger.info(`No activity for ${download.url}`);
        continue;
      }

      const account = this.parseExport(download.url, download.body, diagnostics);
      if (account) {
        accounts.push(account);
      }
    }

    const elapsed = Date.now() - startTime;
    this.logger.info(`Fetched ${accounts.length} account(s) in ${elapsed}ms`);

    return { accounts, diagnostics };
  }

  // ==========================================================================
  // Session steps
  // ==========================================================================

  /**
   * Step 1: landing page. The portal sometimes answers with an empty body;
   * retry a fixed number of times.
   */
  async loadLandingPage(): Promise<SessionContext> {
    const url = new URL(BNP_URLS.LANDING_PATH, this.config.baseUrl).toString();
    const headers: Record<string, string> = {};

    for (let attempt = 1; attempt <= this.config.maxLandingAttempts; attempt++) {
      const response = this.ensureOk(await this.http.get(url, headers), 'Landing page');

      if (response.body.trim() !== '') {
        this.logger.debug(`Landing page loaded on attempt ${attempt}`, { url: response.url });
        return { url: response.url, html: response.body, headers };
      }

      this.logger.warn(`Landing page empty (attempt ${attempt}/${this.config.maxLandingAttempts})`);
    }

    throw new SessionError(
      `site unreachable or empty response after ${this.config.maxLandingAttempts} attempts`,
      { url }
    );
  }

  /**
   * Step 2: fill the login form with the credentials and submit it
   */
  async submitLogin(context: SessionContext): Promise<SessionContext> {
    return this.submitConfiguredForm(context, BNP_FORMS.login, 'login form not found', {
      [BNP_LOGIN_FIELDS.username]: this.credentials.username,
      [BNP_LOGIN_FIELDS.password]: this.credentials.password
    });
  }

  /**
   * Step 3: the export page. The portal only serves it to clients that
   * accept text/html, so the header stays on for the rest of the session.
   */
  async openExportPage(context: SessionContext): Promise<SessionContext> {
    const headers = { ...context.headers, Accept: 'text/html' };
    const url = new URL(BNP_URLS.EXPORT_PATH, context.url).toString();

    const response = this.ensureOk(await this.http.get(url, headers), 'Export page');
    return { url: response.url, html: response.body, headers };
  }

  /**
   * Step 4: ask for an export of every account
   */
  async requestExport(context: SessionContext): Promise<SessionContext> {
    return this.submitConfiguredForm(context, BNP_FORMS.export, 'export form not found');
  }

  /**
   * Step 5: export links on the page, in document order
   */
  collectExportLinks(context: SessionContext): string[] {
    return filterLinksBySuffix(extractLinks(context.html, context.url), EXPORT_LINK_SUFFIX);
  }

  /**
   * Step 6: download one export. An HTML answer means the account had no
   * operations over the period.
   */
  async downloadExport(context: SessionContext, link: string): Promise<ExportDownload> {
    const url = new URL(link, context.url).toString();
    const response = this.ensureOk(await this.http.get(url, context.headers), 'Export download');

    if (isNoActivityBody(response.body)) {
      return { kind: 'no-activity', url: response.url };
    }
    return { kind: 'export', url: response.url, body: response.body };
  }

  // ==========================================================================
  // Internal
  // ==========================================================================

  private async submitConfiguredForm(
    context: SessionContext,
    formConfig: FormConfig,
    notFoundMessage: string,
    values: Record<string, string> = {}
  ): Promise<SessionContext> {
    const form = findForm(context.html, formConfig.locator);
    if (!form) {
      throw new SessionError(notFoundMessage, { url: context.url });
    }

    const submission = buildFormSubmission(form, context.url, { ...formConfig.fields, ...values });
    this.logger.debug(`Submitting form ${form.name ?? '(unnamed)'}`, {
      url: submission.url,
      method: submission.method,
      fields: submission.data
    });

    const response = this.ensureOk(
      await this.http.submitForm(submission.url, submission.method, submission.data, { ...context.headers }),
      `Form ${form.name ?? submission.url}`
    );

    return { url: response.url, html: response.body, headers: context.headers };
  }

  private parseExport(source: string, body: string, diagnostics: ParseDiagnostic[]): AccountRecord | null {
    if (this.config.parsePolicy === 'fail-fast') {
      return AccountRecord.parse(body);
    }

    try {
      return AccountRecord.parse(body, {
        policy: 'skip-and-continue',
        onSkippedLine: (error) => {
          this.logger.warn(`Skipped statement in ${source}: ${error.message}`);
          diagnostics.push(toDiagnostic(source, error, 'line'));
        }
      });
    } catch (error: unknown) {
      if (!(error instanceof ParseError)) throw error;
      this.logger.warn(`Skipped account ${source}: ${error.message}`);
      diagnostics.push(toDiagnostic(source, error, 'account'));
      return null;
    }
  }

  private ensureOk(response: HttpResponse, what: string): HttpResponse {
    if (!response.ok) {
      throw new SessionError(`${what} failed with HTTP ${response.status}`, {
        status: response.status,
        url: response.url
      });
    }
    return response;
  }
}

function toDiagnostic(source: string, error: ParseError, skipped: ParseDiagnostic['skipped']): ParseDiagnostic {
  return {
    source,
    field: error.field,
    message: error.message,
    lineNumber: error.lineNumber,
    line: error.line,
    skipped
  };
}

// ============================================================================
// Factory Functions
// ============================================================================

/**
 * Create a BNPNet HTTP client
 */
export function createBnpHttpClient(credentials: BnpCredentials, config?: BnpHttpConfig): BnpHttpClient {
  return new BnpHttpClient(credentials, config);
}
