/**
 * BnpClient - BNPNet statement client
 *
 * Recommended way to read balances and operations from BNP Paribas online
 * banking. Pure HTTP (no browser): logs in, requests a statement export for
 * every account and parses the downloaded files.
 *
 * ## Limitations
 *
 * - The export carries no sort code; `sortCode()` is always undefined
 * - Accounts with no operations over the period are not returned
 *   (the portal answers their export link with an HTML page)
 *
 * @example
 * ```typescript
 * import { checkBalance } from 'bnpnet-statements';
 *
 * const accounts = await checkBalance({ username: '0123456789', password: 'your_password' });
 * for (const account of accounts) {
 *   console.log(account.name(), account.accountNumber(), account.balance());
 *   for (const statement of account.statements()) {
 *     console.log(statement.asString());
 *   }
 * }
 * ```
 *
 * @see {@link BnpHttpClient} - Lower-level session steps
 */

import { ConfigurationError } from '../../shared/errors.js';
import { createLogger, type Logger } from '../../shared/utils/logger.js';
import { BnpHttpClient } from './http/bnp-http-client.js';
import type { AccountRecord } from './parsers/account.js';
import type { BnpClientConfig, BnpCredentials, FetchAccountsResult } from './types/index.js';

// ============================================================================
// Types
// ============================================================================

export interface CheckBalanceOptions extends BnpClientConfig {
  username?: string;
  password?: string;
}

// ============================================================================
// BnpClient
// ============================================================================

export class BnpClient {
  private readonly credentials: BnpCredentials;
  private readonly config: BnpClientConfig;
  private readonly logger: Logger;

  constructor(credentials: Partial<BnpCredentials>, config: BnpClientConfig = {}) {
    this.credentials = validateCredentials(credentials);
    this.config = config;
    this.logger = createLogger('BnpClient');

    if (config.debug) {
      this.logger.setLevel('debug');
    }
  }

  /**
   * Log in, export and parse every account.
   *
   * Each call runs its own session; the cookie jar is not shared between
   * calls unless a pre-configured `http` client was given.
   */
  async checkBalance(): Promise<FetchAccountsResult> {
    this.logger.info('Starting balance check...');

    const httpClient = new BnpHttpClient(this.credentials, {
      baseUrl: this.config.baseUrl,
      timeout: this.config.timeout,
      userAgent: this.config.userAgent,
      parsePolicy: this.config.parsePolicy,
      maxLandingAttempts: this.config.maxLandingAttempts,
      http: this.config.http,
      logger: this.logger.child('BnpHTTP')
    });

    const result = await httpClient.fetchAccounts();

    if (result.diagnostics.length > 0) {
      this.logger.warn(`${result.diagnostics.length} export problem(s) skipped`);
    }
    return result;
  }
}

function validateCredentials({ username, password }: Partial<BnpCredentials>): BnpCredentials {
  if (!password) {
    throw new ConfigurationError('Must provide a password');
  }
  if (!username || username.trim() === '') {
    throw new ConfigurationError('Must provide a username');
  }
  return { username, password };
}

// ============================================================================
// Factory Functions
// ============================================================================

/**
 * Create a new BnpClient instance
 */
export function createBnpClient(credentials: Partial<BnpCredentials>, config?: BnpClientConfig): BnpClient {
  return new BnpClient(credentials, config);
}

/**
 * One-shot balance check: returns every account that had activity, in
 * the order the portal lists them. Under 'skip-and-continue' the result
 * also carries the diagnostics of every skipped line and account.
 *
 * Throws ConfigurationError before any request when a credential is missing.
 */
export function checkBalance(
  options: CheckBalanceOptions & { parsePolicy: 'skip-and-continue' }
): Promise<FetchAccountsResult>;
export function checkBalance(options: CheckBalanceOptions & { parsePolicy?: 'fail-fast' }): Promise<AccountRecord[]>;
export function checkBalance(options: CheckBalanceOptions): Promise<AccountRecord[] | FetchAccountsResult>;
export async function checkBalance(options: CheckBalanceOptions): Promise<AccountRecord[] | FetchAccountsResult> {
  const { username, password, ...config } = options;
  const client = createBnpClient({ username, password }, config);
  const result = await client.checkBalance();
  return options.parsePolicy === 'skip-and-continue' ? result : result.accounts;
}
