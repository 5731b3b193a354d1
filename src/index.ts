/**
 * bnpnet-statements - BNP Paribas online banking client
 *
 * Reads account balances and operations from BNPNet through its
 * statement-export pages. Pure HTTP: cookie jar + cheerio, no browser.
 *
 * @example
 * ```typescript
 * import { checkBalance, formatAccountReport } from 'bnpnet-statements';
 *
 * const accounts = await checkBalance({
 *   username: '0123456789',
 *   password: 'your_password'
 * });
 * accounts.forEach((account) => console.log(formatAccountReport(account)));
 * ```
 */

// ============================================================================
// BNP Paribas Exports
// ============================================================================

export * from './banks/bnp/index.js';

// ============================================================================
// Shared Infrastructure Exports (Advanced)
// ============================================================================

export {
  BankClientError,
  ConfigurationError,
  SessionError,
  ParseError,
  type BankClientErrorCode,
  type ParseErrorField,
} from './shared/errors.js';

export {
  CookieFetch,
  createCookieFetch,
  type HttpClientConfig,
  type HttpResponse,
  type FetchLike,
} from './shared/utils/http-client.js';

export {
  Logger,
  createLogger,
  type LogLevel,
  type LoggerConfig,
  type LogSink,
} from './shared/utils/logger.js';

export { loadEnv, readBnpEnv, type BnpEnvConfig } from './shared/utils/env.js';
