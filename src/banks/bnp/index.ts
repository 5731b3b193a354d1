/**
 * BNP Paribas Client (HTTP-Only)
 *
 * No browser automation required - uses direct HTTP requests.
 *
 * Recommended usage:
 * ```typescript
 * import { createBnpClient } from 'bnpnet-statements/bnp';
 *
 * const client = createBnpClient({ username: '0123456789', password: 'your_password' });
 * const { accounts, diagnostics } = await client.checkBalance();
 * ```
 */

// Main client (recommended)
export {
  BnpClient,
  createBnpClient,
  checkBalance,
  type CheckBalanceOptions,
} from './client.js';

// Advanced: HTTP Client (session steps)
export {
  BnpHttpClient,
  createBnpHttpClient,
  type BnpHttpConfig,
} from './http/bnp-http-client.js';

// Parsers
export { AccountRecord, type AccountSnapshot, type AccountParseOptions } from './parsers/account.js';
export { StatementRecord, type StatementSnapshot } from './parsers/statement.js';
export { normalizeDate, normalizeAmount, collapseWhitespace, type NormalizedAmount } from './parsers/normalize.js';
export { formatAccountReport } from './format.js';

// Types and constants
export type {
  BnpCredentials,
  BnpClientConfig,
  ParsePolicy,
  ParseDiagnostic,
  FetchAccountsResult,
  SessionContext,
  ExportDownload,
  FormConfig,
  FormLocator,
} from './types/index.js';

export {
  BNP_URLS,
  BNP_FORMS,
  BNP_LOGIN_FIELDS,
  EXPORT_LINK_SUFFIX,
  DEFAULT_MAX_LANDING_ATTEMPTS,
  isParsePolicy,
} from './types/index.js';

// Default export
import { BnpClient } from './client.js';
export default BnpClient;
