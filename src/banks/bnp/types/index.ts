// Centralized types and constants for the BNPNet client

import type { CookieFetch } from '../../../shared/utils/http-client.js';
import type { ParseErrorField } from '../../../shared/errors.js';
import type { AccountRecord } from '../parsers/account.js';

// ============================================================================
// Credentials & configuration
// ============================================================================

export interface BnpCredentials {
  username: string;
  password: string;
}

/**
 * What to do with export text that does not parse.
 *
 * - `fail-fast`: the first bad line aborts the whole call
 * - `skip-and-continue`: bad lines/accounts are dropped and reported as diagnostics
 */
export type ParsePolicy = 'fail-fast' | 'skip-and-continue';

export function isParsePolicy(value: string): value is ParsePolicy {
  return value === 'fail-fast' || value === 'skip-and-continue';
}

export interface BnpClientConfig {
  /** Portal origin (default: BNP_URLS.BASE) */
  baseUrl?: string;
  /** Request timeout in ms (default: 30000) */
  timeout?: number;
  /** Enable debug logging (default: false) */
  debug?: boolean;
  /** Custom user agent */
  userAgent?: string;
  /** Parse policy for export bodies (default: 'fail-fast') */
  parsePolicy?: ParsePolicy;
  /** Attempts at the landing page while it answers with an empty body (default: 13) */
  maxLandingAttempts?: number;
  /** Pre-configured HTTP session; its cookies and settings are used as-is */
  http?: CookieFetch;
}

// ============================================================================
// Session context
// ============================================================================

/**
 * Snapshot of the browsing session after one step.
 * Steps take a context and return the next one.
 */
export interface SessionContext {
  /** URL of the last fetched page; relative links resolve against it */
  readonly url: string;
  /** Body of the last fetched page */
  readonly html: string;
  /** Extra headers sent with every following request */
  readonly headers: Readonly<Record<string, string>>;
}

// ============================================================================
// Results
// ============================================================================

export interface ParseDiagnostic {
  /** Export link the body came from */
  source: string;
  field: ParseErrorField;
  message: string;
  /** 1-based line inside the export body */
  lineNumber?: number;
  line?: string;
  /** What was dropped: one statement line, or the whole account */
  skipped: 'line' | 'account';
}

export interface FetchAccountsResult {
  accounts: AccountRecord[];
  diagnostics: ParseDiagnostic[];
}

export type ExportDownload =
  | { kind: 'no-activity'; url: string }
  | { kind: 'export'; url: string; body: string };

// ============================================================================
// Portal constants
// ============================================================================

export const BNP_URLS = {
  BASE: 'https://www.secure.bnpparibas.net',
  LANDING_PATH: '/controller?type=auth',
  EXPORT_PATH: '/SAF_TLC'
} as const;

export const EXPORT_LINK_SUFFIX = '.exl';

export const DEFAULT_MAX_LANDING_ATTEMPTS = 13;

export type FormLocator = { name: string } | { index: number };

export interface FormConfig {
  locator: FormLocator;
  /** Fields always sent, whether or not the static markup declares them */
  fields: Readonly<Record<string, string>>;
}

/**
 * Forms the session submits. Field lists are explicit so fields the portal
 * adds from client-side script can be sent without reading them from markup.
 */
export const BNP_FORMS = {
  login: {
    locator: { name: 'esp_form' },
    fields: {}
  },
  export: {
    locator: { index: 0 },
    fields: {
      ch_rop: 'tous',
      ch_rop_fmt_fic: 'RTEXC',
      ch_rop_fmt_dat: 'JJMMAA',
      ch_rop_fmt_sep: 'VG',
      ch_rop_dat: 'tous',
      ch_rop_dat_deb: '',
      ch_rop_dat_fin: '',
      ch_memo: 'OUI'
    }
  }
} as const satisfies Record<string, FormConfig>;

/** Login form inputs that receive the credentials */
export const BNP_LOGIN_FIELDS = {
  username: 'userid',
  password: 'password'
} as const;
