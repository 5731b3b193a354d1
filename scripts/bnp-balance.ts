/**
 * BNP Balance Script
 *
 * Logs into BNPNet and prints every account with its operations.
 *
 * Usage:
 *   npx tsx scripts/bnp-balance.ts [--json]
 *
 * Environment:
 *   - BNP_USERNAME: BNPNet customer number
 *   - BNP_PASSWORD: BNPNet password
 *   - BNP_BASE_URL: portal origin override (optional)
 *   - BNP_TIMEOUT_MS: request timeout (optional)
 *   - BNP_PARSE_POLICY: "fail-fast" (default) or "skip-and-continue"
 *   - LOG_LEVEL: silent | error | warn | info | debug
 */

import { loadEnv, readBnpEnv } from '../src/shared/utils/env.js';
import { getErrorMessage } from '../src/shared/utils/helpers.js';
import { createBnpClient } from '../src/banks/bnp/client.js';
import { formatAccountReport } from '../src/banks/bnp/format.js';

// ============================================================================
// Main
// ============================================================================

async function main(): Promise<void> {
  loadEnv();
  const { username, password, ...config } = readBnpEnv();
  const asJson = process.argv.includes('--json');

  const client = createBnpClient({ username, password }, config);
  const { accounts, diagnostics } = await client.checkBalance();

  if (asJson) {
    console.log(JSON.stringify({ accounts, diagnostics }, null, 2));
    return;
  }

  if (accounts.length === 0) {
    console.log('No account with operations over the period.');
  }

  for (const account of accounts) {
    console.log(formatAccountReport(account));
    console.log('');
  }

  for (const diagnostic of diagnostics) {
    console.warn(`Skipped ${diagnostic.skipped} in ${diagnostic.source}: ${diagnostic.message}`);
  }
}

// ============================================================================
// Entry Point
// ============================================================================

main().catch((err: unknown) => {
  console.error(`Failed: ${getErrorMessage(err)}`);
  process.exit(1);
});
