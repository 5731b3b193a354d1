import type { AccountRecord } from './parsers/account.js';

/**
 * Printable summary of one account followed by its operations,
 * one delimited line each.
 */
export function formatAccountReport(account: AccountRecord, separator: string = '\t'): string {
  const lines = [
    `      Name ${account.name()}`,
    `Account no ${account.accountNumber()}`,
    `      Date ${account.statementDate()}`,
    `   Balance ${account.balance().toFixed(2)}`,
    ' Statement'
  ];

  for (const statement of account.statements()) {
    lines.push(statement.asString(separator));
  }

  return lines.join('\n');
}
