/**
 * Account export parser
 *
 * An export body is one header line followed by one line per operation:
 *
 * ```text
 * <name> <NNNNN NNNNNNNNN NN>\t<DD/MM/YY>\t<balance>
 * <DD/MM/YY>\t<description>\t<amount>
 * ```
 *
 * The export never carries a sort code, so `sortCode()` is always undefined.
 */

import { ParseError } from '../../../shared/errors.js';
import { normalizeAmount, normalizeDate } from './normalize.js';
import { StatementRecord, type StatementSnapshot } from './statement.js';
import type { ParsePolicy } from '../types/index.js';

const HEADER_PATTERN = /^(.+?)\s+(\d{5}\s+\d{9}\s+\d{2})\t+(\d{2}\/\d{2}\/\d{2})\t+(-?\d+,\d+)/;

export interface AccountSnapshot {
  name: string;
  accountNumber: string;
  sortCode: undefined;
  statementDate: string;
  balance: number;
  statements: StatementSnapshot[];
}

export interface AccountParseOptions {
  /** Default: 'fail-fast' */
  policy?: ParsePolicy;
  /** Receives each statement line dropped under 'skip-and-continue' */
  onSkippedLine?: (error: ParseError) => void;
}

interface AccountHeader {
  name: string;
  accountNumber: string;
  statementDate: string;
  balance: number;
}

function parseHeader(line: string): AccountHeader {
  const match = line.match(HEADER_PATTERN);
  if (!match) {
    throw new ParseError(`malformed account header: "${line}"`, { field: 'header', line, lineNumber: 1 });
  }

  const [, name, accountNumber, date, balance] = match;

  try {
    return {
      name,
      accountNumber,
      statementDate: normalizeDate(date),
      balance: normalizeAmount(balance).value
    };
  } catch (error: unknown) {
    if (!(error instanceof ParseError)) throw error;
    throw new ParseError(`malformed account header: ${error.message}`, {
      field: 'header',
      line,
      lineNumber: 1,
      cause: error
    });
  }
}

/**
 * Split an export body into lines, dropping the empty ones left by
 * trailing line terminators.
 */
export function splitExportLines(text: string): string[] {
  const lines = text.split(/\r?\n/);
  while (lines.length > 0 && lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}

export class AccountRecord {
  private readonly entries: readonly StatementRecord[];

  private constructor(
    private readonly header: AccountHeader,
    statements: StatementRecord[]
  ) {
    this.entries = Object.freeze([...statements]);
  }

  /**
   * Parse a whole account export body.
   *
   * A malformed header always throws. A malformed statement line throws
   * under 'fail-fast' and is skipped under 'skip-and-continue'.
   */
  static parse(text: string, options: AccountParseOptions = {}): AccountRecord {
    const policy = options.policy ?? 'fail-fast';
    const [headerLine, ...statementLines] = splitExportLines(text);

    if (headerLine === undefined) {
      throw new ParseError('malformed account header: export is empty', { field: 'header', lineNumber: 1 });
    }

    const header = parseHeader(headerLine);
    const statements: StatementRecord[] = [];

    statementLines.forEach((line, index) => {
      const lineNumber = index + 2;
      try {
        statements.push(StatementRecord.parse(line));
      } catch (error: unknown) {
        if (!(error instanceof ParseError)) throw error;

        const located = new ParseError(`line ${lineNumber}: ${error.message}`, {
          field: error.field,
          line,
          lineNumber,
          cause: error
        });
        if (policy === 'fail-fast') throw located;
        options.onSkippedLine?.(located);
      }
    });

    return new AccountRecord(header, statements);
  }

  name(): string {
    return this.header.name;
  }

  /** Account number as printed: `NNNNN NNNNNNNNN NN` */
  accountNumber(): string {
    return this.header.accountNumber;
  }

  /** Not available from this portal */
  sortCode(): undefined {
    return undefined;
  }

  /** As-of date of the balance, YYYY-MM-DD */
  statementDate(): string {
    return this.header.statementDate;
  }

  balance(): number {
    return this.header.balance;
  }

  /** Operations in export order */
  statements(): StatementRecord[] {
    return [...this.entries];
  }

  toJSON(): AccountSnapshot {
    return {
      name: this.header.name,
      accountNumber: this.header.accountNumber,
      sortCode: undefined,
      statementDate: this.header.statementDate,
      balance: this.header.balance,
      statements: this.entries.map((statement) => statement.toJSON())
    };
  }
}
