import { ParseError } from '../../../shared/errors.js';
import { collapseWhitespace, normalizeAmount, normalizeDate, type NormalizedAmount } from './normalize.js';

export interface StatementSnapshot {
  date: string;
  description: string;
  amount: number;
}

/**
 * One operation line of an account export:
 * `DD/MM/YY<TAB>description<TAB>amount[<TAB>...]`
 */
export class StatementRecord {
  private constructor(
    private readonly isoDate: string,
    private readonly text: string,
    private readonly amountValue: number,
    private readonly amountText: string
  ) {}

  /**
   * Parse one export line. Fields past the third are ignored.
   */
  static parse(line: string): StatementRecord {
    const fields = line.split('\t');
    if (fields.length < 3) {
      throw new ParseError(`Statement line has ${fields.length} field(s), expected at least 3: "${line}"`, {
        field: 'line',
        line
      });
    }

    const [rawDate, rawDescription, rawAmount] = fields;

    let date: string;
    let amount: NormalizedAmount;
    try {
      date = normalizeDate(rawDate);
      amount = normalizeAmount(rawAmount);
    } catch (error: unknown) {
      if (!(error instanceof ParseError)) throw error;
      throw new ParseError(`${error.message} in statement line "${line}"`, {
        field: error.field,
        line,
        cause: error
      });
    }

    return new StatementRecord(date, collapseWhitespace(rawDescription), amount.value, amount.text);
  }

  /** Operation date, YYYY-MM-DD */
  date(): string {
    return this.isoDate;
  }

  description(): string {
    return this.text;
  }

  /** Signed amount as printed by the portal */
  amount(): number {
    return this.amountValue;
  }

  /**
   * Delimited representation with normalized values (tab-separated by default)
   */
  asString(separator: string = '\t'): string {
    return [this.isoDate, this.text, this.amountText].join(separator);
  }

  toJSON(): StatementSnapshot {
    return { date: this.isoDate, description: this.text, amount: this.amountValue };
  }
}
