import { isValid, parse } from 'date-fns';
import { InvalidDateError } from '../errors';
import { DATE_FORMAT } from '../models/transaction';

const LEDGER_DATE_PATTERN = /^\d{2}-\d{2}-\d{4}$/;

/**
 * Parse a DD-MM-YYYY date into a local-midnight Date.
 * Returns null for anything that is not a zero-padded, real calendar date.
 */
export function parseLedgerDate(text: string): Date | null {
  if (!LEDGER_DATE_PATTERN.test(text)) {
    return null;
  }

  const parsed = parse(text, DATE_FORMAT, new Date());
  return isValid(parsed) ? parsed : null;
}

export function isLedgerDate(text: string): boolean {
  return parseLedgerDate(text) !== null;
}

/**
 * UTC midnight of a ledger date, for date-typed spreadsheet cells
 */
export function toUtcDate(text: string): Date {
  const parsed = parseLedgerDate(text);
  if (!parsed) {
    throw new InvalidDateError(`Invalid date "${text}". Expected DD-MM-YYYY`);
  }
  return new Date(Date.UTC(parsed.getFullYear(), parsed.getMonth(), parsed.getDate()));
}
