import { z } from 'zod';
import {
  InvalidAmountError,
  InvalidCategoryError,
  InvalidDateError,
  InvalidDescriptionError,
  InvalidIdError,
  TransactionValidationError,
} from '../errors';
import { isLedgerDate } from '../utils/date';
import {
  Category,
  CSV_COLUMNS,
  CsvColumn,
  Transaction,
  TransactionCandidate,
  TransactionFields,
} from './transaction';

export const ledgerDateSchema = z.string().refine(isLedgerDate);
export const amountSchema = z.number().finite().positive();
export const categorySchema = z.nativeEnum(Category);
export const descriptionSchema = z.string();

export type ValidationResult =
  | { ok: true; value: TransactionFields }
  | { ok: false; error: TransactionValidationError };

const CATEGORY_LIST = Object.values(Category).join(', ');

function show(value: unknown): string {
  return typeof value === 'string' ? `"${value}"` : String(value);
}

/**
 * Validate a candidate transaction without throwing.
 * Fields are checked in column order and the first failure wins.
 */
export function validateTransaction(candidate: TransactionCandidate): ValidationResult {
  const date = ledgerDateSchema.safeParse(candidate.date);
  if (!date.success) {
    return {
      ok: false,
      error: new InvalidDateError(`Invalid date ${show(candidate.date)}. Expected DD-MM-YYYY`),
    };
  }

  const amount = amountSchema.safeParse(candidate.amount);
  if (!amount.success) {
    return {
      ok: false,
      error: new InvalidAmountError(`Amount must be a positive number, got ${show(candidate.amount)}`),
    };
  }

  const category = categorySchema.safeParse(candidate.category);
  if (!category.success) {
    return {
      ok: false,
      error: new InvalidCategoryError(
        `Invalid category ${show(candidate.category)}. Must be one of: ${CATEGORY_LIST}`
      ),
    };
  }

  const description = descriptionSchema.safeParse(candidate.description);
  if (!description.success) {
    return {
      ok: false,
      error: new InvalidDescriptionError('Description must be text'),
    };
  }

  return {
    ok: true,
    value: {
      date: date.data,
      amount: amount.data,
      category: category.data,
      description: description.data,
    },
  };
}

/**
 * Construct a Transaction, throwing the validation error if the candidate is invalid
 */
export function createTransaction(id: number, candidate: TransactionCandidate): Transaction {
  const result = validateTransaction(candidate);
  if (!result.ok) {
    throw result.error;
  }
  return { id, ...result.value };
}

export function toRecord(transaction: Transaction): string[] {
  return [
    String(transaction.id),
    transaction.date,
    String(transaction.amount),
    transaction.category,
    transaction.description,
  ];
}

export type RawRecord = Partial<Record<CsvColumn, string>>;

export function parseRecordId(text: string | undefined): number {
  const trimmed = text?.trim() ?? '';
  const id = /^\d+$/.test(trimmed) ? Number(trimmed) : NaN;
  if (!Number.isSafeInteger(id) || id <= 0) {
    throw new InvalidIdError(`Invalid transaction id ${show(text)}`);
  }
  return id;
}

/**
 * Rebuild a Transaction from a stored row, applying the same validation as construction
 */
export function fromRecord(row: RawRecord): Transaction {
  const id = parseRecordId(row.id);
  const amountText = row.amount?.trim() ?? '';

  return createTransaction(id, {
    date: row.date,
    amount: amountText === '' ? NaN : Number(amountText),
    category: row.category,
    description: row.description ?? '',
  });
}

/**
 * Zip a parsed CSV line with its header into a record keyed by column name
 */
export function toRawRecord(header: readonly string[], cells: readonly string[]): RawRecord {
  const record: RawRecord = {};
  for (const column of CSV_COLUMNS) {
    const index = header.indexOf(column);
    if (index !== -1 && index < cells.length) {
      record[column] = cells[index];
    }
  }
  return record;
}
