export enum Category {
  INCOME = 'Income',
  EXPENSE = 'Expense',
}

export const DATE_FORMAT = 'dd-MM-yyyy';

export const CSV_COLUMNS = ['id', 'date', 'amount', 'category', 'description'] as const;
export const LEGACY_CSV_COLUMNS = ['date', 'amount', 'category', 'description'] as const;

export type CsvColumn = (typeof CSV_COLUMNS)[number];

export interface TransactionFields {
  date: string;
  amount: number;
  category: Category;
  description: string;
}

export interface Transaction extends TransactionFields {
  id: number;
}

/**
 * Untrusted input on its way into the Record Model (HTTP bodies, JSON imports)
 */
export interface TransactionCandidate {
  date: unknown;
  amount: unknown;
  category: unknown;
  description: unknown;
}

export type TransactionInput = TransactionFields;

export type TransactionUpdate = Partial<TransactionFields>;

export interface TransactionFilters {
  startDate?: string;
  endDate?: string;
  category?: Category;
  description?: string;
  minAmount?: number;
  maxAmount?: number;
}

export interface FinancialSummary {
  totalIncome: number;
  totalExpense: number;
  netSavings: number;
  transactionCount: number;
  savingsRate: number;
}

export type CategoryBreakdown = Partial<Record<Category, number>>;
