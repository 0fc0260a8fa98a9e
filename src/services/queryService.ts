import { InvalidDateError } from '../errors';
import { Transaction, TransactionFilters } from '../models/transaction';
import { parseLedgerDate } from '../utils/date';
import { LedgerStore } from './storeService';

function boundary(text: string | undefined, label: string): Date | null {
  if (text === undefined || text === '') {
    return null;
  }
  const parsed = parseLedgerDate(text);
  if (!parsed) {
    throw new InvalidDateError(`Invalid ${label} "${text}". Expected DD-MM-YYYY`);
  }
  return parsed;
}

/**
 * Apply every supplied filter (AND) and keep the input order.
 * Date and amount bounds are inclusive; description matching ignores case.
 */
export function filterTransactions(
  transactions: readonly Transaction[],
  filters: TransactionFilters = {}
): Transaction[] {
  const start = boundary(filters.startDate, 'start date');
  const end = boundary(filters.endDate, 'end date');
  const term = filters.description ? filters.description.toLowerCase() : null;

  return transactions.filter((transaction) => {
    if (start || end) {
      const date = parseLedgerDate(transaction.date);
      if (!date) return false;
      if (start && date.getTime() < start.getTime()) return false;
      if (end && date.getTime() > end.getTime()) return false;
    }

    if (filters.category !== undefined && transaction.category !== filters.category) {
      return false;
    }

    if (term !== null && !transaction.description.toLowerCase().includes(term)) {
      return false;
    }

    if (filters.minAmount !== undefined && transaction.amount < filters.minAmount) {
      return false;
    }

    if (filters.maxAmount !== undefined && transaction.amount > filters.maxAmount) {
      return false;
    }

    return true;
  });
}

export class QueryService {
  private store: LedgerStore;

  constructor(store: LedgerStore) {
    this.store = store;
  }

  async query(filters: TransactionFilters = {}): Promise<Transaction[]> {
    return filterTransactions(await this.store.getAll(), filters);
  }
}
