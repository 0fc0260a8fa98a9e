import {
  Category,
  CategoryBreakdown,
  FinancialSummary,
  Transaction,
  TransactionFilters,
} from '../models/transaction';
import { QueryService } from './queryService';

export function calculateSavingsRate(totalIncome: number, totalExpense: number): number {
  if (totalIncome === 0) {
    return 0;
  }
  return ((totalIncome - totalExpense) / totalIncome) * 100;
}

export function summarize(transactions: readonly Transaction[]): FinancialSummary {
  let totalIncome = 0;
  let totalExpense = 0;

  for (const transaction of transactions) {
    if (transaction.category === Category.INCOME) {
      totalIncome += transaction.amount;
    } else {
      totalExpense += transaction.amount;
    }
  }

  return {
    totalIncome,
    totalExpense,
    netSavings: totalIncome - totalExpense,
    transactionCount: transactions.length,
    savingsRate: calculateSavingsRate(totalIncome, totalExpense),
  };
}

/**
 * Sum amounts per category. Categories without rows are left out.
 */
export function categoryBreakdown(transactions: readonly Transaction[]): CategoryBreakdown {
  const breakdown: CategoryBreakdown = {};

  for (const transaction of transactions) {
    breakdown[transaction.category] = (breakdown[transaction.category] ?? 0) + transaction.amount;
  }

  return breakdown;
}

/**
 * Summaries and breakdowns over a filtered view of the ledger
 */
export class ReportService {
  private queryService: QueryService;

  constructor(queryService: QueryService) {
    this.queryService = queryService;
  }

  async summary(filters: TransactionFilters = {}): Promise<FinancialSummary> {
    return summarize(await this.queryService.query(filters));
  }

  async breakdown(filters: TransactionFilters = {}): Promise<CategoryBreakdown> {
    return categoryBreakdown(await this.queryService.query(filters));
  }
}
