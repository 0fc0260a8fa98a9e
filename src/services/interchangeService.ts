import { promises as fs } from 'fs';
import { format } from 'date-fns';
import { Workbook } from 'exceljs';
import { z } from 'zod';
import { InvalidFormatError, StorageError, describeError, isInputValidationError } from '../errors';
import { Transaction } from '../models/transaction';
import { toUtcDate } from '../utils/date';
import { Logger } from '../utils/logger';
import { LedgerStore } from './storeService';

export const TABULAR_SHEET_NAME = 'Transactions';

const importRecordSchema = z.record(z.unknown());

export function defaultBackupPath(dataFile: string, now: Date = new Date()): string {
  return `${dataFile}.backup_${format(now, 'yyyyMMdd_HHmmss')}`;
}

export function toJsonRecords(transactions: readonly Transaction[]) {
  return transactions.map(({ id, date, amount, category, description }) => ({
    id,
    date,
    amount,
    category,
    description,
  }));
}

/**
 * One "Transactions" sheet with the ledger columns; dates become date-typed cells
 */
export function buildWorkbook(transactions: readonly Transaction[]): Workbook {
  const workbook = new Workbook();
  const sheet = workbook.addWorksheet(TABULAR_SHEET_NAME);

  sheet.columns = [
    { header: 'id', key: 'id', width: 8 },
    { header: 'date', key: 'date', width: 12, style: { numFmt: 'dd-mm-yyyy' } },
    { header: 'amount', key: 'amount', width: 12 },
    { header: 'category', key: 'category', width: 10 },
    { header: 'description', key: 'description', width: 40 },
  ];

  for (const transaction of transactions) {
    sheet.addRow({
      id: transaction.id,
      date: toUtcDate(transaction.date),
      amount: transaction.amount,
      category: transaction.category,
      description: transaction.description,
    });
  }

  return workbook;
}

async function writeOutput(path: string, operation: () => Promise<void>): Promise<void> {
  try {
    await operation();
  } catch (error) {
    throw new StorageError(`Failed to write ${path}: ${describeError(error)}`, path, { cause: error });
  }
}

/**
 * Backups and JSON/XLSX interchange for a ledger store
 */
export class InterchangeService {
  private store: LedgerStore;
  private logger: Logger;

  constructor(store: LedgerStore, logger: Logger) {
    this.store = store;
    this.logger = logger;
  }

  /**
   * Byte-for-byte copy of the ledger file. Returns the path written.
   */
  async backup(path?: string): Promise<string> {
    return this.store.withDataFile(async (dataFile) => {
      const target = path ?? defaultBackupPath(dataFile);
      await writeOutput(target, () => fs.copyFile(dataFile, target));
      this.logger.info({ backupPath: target }, 'Ledger backup created');
      return target;
    });
  }

  async exportJson(path: string): Promise<void> {
    const records = toJsonRecords(await this.store.getAll());
    await writeOutput(path, () => fs.writeFile(path, JSON.stringify(records, null, 2), 'utf-8'));
    this.logger.info({ path, count: records.length }, 'Ledger exported to JSON');
  }

  async exportTabular(path: string): Promise<void> {
    const transactions = await this.store.getAll();
    await writeOutput(path, () => buildWorkbook(transactions).xlsx.writeFile(path));
    this.logger.info({ path, count: transactions.length }, 'Ledger exported to XLSX');
  }

  /**
   * Add every valid record of a JSON array through the store.
   * Ids in the file are ignored and invalid records are skipped.
   * Returns how many records were added.
   */
  async importJson(path: string): Promise<number> {
    let data: unknown;
    try {
      data = JSON.parse(await fs.readFile(path, 'utf-8'));
    } catch (error) {
      if (error instanceof SyntaxError) {
        throw new InvalidFormatError(`${path} is not valid JSON: ${error.message}`, { cause: error });
      }
      throw new StorageError(`Failed to read ${path}: ${describeError(error)}`, path, { cause: error });
    }

    if (!Array.isArray(data)) {
      throw new InvalidFormatError(`${path} must contain a JSON array of transactions`);
    }

    const items: unknown[] = data;
    let imported = 0;

    for (const [index, item] of items.entries()) {
      const parsed = importRecordSchema.safeParse(item);
      if (!parsed.success) {
        this.logger.warn({ index }, 'Skipping import entry that is not an object');
        continue;
      }

      const record = parsed.data;
      try {
        await this.store.add({
          date: record.date,
          amount: record.amount,
          category: record.category,
          description: record.description,
        });
        imported++;
      } catch (error) {
        if (!isInputValidationError(error)) {
          throw error;
        }
        this.logger.warn({ index, reason: error.message }, 'Skipping invalid import entry');
      }
    }

    this.logger.info({ path, imported, total: items.length }, 'Ledger import finished');
    return imported;
  }
}
