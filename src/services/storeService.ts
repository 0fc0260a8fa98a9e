import { promises as fs } from 'fs';
import {
  InvalidIdError,
  StorageError,
  TransactionValidationError,
  describeError,
  errorCode,
  isValidationError,
} from '../errors';
import { fromRecord, toRawRecord, toRecord, validateTransaction } from '../models/record';
import {
  CSV_COLUMNS,
  Transaction,
  TransactionCandidate,
  TransactionUpdate,
} from '../models/transaction';
import { parseCsv, serializeCsv, serializeCsvRow } from '../utils/csv';
import { Logger } from '../utils/logger';
import { detectSchema, migrateLegacyFile } from './migrationService';

export interface LedgerStoreOptions {
  dataFile: string;
  logger: Logger;
}

interface LedgerSnapshot {
  content: string;
  transactions: Transaction[];
}

export type UpdateOutcome =
  | { status: 'updated'; transaction: Transaction }
  | { status: 'not-found' }
  | { status: 'invalid'; error: TransactionValidationError };

function isMissingFile(error: unknown): boolean {
  return errorCode(error) === 'ENOENT';
}

function highestIdOf(transactions: readonly Transaction[]): number {
  return transactions.reduce((max, transaction) => Math.max(max, transaction.id), 0);
}

/**
 * Flat-file transaction store.
 *
 * Every mutation reads the whole file, changes it in memory and writes it back.
 * Calls on one instance are serialized; nothing coordinates separate processes.
 */
export class LedgerStore {
  readonly dataFile: string;
  private logger: Logger;
  private tail: Promise<void> = Promise.resolve();
  private initialization: Promise<void> | null = null;
  // Highest id seen by this instance, so deleting the top row does not free its id
  private highestId = 0;

  constructor(options: LedgerStoreOptions) {
    this.dataFile = options.dataFile;
    this.logger = options.logger;
  }

  /**
   * Create, repair or migrate the backing file.
   * A failure is kept and rethrown by every later call until this succeeds.
   */
  async initialize(): Promise<void> {
    return this.exclusive(() => {
      const initialization = this.prepare();
      this.initialization = initialization;
      return initialization;
    });
  }

  async nextId(): Promise<number> {
    return this.exclusive(async () => this.allocateId((await this.readSnapshot()).transactions));
  }

  /**
   * Validate and append a new transaction with a freshly allocated id
   */
  async add(input: TransactionCandidate): Promise<Transaction> {
    return this.exclusive(async () => {
      const result = validateTransaction(input);
      if (!result.ok) {
        throw result.error;
      }

      const snapshot = await this.readSnapshot();
      const transaction: Transaction = { id: this.allocateId(snapshot.transactions), ...result.value };

      let prefix = '';
      if (snapshot.content.trim() === '') {
        prefix = serializeCsvRow(CSV_COLUMNS) + '\n';
      } else if (!snapshot.content.endsWith('\n')) {
        prefix = '\n';
      }

      await this.io('append to', () =>
        fs.appendFile(this.dataFile, prefix + serializeCsvRow(toRecord(transaction)) + '\n', 'utf-8')
      );

      this.highestId = transaction.id;
      this.logger.debug({ id: transaction.id }, 'Transaction added');
      return transaction;
    });
  }

  async getById(id: number): Promise<Transaction | null> {
    return this.exclusive(async () => {
      const { transactions } = await this.readSnapshot();
      return transactions.find((transaction) => transaction.id === id) ?? null;
    });
  }

  /**
   * All transactions in file order
   */
  async getAll(): Promise<Transaction[]> {
    return this.exclusive(async () => (await this.readSnapshot()).transactions);
  }

  async count(): Promise<number> {
    return this.exclusive(async () => (await this.readSnapshot()).transactions.length);
  }

  /**
   * Replace the supplied fields of one row.
   * Returns false when the id is unknown or the merged row is invalid; the file is untouched then.
   */
  async update(id: number, patch: TransactionUpdate): Promise<boolean> {
    return (await this.applyUpdate(id, patch)).status === 'updated';
  }

  /**
   * Same as `update`, reporting which outcome occurred along with the stored row
   */
  async applyUpdate(id: number, patch: TransactionUpdate): Promise<UpdateOutcome> {
    return this.exclusive<UpdateOutcome>(async () => {
      const { transactions } = await this.readSnapshot();
      const current = transactions.find((transaction) => transaction.id === id);
      if (!current) {
        return { status: 'not-found' };
      }

      const result = validateTransaction({
        date: patch.date ?? current.date,
        amount: patch.amount ?? current.amount,
        category: patch.category ?? current.category,
        description: patch.description ?? current.description,
      });

      if (!result.ok) {
        this.logger.warn({ id, reason: result.error.message }, 'Transaction update rejected');
        return { status: 'invalid', error: result.error };
      }

      const updated: Transaction = { id, ...result.value };
      await this.rewrite(transactions.map((transaction) => (transaction.id === id ? updated : transaction)));

      this.logger.debug({ id }, 'Transaction updated');
      return { status: 'updated', transaction: updated };
    });
  }

  /**
   * Remove one row permanently. The id stays retired for the lifetime of this instance.
   */
  async delete(id: number): Promise<boolean> {
    return this.exclusive(async () => {
      const { transactions } = await this.readSnapshot();
      const remaining = transactions.filter((transaction) => transaction.id !== id);

      if (remaining.length === transactions.length) {
        return false;
      }

      await this.rewrite(remaining);

      this.logger.debug({ id }, 'Transaction deleted');
      return true;
    });
  }

  /**
   * Run a task against the initialized backing file with no mutation in flight
   */
  async withDataFile<T>(task: (dataFile: string) => Promise<T>): Promise<T> {
    return this.exclusive(async () => {
      await this.ensureReady();
      return task(this.dataFile);
    });
  }

  private allocateId(transactions: readonly Transaction[]): number {
    return Math.max(this.highestId, highestIdOf(transactions)) + 1;
  }

  private exclusive<T>(task: () => Promise<T>): Promise<T> {
    const result = this.tail.then(task);
    this.tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }

  private async ensureReady(): Promise<void> {
    const initialization = this.initialization ?? this.prepare();
    this.initialization = initialization;
    return initialization;
  }

  private async prepare(): Promise<void> {
    const content = await this.readContent();

    if (content === null || content.trim() === '') {
      await this.rewrite([]);
      this.logger.info({ dataFile: this.dataFile }, 'Created empty ledger');
      return;
    }

    const [header = []] = parseCsv(content);

    switch (detectSchema(header)) {
      case 'current':
        if (header.map((column) => column.trim()).join(',') !== CSV_COLUMNS.join(',')) {
          await this.rewrite(this.parseTransactions(content));
          this.logger.info({ dataFile: this.dataFile }, 'Reordered ledger columns');
        }
        break;
      case 'legacy':
        await migrateLegacyFile(this.dataFile, this.logger);
        break;
      default:
        throw new StorageError(`Unrecognized ledger header: ${header.join(',')}`, this.dataFile);
    }

    this.logger.info({ dataFile: this.dataFile }, 'Ledger ready');
  }

  private async readContent(): Promise<string | null> {
    try {
      return await fs.readFile(this.dataFile, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        return null;
      }
      throw new StorageError(`Failed to read ${this.dataFile}: ${describeError(error)}`, this.dataFile, {
        cause: error,
      });
    }
  }

  private async readSnapshot(): Promise<LedgerSnapshot> {
    await this.ensureReady();
    const content = (await this.readContent()) ?? '';
    const transactions = this.parseTransactions(content);
    this.highestId = Math.max(this.highestId, highestIdOf(transactions));
    return { content, transactions };
  }

  private parseTransactions(content: string): Transaction[] {
    const [header = [], ...rows] = parseCsv(content);
    const columns = header.map((column) => column.trim());
    const seen = new Set<number>();

    return rows.map((cells, index) => {
      try {
        const transaction = fromRecord(toRawRecord(columns, cells));
        if (seen.has(transaction.id)) {
          throw new InvalidIdError(`Duplicate transaction id ${transaction.id}`);
        }
        seen.add(transaction.id);
        return transaction;
      } catch (error) {
        if (isValidationError(error)) {
          throw error.atStoredRecord(this.dataFile, index + 1);
        }
        throw error;
      }
    });
  }

  private async rewrite(transactions: readonly Transaction[]): Promise<void> {
    await this.io('write', () =>
      fs.writeFile(this.dataFile, serializeCsv(CSV_COLUMNS, transactions.map(toRecord)), 'utf-8')
    );
  }

  private async io(action: string, operation: () => Promise<void>): Promise<void> {
    try {
      await operation();
    } catch (error) {
      throw new StorageError(`Failed to ${action} ${this.dataFile}: ${describeError(error)}`, this.dataFile, {
        cause: error,
      });
    }
  }
}
