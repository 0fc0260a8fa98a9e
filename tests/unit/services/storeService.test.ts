import { promises as fs } from 'fs';
import {
  InvalidAmountError,
  InvalidCategoryError,
  InvalidDateError,
  InvalidIdError,
  MigrationError,
  StorageError,
} from '../../../src/errors';
import { Category } from '../../../src/models/transaction';
import { LedgerStore } from '../../../src/services/storeService';
import { createTempDir, createTestStore, ledgerPath, removeTempDir } from '../../setup';
import {
  HEADER,
  LEGACY_HEADER,
  createTestTransactionInput,
  readText,
  seedTransactions,
  writeText,
} from '../../helpers/testUtils';

describe('LedgerStore', () => {
  let dir: string;
  let file: string;
  let store: LedgerStore;

  beforeEach(async () => {
    dir = await createTempDir();
    file = ledgerPath(dir);
    store = createTestStore(dir);
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  describe('initialize', () => {
    it('should create a missing file with only the header', async () => {
      await store.initialize();

      expect(await readText(file)).toBe(`${HEADER}\n`);
    });

    it('should write the header into an empty file', async () => {
      await writeText(file, '');
      await store.initialize();

      expect(await readText(file)).toBe(`${HEADER}\n`);
    });

    it('should treat whitespace-only content as empty', async () => {
      await writeText(file, '\n  \n');
      await store.initialize();

      expect(await readText(file)).toBe(`${HEADER}\n`);
      expect(await store.getAll()).toEqual([]);
    });

    it('should leave a current file untouched', async () => {
      const content = `${HEADER}\n1,01-01-2026,10.0,Income,Salary\n`;
      await writeText(file, content);
      await store.initialize();

      expect(await readText(file)).toBe(content);
    });

    it('should normalize a current file with reordered columns', async () => {
      await writeText(file, 'date,id,amount,category,description\n01-01-2026,1,10,Income,x\n');
      await store.initialize();

      expect(await readText(file)).toBe(`${HEADER}\n1,01-01-2026,10,Income,x\n`);
    });

    it('should reject an unrecognized header', async () => {
      await writeText(file, 'foo,bar\n1,2\n');

      await expect(store.initialize()).rejects.toThrow(StorageError);
    });

    it('should reject a header with extra columns and keep the file as it was', async () => {
      const content = `${HEADER},notes\n1,01-01-2026,10,Income,a,keep me\n`;
      await writeText(file, content);

      await expect(store.initialize()).rejects.toThrow(StorageError);

      expect(await readText(file)).toBe(content);
    });

    it('should initialize lazily on first use', async () => {
      expect(await store.getAll()).toEqual([]);
      expect(await readText(file)).toBe(`${HEADER}\n`);
    });

    it('should migrate a legacy file before serving reads', async () => {
      await writeText(file, `${LEGACY_HEADER}\n01-01-2026,100,Income,Salary\n15-01-2026,50,Expense,Rent\n`);

      const transactions = await store.getAll();

      expect(transactions.map((t) => t.id)).toEqual([1, 2]);
      expect(transactions.map((t) => t.description)).toEqual(['Salary', 'Rent']);
    });

    it('should refuse every operation after a failed migration until initialized again', async () => {
      const legacy = `${LEGACY_HEADER}\n01-01-2026,100,Income,Salary\n`;
      await writeText(file, legacy);
      // A directory where the backup should go makes the copy fail
      await fs.mkdir(`${file}.backup`);

      await expect(store.getAll()).rejects.toThrow(MigrationError);
      await expect(store.add(createTestTransactionInput())).rejects.toThrow(MigrationError);
      expect(await readText(file)).toBe(legacy);

      await fs.rmdir(`${file}.backup`);
      await store.initialize();

      expect(await store.getAll()).toHaveLength(1);
      expect(await readText(`${file}.backup`)).toBe(legacy);
    });
  });

  describe('nextId', () => {
    it('should return 1 for an empty store', async () => {
      expect(await store.nextId()).toBe(1);
    });

    it('should return max id plus one', async () => {
      await writeText(file, `${HEADER}\n4,01-01-2026,10,Income,a\n9,02-01-2026,10,Income,b\n2,03-01-2026,10,Income,c\n`);

      expect(await store.nextId()).toBe(10);
    });
  });

  describe('add', () => {
    it('should assign sequential ids starting at 1', async () => {
      const added = await seedTransactions(store);

      expect(added.map((t) => t.id)).toEqual([1, 2, 3]);
    });

    it('should append exactly one row', async () => {
      await store.add(createTestTransactionInput());

      expect(await readText(file)).toBe(`${HEADER}\n1,28-01-2026,100,Income,Test transaction\n`);
    });

    it('should not rewrite existing rows', async () => {
      const existing = `${HEADER}\n5,01-01-2026,10.0,Income,Old\n`;
      await writeText(file, existing);

      const added = await store.add(createTestTransactionInput({ description: 'New' }));

      expect(added.id).toBe(6);
      expect(await readText(file)).toBe(`${existing}6,28-01-2026,100,Income,New\n`);
    });

    it('should start a new line when the file lacks a trailing newline', async () => {
      await writeText(file, `${HEADER}\n1,01-01-2026,10,Income,x`);

      await store.add(createTestTransactionInput());

      expect(await readText(file)).toBe(`${HEADER}\n1,01-01-2026,10,Income,x\n2,28-01-2026,100,Income,Test transaction\n`);
    });

    it('should reject a date in the wrong pattern', async () => {
      await expect(store.add(createTestTransactionInput({ date: '2026-01-28' }))).rejects.toThrow(
        InvalidDateError
      );
    });

    it('should reject a zero amount', async () => {
      await expect(store.add(createTestTransactionInput({ amount: 0 }))).rejects.toThrow(InvalidAmountError);
    });

    it('should reject an unknown category', async () => {
      await expect(
        store.add({ ...createTestTransactionInput(), category: 'Savings' })
      ).rejects.toThrow(InvalidCategoryError);
    });

    it('should leave the file unchanged when validation fails', async () => {
      await seedTransactions(store);
      const before = await readText(file);

      await expect(store.add(createTestTransactionInput({ amount: -1 }))).rejects.toThrow(InvalidAmountError);

      expect(await readText(file)).toBe(before);
    });

    it('should keep ids unique across many adds', async () => {
      const ids: number[] = [];
      for (let i = 0; i < 20; i++) {
        ids.push((await store.add(createTestTransactionInput({ amount: i + 1 }))).id);
      }

      expect(new Set(ids).size).toBe(20);
    });

    it('should serialize overlapping calls', async () => {
      const added = await Promise.all(
        [1, 2, 3, 4, 5].map((amount) => store.add(createTestTransactionInput({ amount })))
      );

      expect(added.map((t) => t.id)).toEqual([1, 2, 3, 4, 5]);
      expect(await store.count()).toBe(5);
    });

    it('should round trip descriptions with commas and quotes', async () => {
      const added = await store.add(createTestTransactionInput({ description: 'Lunch, "team"' }));

      expect(await store.getById(added.id)).toEqual(added);
    });
  });

  describe('getById', () => {
    it('should return the transaction equal to the one added', async () => {
      const added = await store.add({
        date: '05-02-2026',
        amount: 12.75,
        category: Category.EXPENSE,
        description: 'Groceries',
      });

      expect(await store.getById(added.id)).toEqual({
        id: 1,
        date: '05-02-2026',
        amount: 12.75,
        category: Category.EXPENSE,
        description: 'Groceries',
      });
    });

    it('should return null for an unknown id', async () => {
      await seedTransactions(store);

      expect(await store.getById(999)).toBeNull();
    });
  });

  describe('getAll', () => {
    it('should return rows in file order', async () => {
      await seedTransactions(store);

      const all = await store.getAll();

      expect(all.map((t) => t.description)).toEqual(['Salary', 'Rent', 'Bonus']);
    });

    it('should re-validate rows read from disk', async () => {
      await writeText(file, `${HEADER}\n1,01-01-2026,abc,Income,Broken\n`);

      await expect(store.getAll()).rejects.toThrow(InvalidAmountError);
      await expect(store.getAll()).rejects.toThrow(`Record 1 in ${file}`);
    });

    it('should mark errors from disk with their record number', async () => {
      await writeText(file, `${HEADER}\n1,01-01-2026,10,Income,ok\n2,01-01-2026,abc,Income,Broken\n`);

      await expect(store.getAll()).rejects.toMatchObject({ kind: 'InvalidAmount', storedRecord: 2 });
    });
  });

  describe('duplicate ids on disk', () => {
    const content = `${HEADER}\n1,01-01-2026,10,Income,a\n1,02-01-2026,20,Expense,b\n`;

    beforeEach(async () => {
      await writeText(file, content);
    });

    it('should reject the second row carrying the same id', async () => {
      await expect(store.getAll()).rejects.toThrow(InvalidIdError);
      await expect(store.getAll()).rejects.toThrow(`Record 2 in ${file}: Duplicate transaction id 1`);
    });

    it('should refuse to update and leave both rows on disk', async () => {
      await expect(store.update(1, { description: 'x' })).rejects.toThrow(InvalidIdError);

      expect(await readText(file)).toBe(content);
    });
  });

  describe('update', () => {
    beforeEach(async () => {
      await seedTransactions(store);
    });

    it('should replace only the supplied fields', async () => {
      expect(await store.update(2, { amount: 60 })).toBe(true);

      expect(await store.getById(2)).toEqual({
        id: 2,
        date: '15-01-2026',
        amount: 60,
        category: Category.EXPENSE,
        description: 'Rent',
      });
    });

    it('should rewrite the row in place', async () => {
      await store.update(2, { amount: 60, description: 'Rent (Feb)' });

      expect(await readText(file)).toBe(
        `${HEADER}\n1,01-01-2026,100,Income,Salary\n2,15-01-2026,60,Expense,Rent (Feb)\n3,31-01-2026,75,Income,Bonus\n`
      );
    });

    it('should reject an invalid result and keep the stored row', async () => {
      const before = await readText(file);

      expect(await store.update(1, { amount: -5 })).toBe(false);

      expect(await store.getById(1)).toEqual({
        id: 1,
        date: '01-01-2026',
        amount: 100,
        category: Category.INCOME,
        description: 'Salary',
      });
      expect(await readText(file)).toBe(before);
    });

    it('should reject an invalid date', async () => {
      expect(await store.update(1, { date: '2026-01-01' })).toBe(false);
      expect((await store.getById(1))?.date).toBe('01-01-2026');
    });

    it('should return false for an unknown id', async () => {
      expect(await store.update(42, { amount: 10 })).toBe(false);
    });
  });

  describe('applyUpdate', () => {
    beforeEach(async () => {
      await seedTransactions(store);
    });

    it('should return the stored row on success', async () => {
      expect(await store.applyUpdate(3, { category: Category.EXPENSE })).toEqual({
        status: 'updated',
        transaction: { id: 3, date: '31-01-2026', amount: 75, category: Category.EXPENSE, description: 'Bonus' },
      });
    });

    it('should report an unknown id separately from an invalid result', async () => {
      expect(await store.applyUpdate(42, { amount: 10 })).toEqual({ status: 'not-found' });

      const outcome = await store.applyUpdate(1, { amount: 0 });
      expect(outcome.status).toBe('invalid');
      if (outcome.status === 'invalid') {
        expect(outcome.error).toBeInstanceOf(InvalidAmountError);
      }
    });

    it('should report not-found for a row deleted before the update runs', async () => {
      const [, outcome] = await Promise.all([store.delete(2), store.applyUpdate(2, { amount: 60 })]);

      expect(outcome).toEqual({ status: 'not-found' });
    });
  });

  describe('delete', () => {
    beforeEach(async () => {
      await seedTransactions(store);
    });

    it('should remove the row and keep the others in order', async () => {
      expect(await store.delete(2)).toBe(true);

      expect((await store.getAll()).map((t) => t.id)).toEqual([1, 3]);
      expect(await readText(file)).toBe(`${HEADER}\n1,01-01-2026,100,Income,Salary\n3,31-01-2026,75,Income,Bonus\n`);
    });

    it('should return false for an unknown id', async () => {
      const before = await readText(file);

      expect(await store.delete(99)).toBe(false);
      expect(await readText(file)).toBe(before);
    });

    it('should never hand out a deleted id again', async () => {
      await store.delete(2);
      const afterMiddle = await store.add(createTestTransactionInput());

      await store.delete(afterMiddle.id);
      const afterTop = await store.add(createTestTransactionInput());

      expect(afterMiddle.id).toBe(4);
      expect(afterTop.id).toBe(5);
    });
  });
});
