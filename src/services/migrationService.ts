import { promises as fs } from 'fs';
import { MigrationError, describeError } from '../errors';
import { CSV_COLUMNS, LEGACY_CSV_COLUMNS } from '../models/transaction';
import { parseCsv, serializeCsv } from '../utils/csv';
import { Logger } from '../utils/logger';

export type LedgerSchema = 'current' | 'legacy' | 'unknown';

export interface MigrationReport {
  migratedRows: number;
  backupPath: string;
}

function hasExactly(columns: readonly string[], expected: readonly string[]): boolean {
  return columns.length === expected.length && expected.every((column) => columns.includes(column));
}

/**
 * Classify a header row. Column order does not matter, rows are read by name.
 * A header with extra columns is unknown.
 */
export function detectSchema(header: readonly string[]): LedgerSchema {
  const columns = header.map((column) => column.trim());

  if (hasExactly(columns, CSV_COLUMNS)) {
    return 'current';
  }

  if (hasExactly(columns, LEGACY_CSV_COLUMNS)) {
    return 'legacy';
  }

  return 'unknown';
}

export function migrationBackupPath(dataFile: string): string {
  return `${dataFile}.backup`;
}

/**
 * Upgrade a legacy ledger in place: ids 1..n are assigned in file order and the
 * original bytes are copied to `<file>.backup` before anything is overwritten.
 * Field text is carried over untouched; rows are validated when the store reads them.
 */
export async function migrateLegacyFile(dataFile: string, logger: Logger): Promise<MigrationReport> {
  const backupPath = migrationBackupPath(dataFile);

  try {
    const content = await fs.readFile(dataFile, 'utf-8');
    const [header = [], ...rows] = parseCsv(content);

    if (detectSchema(header) !== 'legacy') {
      throw new Error(`Unexpected header: ${header.join(',')}`);
    }

    const columns = header.map((column) => column.trim());
    const migrated = rows.map((cells, index) => [
      String(index + 1),
      ...LEGACY_CSV_COLUMNS.map((column) => cells[columns.indexOf(column)] ?? ''),
    ]);

    await fs.copyFile(dataFile, backupPath);
    await fs.writeFile(dataFile, serializeCsv(CSV_COLUMNS, migrated), 'utf-8');

    logger.info({ dataFile, backupPath, migratedRows: migrated.length }, 'Ledger migrated to current format');

    return { migratedRows: migrated.length, backupPath };
  } catch (error) {
    throw new MigrationError(`Failed to migrate ledger ${dataFile}: ${describeError(error)}`, {
      cause: error,
    });
  }
}
