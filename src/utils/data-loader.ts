import { readFile } from 'node:fs/promises';
import { parse } from 'csv-parse/sync';
import { PropertyRowSchema } from '../schemas';
import type { Catalog, CatalogLoadResult, PropertyRecord } from '../types';
import { Logger } from './logger';

/**
 * Sample listings served when the catalog file is missing or unusable.
 * Callers see this through a `fallback` load result, never as an error.
 */
export const FALLBACK_PROPERTIES: Catalog = freezeCatalog([
  {
    id: 'PROP001',
    address: '123 Innovation Drive Downtown',
    floor: 5,
    suite: 'A',
    sizeSqFt: 2500,
    rentPerSqFtYear: 28,
    annualRent: 70000,
    monthlyRent: 5833.33,
    contactName: 'John Smith',
    contactEmail: 'john@broker.com'
  },
  {
    id: 'PROP002',
    address: '456 Tech Plaza Midtown',
    floor: 8,
    suite: 'B',
    sizeSqFt: 3200,
    rentPerSqFtYear: 32,
    annualRent: 102400,
    monthlyRent: 8533.33,
    contactName: 'Lisa Brown',
    contactEmail: 'lisa@broker.com'
  },
  {
    id: 'PROP003',
    address: '789 Business Center Uptown',
    floor: 3,
    suite: 'C',
    sizeSqFt: 1800,
    rentPerSqFtYear: 25,
    annualRent: 45000,
    monthlyRent: 3750,
    contactName: 'David Miller',
    contactEmail: 'david@broker.com'
  },
  {
    id: 'PROP004',
    address: '321 Creative Commons Arts District',
    floor: 2,
    suite: 'E',
    sizeSqFt: 2000,
    rentPerSqFtYear: 26,
    annualRent: 52000,
    monthlyRent: 4333.33,
    contactName: 'Michael Clark',
    contactEmail: 'michael@broker.com'
  },
  {
    id: 'PROP005',
    address: '654 Executive Tower Financial District',
    floor: 15,
    suite: 'F',
    sizeSqFt: 5000,
    rentPerSqFtYear: 42,
    annualRent: 210000,
    monthlyRent: 17500,
    contactName: 'Susan Young',
    contactEmail: 'susan@broker.com'
  }
]);

function freezeCatalog(records: PropertyRecord[]): Catalog {
  return Object.freeze(records.map(record => Object.freeze({ ...record })));
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export class DataLoader {
  /** Parses listing rows from CSV text; rows that fail validation are skipped and counted. */
  static parseCatalog(csv: string): { records: Catalog; rejectedRows: number } {
    const rows: unknown[] = parse(csv, {
      columns: true,
      skip_empty_lines: true,
      trim: true,
      bom: true
    });

    const records: PropertyRecord[] = [];
    let rejectedRows = 0;

    rows.forEach((row, index) => {
      const parsed = PropertyRowSchema.safeParse(row);
      if (parsed.success) {
        records.push(parsed.data);
      } else {
        rejectedRows++;
        Logger.debug(`Skipping catalog row ${index + 1}: ${parsed.error.issues.map(i => i.path.join('.')).join(', ')}`);
      }
    });

    return { records: freezeCatalog(records), rejectedRows };
  }

  static async loadCatalog(csvPath: string): Promise<CatalogLoadResult> {
    let csv: string;
    try {
      csv = await readFile(csvPath, 'utf8');
    } catch (error) {
      const reason = isMissingFile(error)
        ? `Property CSV not found at ${csvPath}`
        : `Failed to read ${csvPath}: ${errorMessage(error)}`;
      return this.fallback(reason);
    }

    let parsed: { records: Catalog; rejectedRows: number };
    try {
      parsed = this.parseCatalog(csv);
    } catch (error) {
      return this.fallback(`Failed to parse ${csvPath}: ${errorMessage(error)}`);
    }

    if (parsed.records.length === 0) {
      return this.fallback(`No valid properties in ${csvPath} (${parsed.rejectedRows} rejected rows)`);
    }

    Logger.info(`Loaded ${parsed.records.length} properties from ${csvPath}`);
    if (parsed.rejectedRows > 0) {
      Logger.warn(`Skipped ${parsed.rejectedRows} invalid rows in ${csvPath}`);
    }

    return { kind: 'loaded', records: parsed.records, source: csvPath, rejectedRows: parsed.rejectedRows };
  }

  private static fallback(reason: string): CatalogLoadResult {
    Logger.warn(`${reason}; using ${FALLBACK_PROPERTIES.length} sample properties`);
    return { kind: 'fallback', records: FALLBACK_PROPERTIES, reason };
  }
}
