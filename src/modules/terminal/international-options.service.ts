/**
 * International Options Service
 * Commodity and port choices for international price comparison, read from a CSV file
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import { withFallback } from '../../lib/fallback';
import { fallbackInternationalOptions } from './terminal.fallback';
import { InternationalOptions } from './terminal.types';

export interface InternationalOptionsConfig {
  csvPath: string;
}

const csvRowsSchema = z.array(z.array(z.string()));

const sortedDistinct = (values: string[]): string[] =>
  Array.from(new Set(values.filter((value) => value.length > 0))).sort((a, b) => a.localeCompare(b));

/**
 * Distinct values of the first (commodity) and second (port) columns.
 * The first line is a header.
 */
export function parseInternationalOptions(csv: string): { commodities: string[]; ports: string[] } {
  const rows = csvRowsSchema.parse(
    parse(csv, { from_line: 2, skip_empty_lines: true, trim: true, relax_column_count: true })
  );

  return {
    commodities: sortedDistinct(rows.map((row) => row[0] ?? '')),
    ports: sortedDistinct(rows.map((row) => row[1] ?? '')),
  };
}

export class InternationalOptionsService {
  private csvPath: string;

  constructor(config: InternationalOptionsConfig) {
    this.csvPath = path.resolve(config.csvPath);
  }

  async produceSnapshot(): Promise<InternationalOptions> {
    const options = await withFallback(
      'International prices CSV',
      () => this.loadFromCsv(),
      fallbackInternationalOptions
    );

    return { ...options.value, source: options.source };
  }

  private async loadFromCsv(): Promise<{ commodities: string[]; ports: string[] }> {
    const content = await fs.readFile(this.csvPath, 'utf-8');
    const options = parseInternationalOptions(content);

    if (options.commodities.length === 0 || options.ports.length === 0) {
      throw new Error(`No rows in ${this.csvPath}`);
    }

    return options;
  }
}
