// ============================================================================
// OUTPUT WRITER
// ============================================================================
// Serializes the final result set as JSON or CSV

import fs from 'fs';
import path from 'path';
import type { OutputFormat, ScrapedRecord } from '../shared/types.js';
import { ConfigError } from '../scraper/types/errors.js';

interface CSVOptions {
  delimiter?: ',' | ';' | '\t';
  includeHeaders?: boolean;
}

export function parseOutputFormat(value: string): OutputFormat {
  const format = value.trim().toLowerCase();
  if (format !== 'json' && format !== 'csv') {
    throw new ConfigError(`Unsupported output format: ${value}`);
  }
  return format;
}

export function escapeCSVValue(value: string | null | undefined, delimiter: string = ','): string {
  if (value === null || value === undefined) return '';
  const str = String(value);

  const needsQuoting = str.includes(delimiter) || str.includes('"') || str.includes('\n') || str.includes('\r');

  if (needsQuoting) {
    return `"${str.replace(/"/g, '""')}"`;
  }

  return str;
}

/**
 * Header row from the first record's keys, then one row per record
 */
export function toCSV(records: readonly ScrapedRecord[], options: CSVOptions = {}): string {
  const { delimiter = ',', includeHeaders = true } = options;
  const first = records[0];
  if (!first) return '';

  const headers = Object.keys(first);
  const lines: string[] = [];

  if (includeHeaders) {
    lines.push(headers.map((h) => escapeCSVValue(h, delimiter)).join(delimiter));
  }

  for (const record of records) {
    lines.push(headers.map((header) => escapeCSVValue(record[header], delimiter)).join(delimiter));
  }

  return lines.join('\n') + '\n';
}

export function toJSON(records: readonly ScrapedRecord[], pretty: boolean = true): string {
  return (pretty ? JSON.stringify(records, null, 2) : JSON.stringify(records)) + '\n';
}

/**
 * Write records to `<outputPath>.<format>`, creating the directory if needed.
 * Returns the written file path.
 */
export function saveRecords(records: readonly ScrapedRecord[], outputPath: string, format: OutputFormat): string {
  const filePath = `${outputPath}.${format}`;
  fs.mkdirSync(path.dirname(path.resolve(filePath)), { recursive: true });

  const content = format === 'csv' ? toCSV(records) : toJSON(records);
  fs.writeFileSync(filePath, content, 'utf-8');

  console.log(`[OutputWriter] Wrote ${records.length} records to ${filePath}`);
  return filePath;
}
