// ============================================================================
// QUALITY REPORTER
// ============================================================================
// Field completeness over the final result set, plus the printed summary

import type { FieldCompleteness, QualityReport, ScrapedRecord } from '../shared/types.js';

function ratio(part: number, total: number): number {
  return total === 0 ? 0 : part / total;
}

/**
 * Compute completeness per field (keys of the first record) and the share
 * of records with at least one empty value
 */
export function computeQualityReport(records: readonly ScrapedRecord[]): QualityReport {
  const totalRecords = records.length;
  const first = records[0];

  const fields: FieldCompleteness[] = first
    ? Object.keys(first).map((field) => {
        const filled = records.filter((record) => Boolean(record[field])).length;
        const fieldRatio = ratio(filled, totalRecords);
        return { field, filled, total: totalRecords, ratio: fieldRatio, percent: fieldRatio * 100 };
      })
    : [];

  const incompleteRecords = records.filter((record) => Object.values(record).some((value) => !value)).length;
  const incompleteRatio = ratio(incompleteRecords, totalRecords);

  return {
    totalRecords,
    fields,
    incompleteRecords,
    incompleteRatio,
    incompletePercent: incompleteRatio * 100,
  };
}

/**
 * Summary lines for the console
 */
export function formatQualityReport(report: QualityReport): string[] {
  const lines = ['Scraping Summary:', `Total records scraped: ${report.totalRecords}`];

  if (report.fields.length > 0) {
    lines.push('', 'Field distribution:');
    for (const field of report.fields) {
      lines.push(
        `  ${field.field}: ${field.filled}/${field.total} records have values (${field.percent.toFixed(1)}% complete)`
      );
    }
  }

  lines.push('', 'Data quality issues:');
  if (report.totalRecords === 0) {
    lines.push('  No records found. Check your selectors and URL.');
  } else {
    lines.push(
      `  ${report.incompleteRecords}/${report.totalRecords} records have missing values (${report.incompletePercent.toFixed(1)}%)`
    );
  }

  return lines;
}
