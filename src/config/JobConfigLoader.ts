/**
 * Builds the immutable JobConfig from CLI input and the field-mapping file.
 * Every problem surfaces here as a ConfigError, before any page is fetched.
 */

import fs from 'fs';
import type { FieldSpecs, JobConfig } from '../shared/types.js';
import { ConfigError } from '../scraper/types/errors.js';
import { assertValidSelector, parseFieldMapping } from '../scraper/utils/SelectorSpec.js';
import { JOB_DEFAULTS } from './defaults.js';

export interface JobInput {
  targetUrl: string;
  recordSelector: string;
  paginationSelector?: string;
  identityField?: string;
  maxRecords?: number;
  waitTimeSeconds?: number;
  renderTimeoutSeconds?: number;
}

/**
 * Read and parse a JSON field mapping ({ "product_name": "div.name", ... })
 */
export function loadFieldMapping(filePath: string): FieldSpecs {
  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Error reading fields mapping file ${filePath}: ${reason}`, { cause: error });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Error parsing fields mapping ${filePath}: ${reason}`, { cause: error });
  }

  return parseFieldMapping(raw);
}

function requirePositiveInteger(value: number, name: string): number {
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigError(`${name} must be a positive integer, got ${value}`);
  }
  return value;
}

function requireNonNegative(value: number, name: string): number {
  if (!Number.isFinite(value) || value < 0) {
    throw new ConfigError(`${name} must be a non-negative number, got ${value}`);
  }
  return value;
}

function requireHttpUrl(value: string): string {
  let parsed: URL;
  try {
    parsed = new URL(value.trim());
  } catch {
    throw new ConfigError(`Invalid target URL: "${value}"`);
  }
  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw new ConfigError(`Target URL must use http or https: "${value}"`);
  }
  return value.trim();
}

export function buildJobConfig(input: JobInput, fields: FieldSpecs): JobConfig {
  const targetUrl = requireHttpUrl(input.targetUrl);

  const recordSelector = input.recordSelector.trim();
  if (!recordSelector) {
    throw new ConfigError('Record selector is required');
  }
  assertValidSelector(recordSelector, 'record selector');

  const paginationSelector = (input.paginationSelector ?? JOB_DEFAULTS.paginationSelector).trim();
  if (!paginationSelector) {
    throw new ConfigError('Pagination selector cannot be empty');
  }
  assertValidSelector(paginationSelector, 'pagination selector');

  const identityField = input.identityField ?? JOB_DEFAULTS.identityField;
  if (!Object.hasOwn(fields, identityField)) {
    throw new ConfigError(
      `Identity field "${identityField}" is not in the field mapping (${Object.keys(fields).join(', ')})`
    );
  }

  const maxRecords = requirePositiveInteger(input.maxRecords ?? JOB_DEFAULTS.maxRecords, 'max records');
  const waitTimeSeconds = requireNonNegative(input.waitTimeSeconds ?? JOB_DEFAULTS.waitTimeSeconds, 'wait time');
  const renderTimeoutSeconds = input.renderTimeoutSeconds ?? JOB_DEFAULTS.renderTimeoutSeconds;
  if (!Number.isFinite(renderTimeoutSeconds) || renderTimeoutSeconds <= 0) {
    throw new ConfigError(`render timeout must be a positive number, got ${renderTimeoutSeconds}`);
  }

  return Object.freeze({
    targetUrl,
    recordSelector,
    paginationSelector,
    identityField,
    maxRecords,
    waitTimeMs: Math.round(waitTimeSeconds * 1000),
    renderTimeoutMs: Math.round(renderTimeoutSeconds * 1000),
    fields,
  });
}
