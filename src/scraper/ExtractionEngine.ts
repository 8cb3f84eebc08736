// ============================================================================
// EXTRACTION ENGINE
// ============================================================================
// Parses one page snapshot and turns its record nodes into records

import { JSDOM } from 'jsdom';
import type { FieldSpecs, PageSnapshot, ScrapedRecord } from '../shared/types.js';
import { ParseError } from './types/errors.js';
import { extractField } from './utils/ValueExtractor.js';

/**
 * A snapshot parsed once into a queryable document.
 * Shared by extraction and the pagination decision, then disposed.
 */
export class ParsedPage {
  readonly url: string;
  readonly partial: boolean;
  private dom: JSDOM | null;

  private constructor(snapshot: PageSnapshot, dom: JSDOM) {
    this.url = snapshot.url;
    this.partial = snapshot.partial;
    this.dom = dom;
  }

  static parse(snapshot: PageSnapshot): ParsedPage {
    if (!snapshot.html.trim()) {
      throw new ParseError(snapshot.url, `Empty markup for ${snapshot.url}`);
    }

    try {
      return new ParsedPage(snapshot, new JSDOM(snapshot.html));
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ParseError(snapshot.url, `Could not parse markup for ${snapshot.url}: ${reason}`, { cause: error });
    }
  }

  get document(): Document {
    if (!this.dom) {
      throw new Error(`Parsed page for ${this.url} was already disposed`);
    }
    return this.dom.window.document;
  }

  /**
   * All elements matching a selector, in document order
   */
  queryAll(selector: string): Element[] {
    try {
      return Array.from(this.document.querySelectorAll(selector));
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ParseError(this.url, `Selector "${selector}" rejected on ${this.url}: ${reason}`, { cause: error });
    }
  }

  /**
   * First element matching a selector
   */
  query(selector: string): Element | null {
    return this.queryAll(selector)[0] ?? null;
  }

  dispose(): void {
    this.dom?.window.close();
    this.dom = null;
  }
}

export interface ExtractionOptions {
  recordSelector: string;
  fields: FieldSpecs;
  identityField: string;
  /** Records still allowed under the global cap */
  remainingCapacity: number;
}

/**
 * Lazily yield accepted records from a parsed page, in document order.
 * Stops as soon as `remainingCapacity` records have been yielded.
 */
export function* extractRecords(page: ParsedPage, options: ExtractionOptions): Generator<ScrapedRecord> {
  const { recordSelector, fields, identityField, remainingCapacity } = options;
  if (remainingCapacity <= 0) return;

  const fieldEntries = Object.entries(fields);
  let produced = 0;

  for (const node of page.queryAll(recordSelector)) {
    const record: ScrapedRecord = Object.fromEntries(
      fieldEntries.map(([field, spec]): [string, string] => {
        try {
          return [field, extractField(node, field, spec, page.url)];
        } catch (error) {
          const reason = error instanceof Error ? error.message : String(error);
          throw new ParseError(page.url, `Selector for "${field}" rejected on ${page.url}: ${reason}`, {
            cause: error,
          });
        }
      })
    );

    // Records without an identity value are dropped, not reported
    if (!Object.hasOwn(record, identityField) || !record[identityField]) continue;

    yield record;
    produced++;

    if (produced >= remainingCapacity) return;
  }
}

/**
 * Parse a snapshot and yield its accepted records.
 * The parsed document is released once the sequence finishes or is abandoned.
 */
export function* extract(
  snapshot: PageSnapshot,
  recordSelector: string,
  fields: FieldSpecs,
  identityField: string,
  remainingCapacity: number
): Generator<ScrapedRecord> {
  const page = ParsedPage.parse(snapshot);
  try {
    yield* extractRecords(page, { recordSelector, fields, identityField, remainingCapacity });
  } finally {
    page.dispose();
  }
}
