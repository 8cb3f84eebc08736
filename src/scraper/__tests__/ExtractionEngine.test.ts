import { describe, test, expect } from 'vitest';
import { ParsedPage, extract, extractRecords } from '../ExtractionEngine.js';
import { ParseError } from '../types/errors.js';
import type { FieldSpecs, PageSnapshot } from '../../shared/types.js';

const FIELDS: FieldSpecs = {
  product_name: { kind: 'text', selector: '.name' },
  price: { kind: 'text', selector: '.price' },
  product_url: { kind: 'attribute', selector: 'a', attribute: 'href' },
};

function listing(items: Array<{ name: string; price?: string; href?: string }>): string {
  const cards = items
    .map(
      (item) => `
        <li class="item">
          <div class="name">${item.name}</div>
          ${item.price !== undefined ? `<span class="price">${item.price}</span>` : ''}
          ${item.href !== undefined ? `<a href="${item.href}">open</a>` : ''}
        </li>`
    )
    .join('');
  return `<!DOCTYPE html><html><body><ul>${cards}</ul></body></html>`;
}

function snapshot(html: string, url = 'https://x.test/cat'): PageSnapshot {
  return { url, html, partial: false };
}

describe('ExtractionEngine', () => {
  describe('extract', () => {
    test('yields one record per record node, in document order', () => {
      const html = listing([
        { name: 'Mouse', price: '10', href: '/p/1' },
        { name: 'Keyboard', price: '25', href: 'https://x.test/p/2' },
      ]);

      const records = [...extract(snapshot(html), 'li.item', FIELDS, 'product_name', 10)];

      expect(records).toEqual([
        { product_name: 'Mouse', price: '10', product_url: 'https://x.test/p/1' },
        { product_name: 'Keyboard', price: '25', product_url: 'https://x.test/p/2' },
      ]);
    });

    test('keeps every mapped field, empty when nothing matches', () => {
      const html = listing([{ name: 'Mouse' }]);

      const records = [...extract(snapshot(html), 'li.item', FIELDS, 'product_name', 10)];

      expect(records).toEqual([{ product_name: 'Mouse', price: '', product_url: '' }]);
    });

    test('drops records whose identity field is empty', () => {
      const html = listing([{ name: '' }, { name: 'Mouse' }, { name: '   ' }]);

      const records = [...extract(snapshot(html), 'li.item', FIELDS, 'product_name', 10)];

      expect(records.map((r) => r.product_name)).toEqual(['Mouse']);
    });

    test('never treats an inherited property as the identity value', () => {
      const html = listing([{ name: '' }, { name: '' }]);

      expect([...extract(snapshot(html), 'li.item', FIELDS, 'constructor', 10)]).toEqual([]);
      expect([...extract(snapshot(html), 'li.item', FIELDS, 'toString', 10)]).toEqual([]);
    });

    test('stops at the remaining capacity', () => {
      const html = listing([{ name: 'A' }, { name: 'B' }, { name: 'C' }, { name: 'D' }]);

      const records = [...extract(snapshot(html), 'li.item', FIELDS, 'product_name', 2)];

      expect(records.map((r) => r.product_name)).toEqual(['A', 'B']);
    });

    test('counts only accepted records against the capacity', () => {
      const html = listing([{ name: '' }, { name: 'A' }, { name: '' }, { name: 'B' }, { name: 'C' }]);

      const records = [...extract(snapshot(html), 'li.item', FIELDS, 'product_name', 2)];

      expect(records.map((r) => r.product_name)).toEqual(['A', 'B']);
    });

    test('yields nothing when there is no capacity left', () => {
      const html = listing([{ name: 'A' }]);

      expect([...extract(snapshot(html), 'li.item', FIELDS, 'product_name', 0)]).toEqual([]);
    });

    test('yields nothing when no record node matches', () => {
      const html = listing([{ name: 'A' }]);

      expect([...extract(snapshot(html), 'article.card', FIELDS, 'product_name', 10)]).toEqual([]);
    });

    test('rejects empty markup with a ParseError', () => {
      expect(() => [...extract(snapshot('   '), 'li.item', FIELDS, 'product_name', 10)]).toThrow(ParseError);
    });
  });

  describe('ParsedPage', () => {
    test('wraps rejected selectors in a ParseError', () => {
      const page = ParsedPage.parse(snapshot(listing([{ name: 'A' }])));

      expect(() => page.queryAll('li[')).toThrow(ParseError);
      page.dispose();
    });

    test('refuses queries after dispose', () => {
      const page = ParsedPage.parse(snapshot(listing([{ name: 'A' }])));
      page.dispose();

      expect(() => page.query('li.item')).toThrow('already disposed');
    });

    test('keeps the partial flag of the snapshot', () => {
      const page = ParsedPage.parse({ url: 'https://x.test/cat', html: listing([]), partial: true });

      expect(page.partial).toBe(true);
      page.dispose();
    });

    test('supports several passes over one parse', () => {
      const page = ParsedPage.parse(snapshot(listing([{ name: 'A' }, { name: 'B' }])));
      const options = { recordSelector: 'li.item', fields: FIELDS, identityField: 'product_name', remainingCapacity: 5 };

      expect([...extractRecords(page, options)]).toHaveLength(2);
      expect([...extractRecords(page, options)]).toHaveLength(2);
      page.dispose();
    });
  });
});
