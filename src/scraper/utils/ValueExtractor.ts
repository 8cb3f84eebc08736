// ============================================================================
// VALUE EXTRACTOR UTILITY
// ============================================================================
// Extracts field values from record nodes according to a SelectorSpec

import type { SelectorSpec } from '../../shared/types.js';

/**
 * Attributes that hold a link or an image address
 */
const URL_ATTRIBUTES = ['href', 'src', 'data-src', 'srcset', 'data-href', 'data-original'];

/**
 * Field names conventionally holding links or images (product_url, image, thumb_src, ...)
 */
const URL_FIELD_PATTERN = /(url|link|href|image|img|src)$/i;

const ABSOLUTE_URL_PATTERN = /^[a-z][a-z\d+\-.]*:/i;

/**
 * Check if a value already carries a scheme (https:, data:, mailto:, ...)
 */
export function isAbsoluteUrl(url: string): boolean {
  return ABSOLUTE_URL_PATTERN.test(url);
}

/**
 * Scheme + host of a page URL ("https://x.test/cat/page" -> "https://x.test")
 */
export function getOrigin(pageUrl: string): string | null {
  try {
    const origin = new URL(pageUrl).origin;
    return origin === 'null' ? null : origin;
  } catch {
    return null;
  }
}

/**
 * Resolve a relative URL against the page it came from. Root-relative paths
 * land on the page's scheme + host; "?page=2" keeps the page's path.
 * Absolute URLs and empty values are returned unchanged.
 */
export function resolveUrl(url: string, pageUrl: string): string {
  if (!url || isAbsoluteUrl(url)) return url;
  if (!getOrigin(pageUrl)) return url;

  try {
    return new URL(url, pageUrl).href;
  } catch {
    return url;
  }
}

/**
 * Resolve every candidate URL of a srcset list, keeping its descriptor
 * ("a.jpg 1x, b.jpg 2x")
 */
export function resolveSrcset(srcset: string, pageUrl: string): string {
  return srcset
    .split(',')
    .map((candidate) => candidate.trim())
    .filter((candidate) => candidate.length > 0)
    .map((candidate) => {
      const [url = '', ...descriptors] = candidate.split(/\s+/);
      return [resolveUrl(url, pageUrl), ...descriptors].join(' ');
    })
    .join(', ');
}

/**
 * Whether a field's value should go through URL resolution
 */
export function holdsUrl(field: string, spec: SelectorSpec): boolean {
  if (spec.kind !== 'attribute') return false;
  return URL_ATTRIBUTES.includes(spec.attribute.toLowerCase()) || URL_FIELD_PATTERN.test(field);
}

/**
 * Extract trimmed text content from an element
 */
export function extractText(element: Element | null): string {
  if (!element) return '';
  return element.textContent?.trim() ?? '';
}

/**
 * Extract a specific attribute value
 */
export function extractAttribute(element: Element | null, attributeName: string): string {
  if (!element || !attributeName) return '';
  return element.getAttribute(attributeName) ?? '';
}

/**
 * First descendant of the record node matching the selector;
 * an empty selector addresses the record node itself
 */
export function findElement(container: Element, selector: string): Element | null {
  if (!selector) return container;
  return container.querySelector(selector);
}

/**
 * Extract one field from a record node
 */
export function extractField(
  container: Element,
  field: string,
  spec: SelectorSpec,
  pageUrl: string
): string {
  const element = findElement(container, spec.selector);

  switch (spec.kind) {
    case 'text':
      return extractText(element);

    case 'attribute': {
      const value = extractAttribute(element, spec.attribute).trim();
      if (!holdsUrl(field, spec)) return value;
      return spec.attribute.toLowerCase() === 'srcset' ? resolveSrcset(value, pageUrl) : resolveUrl(value, pageUrl);
    }
  }
}
