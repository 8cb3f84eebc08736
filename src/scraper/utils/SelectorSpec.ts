// ============================================================================
// SELECTOR SPEC PARSER
// ============================================================================
// Turns field-mapping expressions ("h2.title", "a.link@attr:href") into
// tagged SelectorSpec values once, at load time

import { JSDOM } from 'jsdom';
import type { FieldSpecs, SelectorSpec } from '../../shared/types.js';
import { ConfigError } from '../types/errors.js';

export const ATTRIBUTE_MARKER = '@attr:';

let validationDocument: Document | null = null;

/**
 * Throws ConfigError if the CSS parser rejects the selector
 */
export function assertValidSelector(selector: string, context: string): void {
  if (!validationDocument) {
    validationDocument = new JSDOM('<!DOCTYPE html><html><body></body></html>').window.document;
  }

  try {
    validationDocument.createDocumentFragment().querySelector(selector);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Invalid selector for ${context}: "${selector}" (${reason})`, { cause: error });
  }
}

/**
 * Parse one mapping expression
 */
export function parseSelectorSpec(expression: string, field = 'field'): SelectorSpec {
  const trimmed = expression.trim();
  if (!trimmed) {
    throw new ConfigError(`Empty selector expression for "${field}"`);
  }

  const markerIndex = trimmed.indexOf(ATTRIBUTE_MARKER);
  if (markerIndex === -1) {
    assertValidSelector(trimmed, `"${field}"`);
    return { kind: 'text', selector: trimmed };
  }

  const selector = trimmed.slice(0, markerIndex).trim();
  const attribute = trimmed.slice(markerIndex + ATTRIBUTE_MARKER.length).trim();

  if (attribute.includes(ATTRIBUTE_MARKER)) {
    throw new ConfigError(`More than one ${ATTRIBUTE_MARKER} marker in "${field}": "${expression}"`);
  }
  if (!attribute) {
    throw new ConfigError(`Missing attribute name after ${ATTRIBUTE_MARKER} in "${field}": "${expression}"`);
  }
  if (/\s/.test(attribute)) {
    throw new ConfigError(`Attribute name contains whitespace in "${field}": "${attribute}"`);
  }

  // Empty selector = attribute of the record node itself
  if (selector) {
    assertValidSelector(selector, `"${field}"`);
  }

  return { kind: 'attribute', selector, attribute };
}

/**
 * Parse a raw name -> expression mapping into field specs
 */
export function parseFieldMapping(raw: unknown): FieldSpecs {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new ConfigError('Field mapping must be a JSON object of field name to selector expression');
  }

  const entries = Object.entries(raw);
  if (entries.length === 0) {
    throw new ConfigError('Field mapping is empty');
  }

  // fromEntries defines own properties, so a "__proto__" key stays a field
  const specs: Record<string, SelectorSpec> = Object.fromEntries(
    entries.map(([field, expression]): [string, SelectorSpec] => {
      if (typeof expression !== 'string') {
        throw new ConfigError(`Selector expression for "${field}" must be a string`);
      }
      return [field, parseSelectorSpec(expression, field)];
    })
  );

  return Object.freeze(specs);
}

/**
 * Render a spec back to its mapping expression (used in logs)
 */
export function formatSelectorSpec(spec: SelectorSpec): string {
  return spec.kind === 'text' ? spec.selector : `${spec.selector}${ATTRIBUTE_MARKER}${spec.attribute}`;
}
