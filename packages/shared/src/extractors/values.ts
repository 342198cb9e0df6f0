/**
 * Column Value Readers
 *
 * Turn the element found at a column path into a scalar cell value.
 */

import type { Element } from '@xmldom/xmldom';
import type { ColumnDefinition } from '../definitions/types';
import type { ScalarValue } from '../types';
import { findAllPath, findPath, getXlinkAttribute, removeIdPrefix, textOf } from '../xml/elements';
import { logger } from '../logger';

export interface ValueReadOptions {
  stripIdPrefix: boolean;
}

const ISO_DATETIME_PATTERN =
  /^\d{4}-\d{2}-\d{2}(T\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:?\d{2})?)?$/;

const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

const HAS_OFFSET_PATTERN = /(Z|[+-]\d{2}:?\d{2})$/;

/**
 * Parse an ISO 8601 date or date-time into a UTC ISO string.
 * Date-times without offset are read as UTC.
 */
export function parseIsoDateTime(text: string): string | null {
  if (!ISO_DATETIME_PATTERN.test(text)) return null;

  const normalized = text.includes('T') && !HAS_OFFSET_PATTERN.test(text) ? `${text}Z` : text;
  const date = new Date(normalized);
  return Number.isNaN(date.getTime()) ? null : date.toISOString();
}

/**
 * Parse a decimal number, null for anything that is not one
 */
export function parseNumber(text: string): number | null {
  if (!DECIMAL_PATTERN.test(text)) return null;
  const value = Number(text);
  return Number.isFinite(value) ? value : null;
}

function readReference(element: Element | null, options: ValueReadOptions): string | null {
  const href = getXlinkAttribute(element, 'href');
  if (href === null) return null;
  return options.stripIdPrefix ? removeIdPrefix(href) : href;
}

function joinValues(values: (string | null)[]): string | null {
  const present = values.filter((value): value is string => value !== null);
  return present.length > 0 ? present.join(',') : null;
}

/**
 * Read one column from a feature element
 */
export function readColumnValue(
  feature: Element,
  column: ColumnDefinition,
  options: ValueReadOptions
): ScalarValue {
  switch (column.kind) {
    case 'text':
      return textOf(findPath(feature, column.path));

    case 'number': {
      const text = textOf(findPath(feature, column.path));
      if (text === null) return null;
      const value = parseNumber(text);
      if (value === null) {
        logger.warn('Could not convert value to number', { column: column.name, value: text });
      }
      return value;
    }

    case 'datetime': {
      const text = textOf(findPath(feature, column.path));
      if (text === null) return null;
      const value = parseIsoDateTime(text);
      if (value === null) {
        logger.warn('Value is not a valid datetime', { column: column.name, value: text });
      }
      return value;
    }

    case 'reference':
      return readReference(findPath(feature, column.path), options);

    case 'title':
      return getXlinkAttribute(findPath(feature, column.path), 'title');

    case 'list':
      return joinValues(findAllPath(feature, column.path).map(textOf));

    case 'referenceList':
      return joinValues(
        findAllPath(feature, column.path).map((element) => readReference(element, options))
      );
  }
}
