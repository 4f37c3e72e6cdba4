/**
 * Argument checks applied before any request is issued
 */

import { ValidationError } from '../errors.js';
import { isIsoDate } from '../compute/index.js';

export function requireText(value: string | undefined, field: string): string {
  const text = value?.trim();
  if (!text) {
    throw new ValidationError(`${field} is required`, field);
  }
  return text;
}

/** Blank strings count as absent */
export function optionalText(value: string | undefined): string | undefined {
  const text = value?.trim();
  return text ? text : undefined;
}

export function requireDate(value: string | undefined, field: string): string {
  const date = requireText(value, field);
  if (!isIsoDate(date)) {
    throw new ValidationError(`${field} must be a valid date in YYYY-MM-DD format, got '${date}'`, field);
  }
  return date;
}

export function optionalDate(value: string | undefined, field: string): string | undefined {
  return optionalText(value) === undefined ? undefined : requireDate(value, field);
}

export function requireDateOrder(startDate: string | undefined, endDate: string | undefined): void {
  if (startDate && endDate && startDate > endDate) {
    throw new ValidationError(`start_date ${startDate} is after end_date ${endDate}`, 'start_date');
  }
}

/**
 * Hours as a positive decimal; numeric strings are accepted
 */
export function parseHours(value: number | string | undefined, field = 'hours'): number {
  if (value === undefined || (typeof value === 'string' && !value.trim())) {
    throw new ValidationError(`${field} is required`, field);
  }
  const hours = typeof value === 'number' ? value : Number(value.trim());
  if (!Number.isFinite(hours) || hours <= 0) {
    throw new ValidationError(`${field} must be a positive number, got '${value}'`, field);
  }
  return hours;
}

/**
 * Positive integer identifier; numeric strings are accepted
 */
export function parseId(value: number | string | undefined, field: string): number {
  if (value === undefined) {
    throw new ValidationError(`${field} is required`, field);
  }
  const text = typeof value === 'number' ? String(value) : value.trim();
  const id = Number(text);
  // Ids past 2^53 would be rounded onto a different entry
  if (!/^\d+$/.test(text) || !Number.isSafeInteger(id) || id <= 0) {
    throw new ValidationError(`${field} must be a positive integer, got '${value}'`, field);
  }
  return id;
}
