/**
 * Parsers for user-typed values. Each returns the typed value or throws
 * ValidationError with a message fit for the terminal.
 */

import { ValidationError } from '../shared/errors.js';
import type { SortOrder } from './views.js';

/** "Man Walking Around a Corner" (1887) */
export const MIN_YEAR = 1887;
export const MIN_RATING = 0;
export const MAX_RATING = 10;

export function maxYear(now: Date = new Date()): number {
  return now.getFullYear() + 1;
}

export function parseTitle(input: string): string {
  const title = input.trim();
  if (!title) throw new ValidationError('Movie name must not be empty.');
  return title;
}

export function parseYear(input: string, now: Date = new Date()): number {
  const text = input.trim();
  if (!/^-?\d+$/.test(text)) {
    throw new ValidationError(`Invalid year "${input}": please enter a whole number.`);
  }
  const year = Number(text);
  const upper = maxYear(now);
  if (year < MIN_YEAR || year > upper) {
    throw new ValidationError(`Year must be between ${MIN_YEAR} and ${upper}.`);
  }
  return year;
}

export function parseRating(input: string): number {
  const text = input.trim();
  const rating = Number(text);
  if (text === '' || !Number.isFinite(rating)) {
    throw new ValidationError(`Invalid rating "${input}": please enter a number.`);
  }
  if (rating < MIN_RATING || rating > MAX_RATING) {
    throw new ValidationError(`Rating must be between ${MIN_RATING} and ${MAX_RATING}.`);
  }
  if (Math.abs(rating * 10 - Math.round(rating * 10)) > 1e-9) {
    throw new ValidationError('Rating should have at most one decimal place.');
  }
  return rating;
}

/** Blank input means "no constraint" */
export function parseOptional<T>(input: string, parse: (value: string) => T): T | undefined {
  return input.trim() === '' ? undefined : parse(input);
}

export function parseSortOrder(input: string): SortOrder {
  const value = input.trim().toLowerCase();
  if (value === 'asc' || value === 'n') return 'asc';
  if (value === 'desc' || value === 'y') return 'desc';
  throw new ValidationError('Invalid sort order. Use "asc" or "desc".');
}

export function assertYearRange(startYear: number | undefined, endYear: number | undefined): void {
  if (startYear !== undefined && endYear !== undefined && startYear > endYear) {
    throw new ValidationError(`Start year ${startYear} is after end year ${endYear}.`);
  }
}
