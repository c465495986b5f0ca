import {
  LINK_RELATIONS,
  PRIORITIES,
  RESOLUTIONS,
  TaskStatus,
  type LinkRelation,
  type Priority,
  type Resolution,
  type StatusFilter,
} from 'loom-core';
import { CLIError, ExitCode } from './errors.js';

export const STATUS_FILTERS: readonly StatusFilter[] = [TaskStatus.Open, TaskStatus.Complete, 'all'];

export function parsePositiveInteger(raw: string, fieldName: string): number {
  const trimmed = raw.trim();
  if (!/^\d+$/.test(trimmed) || Number(trimmed) < 1) {
    throw new CLIError(`${fieldName} must be a positive integer`, ExitCode.InvalidInput);
  }
  return Number(trimmed);
}

function parseEnumValue<T extends string>(raw: string, fieldName: string, allowed: readonly T[]): T {
  const match = allowed.find((value) => value === raw);
  if (match === undefined) {
    throw new CLIError(`Invalid ${fieldName}: ${raw}. Must be one of: ${allowed.join(', ')}`, ExitCode.InvalidInput);
  }
  return match;
}

export function parsePriority(raw: string): Priority {
  return parseEnumValue(raw.toLowerCase(), 'priority', PRIORITIES);
}

export function parseResolution(raw: string): Resolution {
  return parseEnumValue(raw, 'resolution', RESOLUTIONS);
}

export function parseRelation(raw: string): LinkRelation {
  return parseEnumValue(raw.replace(/-/g, '_'), 'relation', LINK_RELATIONS);
}

export function parseStatusFilter(raw: string): StatusFilter {
  return parseEnumValue(raw, 'status', STATUS_FILTERS);
}

/**
 * Comma-separated list; blanks and repeats are dropped, order kept.
 */
export function parseTags(raw: string): string[] {
  const tags = raw
    .split(',')
    .map((tag) => tag.trim())
    .filter((tag) => tag.length > 0);
  return [...new Set(tags)];
}

/**
 * `YYYY-MM-DD` is read as midnight UTC; anything else must be a full ISO-8601
 * timestamp.
 */
export function parseDate(raw: string, fieldName: string): Date {
  const value = /^\d{4}-\d{2}-\d{2}$/.test(raw) ? `${raw}T00:00:00.000Z` : raw;
  const date = new Date(value);
  if (Number.isNaN(date.getTime())) {
    throw new CLIError(`${fieldName} must be a date (YYYY-MM-DD) or ISO-8601 timestamp`, ExitCode.InvalidInput);
  }
  return date;
}
