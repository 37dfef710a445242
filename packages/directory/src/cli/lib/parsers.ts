/**
 * Commander option parsers
 *
 * @module cli/lib/parsers
 */

import { InvalidArgumentError } from 'commander';

export function parseNonNegativeInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return parsed;
}

export function parsePort(value: string): number {
  const parsed = parseNonNegativeInt(value);
  if (parsed > 65535) {
    throw new InvalidArgumentError('Port must be between 0 and 65535.');
  }
  return parsed;
}

export function parseLatitude(value: string): number {
  const parsed = Number(value);
  if (!value.trim() || !Number.isFinite(parsed) || parsed < -90 || parsed > 90) {
    throw new InvalidArgumentError('Latitude must be a number between -90 and 90.');
  }
  return parsed;
}

export function parseLongitude(value: string): number {
  const parsed = Number(value);
  if (!value.trim() || !Number.isFinite(parsed) || parsed < -180 || parsed > 180) {
    throw new InvalidArgumentError('Longitude must be a number between -180 and 180.');
  }
  return parsed;
}
