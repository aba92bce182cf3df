/**
 * Typed reads from checkpoint data.
 */

import type { JsonObject } from '../progress/types.js';

export function numberField(data: JsonObject | null, key: string): number | undefined {
  const value = data?.[key];
  return typeof value === 'number' ? value : undefined;
}

export function stringField(data: JsonObject | null, key: string): string | undefined {
  const value = data?.[key];
  return typeof value === 'string' ? value : undefined;
}

export function hasField(data: JsonObject | null, key: string): boolean {
  return data !== null && Object.prototype.hasOwnProperty.call(data, key);
}
