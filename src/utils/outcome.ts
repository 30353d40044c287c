import type { ProviderError } from './errors.js';

/**
 * Result of an adapter call. Adapters report provider failures as values
 * so the caller decides how to degrade.
 */
export type Outcome<T> = { ok: true; value: T } | { ok: false; error: ProviderError };

export function succeed<T>(value: T): Outcome<T> {
  return { ok: true, value };
}

export function fail<T>(error: ProviderError): Outcome<T> {
  return { ok: false, error };
}
