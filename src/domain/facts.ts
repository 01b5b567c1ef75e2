import { ConnectorRecord, ConnectorSource } from '../connectors/types';
import { ExternalFact, FactScalar } from './types';

function toScalar(value: unknown): FactScalar | undefined {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') return value;
  if (Array.isArray(value)) {
    const parts = value.map(toScalar).filter((v): v is string | number | boolean => v !== null && v !== undefined);
    return parts.join(', ');
  }
  // Nested objects carry no meaning for the prompt
  return undefined;
}

/** Flatten a raw connector record into scalars; arrays become comma-joined strings. */
export function flattenRecord(record: ConnectorRecord): Record<string, FactScalar> {
  const flat: Record<string, FactScalar> = {};
  for (const [key, raw] of Object.entries(record)) {
    const value = toScalar(raw);
    if (value !== undefined) flat[key] = value;
  }
  return flat;
}

export function factKey(source: ConnectorSource): string {
  return `${source}.contact`;
}

export function foundFact(source: ConnectorSource, record: ConnectorRecord, retrievedAt = Date.now()): ExternalFact {
  return { key: factKey(source), value: flattenRecord(record), source, retrievedAt, error: false };
}

export function notFoundFact(source: ConnectorSource, reason: string, retrievedAt = Date.now()): ExternalFact {
  return { key: factKey(source), value: { found: false, reason }, source, retrievedAt, error: false };
}

export function errorFact(source: ConnectorSource, message: string, retrievedAt = Date.now()): ExternalFact {
  return { key: factKey(source), value: null, source, retrievedAt, error: true, errorMessage: message };
}

/** One-line rendering used in prompts and for context budgeting */
export function renderFact(fact: ExternalFact): string {
  if (fact.error) return `${fact.key}: unavailable (${fact.errorMessage ?? 'error'})`;
  if (fact.value === null || typeof fact.value !== 'object') return `${fact.key}: ${String(fact.value)}`;
  const fields = Object.entries(fact.value).map(([k, v]) => `${k}=${String(v)}`);
  return `${fact.key}: ${fields.join('; ')}`;
}
