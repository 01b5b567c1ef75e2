import { ConnectorQuery, ConnectorSource } from '../connectors/types';

export type FactScalar = string | number | boolean | null;
export type FactValue = FactScalar | Readonly<Record<string, FactScalar>>;

/** A value retrieved from an external record system */
export interface ExternalFact {
  /** e.g. crm.contact, marketing.contact */
  key: string;
  value: FactValue;
  source: ConnectorSource;
  /** Epoch milliseconds */
  retrievedAt: number;
  /** The lookup failed; `value` is null and `errorMessage` says why */
  error: boolean;
  errorMessage?: string;
}

/**
 * ok: every lookup completed (found or not found)
 * partial: some lookups failed
 * degraded_no_data: every lookup failed
 */
export type CoordinatorStatus = 'ok' | 'partial' | 'degraded_no_data';

export interface DomainQueryResult {
  status: CoordinatorStatus;
  facts: ExternalFact[];
  targets: ConnectorSource[];
  query: ConnectorQuery;
}

export interface CoordinatorOptions {
  /** Per-attempt timeout */
  timeoutMs: number;
  /** Retries after the first attempt */
  maxRetries: number;
  /** Fixed delay between attempts */
  retryBackoffMs: number;
}
