/** Domain record systems the assistant can consult */
export type ConnectorSource = 'crm' | 'marketing';

export const CONNECTOR_SOURCES: readonly ConnectorSource[] = ['crm', 'marketing'];

/** Raw record as returned by a connector, before normalization */
export type ConnectorRecord = Record<string, unknown>;

/** What the coordinator could extract from the user's message */
export interface ConnectorQuery {
  email?: string;
  phone?: string;
  /** Original message text */
  text: string;
}

export type LookupResult =
  | { status: 'found'; record: ConnectorRecord }
  | { status: 'not_found'; reason: string };

/**
 * Lookup capability over one record system.
 * Transport and API failures are thrown as ConnectorError; a missing record is
 * a regular `not_found` result.
 */
export interface RecordConnector {
  readonly source: ConnectorSource;
  /** Backend identifier for logs (vtiger, mautic, mock) */
  readonly backend: string;
  lookup(query: ConnectorQuery, signal?: AbortSignal): Promise<LookupResult>;
  healthCheck(): Promise<boolean>;
}

export interface CrmConnector extends RecordConnector {
  readonly source: 'crm';
  /** Set a contact's lead score (0–100) */
  updateLeadScore(email: string, score: number, signal?: AbortSignal): Promise<ConnectorRecord>;
  /** Every contact with its id, name, email, phone and lead score */
  listContacts(signal?: AbortSignal): Promise<ConnectorRecord[]>;
}

export interface MarketingConnector extends RecordConnector {
  readonly source: 'marketing';
  /** Add a segmentation tag to a contact */
  addTag(email: string, tag: string, signal?: AbortSignal): Promise<ConnectorRecord>;
}

export interface ConnectorSet {
  crm: CrmConnector;
  marketing: MarketingConnector;
}
