import { ConnectorError } from '../errors';
import { logger } from '../observability/logger';
import {
  ConnectorQuery,
  ConnectorRecord,
  ConnectorSet,
  CrmConnector,
  LookupResult,
  MarketingConnector,
} from './types';

function findByQuery(records: Map<string, ConnectorRecord>, query: ConnectorQuery): ConnectorRecord | undefined {
  if (query.email) return records.get(query.email.toLowerCase());
  if (query.phone) {
    for (const record of records.values()) {
      if (record.phone === query.phone) return record;
    }
  }
  return undefined;
}

/**
 * In-memory CRM for local development and testing.
 * Records are keyed by lower-cased email.
 */
export class MockCrmConnector implements CrmConnector {
  readonly source = 'crm' as const;
  readonly backend = 'mock';
  private readonly records = new Map<string, ConnectorRecord>();

  constructor(seed: ConnectorRecord[] = []) {
    for (const record of seed) {
      if (typeof record.email === 'string') this.records.set(record.email.toLowerCase(), { ...record });
    }
  }

  async lookup(query: ConnectorQuery): Promise<LookupResult> {
    const record = findByQuery(this.records, query);
    if (!record) return { status: 'not_found', reason: 'no matching mock contact' };
    return { status: 'found', record: { ...record } };
  }

  async updateLeadScore(email: string, score: number): Promise<ConnectorRecord> {
    if (!Number.isInteger(score) || score < 0 || score > 100) {
      throw new RangeError('Lead score must be an integer between 0 and 100');
    }
    const record = this.records.get(email.toLowerCase());
    if (!record) throw new ConnectorError(this.source, `no contact for ${email}`, 404);
    record.lead_score = score;
    logger.info({ email, score }, '[MOCK] Lead score updated');
    return { ...record };
  }

  async listContacts(): Promise<ConnectorRecord[]> {
    return Array.from(this.records.values(), (record) => ({ ...record }));
  }

  async healthCheck(): Promise<boolean> {
    return true;
  }
}

/** In-memory marketing automation for local development and testing. */
export class MockMarketingConnector implements MarketingConnector {
  readonly source = 'marketing' as const;
  readonly backend = 'mock';
  private readonly records = new Map<string, ConnectorRecord>();

  constructor(seed: ConnectorRecord[] = []) {
    for (const record of seed) {
      if (typeof record.email === 'string') this.records.set(record.email.toLowerCase(), { ...record });
    }
  }

  async lookup(query: ConnectorQuery): Promise<LookupResult> {
    const record = findByQuery(this.records, query);
    if (!record) return { status: 'not_found', reason: 'no matching mock contact' };
    return { status: 'found', record: { ...record } };
  }

  async addTag(email: string, tag: string): Promise<ConnectorRecord> {
    const record = this.records.get(email.toLowerCase());
    if (!record) throw new ConnectorError(this.source, `no contact for ${email}`, 404);
    const tags = Array.isArray(record.tags) ? record.tags.map(String) : [];
    record.tags = [...new Set([...tags, tag])];
    logger.info({ email, tag }, '[MOCK] Tag added');
    return { email, tag, added: true };
  }

  async healthCheck(): Promise<boolean> {
    return true;
  }
}

/** Demo records served when no CRM / marketing credentials are configured */
export function createMockConnectors(): ConnectorSet {
  return {
    crm: new MockCrmConnector([
      { id: '12x1', email: 'ana@example.com', firstname: 'Ana', lastname: 'Teste', phone: '5511900000001', lead_score: 72, status: 'Active customer' },
      { id: '12x2', email: 'bruno@example.com', firstname: 'Bruno', lastname: 'Exemplo', phone: '5521900000002', lead_score: 25, status: 'Cold lead' },
    ]),
    marketing: new MockMarketingConnector([
      { id: '1', email: 'ana@example.com', segments: ['Weekly newsletter'], tags: ['vip'], lastCampaign: 'Spring webinar' },
      { id: '2', email: 'bruno@example.com', segments: ['Re-engagement'], tags: [], lastCampaign: null },
    ]),
  };
}
