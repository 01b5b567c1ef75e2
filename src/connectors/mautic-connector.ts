import { ConnectorError } from '../errors';
import { logger } from '../observability/logger';
import { basicAuthHeader, isRecord, joinUrl, requestJson } from './http';
import { ConnectorQuery, ConnectorRecord, LookupResult, MarketingConnector } from './types';

export interface MauticConfig {
  /** e.g. https://mautic.example.com/api */
  baseUrl: string;
  username: string;
  password: string;
}

/** Mautic keys collections by id: { "12": {...}, "40": {...} } */
function collectionValues(value: unknown): Record<string, unknown>[] {
  if (Array.isArray(value)) return value.filter(isRecord);
  if (!isRecord(value)) return [];
  return Object.values(value).filter(isRecord);
}

function stringField(record: Record<string, unknown>, ...keys: string[]): string | undefined {
  for (const key of keys) {
    const v = record[key];
    if (typeof v === 'string' && v) return v;
  }
  return undefined;
}

/**
 * Mautic REST connector (Basic Auth).
 *
 * Lookup resolves the contact by email search, then pulls its segments and
 * campaigns so a single fact can answer "which campaign did this contact last
 * join?".
 */
export class MauticConnector implements MarketingConnector {
  readonly source = 'marketing' as const;
  readonly backend = 'mautic';
  private readonly authHeader: string;
  private readonly log = logger.child({ component: 'mautic-connector' });

  constructor(private readonly config: MauticConfig) {
    this.authHeader = basicAuthHeader({ username: config.username, secret: config.password });
  }

  async lookup(query: ConnectorQuery, signal?: AbortSignal): Promise<LookupResult> {
    if (!query.email) {
      return { status: 'not_found', reason: 'no email in message' };
    }

    const contact = await this.findContact(query.email, signal);
    if (!contact) {
      return { status: 'not_found', reason: `no contact with email ${query.email}` };
    }

    const id = String(contact.id);
    const [segments, campaigns] = await Promise.all([
      this.get(`contacts/${id}/segments`, {}, signal),
      this.get(`contacts/${id}/campaigns`, {}, signal),
    ]);

    const segmentNames = collectionValues(segments.lists)
      .map((s) => stringField(s, 'name', 'alias'))
      .filter((s): s is string => Boolean(s));

    const campaignList = collectionValues(campaigns.campaigns)
      .map((c) => ({ name: stringField(c, 'campaignName', 'name'), dateAdded: stringField(c, 'dateAdded') ?? '' }))
      .filter((c): c is { name: string; dateAdded: string } => Boolean(c.name))
      .sort((a, b) => a.dateAdded.localeCompare(b.dateAdded));

    const fields = isRecord(contact.fields) && isRecord(contact.fields.all) ? contact.fields.all : {};
    const tags = collectionValues(contact.tags)
      .map((t) => stringField(t, 'tag'))
      .filter((t): t is string => Boolean(t));

    const record: ConnectorRecord = {
      id,
      ...fields,
      points: contact.points ?? fields.points ?? null,
      tags,
      segments: segmentNames,
      campaigns: campaignList.map((c) => c.name),
      lastCampaign: campaignList.length > 0 ? campaignList[campaignList.length - 1].name : null,
    };
    return { status: 'found', record };
  }

  async addTag(email: string, tag: string, signal?: AbortSignal): Promise<ConnectorRecord> {
    const contact = await this.findContact(email, signal);
    if (!contact) {
      throw new ConnectorError(this.source, `no contact with email ${email}`, 404);
    }

    const id = String(contact.id);
    const body = await requestJson(this.source, joinUrl(this.config.baseUrl, `contacts/${id}/tags/add`), {
      method: 'POST',
      headers: { Authorization: this.authHeader, 'Content-Type': 'application/json', Accept: 'application/json' },
      body: JSON.stringify({ tags: [tag] }),
      signal,
    });
    this.assertNoErrors(body);
    this.log.info({ id, tag }, 'Tag added to contact');
    return { id, tag, added: true };
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.get('contacts', { limit: '1' }, AbortSignal.timeout(5000));
      return true;
    } catch (err) {
      this.log.warn({ err }, 'Mautic health check failed');
      return false;
    }
  }

  private async findContact(email: string, signal?: AbortSignal): Promise<Record<string, unknown> | undefined> {
    const body = await this.get('contacts', { search: `email:${email}`, limit: '1' }, signal);
    return collectionValues(body.contacts)[0];
  }

  private async get(
    endpoint: string,
    params: Record<string, string>,
    signal?: AbortSignal,
  ): Promise<Record<string, unknown>> {
    const body = await requestJson(this.source, joinUrl(this.config.baseUrl, endpoint, params), {
      method: 'GET',
      headers: { Authorization: this.authHeader, Accept: 'application/json' },
      signal,
    });
    this.assertNoErrors(body);
    return body;
  }

  private assertNoErrors(body: Record<string, unknown>): void {
    const first = collectionValues(body.errors)[0];
    if (first) {
      const message = stringField(first, 'message') ?? 'unknown Mautic API error';
      const code = typeof first.code === 'number' ? first.code : undefined;
      throw new ConnectorError(this.source, message, code);
    }
  }
}
