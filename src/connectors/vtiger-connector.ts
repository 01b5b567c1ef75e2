import { ConnectorError } from '../errors';
import { logger } from '../observability/logger';
import { basicAuthHeader, isRecord, joinUrl, requestJson } from './http';
import { ConnectorQuery, ConnectorRecord, CrmConnector, LookupResult } from './types';

export interface VtigerConfig {
  /** e.g. https://instance.odx.vtiger.com/restapi/v1/vtiger/default */
  baseUrl: string;
  username: string;
  accessKey: string;
  /** Module searched by lookup (default Contacts) */
  module?: string;
}

/** Custom field holding the lead score on the Contacts module */
export const LEAD_SCORE_FIELD = 'cf_lead_score';

/** VQL caps a page at 100 rows */
const PAGE_SIZE = 100;
const MAX_QUERY_ROWS = 10_000;

/** VQL string literals are single-quoted; drop anything that could close them. */
function vqlLiteral(value: string): string {
  return `'${value.replace(/['\\;]/g, '')}'`;
}

/**
 * Vtiger CRM REST connector.
 *
 * Auth is HTTP Basic with the login email and the user's access key. Vtiger
 * answers 200 even for API errors and flags them with `success: false`, so
 * both the HTTP status and the body flag are checked.
 */
export class VtigerConnector implements CrmConnector {
  readonly source = 'crm' as const;
  readonly backend = 'vtiger';
  private readonly module: string;
  private readonly authHeader: string;
  private readonly log = logger.child({ component: 'vtiger-connector' });

  constructor(private readonly config: VtigerConfig) {
    this.module = config.module ?? 'Contacts';
    this.authHeader = basicAuthHeader({ username: config.username, secret: config.accessKey });
  }

  async lookup(query: ConnectorQuery, signal?: AbortSignal): Promise<LookupResult> {
    const where = query.email
      ? `email = ${vqlLiteral(query.email)}`
      : query.phone
        ? `phone = ${vqlLiteral(query.phone)}`
        : undefined;

    if (!where) {
      return { status: 'not_found', reason: 'no email or phone in message' };
    }

    const rows = await this.query(`SELECT * FROM ${this.module} WHERE ${where} LIMIT 1;`, signal);
    const first = rows[0];
    if (!first) {
      return { status: 'not_found', reason: `no ${this.module} record matches` };
    }
    return { status: 'found', record: first };
  }

  async updateLeadScore(email: string, score: number, signal?: AbortSignal): Promise<ConnectorRecord> {
    if (!Number.isInteger(score) || score < 0 || score > 100) {
      throw new RangeError('Lead score must be an integer between 0 and 100');
    }

    const found = await this.lookup({ email, text: email }, signal);
    if (found.status === 'not_found') {
      throw new ConnectorError(this.source, `no ${this.module} record for ${email}`, 404);
    }

    const id = found.record.id;
    if (typeof id !== 'string' || !id) {
      throw new ConnectorError(this.source, 'record has no id');
    }

    const element = JSON.stringify({ ...found.record, id, [LEAD_SCORE_FIELD]: score });
    const body = await this.request('POST', 'update', { element }, signal);
    this.log.info({ id, score }, 'Lead score updated');
    return isRecord(body.result) ? body.result : { id, [LEAD_SCORE_FIELD]: score };
  }

  async listContacts(signal?: AbortSignal): Promise<ConnectorRecord[]> {
    const rows = await this.queryAll(
      `SELECT id, firstname, lastname, email, phone, ${LEAD_SCORE_FIELD} FROM ${this.module};`,
      signal,
    );
    this.log.debug({ count: rows.length }, 'Contacts listed');
    return rows;
  }

  /** Run one VQL statement (first page only, as written) */
  async query(vql: string, signal?: AbortSignal): Promise<ConnectorRecord[]> {
    const body = await this.request('GET', 'query', { query: vql }, signal);
    const result = body.result;
    return Array.isArray(result) ? result.filter(isRecord) : [];
  }

  /** Page through a VQL statement written without LIMIT/OFFSET */
  private async queryAll(baseQuery: string, signal?: AbortSignal): Promise<ConnectorRecord[]> {
    const all: ConnectorRecord[] = [];
    const statement = baseQuery.trim().replace(/;+$/, '');

    for (let offset = 0; offset < MAX_QUERY_ROWS; offset += PAGE_SIZE) {
      const page = await this.query(`${statement} LIMIT ${offset}, ${PAGE_SIZE};`, signal);
      all.push(...page);
      if (page.length < PAGE_SIZE) return all;
    }

    this.log.warn({ limit: MAX_QUERY_ROWS }, 'VQL pagination stopped at row limit');
    return all;
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.query(`SELECT id FROM ${this.module} LIMIT 1;`, AbortSignal.timeout(5000));
      return true;
    } catch (err) {
      this.log.warn({ err }, 'Vtiger health check failed');
      return false;
    }
  }

  private async request(
    method: 'GET' | 'POST',
    endpoint: string,
    params: Record<string, string>,
    signal?: AbortSignal,
  ): Promise<Record<string, unknown>> {
    const headers = { Authorization: this.authHeader, Accept: 'application/json' };
    const body = method === 'GET'
      ? await requestJson(this.source, joinUrl(this.config.baseUrl, endpoint, params), { method, headers, signal })
      : await requestJson(this.source, joinUrl(this.config.baseUrl, endpoint), {
          method,
          headers: { ...headers, 'Content-Type': 'application/x-www-form-urlencoded' },
          body: new URLSearchParams(params).toString(),
          signal,
        });

    if (body.success !== true) {
      const error = isRecord(body.error) ? body.error : {};
      const code = typeof error.code === 'string' ? error.code : 'VTIGER_UNKNOWN_ERROR';
      const message = typeof error.message === 'string' ? error.message : 'unknown Vtiger API error';
      throw new ConnectorError(this.source, `${code}: ${message}`);
    }
    return body;
  }
}
