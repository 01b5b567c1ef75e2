import { MauticConnector } from '../../src/connectors/mautic-connector';

const BASE_URL = 'https://mautic.example.com/api';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

const CONTACTS = {
  total: 1,
  contacts: {
    '12': {
      id: 12,
      points: 40,
      fields: { all: { email: 'ana@example.com', firstname: 'Ana' } },
      tags: [{ id: 1, tag: 'vip' }],
    },
  },
};

const SEGMENTS = { total: 1, lists: { '3': { id: 3, name: 'Weekly newsletter', alias: 'weekly' } } };

const CAMPAIGNS = {
  total: 2,
  campaigns: {
    '5': { id: 5, campaignName: 'Welcome', dateAdded: '2024-01-01T00:00:00+00:00' },
    '7': { id: 7, campaignName: 'Spring webinar', dateAdded: '2024-03-01T00:00:00+00:00' },
  },
};

describe('MauticConnector', () => {
  let fetchSpy: jest.SpyInstance;
  let connector: MauticConnector;

  beforeEach(() => {
    fetchSpy = jest.spyOn(global, 'fetch');
    connector = new MauticConnector({ baseUrl: BASE_URL, username: 'api-user', password: 'test-secret' });
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should combine contact, segments and campaigns into one record', async () => {
    fetchSpy.mockImplementation(async (input: unknown) => {
      const url = String(input);
      if (url.includes('/contacts/12/segments')) return jsonResponse(SEGMENTS);
      if (url.includes('/contacts/12/campaigns')) return jsonResponse(CAMPAIGNS);
      return jsonResponse(CONTACTS);
    });

    const result = await connector.lookup({ email: 'ana@example.com', text: 'campanha da ana@example.com' });

    expect(result).toEqual({
      status: 'found',
      record: {
        id: '12',
        email: 'ana@example.com',
        firstname: 'Ana',
        points: 40,
        tags: ['vip'],
        segments: ['Weekly newsletter'],
        campaigns: ['Welcome', 'Spring webinar'],
        lastCampaign: 'Spring webinar',
      },
    });
    const search = new URL(String(fetchSpy.mock.calls[0][0])).searchParams;
    expect(search.get('search')).toBe('email:ana@example.com');
    expect(search.get('limit')).toBe('1');
  });

  it('should report a contact that does not exist', async () => {
    fetchSpy.mockResolvedValueOnce(jsonResponse({ total: 0, contacts: [] }));

    const result = await connector.lookup({ email: 'nobody@example.com', text: 'x' });

    expect(result).toEqual({ status: 'not_found', reason: 'no contact with email nobody@example.com' });
    expect(fetchSpy).toHaveBeenCalledTimes(1);
  });

  it('should need an email to search', async () => {
    const result = await connector.lookup({ phone: '5511900000001', text: 'x' });

    expect(result).toEqual({ status: 'not_found', reason: 'no email in message' });
    expect(fetchSpy).not.toHaveBeenCalled();
  });

  it('should raise errors reported in the body', async () => {
    fetchSpy.mockResolvedValueOnce(jsonResponse({ errors: [{ code: 401, message: 'API authorization denied.' }] }));

    await expect(connector.lookup({ email: 'ana@example.com', text: 'x' }))
      .rejects.toMatchObject({ message: 'marketing: API authorization denied.', httpStatus: 401 });
  });

  it('should add a tag to the contact', async () => {
    fetchSpy
      .mockResolvedValueOnce(jsonResponse(CONTACTS))
      .mockResolvedValueOnce(jsonResponse({ contact: { id: 12 } }));

    const result = await connector.addTag('ana@example.com', 'webinar-2024');

    expect(result).toEqual({ id: '12', tag: 'webinar-2024', added: true });
    const [url, init] = fetchSpy.mock.calls[1];
    expect(url).toBe(`${BASE_URL}/contacts/12/tags/add`);
    expect(init).toMatchObject({ method: 'POST', body: '{"tags":["webinar-2024"]}' });
  });

  it('should refuse to tag an unknown contact', async () => {
    fetchSpy.mockResolvedValueOnce(jsonResponse({ total: 0, contacts: [] }));

    await expect(connector.addTag('nobody@example.com', 'vip'))
      .rejects.toMatchObject({ message: 'marketing: no contact with email nobody@example.com', httpStatus: 404 });
  });
});
