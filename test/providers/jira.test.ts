import { beforeEach, describe, expect, it, vi } from 'vitest';

vi.mock('node-fetch', async (importOriginal) => {
  const actual = await importOriginal<typeof import('node-fetch')>();
  return { ...actual, default: vi.fn() };
});

const { default: fetch, Response } = await import('node-fetch');
const { ConfigurationError, TransportError } = await import('../../src/lib/errors.js');
const { JiraClient, bulkCommentJql, firstPage, isCloudServer, nextPage } = await import('../../src/providers/jira.js');

const fetchMock = vi.mocked(fetch);

function jsonResponse(body: unknown, status = 200): InstanceType<typeof Response> {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

function requestedUrl(call: number): URL {
  return new URL(String(fetchMock.mock.calls[call]?.[0]));
}

function requestHeaders(call: number): unknown {
  return fetchMock.mock.calls[call]?.[1]?.headers;
}

const SEARCH = { pageSize: 50, maxResults: 1000 };

function serverClient(search = SEARCH) {
  return new JiraClient({ server: 'https://jira.example.com/', apiToken: 'test-token', search });
}

describe('JiraClient', () => {
  beforeEach(() => {
    fetchMock.mockReset();
  });

  describe('authentication', () => {
    it('uses a bearer token and API v2 for Server', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ name: 'dev' }));
      const client = serverClient();
      await client.testConnection();

      expect(client.apiVersion).toBe('2');
      expect(client.serverUrl).toBe('https://jira.example.com');
      expect(requestedUrl(0).href).toBe('https://jira.example.com/rest/api/2/myself');
      expect(requestHeaders(0)).toEqual({
        Authorization: 'Bearer test-token',
        Accept: 'application/json',
        'Content-Type': 'application/json',
      });
    });

    it('uses basic auth and API v3 for Cloud', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ accountId: 'abc' }));
      const client = new JiraClient({
        server: 'https://example.atlassian.net',
        email: 'dev@example.com',
        apiToken: 'test-token',
        search: SEARCH,
      });
      await client.testConnection();

      const expected = `Basic ${Buffer.from('dev@example.com:test-token').toString('base64')}`;
      expect(requestedUrl(0).href).toBe('https://example.atlassian.net/rest/api/3/myself');
      expect(requestHeaders(0)).toMatchObject({ Authorization: expected });
    });

    it('requires an email for Cloud', () => {
      expect(
        () => new JiraClient({ server: 'https://example.atlassian.net', apiToken: 'test-token', search: SEARCH }),
      ).toThrow(ConfigurationError);
    });

    it('recognizes Cloud hosts', () => {
      expect(isCloudServer('https://Example.Atlassian.net')).toBe(true);
      expect(isCloudServer('https://jira.example.com')).toBe(false);
    });
  });

  describe('errors', () => {
    it('turns an error status into a transport error', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ errorMessages: ['Issue does not exist'] }, 404));
      const error = await serverClient()
        .getIssue('PROJ-404', {})
        .catch((reason: unknown) => reason);

      expect(error).toBeInstanceOf(TransportError);
      expect(error instanceof TransportError ? [error.message, error.status] : []).toEqual(['API error: 404', 404]);
    });

    it('wraps network failures', async () => {
      fetchMock.mockRejectedValueOnce(new Error('socket hang up'));
      await expect(serverClient().testConnection()).rejects.toThrow('Request to myself failed: socket hang up');
    });

    it('rejects a body that is not JSON', async () => {
      fetchMock.mockResolvedValueOnce(new Response('<html>login</html>', { status: 200 }));
      await expect(serverClient().testConnection()).rejects.toBeInstanceOf(TransportError);
    });
  });

  describe('getIssue', () => {
    it('requests the standard fields plus resolved custom fields', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ key: 'PROJ-1', fields: {} }));
      const raw = await serverClient().getIssue('PROJ-1', { targetEnd: 'customfield_10500' });

      expect(raw).toEqual({ key: 'PROJ-1', fields: {} });
      expect(requestedUrl(0).pathname).toBe('/rest/api/2/issue/PROJ-1');
      expect(requestedUrl(0).searchParams.get('fields')).toBe(
        'summary,status,assignee,priority,created,updated,subtasks,issuelinks,customfield_10500',
      );
    });
  });

  describe('fieldCatalog', () => {
    it('lists field ids and names', async () => {
      fetchMock.mockResolvedValueOnce(
        jsonResponse([{ id: 'summary', name: 'Summary', custom: false }, { id: 'customfield_10500', name: 'Target end' }, 'x']),
      );
      expect(await serverClient().fieldCatalog()).toEqual([
        { id: 'summary', name: 'Summary' },
        { id: 'customfield_10500', name: 'Target end' },
      ]);
      expect(requestedUrl(0).pathname).toBe('/rest/api/2/field');
    });
  });

  describe('searchIssues', () => {
    const issues = (from: number, count: number) =>
      Array.from({ length: count }, (_, index) => ({ key: `PROJ-${from + index}` }));

    it('pages until the server total is reached', async () => {
      fetchMock
        .mockResolvedValueOnce(jsonResponse({ issues: issues(1, 2), total: 5 }))
        .mockResolvedValueOnce(jsonResponse({ issues: issues(3, 2), total: 5 }))
        .mockResolvedValueOnce(jsonResponse({ issues: issues(5, 1), total: 5 }));

      const found = await serverClient({ pageSize: 2, maxResults: 1000 }).searchIssues('project = PROJ', {});

      expect(found.map((issue) => issue.key)).toEqual(['PROJ-1', 'PROJ-2', 'PROJ-3', 'PROJ-4', 'PROJ-5']);
      expect(fetchMock).toHaveBeenCalledTimes(3);
      const pages = [0, 1, 2].map((call) => {
        const params = requestedUrl(call).searchParams;
        return [params.get('startAt'), params.get('maxResults')];
      });
      expect(pages).toEqual([
        ['0', '2'],
        ['2', '2'],
        ['4', '2'],
      ]);
      expect(requestedUrl(0).searchParams.get('jql')).toBe('project = PROJ');
      expect(requestedUrl(0).searchParams.get('fields')).toBe('summary,status,assignee,priority,created,updated');
    });

    it('stops at the result cap', async () => {
      fetchMock
        .mockResolvedValueOnce(jsonResponse({ issues: issues(1, 2), total: 10 }))
        .mockResolvedValueOnce(jsonResponse({ issues: issues(3, 1), total: 10 }));

      const found = await serverClient({ pageSize: 2, maxResults: 3 }).searchIssues('project = PROJ', {});

      expect(found).toHaveLength(3);
      expect(requestedUrl(1).searchParams.get('maxResults')).toBe('1');
    });

    it('stops after a short page', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ issues: issues(1, 30), total: 120 }));
      const found = await serverClient().searchIssues('project = PROJ', {});
      expect(found).toHaveLength(30);
      expect(fetchMock).toHaveBeenCalledTimes(1);
    });

    it('propagates a failed page', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ errorMessages: ['bad jql'] }, 400));
      await expect(serverClient().searchIssues('nonsense', {})).rejects.toThrow('API error: 400');
    });
  });

  describe('mostRecentComments', () => {
    it('makes no request for no keys', async () => {
      expect((await serverClient().mostRecentComments([])).size).toBe(0);
      expect(fetchMock).not.toHaveBeenCalled();
    });

    it('reads the comment endpoint for a single key', async () => {
      fetchMock.mockResolvedValueOnce(
        jsonResponse({
          comments: [
            { id: '1', created: '2024-05-01T09:00:00.000+0000' },
            { id: '2', created: '2024-06-01T09:00:00.000+0000' },
          ],
        }),
      );
      const latest = await serverClient().mostRecentComments(['PROJ-1']);

      expect(requestedUrl(0).pathname).toBe('/rest/api/2/issue/PROJ-1/comment');
      expect(latest.get('PROJ-1')).toEqual({ id: '2', created: '2024-06-01T09:00:00.000+0000' });
    });

    it('uses one search request for several keys', async () => {
      fetchMock.mockResolvedValueOnce(
        jsonResponse({
          issues: [
            { key: 'PROJ-1', fields: { comment: { comments: [{ id: '9', created: '2024-06-02T09:00:00.000+0000' }] } } },
            { key: 'PROJ-2', fields: { comment: { comments: [] } } },
          ],
        }),
      );
      const latest = await serverClient().mostRecentComments(['PROJ-1', 'PROJ-2']);

      expect(fetchMock).toHaveBeenCalledTimes(1);
      const params = requestedUrl(0).searchParams;
      expect(requestedUrl(0).pathname).toBe('/rest/api/2/search');
      expect(params.get('jql')).toBe('key in ("PROJ-1","PROJ-2")');
      expect(params.get('fields')).toBe('comment');
      expect(params.get('maxResults')).toBe('2');
      expect([...latest.keys()]).toEqual(['PROJ-1']);
      expect(latest.get('PROJ-1')?.id).toBe('9');
    });
  });
});

describe('paging helpers', () => {
  const limits = { pageSize: 50, maxResults: 120 };

  it('starts at zero with the smaller of page size and cap', () => {
    expect(firstPage(limits)).toEqual({ startAt: 0, maxResults: 50 });
    expect(firstPage({ pageSize: 50, maxResults: 10 })).toEqual({ startAt: 0, maxResults: 10 });
  });

  it('shrinks the last page to the remaining cap', () => {
    expect(nextPage({ startAt: 50, maxResults: 50 }, { received: 50, collected: 100, total: 500 }, limits)).toEqual({
      startAt: 100,
      maxResults: 20,
    });
  });

  it('ends at the total, the cap or a short page', () => {
    expect(nextPage({ startAt: 0, maxResults: 50 }, { received: 50, collected: 50, total: 50 }, limits)).toBeUndefined();
    expect(nextPage({ startAt: 100, maxResults: 20 }, { received: 20, collected: 120, total: 500 }, limits)).toBeUndefined();
    expect(nextPage({ startAt: 0, maxResults: 50 }, { received: 10, collected: 10, total: 500 }, limits)).toBeUndefined();
  });

  it('quotes keys in the bulk comment query', () => {
    expect(bulkCommentJql(['PROJ-1', 'PROJ-2'])).toBe('key in ("PROJ-1","PROJ-2")');
  });
});
