import { describe, expect, it } from 'vitest';
import { RemoteApiError } from '../src/errors.js';
import { HttpError } from '../src/http.js';
import { ScoroProvider, scoroAccount } from '../src/providers/scoro.js';

function jsonResponse(obj: unknown, status = 200) {
  return new Response(JSON.stringify(obj), {
    status,
    headers: { 'content-type': 'application/json' },
  });
}

function stub(responses: Response[]) {
  const calls: Array<{ url: string; method: string; body: Record<string, unknown> }> = [];
  const fetcher: typeof fetch = async (url, init) => {
    calls.push({
      url: url.toString(),
      method: init?.method ?? 'GET',
      body: JSON.parse(String(init?.body)) as Record<string, unknown>,
    });
    return responses.shift() ?? new Response('no more responses', { status: 500 });
  };
  return { calls, fetcher };
}

describe('scoroAccount', () => {
  it('reduces URLs to the account name', () => {
    expect(scoroAccount('acme')).toBe('acme');
    expect(scoroAccount(' https://acme.scoro.com/ ')).toBe('acme');
    expect(scoroAccount('acme.scoro.com/api/v2')).toBe('acme');
  });
});

describe('ScoroProvider', () => {
  it('posts the request envelope and pages until a short page', async () => {
    const { calls, fetcher } = stub([
      jsonResponse({
        status: 'OK',
        data: [
          { id: 1, firstname: 'Jane', lastname: 'Doe', full_name: 'Jane Doe', is_active: '1' },
          { user_id: '2', name: 'Bob', status: 'inactive' },
        ],
      }),
      jsonResponse({ status: 'OK', data: [{ id: 3, firstname: 'Al' }] }),
    ]);
    const p = new ScoroProvider({ apiKey: 'test-secret', companyAccount: 'https://acme.scoro.com/', pageSize: 2, fetcher });

    const users = await p.listUsers();
    expect(users).toEqual([
      { id: 1, firstname: 'Jane', lastname: 'Doe', fullName: 'Jane Doe', isActive: true },
      { id: 2, fullName: 'Bob', isActive: false },
      { id: 3, firstname: 'Al', isActive: true },
    ]);

    expect(calls).toHaveLength(2);
    expect(calls[0]).toEqual({
      url: 'https://acme.scoro.com/api/v2/users/list',
      method: 'POST',
      body: { lang: 'eng', company_account_id: 'acme', apiKey: 'test-secret', page: 1, per_page: 2, request: {} },
    });
    expect(calls[1]?.body.page).toBe(2);
  });

  it('ends a listing when a later page is rejected', async () => {
    const users = [
      { id: 1, firstname: 'Jane' },
      { id: 2, firstname: 'Bob' },
    ];
    const rejected = stub([
      jsonResponse({ status: 'OK', data: users }),
      jsonResponse({ status: 'ERROR', messages: { error: ['Page not found'] } }),
    ]);
    const p = new ScoroProvider({ apiKey: 'test-secret', companyAccount: 'acme', pageSize: 2, fetcher: rejected.fetcher });
    expect((await p.listUsers()).map((u) => u.id)).toEqual([1, 2]);
    expect(rejected.calls).toHaveLength(2);

    const notFound = stub([jsonResponse({ status: 'OK', data: users }), new Response('gone', { status: 404 })]);
    const q = new ScoroProvider({ apiKey: 'test-secret', companyAccount: 'acme', pageSize: 2, fetcher: notFound.fetcher });
    expect((await q.listUsers()).map((u) => u.id)).toEqual([1, 2]);
  });

  it('still fails a listing on a transient error past the first page', async () => {
    const { fetcher } = stub([
      jsonResponse({ status: 'OK', data: [{ id: 1 }, { id: 2 }] }),
      new Response('busy', { status: 503 }),
    ]);
    const p = new ScoroProvider({ apiKey: 'test-secret', companyAccount: 'acme', pageSize: 2, fetcher });
    await expect(p.listUsers()).rejects.toBeInstanceOf(HttpError);
  });

  it('stops when the remote keeps returning the same page', async () => {
    let requests = 0;
    const fetcher: typeof fetch = async () => {
      requests++;
      return jsonResponse({ status: 'OK', data: [{ id: 1 }, { id: 2 }] });
    };
    const p = new ScoroProvider({ apiKey: 'test-secret', companyAccount: 'acme', pageSize: 2, fetcher });

    expect((await p.listUsers()).map((u) => u.id)).toEqual([1, 2]);
    expect(requests).toBe(2);
  });

  it('caps the number of pages per listing', async () => {
    const pages: number[] = [];
    const fetcher: typeof fetch = async (_url, init) => {
      const body: unknown = JSON.parse(String(init?.body));
      const page = body && typeof body === 'object' && 'page' in body ? Number(body.page) : 0;
      pages.push(page);
      return jsonResponse({ status: 'OK', data: [{ id: page * 2 - 1 }, { id: page * 2 }] });
    };
    const p = new ScoroProvider({ apiKey: 'test-secret', companyAccount: 'acme', pageSize: 2, maxPages: 3, fetcher });

    expect((await p.listUsers()).map((u) => u.id)).toEqual([1, 2, 3, 4, 5, 6]);
    expect(pages).toEqual([1, 2, 3]);
  });

  it('sends the credential under user_token when configured', async () => {
    const { calls, fetcher } = stub([jsonResponse({ status: 'OK', data: [] })]);
    const p = new ScoroProvider({ apiKey: 'test-secret', companyAccount: 'acme', authField: 'user_token', fetcher });

    await p.listActivities();
    expect(calls[0]?.body.user_token).toBe('test-secret');
    expect(calls[0]?.body).not.toHaveProperty('apiKey');
  });

  it('forwards the phase project filter', async () => {
    const { calls, fetcher } = stub([
      jsonResponse({ status: 'OK', data: [{ id: 7, project_id: 33, title: 'Website Design', type: 'phase' }] }),
    ]);
    const p = new ScoroProvider({ apiKey: 'test-secret', companyAccount: 'acme', fetcher });

    expect(await p.listPhases(104)).toEqual([{ id: 7, projectId: 33, type: 'phase', title: 'Website Design' }]);
    expect(calls[0]?.body.request).toEqual({ filters: { project_id: 104 } });
  });

  it('skips malformed records', async () => {
    const { fetcher } = stub([
      jsonResponse({ status: 'OK', data: [{ activity_id: 10, name: 'Other' }, { name: 'no id' }] }),
    ]);
    const p = new ScoroProvider({ apiKey: 'test-secret', companyAccount: 'acme', fetcher });
    expect(await p.listActivities()).toEqual([{ id: 10, name: 'Other', isActive: true }]);
  });

  it('updates by id through the modify path', async () => {
    const { calls, fetcher } = stub([
      jsonResponse({ status: 'OK', data: { event_id: 900, event_name: 'Design', project_id: 3 } }),
    ]);
    const p = new ScoroProvider({ apiKey: 'test-secret', companyAccount: 'acme', fetcher });

    const task = await p.upsertTask(
      {
        event_name: 'Design',
        project_id: 3,
        owner_id: 1,
        related_users: [1],
        is_completed: false,
        status: 'task_status1',
      },
      55,
    );
    expect(task).toEqual({ id: 900, name: 'Design', projectId: 3 });
    expect(calls[0]?.url).toBe('https://acme.scoro.com/api/v2/tasks/modify/55');
    expect(calls[0]?.body.request).toEqual({
      event_name: 'Design',
      project_id: 3,
      owner_id: 1,
      related_users: [1],
      is_completed: false,
      status: 'task_status1',
    });
  });

  it('turns an ERROR envelope into RemoteApiError', async () => {
    const { fetcher } = stub([
      jsonResponse({ status: 'ERROR', statusCode: 400, messages: { error: ['Project name missing'] } }),
    ]);
    const p = new ScoroProvider({ apiKey: 'test-secret', companyAccount: 'acme', fetcher });

    const err = await p.upsertProject({ project_name: '' }).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(RemoteApiError);
    if (err instanceof RemoteApiError) {
      expect(err.endpoint).toBe('projects/modify');
      expect(err.messages).toEqual(['Project name missing']);
    }
  });

  it('surfaces HTTP failures as HttpError', async () => {
    const { fetcher } = stub([new Response('busy', { status: 503 })]);
    const p = new ScoroProvider({ apiKey: 'test-secret', companyAccount: 'acme', fetcher });
    await expect(p.testConnection()).rejects.toBeInstanceOf(HttpError);
  });
});
