import { describe, expect, it } from 'vitest';
import { HttpError } from '../src/http.js';
import { AsanaProvider } from '../src/providers/asana.js';

function jsonResponse(obj: unknown, status = 200) {
  return new Response(JSON.stringify(obj), {
    status,
    headers: { 'content-type': 'application/json' },
  });
}

describe('AsanaProvider', () => {
  it('pages through project tasks and maps fields', async () => {
    const urls: URL[] = [];
    const auth: Array<string | null> = [];

    const fetcher: typeof fetch = async (url, init) => {
      const u = new URL(url.toString());
      urls.push(u);
      auth.push(new Headers(init?.headers).get('authorization'));

      if (u.pathname === '/api/1.0/projects/P1/tasks' && !u.searchParams.has('offset')) {
        return jsonResponse({
          data: [
            {
              gid: '1',
              name: ' Design ',
              notes: 'Hi',
              html_notes: '<body>Hi</body>',
              due_on: '2024-03-08',
              start_on: null,
              assignee: { gid: 'u1', name: 'Dana Reyes' },
              created_by: { gid: 'u2', name: 'Sam Ortiz' },
              completed: false,
              completed_at: null,
              created_at: '2024-01-01T00:00:00.000Z',
              custom_fields: [
                { name: 'Task Category', display_value: 'Copywriter' },
                { name: 'Priority', enum_value: { gid: 'e1', name: 'High' } },
                { name: 'Actual time', number_value: 1.5 },
                { name: 'Empty', display_value: null },
              ],
              memberships: [
                { project: { gid: 'other' }, section: { name: 'Backlog' } },
                { project: { gid: 'P1' }, section: { name: ' Website Design ' } },
              ],
              resource_subtype: 'default_task',
            },
          ],
          next_page: { offset: 'abc' },
        });
      }
      if (u.pathname === '/api/1.0/projects/P1/tasks') {
        return jsonResponse({
          data: [
            {
              gid: '2',
              name: 'Go live',
              resource_subtype: 'milestone',
              completed: true,
              completed_at: '2024-04-01T10:00:00.000Z',
              due_at: '2024-04-01T12:00:00.000Z',
            },
          ],
          next_page: null,
        });
      }
      return new Response('not found', { status: 404 });
    };

    const p = new AsanaProvider({ accessToken: 'test-token', pageSize: 1, fetcher });
    const tasks = await p.listProjectTasks('P1');

    expect(tasks).toEqual([
      {
        id: '1',
        name: 'Design',
        assigneeNames: ['Dana Reyes'],
        creatorName: 'Sam Ortiz',
        categoryLabel: 'Copywriter',
        completed: false,
        completedAt: null,
        createdAt: '2024-01-01T00:00:00.000Z',
        dueOn: '2024-03-08',
        notes: '<body>Hi</body>',
        section: 'Website Design',
        isMilestone: false,
        customFields: { 'Task Category': 'Copywriter', Priority: 'High', 'Actual time': '1.5' },
      },
      {
        id: '2',
        name: 'Go live',
        assigneeNames: [],
        categoryLabel: '',
        completed: true,
        completedAt: '2024-04-01T10:00:00.000Z',
        dueOn: '2024-04-01T12:00:00.000Z',
        isMilestone: true,
        customFields: {},
      },
    ]);

    expect(urls).toHaveLength(2);
    expect(urls[0]?.searchParams.get('limit')).toBe('1');
    expect(urls[1]?.searchParams.get('offset')).toBe('abc');
    expect(auth).toEqual(['Bearer test-token', 'Bearer test-token']);
  });

  it('keeps only comment stories with text', async () => {
    const fetcher: typeof fetch = async () =>
      jsonResponse({
        data: [
          { gid: 's1', type: 'comment', text: 'Looks good', created_at: '2024-03-01T10:00:00.000Z', created_by: { name: 'Sam Ortiz' } },
          { gid: 's2', type: 'system', resource_subtype: 'assigned', text: 'assigned to Dana' },
          { gid: 's3', resource_subtype: 'comment_added', text: '  ' },
        ],
      });

    const p = new AsanaProvider({ accessToken: 'test-token', fetcher });
    expect(await p.listTaskComments('1')).toEqual([
      { id: 's1', authorName: 'Sam Ortiz', text: 'Looks good', createdAt: '2024-03-01T10:00:00.000Z' },
    ]);
  });

  it('finds a project by name across workspaces', async () => {
    const fetcher: typeof fetch = async (url) => {
      const u = new URL(url.toString());
      if (u.pathname === '/api/1.0/workspaces') return jsonResponse({ data: [{ gid: 'w1' }, { gid: 'w2' }] });
      if (u.pathname === '/api/1.0/workspaces/w1/projects') return jsonResponse({ data: [{ gid: 'p8', name: 'Internal' }] });
      if (u.pathname === '/api/1.0/workspaces/w2/projects') {
        return jsonResponse({ data: [{ gid: 'p9', name: 'Acme Roofing', notes: null, due_on: '2024-06-30' }] });
      }
      return new Response('not found', { status: 404 });
    };

    const p = new AsanaProvider({ accessToken: 'test-token', fetcher });
    expect(await p.findProjectByName('acme roofing')).toEqual({ id: 'p9', name: 'Acme Roofing', dueOn: '2024-06-30' });
    expect(await p.findProjectByName('Nope')).toBeUndefined();
  });

  it('reads a single project by gid', async () => {
    const fetcher: typeof fetch = async () =>
      jsonResponse({ data: { gid: 'p9', name: 'Acme Roofing', notes: 'Rebuild', start_on: '2024-01-15' } });
    const p = new AsanaProvider({ accessToken: 'test-token', fetcher });
    expect(await p.getProject('p9')).toEqual({ id: 'p9', name: 'Acme Roofing', notes: 'Rebuild', startOn: '2024-01-15' });
  });

  it('reports rejected credentials as HttpError 401', async () => {
    const fetcher: typeof fetch = async () => new Response('{"errors":[]}', { status: 401 });
    const p = new AsanaProvider({ accessToken: 'test-token', fetcher });
    const err = await p.testConnection().catch((e: unknown) => e);
    expect(err).toBeInstanceOf(HttpError);
    if (err instanceof HttpError) expect(err.status).toBe(401);
  });
});
