import { describe, expect, it } from 'vitest';
import { existsSync } from 'node:fs';
import { mkdtemp } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { DEMO_FALLBACK_USER_ID, demoDestination, demoSourceProjects } from '../src/demo.js';
import { FatalConfigError } from '../src/errors.js';
import { HttpError } from '../src/http.js';
import { CategoryMapper } from '../src/migrate/categories.js';
import { RunContext, type RunSettings } from '../src/migrate/context.js';
import { MigrationEngine } from '../src/migrate/engine.js';
import type { MigrationPhase, StatusNotifier } from '../src/notify.js';
import { MockDestination, MockSource, type MockDestinationOptions, type MockSourceProject } from '../src/providers/mock.js';
import type { SourceTaskRecord } from '../src/providers/source.js';
import { RateLimitedExecutor, retryPolicy } from '../src/retry.js';
import { ExportStore } from '../src/store/exportStore.js';

function rec(id: string, name: string, extra: Partial<SourceTaskRecord> = {}): SourceTaskRecord {
  return {
    id,
    name,
    assigneeNames: [],
    categoryLabel: '',
    completed: false,
    completedAt: null,
    isMilestone: false,
    customFields: {},
    ...extra,
  };
}

const shared = rec('T-100', 'Homepage mockup review', { assigneeNames: ['Dana Reyes'], section: 'Website Design' });

const sourceProjects: MockSourceProject[] = [
  {
    id: 'P-1',
    name: "Dana's tasks",
    tasks: [{ ...shared }, rec('T-200', 'Update OKR sheet', { assigneeNames: ['Dana Reyes'] })],
  },
  {
    id: 'P-2',
    name: 'Acme Roofing',
    tasks: [
      {
        ...rec('T-300', 'Kick-off call', { customFields: { 'PM Name': 'Sam Ortiz' } }),
        comments: [{ id: 'S-1', authorName: 'Sam Ortiz', text: 'Call booked for Tuesday.' }],
      },
      { ...shared },
    ],
  },
];

const destinationData: MockDestinationOptions = {
  users: [
    { id: 1, firstname: 'Ops', lastname: 'Admin', fullName: 'Ops Admin', isActive: true },
    { id: 2, firstname: 'Sam', lastname: 'Ortiz', fullName: 'Sam Ortiz', isActive: true },
    { id: 3, firstname: 'Dana', lastname: 'Reyes', fullName: 'Dana Reyes', isActive: true },
  ],
  activities: [{ id: 10, name: 'Other', isActive: true }],
};

class RecordingNotifier implements StatusNotifier {
  seen: string[] = [];
  async notify(projectId: string, _projectName: string, phase: MigrationPhase) {
    this.seen.push(`${phase}:${projectId}`);
  }
}

function setup(opts: { destination?: MockDestinationOptions; settings?: Partial<RunSettings>; lockDir?: string } = {}) {
  const source = new MockSource(sourceProjects);
  const destination = new MockDestination(opts.destination ?? destinationData);
  const context = new RunContext({
    destination,
    executor: new RateLimitedExecutor(retryPolicy({ minIntervalMs: 0 })),
    mapper: new CategoryMapper({}),
    settings: { fallbackUserId: 1, ...opts.settings },
  });
  const notifier = new RecordingNotifier();
  const engine = new MigrationEngine({ source, context, notifier, lockDir: opts.lockDir });
  return { source, destination, context, notifier, engine };
}

const both = [
  { by: 'gid' as const, value: 'P-1' },
  { by: 'gid' as const, value: 'P-2' },
];

describe('MigrationEngine', () => {
  it('migrates every project and writes a shared task once, under the client project', async () => {
    const { destination, engine, notifier } = setup();

    const report = await engine.run(both);

    expect(report.counters).toEqual({ attempted: 3, succeeded: 3, failed: 0, dedupClient: 0, dedupTeam: 1 });
    expect(report.projects.map((p) => [p.projectId, p.state, p.tasks.planned])).toEqual([
      ['P-1', 'Done', 1],
      ['P-2', 'Done', 2],
    ]);
    expect(report.projects[0]?.tasks.deduplicated).toBe(1);
    expect(report.projects[1]?.tasks.replaced).toBe(1);

    expect(destination.tasks.map((t) => t.event_name)).toEqual(['Update OKR sheet', 'Kick-off call', 'Homepage mockup review']);
    const acme = report.projects.find((p) => p.projectId === 'P-2');
    const homepage = destination.tasks.filter((t) => t.event_name === 'Homepage mockup review');
    expect(homepage).toHaveLength(1);
    expect(homepage[0]?.project_id).toBe(acme?.destinationId);
    expect(destination.comments.map((c) => c.comment)).toEqual(['Call booked for Tuesday.']);

    expect(notifier.seen).toEqual(['Phase1:P-1', 'Phase1:P-2', 'Phase2:P-1', 'Phase2:P-2', 'Phase3:P-1', 'Phase3:P-2']);
    expect(report.failures).toEqual([]);
    expect(report.finishedAt).toBeDefined();
  });

  it('reaches the same ownership when the client project is listed first', async () => {
    const { destination, engine } = setup();

    const report = await engine.run([...both].reverse());

    expect(report.counters.dedupTeam).toBe(1);
    expect(destination.tasks.map((t) => t.event_name)).toEqual(['Kick-off call', 'Homepage mockup review', 'Update OKR sheet']);
  });

  it('writes nothing on a dry run', async () => {
    const { destination, engine } = setup({ settings: { dryRun: true } });

    const report = await engine.run(both);

    expect(report.dryRun).toBe(true);
    expect(report.projects.map((p) => [p.state, p.tasks.planned])).toEqual([
      ['Pending', 1],
      ['Pending', 2],
    ]);
    expect(report.counters.attempted).toBe(0);
    expect(destination.calls).toEqual({});
  });

  it('records an unknown project and carries on with the rest', async () => {
    const { engine } = setup();

    const report = await engine.run([{ by: 'gid', value: 'P-404' }, ...both]);

    expect(report.projects.map((p) => [p.projectId, p.state])).toEqual([
      ['P-404', 'Failed'],
      ['P-1', 'Done'],
      ['P-2', 'Done'],
    ]);
    expect(report.failures.map((f) => [f.projectId, f.stage])).toEqual([['P-404', 'export']]);
  });

  it('finds projects by name and skips repeats', async () => {
    const { destination, engine } = setup();

    const report = await engine.run([
      { by: 'name', value: 'acme roofing' },
      { by: 'gid', value: 'P-2' },
    ]);

    expect(report.projects.map((p) => p.projectId)).toEqual(['P-2']);
    expect(destination.tasks).toHaveLength(2);
  });

  it('aborts before exporting when the destination rejects the credentials', async () => {
    const { destination, engine, notifier } = setup({
      destination: {
        ...destinationData,
        failWith: (op) =>
          op === 'testConnection' ? new HttpError('HTTP 401', 401, 'https://acme.scoro.com/api/v2/users/list') : undefined,
      },
    });

    await expect(engine.run(both)).rejects.toBeInstanceOf(FatalConfigError);
    expect(notifier.seen).toEqual([]);
    expect(destination.calls['tasks/modify']).toBeUndefined();
  });

  it('holds the state-dir lock only while running', async () => {
    const dir = await mkdtemp(path.join(os.tmpdir(), 'migrate-'));
    const { engine } = setup({ lockDir: dir });

    await engine.run(both);
    expect(existsSync(path.join(dir, 'lock'))).toBe(false);
  });

  it('saves export snapshots when a store is given', async () => {
    const dir = await mkdtemp(path.join(os.tmpdir(), 'migrate-'));
    const store = new ExportStore(dir);
    const context = new RunContext({
      destination: new MockDestination(destinationData),
      executor: new RateLimitedExecutor(retryPolicy({ minIntervalMs: 0 })),
      settings: { fallbackUserId: 1, dryRun: true },
    });
    const engine = new MigrationEngine({ source: new MockSource(sourceProjects), context, exportStore: store });

    await engine.run(both);
    const snapshot = await store.latest('P-2');
    expect(snapshot?.project.tasks.map((t) => t.id)).toEqual(['T-300', 'T-100']);
    expect(snapshot?.project.classification).toBe('client');
  });

  it('runs the demo data end to end', async () => {
    const context = new RunContext({
      destination: new MockDestination(demoDestination()),
      executor: new RateLimitedExecutor(retryPolicy({ minIntervalMs: 0 })),
      settings: { fallbackUserId: DEMO_FALLBACK_USER_ID },
    });
    const engine = new MigrationEngine({ source: new MockSource(demoSourceProjects()), context });

    const report = await engine.run([
      { by: 'gid', value: 'P-1' },
      { by: 'gid', value: 'P-2' },
    ]);

    expect(report.projects.map((p) => p.state)).toEqual(['Done', 'Done']);
    expect(report.counters).toMatchObject({ attempted: 4, succeeded: 4, failed: 0, dedupTeam: 1 });
  });
});
