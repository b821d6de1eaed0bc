import type { ProjectClassification } from '../model.js';
import type { DedupStats } from './dedup.js';

export type ProjectState =
  | 'Pending'
  | 'ResolveCompany'
  | 'UpsertProject'
  | 'CreatePhases'
  | 'ImportTasks'
  | 'Done'
  | 'Failed';

export type FailureStage = 'export' | 'plan' | ProjectState | 'comment';

export interface FailureDescriptor {
  projectId: string;
  projectName: string;
  taskId?: string;
  taskName?: string;
  stage: FailureStage;
  message: string;
}

export interface ProjectOutcome {
  projectId: string;
  projectName: string;
  classification?: ProjectClassification;
  state: ProjectState;
  destinationId?: number;
  companyId?: number;
  tasks: { planned: number; created: number; failed: number; excluded: number; deduplicated: number; replaced: number };
  comments: { created: number; failed: number };
  phases: { created: number; failed: number };
}

export interface MigrationReport {
  startedAt: string;
  finishedAt?: string;
  dryRun: boolean;
  counters: {
    attempted: number;
    succeeded: number;
    failed: number;
    dedupClient: number;
    dedupTeam: number;
  };
  projects: ProjectOutcome[];
  failures: FailureDescriptor[];
}

export class MigrationSummary {
  attempted = 0;
  succeeded = 0;
  failed = 0;
  dedupClient = 0;
  dedupTeam = 0;
  readonly startedAt: string;
  finishedAt?: string;

  private projects = new Map<string, ProjectOutcome>();
  private failures: FailureDescriptor[] = [];

  constructor(
    private now: () => Date = () => new Date(),
    readonly dryRun = false,
  ) {
    this.startedAt = now().toISOString();
  }

  project(projectId: string, projectName = projectId): ProjectOutcome {
    let p = this.projects.get(projectId);
    if (!p) {
      p = {
        projectId,
        projectName,
        state: 'Pending',
        tasks: { planned: 0, created: 0, failed: 0, excluded: 0, deduplicated: 0, replaced: 0 },
        comments: { created: 0, failed: 0 },
        phases: { created: 0, failed: 0 },
      };
      this.projects.set(projectId, p);
    }
    return p;
  }

  recordFailure(f: FailureDescriptor): void {
    this.failures.push(f);
  }

  taskAttempted(): void {
    this.attempted++;
  }

  taskSucceeded(projectId: string): void {
    this.succeeded++;
    this.project(projectId).tasks.created++;
  }

  taskFailed(f: FailureDescriptor): void {
    this.failed++;
    this.project(f.projectId).tasks.failed++;
    this.recordFailure(f);
  }

  applyDedup(stats: DedupStats): void {
    this.dedupClient = stats.dropped.client;
    this.dedupTeam = stats.dropped['team-member'];
  }

  finish(): void {
    this.finishedAt = this.now().toISOString();
  }

  failuresFor(projectId: string): FailureDescriptor[] {
    return this.failures.filter((f) => f.projectId === projectId);
  }

  toReport(): MigrationReport {
    return {
      startedAt: this.startedAt,
      finishedAt: this.finishedAt,
      dryRun: this.dryRun,
      counters: {
        attempted: this.attempted,
        succeeded: this.succeeded,
        failed: this.failed,
        dedupClient: this.dedupClient,
        dedupTeam: this.dedupTeam,
      },
      projects: [...this.projects.values()].map((p) => structuredClone(p)),
      failures: this.failures.map((f) => ({ ...f })),
    };
  }
}

export function formatSummary(r: MigrationReport): string {
  const lines: string[] = [];
  const c = r.counters;
  lines.push(`Migration ${r.dryRun ? '(dry run) ' : ''}started ${r.startedAt}${r.finishedAt ? `, finished ${r.finishedAt}` : ''}`);
  lines.push(`Tasks: ${c.attempted} attempted, ${c.succeeded} succeeded, ${c.failed} failed`);
  lines.push(`Duplicates dropped: ${c.dedupClient} client, ${c.dedupTeam} team-member`);

  for (const p of r.projects) {
    const dest = p.destinationId !== undefined ? ` -> ${p.destinationId}` : '';
    lines.push(`- ${p.projectName} [${p.projectId}]${dest}: ${p.state}`);
    lines.push(
      `    tasks ${p.tasks.created}/${p.tasks.planned} created, ${p.tasks.failed} failed, ` +
        `${p.tasks.excluded} excluded, ${p.tasks.deduplicated} deduplicated, ${p.tasks.replaced} replaced`,
    );
    lines.push(
      `    phases ${p.phases.created} created (${p.phases.failed} failed), ` +
        `comments ${p.comments.created} created (${p.comments.failed} failed)`,
    );
  }

  if (r.failures.length) {
    lines.push(`Failures (${r.failures.length}):`);
    for (const f of r.failures) {
      const task = f.taskId ? ` task ${f.taskId}${f.taskName ? ` "${f.taskName}"` : ''}` : '';
      lines.push(`  ${f.projectName} [${f.stage}]${task}: ${f.message}`);
    }
  }
  return lines.join('\n');
}
