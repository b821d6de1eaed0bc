import { RemoteApiError } from '../errors.js';
import type { CommentInput, NormalizedTask, PhaseInput, ProjectInput, SourceComment } from '../model.js';
import type {
  DestinationProvider,
  RemoteActivity,
  RemoteComment,
  RemoteCompany,
  RemotePhase,
  RemoteProject,
  RemoteTask,
  RemoteUser,
} from './destination.js';
import type { SourceProjectHeader, SourceProvider, SourceTaskRecord } from './source.js';

/* ------------------------------------------------------------------ */
/*  Source                                                             */
/* ------------------------------------------------------------------ */

export interface MockSourceProject extends SourceProjectHeader {
  tasks: Array<SourceTaskRecord & { comments?: SourceComment[] }>;
}

/** In-memory source for tests and the demo command. */
export class MockSource implements SourceProvider {
  readonly name = 'mock-source';
  private projects = new Map<string, MockSourceProject>();
  private comments = new Map<string, SourceComment[]>();

  constructor(projects: MockSourceProject[] = []) {
    for (const p of projects) {
      this.projects.set(p.id, p);
      for (const t of p.tasks) if (t.comments?.length) this.comments.set(t.id, t.comments);
    }
  }

  async testConnection(): Promise<void> {}

  private require(id: string) {
    const p = this.projects.get(id);
    if (!p) throw new RemoteApiError(`Unknown project ${id}`, 'projects/get', [], 404);
    return p;
  }

  async getProject(id: string): Promise<SourceProjectHeader> {
    const { tasks: _tasks, ...header } = this.require(id);
    return header;
  }

  async findProjectByName(name: string): Promise<SourceProjectHeader | undefined> {
    const wanted = name.trim().toLowerCase();
    const hit = [...this.projects.values()].find((p) => p.name.trim().toLowerCase() === wanted);
    return hit ? this.getProject(hit.id) : undefined;
  }

  async listProjectTasks(projectId: string): Promise<SourceTaskRecord[]> {
    return this.require(projectId).tasks.map(({ comments: _comments, ...t }) => ({ ...t }));
  }

  async listTaskComments(taskId: string): Promise<SourceComment[]> {
    return [...(this.comments.get(taskId) ?? [])];
  }
}

/* ------------------------------------------------------------------ */
/*  Destination                                                        */
/* ------------------------------------------------------------------ */

export interface MockDestinationOptions {
  users?: RemoteUser[];
  activities?: RemoteActivity[];
  companies?: RemoteCompany[];
  projects?: RemoteProject[];
  phases?: RemotePhase[];
  /** User ids listed as active but refused when used on a task. */
  rejectedUserIds?: number[];
  /** Hook to make a call throw (e.g. a task by name). */
  failWith?: (op: string, payload: unknown) => Error | undefined;
}

export interface StoredTask extends NormalizedTask {
  id: number;
}

export interface StoredComment extends CommentInput {
  id: number;
}

/**
 * In-memory destination. Mirrors two production behaviours: the phase
 * listing ignores its project filter, and a task whose phase belongs to
 * another project is moved to that project.
 */
export class MockDestination implements DestinationProvider {
  readonly name = 'mock-destination';
  readonly users: RemoteUser[];
  readonly activities: RemoteActivity[];
  readonly companies: RemoteCompany[];
  readonly projects: RemoteProject[];
  readonly phases: RemotePhase[];
  readonly tasks: StoredTask[] = [];
  readonly comments: StoredComment[] = [];
  /** Operation name -> number of calls. */
  readonly calls: Record<string, number> = {};

  private nextId = 1000;
  private rejected: Set<number>;
  private failWith?: MockDestinationOptions['failWith'];

  constructor(opts: MockDestinationOptions = {}) {
    this.users = [...(opts.users ?? [])];
    this.activities = [...(opts.activities ?? [])];
    this.companies = [...(opts.companies ?? [])];
    this.projects = [...(opts.projects ?? [])];
    this.phases = [...(opts.phases ?? [])];
    this.rejected = new Set(opts.rejectedUserIds ?? []);
    this.failWith = opts.failWith;
  }

  private track(op: string, payload?: unknown) {
    this.calls[op] = (this.calls[op] ?? 0) + 1;
    const err = this.failWith?.(op, payload);
    if (err) throw err;
  }

  private id() {
    return this.nextId++;
  }

  async testConnection(): Promise<void> {
    this.track('testConnection');
  }

  async listUsers() {
    this.track('users/list');
    return this.users.map((u) => ({ ...u }));
  }

  async listActivities() {
    this.track('activities/list');
    return this.activities.map((a) => ({ ...a }));
  }

  async listCompanies() {
    this.track('companies/list');
    return this.companies.map((c) => ({ ...c }));
  }

  async createCompany(name: string): Promise<RemoteCompany> {
    this.track('companies/modify', { name });
    const company = { id: this.id(), name };
    this.companies.push(company);
    return { ...company };
  }

  async listProjects() {
    this.track('projects/list');
    return this.projects.map((p) => ({ ...p }));
  }

  async upsertProject(input: ProjectInput, id?: number): Promise<RemoteProject> {
    this.track('projects/modify', input);
    const existing = id === undefined ? undefined : this.projects.find((p) => p.id === id);
    if (existing) {
      existing.name = input.project_name;
      existing.companyId = input.company_id;
      existing.managerId = input.manager_id;
      return { ...existing };
    }
    const project: RemoteProject = {
      id: id ?? this.id(),
      name: input.project_name,
      companyId: input.company_id,
      managerId: input.manager_id,
    };
    this.projects.push(project);
    return { ...project };
  }

  /** The filter is accepted and ignored, like the real endpoint. */
  async listPhases(_projectId?: number) {
    this.track('projectPhases/list');
    return this.phases.map((p) => ({ ...p }));
  }

  async createPhase(input: PhaseInput): Promise<RemotePhase> {
    this.track('projectPhases/modify', input);
    const phase: RemotePhase = {
      id: this.id(),
      projectId: input.project_id,
      type: input.type,
      title: input.title,
      startDate: input.start_date,
      endDate: input.end_date,
    };
    this.phases.push(phase);
    return { ...phase };
  }

  async upsertTask(input: NormalizedTask, id?: number): Promise<RemoteTask> {
    this.track('tasks/modify', input);
    const refused = [input.owner_id, ...input.related_users].filter((u) => this.rejected.has(u));
    if (refused.length) {
      throw new RemoteApiError('Scoro rejected tasks/modify', 'tasks/modify', [`User ${refused[0]} cannot be assigned`]);
    }

    const phase = this.phases.find((p) => p.id === input.project_phase_id);
    const projectId = phase?.projectId ?? input.project_id;
    const stored: StoredTask = { ...input, project_id: projectId, id: id ?? this.id() };
    const idx = this.tasks.findIndex((t) => t.id === stored.id);
    if (idx === -1) this.tasks.push(stored);
    else this.tasks[idx] = stored;
    return { id: stored.id, name: stored.event_name, projectId, phaseId: stored.project_phase_id };
  }

  async createComment(input: CommentInput): Promise<RemoteComment> {
    this.track('comments/modify', input);
    const comment: StoredComment = { ...input, id: this.id() };
    this.comments.push(comment);
    return { id: comment.id };
  }
}
