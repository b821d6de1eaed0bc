import { z } from 'zod';
import { HttpError, requestJson, type FetchLike } from '../http.js';
import { RemoteApiError, isAuthError, isTransientError } from '../errors.js';
import { createLogger, type Logger } from '../log.js';
import type { CommentInput, NormalizedTask, PhaseInput, ProjectInput } from '../model.js';
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

export type ScoroAuthField = 'apiKey' | 'user_token';

export interface ScoroProviderOptions {
  apiKey: string;
  /** Account subdomain, or the full account URL. */
  companyAccount: string;
  /** Which envelope key carries the credential (default apiKey). */
  authField?: ScoroAuthField;
  pageSize?: number;
  /** Upper bound on pages fetched per listing (default 1000). */
  maxPages?: number;
  timeoutMs?: number;
  logger?: Logger;
  /** Inject fetch for tests */
  fetcher?: FetchLike;
}

/** "https://acme.scoro.com/foo" -> "acme". */
export function scoroAccount(input: string): string {
  let v = input.trim().replace(/^https?:\/\//i, '');
  const idx = v.toLowerCase().indexOf('.scoro.com');
  if (idx !== -1) v = v.slice(0, idx);
  return v.split('/')[0] ?? '';
}

/* ------------------------------------------------------------------ */
/*  Raw record schemas                                                 */
/* ------------------------------------------------------------------ */

const IdLike = z
  .union([z.number().int(), z.string().regex(/^\d+$/).transform(Number)])
  .nullish()
  .transform((v) => v ?? undefined);

const OptStr = z
  .union([z.string(), z.number().transform(String)])
  .nullish()
  .transform((v) => (v ? v : undefined));

const Flag = z
  .union([z.boolean(), z.number(), z.string()])
  .nullish()
  .transform((v) => {
    if (v === null || v === undefined) return undefined;
    if (typeof v === 'boolean') return v;
    if (typeof v === 'number') return v !== 0;
    return !['0', 'false', 'no', ''].includes(v.trim().toLowerCase());
  });

function firstId(...ids: Array<number | undefined>): number | undefined {
  return ids.find((id) => id !== undefined);
}

const missingId = (what: string) => (ctx: z.RefinementCtx) => {
  ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${what} record without id` });
  return z.NEVER;
};

export const ScoroUserSchema = z
  .object({
    id: IdLike,
    user_id: IdLike,
    firstname: OptStr,
    lastname: OptStr,
    full_name: OptStr,
    name: OptStr,
    email: OptStr,
    is_active: Flag,
    status: OptStr,
  })
  .transform((u, ctx): RemoteUser => {
    const id = firstId(u.id, u.user_id);
    if (id === undefined) return missingId('user')(ctx);
    const inactive = u.is_active === false || u.status?.toLowerCase() === 'inactive';
    return {
      id,
      firstname: u.firstname,
      lastname: u.lastname,
      fullName: u.full_name ?? u.name,
      email: u.email,
      isActive: !inactive,
    };
  });

export const ScoroPhaseSchema = z
  .object({
    id: IdLike,
    phase_id: IdLike,
    project_id: IdLike,
    type: OptStr,
    title: OptStr,
    name: OptStr,
    start_date: OptStr,
    end_date: OptStr,
  })
  .transform((p, ctx): RemotePhase => {
    const id = firstId(p.id, p.phase_id);
    if (id === undefined) return missingId('phase')(ctx);
    return {
      id,
      projectId: p.project_id,
      type: p.type === 'milestone' ? 'milestone' : 'phase',
      title: p.title ?? p.name ?? '',
      startDate: p.start_date,
      endDate: p.end_date,
    };
  });

export const ScoroCompanySchema = z
  .object({
    id: IdLike,
    company_id: IdLike,
    client_id: IdLike,
    contact_id: IdLike,
    name: OptStr,
    search_name: OptStr,
  })
  .transform((c, ctx): RemoteCompany => {
    const id = firstId(c.id, c.company_id, c.client_id, c.contact_id);
    if (id === undefined) return missingId('company')(ctx);
    return { id, name: c.name ?? c.search_name ?? '' };
  });

export const ScoroProjectSchema = z
  .object({
    id: IdLike,
    project_id: IdLike,
    project_name: OptStr,
    name: OptStr,
    company_id: IdLike,
    manager_id: IdLike,
  })
  .transform((p, ctx): RemoteProject => {
    const id = firstId(p.project_id, p.id);
    if (id === undefined) return missingId('project')(ctx);
    return { id, name: p.project_name ?? p.name ?? '', companyId: p.company_id, managerId: p.manager_id };
  });

export const ScoroActivitySchema = z
  .object({
    id: IdLike,
    activity_id: IdLike,
    name: OptStr,
    is_active: Flag,
  })
  .transform((a, ctx): RemoteActivity => {
    const id = firstId(a.activity_id, a.id);
    if (id === undefined) return missingId('activity')(ctx);
    return { id, name: a.name ?? '', isActive: a.is_active ?? true };
  });

export const ScoroTaskSchema = z
  .object({
    id: IdLike,
    event_id: IdLike,
    task_id: IdLike,
    event_name: OptStr,
    project_id: IdLike,
    project_phase_id: IdLike,
  })
  .transform((t, ctx): RemoteTask => {
    const id = firstId(t.event_id, t.task_id, t.id);
    if (id === undefined) return missingId('task')(ctx);
    return { id, name: t.event_name ?? '', projectId: t.project_id, phaseId: t.project_phase_id };
  });

const ScoroCommentSchema = z
  .object({ id: IdLike, comment_id: IdLike })
  .transform((c, ctx): RemoteComment => {
    const id = firstId(c.comment_id, c.id);
    if (id === undefined) return missingId('comment')(ctx);
    return { id };
  });

const EnvelopeSchema = z.object({
  status: z.string().optional(),
  messages: z.unknown().optional(),
  data: z.unknown().optional(),
});

function collectMessages(m: unknown): string[] {
  if (m === null || m === undefined) return [];
  if (typeof m === 'string') return [m];
  if (Array.isArray(m)) return m.flatMap(collectMessages);
  if (typeof m === 'object') return Object.values(m).flatMap(collectMessages);
  return [String(m)];
}

function isEndOfPages(e: unknown) {
  if (isTransientError(e) || isAuthError(e)) return false;
  return e instanceof RemoteApiError || (e instanceof HttpError && e.status >= 400 && e.status < 500);
}

function asRecords(data: unknown): unknown[] {
  if (Array.isArray(data)) return data;
  if (data && typeof data === 'object') return Object.values(data);
  return [];
}

/* ------------------------------------------------------------------ */
/*  Client                                                             */
/* ------------------------------------------------------------------ */

export class ScoroProvider implements DestinationProvider {
  readonly name = 'scoro';
  readonly account: string;
  private baseUrl: string;
  private fetcher: FetchLike;
  private logger: Logger;
  private pageSize: number;
  private maxPages: number;

  constructor(private opts: ScoroProviderOptions) {
    this.account = scoroAccount(opts.companyAccount);
    this.baseUrl = `https://${this.account}.scoro.com/api/v2`;
    this.fetcher = opts.fetcher ?? fetch;
    this.logger = opts.logger ?? createLogger('silent');
    this.pageSize = opts.pageSize ?? 100;
    this.maxPages = opts.maxPages ?? 1000;
  }

  private envelope(request: Record<string, unknown>, extra: Record<string, unknown> = {}) {
    return {
      lang: 'eng',
      company_account_id: this.account,
      [this.opts.authField ?? 'apiKey']: this.opts.apiKey,
      ...extra,
      request,
    };
  }

  /** POST one envelope and return its `data`; `status: ERROR` becomes RemoteApiError. */
  private async call(endpoint: string, request: Record<string, unknown>, extra?: Record<string, unknown>) {
    const raw = await requestJson<unknown>(
      `${this.baseUrl}/${endpoint}`,
      { method: 'POST', body: this.envelope(request, extra), timeoutMs: this.opts.timeoutMs },
      this.fetcher,
    );
    const env = EnvelopeSchema.safeParse(raw ?? {});
    if (!env.success) throw new RemoteApiError(`Unexpected response shape from ${endpoint}`, endpoint);
    if (env.data.status === 'ERROR') {
      const messages = collectMessages(env.data.messages);
      throw new RemoteApiError(`Scoro rejected ${endpoint}`, endpoint, messages);
    }
    return env.data.data;
  }

  private parseList<T>(endpoint: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, records: unknown[]): T[] {
    const out: T[] = [];
    for (const r of records) {
      const parsed = schema.safeParse(r);
      if (parsed.success) out.push(parsed.data);
      else this.logger.warn(`${endpoint}: skipping malformed record`, parsed.error.issues[0]?.message);
    }
    return out;
  }

  private parseOne<T>(endpoint: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown): T {
    const parsed = schema.safeParse(data);
    if (!parsed.success) {
      throw new RemoteApiError(`Malformed ${endpoint} response`, endpoint, parsed.error.issues.map((i) => i.message));
    }
    return parsed.data;
  }

  /**
   * Page through a listing until a short page. Past the first page, a
   * rejected request means there are no more pages; a page that repeats the
   * previous one, or hitting `maxPages`, also ends the listing.
   */
  private async list<T>(
    endpoint: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    request: Record<string, unknown> = {},
  ): Promise<T[]> {
    const out: T[] = [];
    let previous: string | undefined;
    for (let page = 1; page <= this.maxPages; page++) {
      let data: unknown;
      try {
        data = await this.call(endpoint, request, { page, per_page: this.pageSize });
      } catch (e) {
        if (page > 1 && isEndOfPages(e)) {
          this.logger.debug(`${endpoint}: no more pages after page ${page - 1}`);
          break;
        }
        throw e;
      }
      const records = asRecords(data);
      const signature = JSON.stringify(records);
      if (records.length && signature === previous) {
        this.logger.warn(`${endpoint}: page ${page} repeats page ${page - 1}; stopping`);
        break;
      }
      previous = signature;
      out.push(...this.parseList(endpoint, schema, records));
      if (records.length < this.pageSize) break;
      if (page === this.maxPages) this.logger.warn(`${endpoint}: stopped at ${this.maxPages} pages`);
    }
    return out;
  }

  private modifyPath(module: string, id?: number) {
    return id === undefined ? `${module}/modify` : `${module}/modify/${id}`;
  }

  async testConnection(): Promise<void> {
    await this.call('users/list', {}, { page: 1, per_page: 1 });
  }

  listUsers() {
    return this.list('users/list', ScoroUserSchema);
  }

  listActivities() {
    return this.list('activities/list', ScoroActivitySchema);
  }

  listCompanies() {
    return this.list('companies/list', ScoroCompanySchema);
  }

  async createCompany(name: string): Promise<RemoteCompany> {
    const data = await this.call('companies/modify', { name });
    const company = this.parseOne('companies/modify', ScoroCompanySchema, data);
    return { ...company, name: company.name || name };
  }

  listProjects() {
    return this.list('projects/list', ScoroProjectSchema);
  }

  async upsertProject(input: ProjectInput, id?: number): Promise<RemoteProject> {
    const endpoint = this.modifyPath('projects', id);
    const project = this.parseOne(endpoint, ScoroProjectSchema, await this.call(endpoint, { ...input }));
    return { ...project, name: project.name || input.project_name };
  }

  listPhases(projectId?: number) {
    const request = projectId === undefined ? {} : { filters: { project_id: projectId } };
    return this.list('projectPhases/list', ScoroPhaseSchema, request);
  }

  async createPhase(input: PhaseInput): Promise<RemotePhase> {
    const phase = this.parseOne('projectPhases/modify', ScoroPhaseSchema, await this.call('projectPhases/modify', { ...input }));
    return { ...phase, projectId: phase.projectId ?? input.project_id, title: phase.title || input.title };
  }

  async upsertTask(input: NormalizedTask, id?: number): Promise<RemoteTask> {
    const endpoint = this.modifyPath('tasks', id);
    const task = this.parseOne(endpoint, ScoroTaskSchema, await this.call(endpoint, { ...input }));
    return { ...task, name: task.name || input.event_name };
  }

  async createComment(input: CommentInput): Promise<RemoteComment> {
    return this.parseOne('comments/modify', ScoroCommentSchema, await this.call('comments/modify', { ...input }));
  }
}
