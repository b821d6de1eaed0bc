import { z } from 'zod';
import { customField } from '../fields.js';
import { requestJson, type FetchLike } from '../http.js';
import type { SourceComment } from '../model.js';
import type { SourceProjectHeader, SourceProvider, SourceTaskRecord } from './source.js';

export interface AsanaProviderOptions {
  accessToken: string;
  /** Default workspace for name lookups. */
  workspaceId?: string;
  baseUrl?: string;
  pageSize?: number;
  timeoutMs?: number;
  /** Inject fetch for tests */
  fetcher?: FetchLike;
}

const TASK_FIELDS = [
  'gid',
  'name',
  'notes',
  'html_notes',
  'due_on',
  'due_at',
  'start_on',
  'assignee.name',
  'created_by.name',
  'completed',
  'completed_at',
  'created_at',
  'custom_fields.name',
  'custom_fields.display_value',
  'custom_fields.text_value',
  'custom_fields.number_value',
  'custom_fields.enum_value.name',
  'custom_fields.date_value.date',
  'memberships.project.gid',
  'memberships.section.name',
  'resource_subtype',
].join(',');

const PROJECT_FIELDS = 'gid,name,notes,start_on,due_on';

const OptStr = z
  .string()
  .nullish()
  .transform((v) => v ?? undefined);

const Named = z
  .object({ gid: OptStr, name: OptStr })
  .nullish()
  .transform((v) => v ?? undefined);

const CustomFieldSchema = z.object({
  name: OptStr,
  display_value: OptStr,
  text_value: OptStr,
  number_value: z.number().nullish(),
  enum_value: Named,
  date_value: z
    .object({ date: OptStr })
    .nullish()
    .transform((v) => v ?? undefined),
});

type AsanaCustomField = z.infer<typeof CustomFieldSchema>;

function fieldValue(f: AsanaCustomField): string | undefined {
  const v =
    f.display_value ??
    f.text_value ??
    f.enum_value?.name ??
    (f.number_value !== null && f.number_value !== undefined ? String(f.number_value) : undefined) ??
    f.date_value?.date;
  return v?.trim() ? v.trim() : undefined;
}

const AsanaProjectSchema = z.object({
  gid: z.string(),
  name: z.string().default(''),
  notes: OptStr,
  start_on: OptStr,
  due_on: OptStr,
});

export const AsanaTaskSchema = z.object({
  gid: z.string(),
  name: z.string().default(''),
  notes: OptStr,
  html_notes: OptStr,
  due_on: OptStr,
  due_at: OptStr,
  start_on: OptStr,
  assignee: Named,
  created_by: Named,
  completed: z.boolean().default(false),
  completed_at: OptStr,
  created_at: OptStr,
  custom_fields: z.array(CustomFieldSchema).nullish(),
  memberships: z
    .array(z.object({ project: Named, section: Named }))
    .nullish(),
  resource_subtype: OptStr,
});

const AsanaStorySchema = z.object({
  gid: z.string(),
  type: OptStr,
  resource_subtype: OptStr,
  text: OptStr,
  created_at: OptStr,
  created_by: Named,
});

const PageSchema = z.object({
  data: z.array(z.unknown()),
  next_page: z
    .object({ offset: z.string() })
    .nullish(),
});

const SingleSchema = z.object({ data: z.unknown() });

function toHeader(p: z.infer<typeof AsanaProjectSchema>): SourceProjectHeader {
  return { id: p.gid, name: p.name, notes: p.notes, startOn: p.start_on, dueOn: p.due_on };
}

export type AsanaTask = z.infer<typeof AsanaTaskSchema>;

export function toTaskRecord(raw: AsanaTask, projectId: string): SourceTaskRecord {
  const customFields: Record<string, string> = {};
  for (const f of raw.custom_fields ?? []) {
    const value = fieldValue(f);
    if (f.name && value !== undefined) customFields[f.name] = value;
  }

  const memberships = raw.memberships ?? [];
  const membership = memberships.find((m) => m.project?.gid === projectId) ?? memberships[0];

  return {
    id: raw.gid,
    name: raw.name.trim(),
    assigneeNames: raw.assignee?.name ? [raw.assignee.name] : [],
    creatorName: raw.created_by?.name,
    categoryLabel: customField(customFields, 'Category', 'Activity Type') ?? '',
    completed: raw.completed,
    completedAt: raw.completed_at ?? null,
    createdAt: raw.created_at,
    dueOn: raw.due_on ?? raw.due_at,
    startOn: raw.start_on,
    notes: raw.html_notes ?? raw.notes,
    section: membership?.section?.name?.trim() || undefined,
    isMilestone: raw.resource_subtype === 'milestone',
    customFields,
  };
}

export class AsanaProvider implements SourceProvider {
  readonly name = 'asana';
  private baseUrl: string;
  private fetcher: FetchLike;
  private pageSize: number;

  constructor(private opts: AsanaProviderOptions) {
    this.baseUrl = (opts.baseUrl ?? 'https://app.asana.com/api/1.0').replace(/\/+$/, '');
    this.fetcher = opts.fetcher ?? fetch;
    this.pageSize = opts.pageSize ?? 100;
  }

  private get<T>(path: string, query: Record<string, string | number | boolean | undefined> = {}) {
    return requestJson<T>(
      `${this.baseUrl}${path}`,
      {
        headers: { authorization: `Bearer ${this.opts.accessToken}` },
        query,
        timeoutMs: this.opts.timeoutMs,
      },
      this.fetcher,
    );
  }

  private async one<T>(path: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, query?: Record<string, string>) {
    const body = SingleSchema.parse(await this.get<unknown>(path, query));
    return schema.parse(body.data);
  }

  /** Follow `next_page.offset` until exhausted. */
  private async paged<T>(
    path: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    query: Record<string, string | number | boolean | undefined> = {},
  ): Promise<T[]> {
    const out: T[] = [];
    let offset: string | undefined;
    do {
      const page = PageSchema.parse(await this.get<unknown>(path, { ...query, limit: this.pageSize, offset }));
      for (const item of page.data) out.push(schema.parse(item));
      offset = page.next_page?.offset;
    } while (offset);
    return out;
  }

  async testConnection(): Promise<void> {
    await this.get<unknown>('/users/me', { opt_fields: 'gid,name' });
  }

  async getProject(id: string): Promise<SourceProjectHeader> {
    return toHeader(await this.one(`/projects/${encodeURIComponent(id)}`, AsanaProjectSchema, { opt_fields: PROJECT_FIELDS }));
  }

  async findProjectByName(name: string, workspaceId = this.opts.workspaceId): Promise<SourceProjectHeader | undefined> {
    const wanted = name.trim();
    const workspaces = workspaceId
      ? [workspaceId]
      : (await this.paged('/workspaces', z.object({ gid: z.string() }), { opt_fields: 'gid' })).map((w) => w.gid);

    for (const ws of workspaces) {
      const projects = await this.paged(`/workspaces/${encodeURIComponent(ws)}/projects`, AsanaProjectSchema, {
        archived: false,
        opt_fields: PROJECT_FIELDS,
      });
      const hit =
        projects.find((p) => p.name.trim() === wanted) ??
        projects.find((p) => p.name.trim().toLowerCase() === wanted.toLowerCase());
      if (hit) return toHeader(hit);
    }
    return undefined;
  }

  async listProjectTasks(projectId: string): Promise<SourceTaskRecord[]> {
    const raw = await this.paged(`/projects/${encodeURIComponent(projectId)}/tasks`, AsanaTaskSchema, {
      opt_fields: TASK_FIELDS,
    });
    return raw.map((t) => toTaskRecord(t, projectId));
  }

  async listTaskComments(taskId: string): Promise<SourceComment[]> {
    const stories = await this.paged(`/tasks/${encodeURIComponent(taskId)}/stories`, AsanaStorySchema, {
      opt_fields: 'gid,type,resource_subtype,text,created_at,created_by.name',
    });
    return stories
      .filter((s) => s.type === 'comment' || s.resource_subtype === 'comment_added')
      .filter((s) => s.text?.trim())
      .map((s) => ({ id: s.gid, authorName: s.created_by?.name, text: s.text ?? '', createdAt: s.created_at }));
  }
}
