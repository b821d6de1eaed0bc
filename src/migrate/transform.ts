import {
  customField,
  customFieldExact,
  dateRange,
  parsePriority,
  stripHtml,
  toDateOnly,
  toDateTime,
  toDuration,
} from '../fields.js';
import { createLogger, type Logger } from '../log.js';
import type { PhaseSpec, PlannedTask, ProjectPlan, SourceProject, SourceTask, TaskStatusCode } from '../model.js';
import type { CategoryMapper } from './categories.js';
import type { DedupLedger } from './dedup.js';

export interface PlanContext {
  ledger: DedupLedger;
  mapper: CategoryMapper;
  /** Tasks created before this date are skipped unless assigned and due. */
  cutoffDate?: string;
  logger?: Logger;
}

const COMPANY_SCAN_LIMIT = 10;

export type Eligibility = 'ok' | 'unnamed' | 'before-cutoff' | 'milestone';

export function eligibility(task: SourceTask, cutoffDate?: string): Eligibility {
  if (!task.name.trim()) return 'unnamed';
  if (task.isMilestone) return 'milestone';
  if (cutoffDate && task.createdAt) {
    const created = Date.parse(task.createdAt);
    const cutoff = Date.parse(cutoffDate);
    if (Number.isFinite(created) && Number.isFinite(cutoff) && created < cutoff) {
      if (!(task.assigneeNames.length > 0 && task.dueOn)) return 'before-cutoff';
    }
  }
  return 'ok';
}

/**
 * First pass: claim every eligible task of `project` in the ledger.
 * Must run for all projects before any `planProject` call.
 */
export function reserveProject(project: SourceProject, ctx: PlanContext): void {
  for (const task of project.tasks) {
    if (eligibility(task, ctx.cutoffDate) !== 'ok') continue;
    ctx.ledger.reserve(task.id, {
      projectId: project.id,
      projectName: project.name,
      classification: project.classification,
    });
  }
}

function managerField(fields: Record<string, string>) {
  return customField(fields, 'PM Name') ?? customFieldExact(fields, 'PM');
}

/** Most frequent PM name over the project's tasks; ties go to the first seen. */
export function projectManager(tasks: SourceTask[]): string | undefined {
  const counts = new Map<string, number>();
  for (const t of tasks) {
    const pm = managerField(t.customFields);
    if (pm) counts.set(pm, (counts.get(pm) ?? 0) + 1);
  }
  let best: string | undefined;
  let bestCount = 0;
  for (const [name, count] of counts) {
    if (count > bestCount) {
      best = name;
      bestCount = count;
    }
  }
  return best;
}

export function companyName(project: SourceProject): string | undefined {
  if (project.classification === 'client') return project.name.trim() || undefined;
  for (const t of project.tasks.slice(0, COMPANY_SCAN_LIMIT)) {
    const name = customField(t.customFields, 'C-Name', 'Company Name');
    if (name) return name;
  }
  return undefined;
}

export function completionOf(task: SourceTask): {
  status: TaskStatusCode;
  isCompleted: boolean;
  datetimeCompleted?: string;
} {
  if (!task.completed) return { status: 'task_status1', isCompleted: false };
  // the destination refuses "done" without recorded time
  const actual = customField(task.customFields, 'Actual time');
  if (task.completedAt && actual) {
    return { status: 'task_status4', isCompleted: true, datetimeCompleted: toDateTime(task.completedAt) };
  }
  return { status: 'task_status2', isCompleted: false };
}

export function planTask(task: SourceTask, mapper: CategoryMapper): PlannedTask {
  const description = stripHtml(task.notes);
  return {
    sourceId: task.id,
    name: task.name.trim(),
    description: description || undefined,
    activityName: mapper.map(task.categoryLabel),
    assigneeNames: task.assigneeNames.filter((n) => n.trim()),
    ownerName: managerField(task.customFields) ?? task.creatorName,
    phaseName: task.section?.trim() || undefined,
    ...completionOf(task),
    datetimeDue: toDateTime(task.dueOn),
    startDatetime: toDateTime(task.startOn),
    priorityId: parsePriority(customField(task.customFields, 'Priority')),
    durationPlanned: toDuration(customField(task.customFields, 'Estimated time')),
    durationActual: toDuration(customField(task.customFields, 'Actual time')),
    comments: task.comments.filter((c) => c.text.trim()),
  };
}

function phasesOf(project: SourceProject, kept: SourceTask[]): PhaseSpec[] {
  const sections = new Map<string, SourceTask[]>();
  for (const t of kept) {
    const section = t.section?.trim();
    if (!section) continue;
    const list = sections.get(section);
    if (list) list.push(t);
    else sections.set(section, [t]);
  }

  const phases: PhaseSpec[] = [];
  for (const [title, tasks] of sections) {
    const { min } = dateRange(tasks.map((t) => toDateOnly(t.startOn) ?? toDateOnly(t.dueOn)));
    const { max } = dateRange(tasks.map((t) => toDateOnly(t.dueOn)));
    phases.push({ title, type: 'phase', startDate: min, endDate: max });
  }

  for (const t of project.tasks) {
    if (!t.isMilestone || !t.name.trim()) continue;
    phases.push({ title: t.name.trim(), type: 'milestone', endDate: toDateOnly(t.dueOn) });
  }
  return phases;
}

/**
 * Second pass: turn an exported project into an import plan.
 * Keeps only the tasks the (sealed) ledger assigns to this project, in
 * source order.
 */
export function planProject(project: SourceProject, ctx: PlanContext): ProjectPlan {
  const logger = ctx.logger ?? createLogger('silent');
  const kept: SourceTask[] = [];
  let excluded = 0;
  let deduplicated = 0;

  for (const task of project.tasks) {
    const e = eligibility(task, ctx.cutoffDate);
    if (e === 'milestone') continue;
    if (e !== 'ok') {
      excluded++;
      logger.debug(`skip task ${task.id} (${e})`);
      continue;
    }
    const owner = ctx.ledger.ownerOf(task.id);
    if (owner && owner.projectId !== project.id) {
      deduplicated++;
      logger.debug(`task ${task.id} belongs to "${owner.projectName}"`);
      continue;
    }
    kept.push(task);
  }

  const starts = dateRange(kept.map((t) => toDateOnly(t.startOn) ?? toDateOnly(t.dueOn)));
  const dues = dateRange(kept.map((t) => toDateOnly(t.dueOn)));
  const description = stripHtml(project.notes);

  return {
    source: project,
    classification: project.classification,
    companyName: companyName(project),
    managerName: projectManager(project.tasks),
    description: description || undefined,
    startDate: toDateOnly(project.startOn) ?? starts.min,
    deadline: toDateOnly(project.dueOn) ?? dues.max,
    phases: phasesOf(project, kept),
    tasks: kept.map((t) => planTask(t, ctx.mapper)),
    counts: {
      written: kept.length,
      excluded,
      deduplicated,
      replaced: ctx.ledger.replacedCount(project.id),
    },
  };
}
