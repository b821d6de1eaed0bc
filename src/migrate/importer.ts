import { ProjectImportFailure, TaskImportFailure, errorMessage, isTransientError } from '../errors.js';
import type { Logger } from '../log.js';
import type { NormalizedTask, PlannedTask, ProjectInput, ProjectPlan } from '../model.js';
import { nullNotifier, type StatusNotifier } from '../notify.js';
import { isFound } from '../resolve/cache.js';
import type { RunContext } from './context.js';
import type { ProjectOutcome } from './summary.js';

const PROJECT_STATUS = 'inprogress';

/** Copy the plan's counters into the project's outcome. */
export function recordPlan(ctx: RunContext, plan: ProjectPlan): ProjectOutcome {
  const outcome = ctx.summary.project(plan.source.id, plan.source.name);
  outcome.classification = plan.classification;
  outcome.tasks.planned = plan.tasks.length;
  outcome.tasks.excluded = plan.counts.excluded;
  outcome.tasks.deduplicated = plan.counts.deduplicated;
  outcome.tasks.replaced = plan.counts.replaced;
  return outcome;
}

/**
 * Drives one project through
 * ResolveCompany -> UpsertProject -> CreatePhases -> ImportTasks -> Done,
 * or to Failed when the project itself cannot be written.
 */
export class ProjectImporter {
  constructor(
    private ctx: RunContext,
    private notifier: StatusNotifier = nullNotifier,
  ) {}

  private get fallbackUserId() {
    return this.ctx.settings.fallbackUserId;
  }

  /** Run a lookup whose failure only costs an optional field. */
  private async soft<T>(logger: Logger, what: string, fn: () => Promise<T>): Promise<T | undefined> {
    try {
      return await fn();
    } catch (e) {
      logger.warn(`${what} failed; continuing without it`, errorMessage(e));
      return undefined;
    }
  }

  private async userOrFallback(logger: Logger, name: string | undefined): Promise<number> {
    if (!name?.trim()) return this.fallbackUserId;
    const r = await this.soft(logger, `user lookup "${name}"`, () => this.ctx.users.resolve(name));
    return r !== undefined && isFound(r) ? r : this.fallbackUserId;
  }

  async import(plan: ProjectPlan): Promise<ProjectOutcome> {
    const { summary } = this.ctx;
    const project = plan.source;
    const logger = this.ctx.logger.child(project.name || project.id);
    const outcome = recordPlan(this.ctx, plan);

    await this.notifier.notify(project.id, project.name, 'Phase3');

    // ResolveCompany
    outcome.state = 'ResolveCompany';
    let companyId: number | undefined;
    if (plan.companyName) {
      const companyName = plan.companyName;
      const r = await this.soft(logger, `company "${companyName}"`, () => this.ctx.companies.resolve(companyName));
      if (r !== undefined && isFound(r)) companyId = r;
      else logger.warn(`no company for "${companyName}"; project created without one`);
    }
    outcome.companyId = companyId;

    // UpsertProject
    outcome.state = 'UpsertProject';
    let projectId: number;
    try {
      projectId = await this.upsertProject(plan, companyId, logger);
    } catch (e) {
      const failure = new ProjectImportFailure(
        `could not create project "${project.name}": ${errorMessage(e)}`,
        project.id,
        'UpsertProject',
        { cause: e },
      );
      logger.error(failure.message);
      outcome.state = 'Failed';
      summary.recordFailure({
        projectId: project.id,
        projectName: project.name,
        stage: 'UpsertProject',
        message: failure.message,
      });
      return outcome;
    }
    outcome.destinationId = projectId;

    // CreatePhases
    outcome.state = 'CreatePhases';
    await this.createPhases(plan, projectId, outcome, logger);

    // ImportTasks
    outcome.state = 'ImportTasks';
    for (const task of plan.tasks) {
      summary.taskAttempted();
      try {
        await this.importTask(task, plan, projectId, outcome, logger);
      } catch (e) {
        logger.error(`task "${task.name}" failed`, errorMessage(e));
        summary.taskFailed({
          projectId: project.id,
          projectName: project.name,
          taskId: task.sourceId,
          taskName: task.name,
          stage: 'ImportTasks',
          message: errorMessage(e),
        });
      }
    }

    outcome.state = 'Done';
    logger.info(
      `done: ${outcome.tasks.created}/${outcome.tasks.planned} tasks, ${outcome.tasks.failed} failed`,
    );
    return outcome;
  }

  private async upsertProject(plan: ProjectPlan, companyId: number | undefined, logger: Logger): Promise<number> {
    const { executor, destination, settings, projects } = this.ctx;
    const name = plan.source.name;
    const managerId = await this.userOrFallback(logger, plan.managerName);

    let existingId: number | undefined;
    if (settings.reuseExistingProjects) {
      const r = await this.soft(logger, `project lookup "${name}"`, () => projects.resolve(name));
      if (r !== undefined && isFound(r)) {
        existingId = r;
        logger.info(`reusing destination project ${existingId}`);
      }
    }

    const input: ProjectInput = {
      project_name: name,
      company_id: companyId,
      manager_id: managerId,
      status: PROJECT_STATUS,
      deadline: plan.deadline,
      date: plan.startDate,
      description: plan.description,
    };
    const saved = await executor.execute('projects/modify', () => destination.upsertProject(input, existingId));
    projects.remember({ ...saved, name });
    return saved.id;
  }

  private async createPhases(plan: ProjectPlan, projectId: number, outcome: ProjectOutcome, logger: Logger) {
    const { executor, destination, phases, summary } = this.ctx;
    for (const wanted of plan.phases) {
      const existing = await this.soft(logger, `phase lookup "${wanted.title}"`, () => phases.resolve(wanted.title, projectId));
      if (existing !== undefined && isFound(existing)) continue;
      try {
        const created = await executor.execute('projectPhases/modify', () =>
          destination.createPhase({
            project_id: projectId,
            type: wanted.type,
            title: wanted.title,
            start_date: wanted.startDate,
            end_date: wanted.endDate,
          }),
        );
        phases.remember({ ...created, title: wanted.title }, projectId);
        outcome.phases.created++;
      } catch (e) {
        outcome.phases.failed++;
        logger.warn(`phase "${wanted.title}" not created; its tasks get no phase`, errorMessage(e));
        summary.recordFailure({
          projectId: plan.source.id,
          projectName: plan.source.name,
          stage: 'CreatePhases',
          message: `phase "${wanted.title}": ${errorMessage(e)}`,
        });
      }
    }
  }

  /** Owner and assignees are all the fallback user. */
  private onlyFallback(payload: NormalizedTask) {
    return payload.owner_id === this.fallbackUserId && payload.related_users.every((u) => u === this.fallbackUserId);
  }

  async buildTask(task: PlannedTask, projectId: number, logger: Logger): Promise<NormalizedTask> {
    const { activities, users, phases } = this.ctx;

    const activityId = await this.soft(logger, `activity "${task.activityName}"`, () => activities.resolveOrDefault(task.activityName));

    const assignees = (await this.soft(logger, 'assignee lookup', () => users.resolveMany(task.assigneeNames))) ?? [];
    if (task.assigneeNames.length && !assignees.length) {
      logger.warn(`no assignee of "${task.name}" resolved; using fallback user`);
    }
    const ownerId = await this.userOrFallback(logger, task.ownerName);

    let phaseId: number | undefined;
    if (task.phaseName) {
      const phaseName = task.phaseName;
      const r = await this.soft(logger, `phase "${phaseName}"`, () => phases.resolve(phaseName, projectId));
      if (r !== undefined && isFound(r)) phaseId = r;
    }

    return {
      event_name: task.name,
      project_id: projectId,
      project_phase_id: phaseId,
      activity_id: activityId,
      owner_id: ownerId,
      related_users: assignees.length ? assignees : [this.fallbackUserId],
      is_completed: task.isCompleted,
      status: task.status,
      description: task.description,
      datetime_completed: task.datetimeCompleted,
      datetime_due: task.datetimeDue,
      start_datetime: task.startDatetime,
      priority_id: task.priorityId,
      duration_planned: task.durationPlanned,
      duration_actual: task.durationActual,
    };
  }

  private async importTask(
    task: PlannedTask,
    plan: ProjectPlan,
    projectId: number,
    outcome: ProjectOutcome,
    logger: Logger,
  ) {
    const { executor, destination, summary } = this.ctx;
    const payload = await this.buildTask(task, projectId, logger);

    let taskId: number;
    try {
      taskId = (await executor.execute('tasks/modify', () => destination.upsertTask(payload))).id;
    } catch (e) {
      if (isTransientError(e) || this.onlyFallback(payload)) {
        throw new TaskImportFailure(errorMessage(e), task.sourceId, { cause: e });
      }
      // a listed user may still be refused on assignment; one retry with the fallback user
      logger.warn(`"${task.name}" rejected with resolved users; retrying with fallback user`, errorMessage(e));
      const retry: NormalizedTask = { ...payload, owner_id: this.fallbackUserId, related_users: [this.fallbackUserId] };
      try {
        taskId = (await executor.execute('tasks/modify', () => destination.upsertTask(retry))).id;
      } catch (e2) {
        throw new TaskImportFailure(errorMessage(e2), task.sourceId, { cause: e2 });
      }
    }
    summary.taskSucceeded(plan.source.id);

    for (const comment of task.comments) {
      const userId = await this.userOrFallback(logger, comment.authorName);
      try {
        await executor.execute('comments/modify', () =>
          destination.createComment({ module: 'tasks', object_id: taskId, comment: comment.text, user_id: userId }),
        );
        outcome.comments.created++;
      } catch (e) {
        outcome.comments.failed++;
        logger.warn(`comment ${comment.id} on "${task.name}" not created`, errorMessage(e));
        summary.recordFailure({
          projectId: plan.source.id,
          projectName: plan.source.name,
          taskId: task.sourceId,
          taskName: task.name,
          stage: 'comment',
          message: errorMessage(e),
        });
      }
    }
  }
}
