import { FatalConfigError, errorMessage, isAuthError } from '../errors.js';
import type { ProjectPlan, ProjectRef, SourceProject } from '../model.js';
import { nullNotifier, type StatusNotifier } from '../notify.js';
import type { SourceProvider } from '../providers/source.js';
import type { ExportStore } from '../store/exportStore.js';
import { acquireLock, type LockHandle } from '../store/lock.js';
import type { RunContext } from './context.js';
import { ProjectExporter } from './export.js';
import { ProjectImporter, recordPlan } from './importer.js';
import type { MigrationReport } from './summary.js';
import { planProject, reserveProject, type PlanContext } from './transform.js';

export interface MigrationEngineOptions {
  source: SourceProvider;
  context: RunContext;
  notifier?: StatusNotifier;
  /** Save every exported project here. */
  exportStore?: ExportStore;
  /** Directory holding the run lock; no lock when omitted. */
  lockDir?: string;
  workspaceId?: string;
}

export class MigrationEngine {
  private notifier: StatusNotifier;

  constructor(private opts: MigrationEngineOptions) {
    this.notifier = opts.notifier ?? nullNotifier;
  }

  private async checkConnectivity() {
    const { source, context } = this.opts;
    const checkConnection = async (what: string, call: () => Promise<void>) => {
      try {
        await context.executor.execute(`${what}:ping`, call);
      } catch (e) {
        const reason = isAuthError(e) ? 'credentials were rejected' : 'is unreachable';
        throw new FatalConfigError(`${what} ${reason}: ${errorMessage(e)}`);
      }
    };
    await checkConnection(source.name, () => source.testConnection());
    if (!context.settings.dryRun) {
      await checkConnection(context.destination.name, () => context.destination.testConnection());
    }
  }

  private async exportAll(refs: ProjectRef[]): Promise<SourceProject[]> {
    const { context: ctx } = this.opts;
    const exporter = new ProjectExporter({
      source: this.opts.source,
      executor: ctx.executor,
      teamMembers: ctx.settings.teamMembers,
      classificationOverrides: ctx.settings.classificationOverrides,
      workspaceId: this.opts.workspaceId,
      store: this.opts.exportStore,
      logger: ctx.logger.child('export'),
    });

    const projects: SourceProject[] = [];
    const seen = new Set<string>();
    for (const ref of refs) {
      await this.notifier.notify(ref.value, ref.value, 'Phase1');
      try {
        const project = await exporter.export(ref);
        if (seen.has(project.id)) {
          ctx.logger.warn(`project ${project.id} listed twice; ignoring the repeat`);
          continue;
        }
        seen.add(project.id);
        projects.push(project);
      } catch (e) {
        ctx.logger.error(`export of ${ref.by} "${ref.value}" failed`, errorMessage(e));
        ctx.summary.project(ref.value).state = 'Failed';
        ctx.summary.recordFailure({
          projectId: ref.value,
          projectName: ref.value,
          stage: 'export',
          message: errorMessage(e),
        });
      }
    }
    return projects;
  }

  private planAll(projects: SourceProject[]): ProjectPlan[] {
    const { context: ctx } = this.opts;
    const planCtx: PlanContext = {
      ledger: ctx.ledger,
      mapper: ctx.mapper,
      cutoffDate: ctx.settings.cutoffDate,
      logger: ctx.logger.child('plan'),
    };

    // every project claims its tasks before any plan is cut
    for (const p of projects) reserveProject(p, planCtx);
    ctx.ledger.seal();
    ctx.summary.applyDedup(ctx.ledger.stats());

    const plans: ProjectPlan[] = [];
    for (const p of projects) {
      try {
        plans.push(planProject(p, planCtx));
      } catch (e) {
        ctx.summary.project(p.id, p.name).state = 'Failed';
        ctx.summary.recordFailure({ projectId: p.id, projectName: p.name, stage: 'plan', message: errorMessage(e) });
      }
    }
    return plans;
  }

  /**
   * Export, plan and import the given projects. Only a FatalConfigError
   * escapes; everything else ends up in the report.
   */
  async run(refs: ProjectRef[]): Promise<MigrationReport> {
    const { context: ctx } = this.opts;
    const lock: LockHandle | undefined = this.opts.lockDir ? await acquireLock(this.opts.lockDir) : undefined;
    try {
      await this.checkConnectivity();

      const projects = await this.exportAll(refs);
      for (const p of projects) await this.notifier.notify(p.id, p.name, 'Phase2');
      const plans = this.planAll(projects);

      if (ctx.settings.dryRun) {
        for (const plan of plans) recordPlan(ctx, plan);
        ctx.logger.info(`dry run: ${plans.length} projects planned, nothing written`);
      } else {
        const importer = new ProjectImporter(ctx, this.notifier);
        for (const plan of plans) {
          try {
            await importer.import(plan);
          } catch (e) {
            ctx.summary.project(plan.source.id, plan.source.name).state = 'Failed';
            ctx.summary.recordFailure({
              projectId: plan.source.id,
              projectName: plan.source.name,
              stage: 'ImportTasks',
              message: errorMessage(e),
            });
          }
        }
      }

      ctx.summary.finish();
      return ctx.summary.toReport();
    } finally {
      await lock?.release();
    }
  }
}
