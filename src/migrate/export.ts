import { errorMessage } from '../errors.js';
import { createLogger, type Logger } from '../log.js';
import type { ProjectClassification, ProjectRef, SourceProject, SourceTask } from '../model.js';
import type { SourceProvider } from '../providers/source.js';
import type { RateLimitedExecutor } from '../retry.js';
import type { ExportStore } from '../store/exportStore.js';
import { classifyProject } from './classify.js';

export class ProjectNotFoundError extends Error {
  constructor(public readonly ref: ProjectRef) {
    super(`Source project not found by ${ref.by}: "${ref.value}"`);
    this.name = 'ProjectNotFoundError';
  }
}

export interface ExporterOptions {
  source: SourceProvider;
  executor: RateLimitedExecutor;
  teamMembers?: string[];
  classificationOverrides?: Record<string, ProjectClassification>;
  workspaceId?: string;
  /** Write each exported project to disk. */
  store?: ExportStore;
  logger?: Logger;
}

/** Pulls one project with its tasks and comments out of the source. */
export class ProjectExporter {
  private logger: Logger;

  constructor(private opts: ExporterOptions) {
    this.logger = opts.logger ?? createLogger('silent');
  }

  private async header(ref: ProjectRef) {
    const { source, executor } = this.opts;
    if (ref.by === 'gid') return executor.execute(`projects/${ref.value}`, () => source.getProject(ref.value));
    const found = await executor.execute(`projects?name=${ref.value}`, () =>
      source.findProjectByName(ref.value, this.opts.workspaceId),
    );
    if (!found) throw new ProjectNotFoundError(ref);
    return found;
  }

  async export(ref: ProjectRef): Promise<SourceProject> {
    const { source, executor } = this.opts;
    const header = await this.header(ref);
    const records = await executor.execute(`projects/${header.id}/tasks`, () => source.listProjectTasks(header.id));

    const tasks: SourceTask[] = [];
    for (const r of records) {
      let comments: SourceTask['comments'] = [];
      try {
        comments = await executor.execute(`tasks/${r.id}/stories`, () => source.listTaskComments(r.id));
      } catch (e) {
        this.logger.warn(`comments for task ${r.id} unavailable`, errorMessage(e));
      }
      tasks.push({ ...r, comments, projectId: header.id, projectName: header.name });
    }

    const classification = classifyProject(header, {
      teamMembers: this.opts.teamMembers,
      overrides: this.opts.classificationOverrides,
    });

    const project: SourceProject = { ...header, classification, tasks };
    this.logger.info(`exported "${header.name}" (${header.id}): ${tasks.length} tasks, ${classification}`);

    if (this.opts.store) {
      try {
        const file = await this.opts.store.save(project);
        this.logger.debug(`export snapshot written to ${file}`);
      } catch (e) {
        this.logger.warn(`could not write export snapshot for ${header.id}`, errorMessage(e));
      }
    }
    return project;
  }
}
