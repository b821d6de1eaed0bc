import type { SourceComment, SourceTask } from '../model.js';

export interface SourceProjectHeader {
  id: string;
  name: string;
  notes?: string;
  startOn?: string;
  dueOn?: string;
}

/** A task as the source lists it; comments and project identity are attached by the exporter. */
export type SourceTaskRecord = Omit<SourceTask, 'comments' | 'projectId' | 'projectName'>;

export interface SourceProvider {
  readonly name: string;

  /** Cheap authenticated call; throws on bad credentials or no connectivity. */
  testConnection(): Promise<void>;

  getProject(id: string): Promise<SourceProjectHeader>;

  /** Search by display name, optionally inside one workspace. */
  findProjectByName(name: string, workspaceId?: string): Promise<SourceProjectHeader | undefined>;

  /** Tasks in the project's own order. */
  listProjectTasks(projectId: string): Promise<SourceTaskRecord[]>;

  listTaskComments(taskId: string): Promise<SourceComment[]>;
}
