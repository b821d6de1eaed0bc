import type { CommentInput, NormalizedTask, PhaseInput, PhaseType, ProjectInput } from '../model.js';

/*
 * Typed boundary for destination records. Raw responses are normalized into
 * these shapes by the provider; nothing past this point inspects raw keys.
 */

export interface RemoteUser {
  id: number;
  firstname?: string;
  lastname?: string;
  fullName?: string;
  email?: string;
  isActive: boolean;
}

export interface RemotePhase {
  id: number;
  /** Owning project; absent when the listing did not say. */
  projectId?: number;
  type: PhaseType;
  title: string;
  startDate?: string;
  endDate?: string;
}

export interface RemoteCompany {
  id: number;
  name: string;
}

export interface RemoteProject {
  id: number;
  name: string;
  companyId?: number;
  managerId?: number;
}

export interface RemoteActivity {
  id: number;
  name: string;
  isActive: boolean;
}

export interface RemoteTask {
  id: number;
  name: string;
  projectId?: number;
  phaseId?: number;
}

export interface RemoteComment {
  id: number;
}

export interface DestinationProvider {
  readonly name: string;

  /** Cheap authenticated call; throws on bad credentials or no connectivity. */
  testConnection(): Promise<void>;

  listUsers(): Promise<RemoteUser[]>;
  listActivities(): Promise<RemoteActivity[]>;

  listCompanies(): Promise<RemoteCompany[]>;
  /** Create a company with the minimal required fields. */
  createCompany(name: string): Promise<RemoteCompany>;

  listProjects(): Promise<RemoteProject[]>;
  upsertProject(input: ProjectInput, id?: number): Promise<RemoteProject>;

  /**
   * List phases. The project filter is forwarded, but the remote is known to
   * ignore it: callers must filter by `projectId` themselves.
   */
  listPhases(projectId?: number): Promise<RemotePhase[]>;
  createPhase(input: PhaseInput): Promise<RemotePhase>;

  upsertTask(input: NormalizedTask, id?: number): Promise<RemoteTask>;
  createComment(input: CommentInput): Promise<RemoteComment>;
}
